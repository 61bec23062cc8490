/**
 * Validate every indicator of a registry group.
 */

import { err, ok, type Result } from 'neverthrow';

import { getErrorMessage, type GroupScanError } from '../errors.js';
import { makeVariableResolver, createVariableNameCache } from '../variable-resolver.js';
import { runWorkerPool } from '../worker-pool.js';
import { parseFailedRecord, validateIndicator } from './validate-indicator.js';
import {
  DEFAULT_WORKER_CONCURRENCY,
  INDICATORS_COLLECTION,
  type IndicatorGroupReport,
  type IndicatorRecord,
  type IndicatorTypeFactors,
} from '../types.js';

import type { RegistryClient } from '../ports.js';
import type { Logger } from 'pino';

export interface ScanGroupDeps {
  registry: RegistryClient;
  indicatorTypeFactors: IndicatorTypeFactors;
  logger: Logger;
  concurrency?: number;
}

/**
 * Scans one group.
 *
 * Group-level failures (unknown group, missing metadata, registry errors while
 * listing members) are returned as errors. Indicator-level failures never are:
 * they become findings on the affected record. Groups of anything other than
 * indicators yield an empty list.
 *
 * Each scan uses its own variable name cache.
 */
export const scanGroup = async (
  deps: ScanGroupDeps,
  groupId: string
): Promise<Result<IndicatorGroupReport, GroupScanError>> => {
  const log = deps.logger.child({ groupId });

  const membersResult = await deps.registry.fetchGroupMembers(groupId);
  if (membersResult.isErr()) {
    return err(membersResult.error);
  }

  const { elementType, memberIds, displayName } = membersResult.value;
  const report = { groupId, displayName, elementType };

  if (elementType !== INDICATORS_COLLECTION) {
    log.info({ elementType }, 'Skipping group whose members are not indicators');
    return ok({ ...report, indicators: [] });
  }

  const resolver = makeVariableResolver(
    { registry: deps.registry, cache: createVariableNameCache() },
    { elementType, memberIds: new Set(memberIds) }
  );

  log.info({ indicatorCount: memberIds.length }, 'Scanning indicator group');

  const byId = new Map<string, IndicatorRecord>();
  await runWorkerPool(
    memberIds,
    async (indicatorId) => {
      if (byId.has(indicatorId)) {
        return;
      }
      const record = await validateIndicator(
        { registry: deps.registry, resolver, indicatorTypeFactors: deps.indicatorTypeFactors },
        indicatorId,
        (failedId, cause) => {
          log.warn({ indicatorId: failedId, error: getErrorMessage(cause) }, 'Indicator parse failed');
        }
      );
      byId.set(indicatorId, record);
    },
    { concurrency: deps.concurrency ?? DEFAULT_WORKER_CONCURRENCY }
  );

  const indicators = memberIds.map(
    (indicatorId) => byId.get(indicatorId) ?? parseFailedRecord(indicatorId)
  );

  log.info({ indicatorCount: indicators.length }, 'Finished indicator group');
  return ok({ ...report, indicators });
};
