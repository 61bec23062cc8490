/**
 * Scan a list of groups into one report.
 */

import { getErrorMessage } from '../errors.js';
import { scanGroup, type ScanGroupDeps } from './scan-group.js';

import type { IndicatorGroupReport, IndicatorReport } from '../types.js';

export type BuildIndicatorReportDeps = ScanGroupDeps;

/**
 * Scans groups one after another. A group that cannot be scanned is logged
 * and listed in `failedGroupIds`; the remaining groups are still processed.
 */
export const buildIndicatorReport = async (
  deps: BuildIndicatorReportDeps,
  groupIds: readonly string[]
): Promise<IndicatorReport> => {
  const groups: IndicatorGroupReport[] = [];
  const failedGroupIds: string[] = [];

  for (const groupId of groupIds) {
    const result = await scanGroup(deps, groupId);
    if (result.isErr()) {
      deps.logger.error(
        { groupId, errorType: result.error.type, error: getErrorMessage(result.error) },
        'Failed to output indicators for group'
      );
      failedGroupIds.push(groupId);
      continue;
    }
    groups.push(result.value);
  }

  return { groups, failedGroupIds };
};
