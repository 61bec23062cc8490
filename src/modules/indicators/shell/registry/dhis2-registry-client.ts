/**
 * DHIS2 Web API adapter for the registry port.
 *
 * This is the only file that talks HTTP.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createGroupNotFoundError,
  createHttpError,
  createInvalidGroupError,
  createInvalidResponseError,
  createNetworkError,
  createTimeoutError,
  getErrorMessage,
  isTimeoutError,
  type GroupScanError,
  type RegistryError,
} from '../../core/errors.js';
import { extractNumericFactor } from '../../core/numeric-factor.js';
import { DEFAULT_INDICATOR_TYPE_FACTOR, type GroupMembers } from '../../core/types.js';
import { collectionFromHref } from '../../core/variable-resolver.js';
import { authorizationHeader, type RegistryConnection } from './connection.js';
import {
  groupMemberListValidator,
  identifiableObjectValidator,
  indicatorGroupsValidator,
  indicatorTypesValidator,
  isRegistryObject,
} from './schemas.js';

import type { RegistryClient } from '../../core/ports.js';
import type { IdentifiableObject, RegistryObject } from '../../core/types.js';
import type { Logger } from 'pino';

export type FetchFn = typeof fetch;

export interface MakeDhis2RegistryClientOptions {
  connection: RegistryConnection;
  logger: Logger;
  /** Per-request timeout */
  timeoutMs: number;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
}

const formatDetails = (errors: Iterable<{ path: string; message: string }>): string[] =>
  Array.from(errors, (error) => `${error.path}: ${error.message}`);

export const makeDhis2RegistryClient = (options: MakeDhis2RegistryClientOptions): RegistryClient => {
  const { connection, logger, timeoutMs } = options;
  const fetchFn = options.fetch ?? fetch;

  const headers: Record<string, string> = { accept: 'application/json' };
  const authorization = authorizationHeader(connection.auth);
  if (authorization !== undefined) {
    headers['authorization'] = authorization;
  }

  /**
   * GET `/api/{path}`. A 404 is reported as `ok(null)`.
   */
  const getJson = async (path: string): Promise<Result<unknown, RegistryError>> => {
    const url = `${connection.baseUrl}/api/${path}`;
    logger.debug({ url }, 'Registry request');

    let response: Response;
    try {
      response = await fetchFn(url, { headers, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (isTimeoutError(error)) {
        return err(createTimeoutError(`Registry request to ${url} timed out`, error));
      }
      return err(
        createNetworkError(`Registry request to ${url} failed: ${getErrorMessage(error)}`, error)
      );
    }

    if (!response.ok) {
      // Release the connection; the body is not read
      await response.body?.cancel();
      return response.status === 404 ? ok(null) : err(createHttpError(url, response.status));
    }

    try {
      const body: unknown = await response.json();
      return ok(body);
    } catch (error) {
      return err(
        createInvalidResponseError(`Registry response from ${url} is not valid JSON`, [
          getErrorMessage(error),
        ])
      );
    }
  };

  const fetchKnownTypeRecord = async (
    elementType: string,
    id: string
  ): Promise<Result<RegistryObject | null, RegistryError>> => {
    const result = await getJson(`${encodeURIComponent(elementType)}/${encodeURIComponent(id)}`);
    if (result.isErr()) {
      return err(result.error);
    }
    const body = result.value;
    if (body === null) {
      return ok(null);
    }
    if (!isRegistryObject(body)) {
      return err(createInvalidResponseError(`Record ${elementType}/${id} is not a JSON object`));
    }
    return ok(body);
  };

  const fetchGenericIdentifiableObject = async (
    id: string
  ): Promise<Result<IdentifiableObject | null, RegistryError>> => {
    const result = await getJson(`identifiableObjects/${encodeURIComponent(id)}`);
    if (result.isErr()) {
      return err(result.error);
    }
    const body = result.value;
    if (!identifiableObjectValidator.Check(body)) {
      return ok(null);
    }
    return ok({ id: body.id ?? id, href: body.href });
  };

  return {
    fetchKnownTypeRecord,
    fetchGenericIdentifiableObject,

    async fetchIndicatorTypeFactors() {
      const result = await getJson('indicatorTypes?paging=false&fields=id,displayName,factor');
      if (result.isErr()) {
        return err(result.error);
      }
      const body = result.value;
      if (!indicatorTypesValidator.Check(body)) {
        return err(
          createInvalidResponseError(
            'Registry misconfigured? Missing indicatorTypes',
            formatDetails(indicatorTypesValidator.Errors(body))
          )
        );
      }

      const factors = new Map<string, number>();
      for (const indicatorType of body.indicatorTypes) {
        const factor =
          indicatorType.factor ??
          extractNumericFactor(indicatorType.displayName ?? '', false) ??
          DEFAULT_INDICATOR_TYPE_FACTOR;
        factors.set(indicatorType.id, factor);
      }
      return ok(factors);
    },

    async fetchGroupMembers(groupId): Promise<Result<GroupMembers, GroupScanError>> {
      const objectResult = await fetchGenericIdentifiableObject(groupId);
      if (objectResult.isErr()) {
        return err(objectResult.error);
      }
      const collection =
        objectResult.value === null ? null : collectionFromHref(objectResult.value.href);
      if (collection === null) {
        return err(createGroupNotFoundError(groupId));
      }

      const recordResult = await fetchKnownTypeRecord(collection, groupId);
      if (recordResult.isErr()) {
        return err(recordResult.error);
      }
      const record = recordResult.value;
      if (record === null) {
        return err(createGroupNotFoundError(groupId));
      }

      const displayName = record['displayName'];
      if (typeof displayName !== 'string' || displayName === '') {
        return err(createInvalidGroupError(groupId, 'missing display name'));
      }

      const elementType = collection.replace(/Group/g, '');
      if (elementType === collection) {
        return err(createInvalidGroupError(groupId, `${collection} is not a group collection`));
      }

      const members = record[elementType];
      if (!groupMemberListValidator.Check(members)) {
        return err(createInvalidGroupError(groupId, `missing ${elementType} list`));
      }

      return ok({
        elementType,
        memberIds: members.map((member) => member.id),
        displayName,
      });
    },

    async listIndicatorGroups() {
      const result = await getJson('indicatorGroups?paging=false&fields=id,displayName');
      if (result.isErr()) {
        return err(result.error);
      }
      const body = result.value;
      if (!indicatorGroupsValidator.Check(body)) {
        return err(
          createInvalidResponseError(
            'Unexpected indicator group list',
            formatDetails(indicatorGroupsValidator.Errors(body))
          )
        );
      }
      return ok(
        body.indicatorGroups.flatMap((group) =>
          group.displayName !== undefined ? [{ id: group.id, displayName: group.displayName }] : []
        )
      );
    },
  };
};
