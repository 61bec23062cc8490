/**
 * Port interfaces for the indicator audit module.
 */

import type { GroupScanError, RegistryError } from './errors.js';
import type {
  GroupMembers,
  GroupSummary,
  IdentifiableObject,
  IndicatorTypeFactors,
  RegistryObject,
  ResolvedVariable,
  VariableId,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only lookups against the metadata registry.
 * Absence is reported as `ok(null)`; only transport and decoding failures are errors.
 */
export interface RegistryClient {
  /** Record of `id` inside a known collection, e.g. `indicators` */
  fetchKnownTypeRecord(
    elementType: string,
    id: string
  ): Promise<Result<RegistryObject | null, RegistryError>>;

  /** Collection-agnostic lookup used to discover the collection of `id` */
  fetchGenericIdentifiableObject(
    id: string
  ): Promise<Result<IdentifiableObject | null, RegistryError>>;

  fetchIndicatorTypeFactors(): Promise<Result<IndicatorTypeFactors, RegistryError>>;

  fetchGroupMembers(groupId: string): Promise<Result<GroupMembers, GroupScanError>>;

  listIndicatorGroups(): Promise<Result<GroupSummary[], RegistryError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Variable Name Cache
// ─────────────────────────────────────────────────────────────────────────────

export type VariableLookup = Promise<Result<ResolvedVariable, RegistryError>>;

/**
 * Write-once store of variable lookups, shared by concurrent indicator workers.
 */
export interface VariableNameCache {
  /**
   * Returns the lookup stored for `id`, or stores and returns `compute()`.
   * Concurrent callers for the same id share a single lookup.
   */
  getOrInsert(id: VariableId, compute: () => VariableLookup): VariableLookup;

  /** Settled, successful entries */
  readonly size: number;
}
