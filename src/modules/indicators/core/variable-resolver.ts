/**
 * Resolves variable ids found in formulas to registry display names.
 */

import { err, ok, type Result } from 'neverthrow';

import type { RegistryError } from './errors.js';
import type { RegistryClient, VariableLookup, VariableNameCache } from './ports.js';
import type { GroupContext, RegistryObject, ResolvedVariable, VariableId } from './types.js';

export interface VariableResolver {
  resolve(id: VariableId): VariableLookup;
}

export interface MakeVariableResolverDeps {
  registry: RegistryClient;
  cache: VariableNameCache;
}

// ─────────────────────────────────────────────────────────────────────────────
// Naming Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * English singular of a registry collection name (`dataElements` → `dataElement`).
 */
export const singularize = (collection: string): string =>
  collection.endsWith('s') && !collection.endsWith('ss') ? collection.slice(0, -1) : collection;

/**
 * Collection segment of an object's self link (`.../api/dataSets/abc` → `dataSets`).
 */
export const collectionFromHref = (href: string): string | null => {
  const segments = href.replace(/\/+$/, '').split('/');
  const collection = segments.at(-2);
  return collection !== undefined && collection !== '' ? collection : null;
};

const readDisplayName = (record: RegistryObject): string | null => {
  const displayName = record['displayName'];
  return typeof displayName === 'string' && displayName !== '' ? displayName : null;
};

// ─────────────────────────────────────────────────────────────────────────────
// Cache
// ─────────────────────────────────────────────────────────────────────────────

/**
 * In-memory variable name cache for a single group scan.
 *
 * The stored value is the lookup promise itself, so concurrent callers share
 * one registry round trip and only ever observe a complete result.
 * Failed lookups are evicted so a later caller can retry.
 */
export const createVariableNameCache = (): VariableNameCache => {
  const store = new Map<VariableId, VariableLookup>();
  let settled = 0;

  return {
    getOrInsert(id, compute) {
      const existing = store.get(id);
      if (existing !== undefined) {
        return existing;
      }

      const lookup = compute().then(
        (result) => {
          if (result.isErr()) {
            store.delete(id);
          } else {
            settled++;
          }
          return result;
        },
        (error: unknown) => {
          store.delete(id);
          throw error;
        }
      );
      store.set(id, lookup);
      return lookup;
    },

    get size() {
      return settled;
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Resolver
// ─────────────────────────────────────────────────────────────────────────────

const NOT_IN_REGISTRY: ResolvedVariable = { outcome: 'NotInRegistry' };

const toResolvedVariable = (
  record: RegistryObject | null,
  collection: string
): ResolvedVariable => {
  const elementType = singularize(collection);
  if (record === null) {
    return { outcome: 'NoMetadata', elementType };
  }
  const displayName = readDisplayName(record);
  return displayName === null
    ? { outcome: 'NoMetadata', elementType }
    : { outcome: 'Resolved', displayName, elementType };
};

/**
 * Members of the scanned group are looked up directly in the group's
 * collection; any other id is first located through the generic
 * identifiable-object lookup.
 */
export const makeVariableResolver = (
  deps: MakeVariableResolverDeps,
  group: GroupContext
): VariableResolver => {
  const { registry, cache } = deps;

  const lookupKnownType = async (
    id: VariableId,
    collection: string
  ): Promise<Result<ResolvedVariable, RegistryError>> => {
    const recordResult = await registry.fetchKnownTypeRecord(collection, id);
    return recordResult.map((record) => toResolvedVariable(record, collection));
  };

  const lookupUnknownType = async (
    id: VariableId
  ): Promise<Result<ResolvedVariable, RegistryError>> => {
    const objectResult = await registry.fetchGenericIdentifiableObject(id);
    if (objectResult.isErr()) {
      return err(objectResult.error);
    }

    const collection =
      objectResult.value === null ? null : collectionFromHref(objectResult.value.href);
    if (collection === null) {
      return ok(NOT_IN_REGISTRY);
    }

    return lookupKnownType(id, collection);
  };

  return {
    resolve(id) {
      return cache.getOrInsert(id, () =>
        group.memberIds.has(id) ? lookupKnownType(id, group.elementType) : lookupUnknownType(id)
      );
    },
  };
};
