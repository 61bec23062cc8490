import { ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { createTimeoutError } from '@/modules/indicators/core/errors.js';
import {
  collectionFromHref,
  createVariableNameCache,
  makeVariableResolver,
  singularize,
} from '@/modules/indicators/core/variable-resolver.js';

import { makeFakeRegistry, type FakeRegistryOptions } from '../../fixtures/fakes.js';

import type { ResolvedVariable } from '@/modules/indicators/core/types.js';

const RECORDS: FakeRegistryOptions['records'] = {
  indicators: { ind1: { id: 'ind1', displayName: 'Indicator One' } },
  dataElements: {
    de1: { id: 'de1', displayName: 'Cases Total' },
    de2: { id: 'de2' },
  },
};

const setup = (options: FakeRegistryOptions = {}) => {
  const fake = makeFakeRegistry({ records: RECORDS, ...options });
  const cache = createVariableNameCache();
  const resolver = makeVariableResolver(
    { registry: fake.client, cache },
    { elementType: 'indicators', memberIds: new Set(['ind1']) }
  );
  return { ...fake, cache, resolver };
};

describe('singularize', () => {
  it('drops a trailing s', () => {
    expect(singularize('dataElements')).toBe('dataElement');
    expect(singularize('indicators')).toBe('indicator');
  });

  it('keeps words ending in ss or without s', () => {
    expect(singularize('class')).toBe('class');
    expect(singularize('dataSet')).toBe('dataSet');
  });
});

describe('collectionFromHref', () => {
  it('returns the segment before the id', () => {
    expect(collectionFromHref('https://registry.test/api/dataSets/abc')).toBe('dataSets');
    expect(collectionFromHref('https://registry.test/api/dataSets/abc/')).toBe('dataSets');
  });

  it('returns null without a collection segment', () => {
    expect(collectionFromHref('abc')).toBeNull();
  });
});

describe('makeVariableResolver', () => {
  it('looks up group members directly in the group collection', async () => {
    const { resolver, calls } = setup();

    const result = await resolver.resolve('ind1');

    expect(result._unsafeUnwrap()).toEqual({
      outcome: 'Resolved',
      displayName: 'Indicator One',
      elementType: 'indicator',
    });
    expect(calls.generic).toEqual([]);
    expect(calls.knownType).toEqual(['indicators/ind1']);
  });

  it('locates other ids through the generic lookup', async () => {
    const { resolver, calls } = setup();

    const result = await resolver.resolve('de1');

    expect(result._unsafeUnwrap()).toEqual({
      outcome: 'Resolved',
      displayName: 'Cases Total',
      elementType: 'dataElement',
    });
    expect(calls.generic).toEqual(['de1']);
    expect(calls.knownType).toEqual(['dataElements/de1']);
  });

  it('reports ids unknown to the registry', async () => {
    const { resolver } = setup();

    const result = await resolver.resolve('nope');

    expect(result._unsafeUnwrap()).toEqual({ outcome: 'NotInRegistry' });
  });

  it('reports records without a display name', async () => {
    const { resolver } = setup();

    const result = await resolver.resolve('de2');

    expect(result._unsafeUnwrap()).toEqual({ outcome: 'NoMetadata', elementType: 'dataElement' });
  });

  it('queries the registry once per id', async () => {
    const { resolver, calls, cache } = setup();

    const [first, second] = await Promise.all([resolver.resolve('de1'), resolver.resolve('de1')]);
    await resolver.resolve('de1');

    expect(first).toBe(second);
    expect(calls.generic).toEqual(['de1']);
    expect(cache.size).toBe(1);
  });

  it('does not cache failed lookups', async () => {
    const { resolver, calls, cache } = setup({
      failures: { de1: createTimeoutError('timed out') },
    });

    expect((await resolver.resolve('de1')).isErr()).toBe(true);
    expect((await resolver.resolve('de1')).isErr()).toBe(true);

    expect(calls.generic).toEqual(['de1', 'de1']);
    expect(cache.size).toBe(0);
  });
});

describe('createVariableNameCache', () => {
  const resolved: ResolvedVariable = {
    outcome: 'Resolved',
    displayName: 'Cases Total',
    elementType: 'dataElement',
  };

  it('shares an in-flight lookup between callers', async () => {
    const cache = createVariableNameCache();
    const compute = vi.fn(() => Promise.resolve(ok(resolved)));

    const first = cache.getOrInsert('de1', compute);
    const second = cache.getOrInsert('de1', compute);

    expect(second).toBe(first);
    expect((await second)._unsafeUnwrap()).toEqual(resolved);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('counts only settled successful entries', async () => {
    const cache = createVariableNameCache();

    const lookup = cache.getOrInsert('de1', () => Promise.resolve(ok(resolved)));
    expect(cache.size).toBe(0);

    await lookup;
    expect(cache.size).toBe(1);
  });

  it('evicts rejected lookups', async () => {
    const cache = createVariableNameCache();

    await expect(
      cache.getOrInsert('de1', () => Promise.reject(new Error('boom')))
    ).rejects.toThrow('boom');
    const retried = await cache.getOrInsert('de1', () => Promise.resolve(ok(resolved)));

    expect(retried._unsafeUnwrap()).toEqual(resolved);
  });
});
