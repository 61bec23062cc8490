import { describe, expect, it } from 'vitest';

import { createHttpError } from '@/modules/indicators/core/errors.js';
import { Findings } from '@/modules/indicators/core/findings.js';
import { buildIndicatorReport } from '@/modules/indicators/core/usecases/build-indicator-report.js';
import { findGroupsByDescription } from '@/modules/indicators/core/usecases/find-groups-by-description.js';
import { scanGroup } from '@/modules/indicators/core/usecases/scan-group.js';

import {
  makeFakeRegistry,
  makeTestLogger,
  type FakeRegistryOptions,
} from '../../fixtures/fakes.js';

const REGISTRY: FakeRegistryOptions = {
  records: {
    indicatorGroups: {
      malaria: {
        id: 'malaria',
        displayName: 'Malaria',
        indicators: [{ id: 'ind2' }, { id: 'ind1' }, { id: 'ghost' }],
      },
      unnamed: { id: 'unnamed', indicators: [] },
    },
    dataElementGroups: {
      deg: { id: 'deg', displayName: 'Raw data', dataElements: [{ id: 'de1' }] },
    },
    indicators: {
      ind1: {
        id: 'ind1',
        displayName: 'Confirmed cases',
        numerator: '#{de1}',
        denominator: '1',
        numeratorDescription: 'Confirmed',
        denominatorDescription: '1',
      },
      ind2: {
        id: 'ind2',
        displayName: 'Positivity',
        numerator: '#{de1}',
        denominator: '#{de2}',
        numeratorDescription: 'Confirmed',
        denominatorDescription: 'Tested',
      },
    },
    dataElements: {
      de1: { id: 'de1', displayName: 'Confirmed malaria' },
      de2: { id: 'de2', displayName: 'Tested for malaria' },
    },
  },
};

const makeDeps = (options: FakeRegistryOptions = REGISTRY) => {
  const fake = makeFakeRegistry(options);
  return {
    deps: {
      registry: fake.client,
      indicatorTypeFactors: new Map<string, number>(),
      logger: makeTestLogger(),
      concurrency: 4,
    },
    calls: fake.calls,
  };
};

describe('scanGroup', () => {
  it('validates every indicator in declared member order', async () => {
    const { deps } = makeDeps();

    const report = (await scanGroup(deps, 'malaria'))._unsafeUnwrap();

    expect(report.displayName).toBe('Malaria');
    expect(report.elementType).toBe('indicators');
    expect(report.indicators.map((record) => record.id)).toEqual(['ind2', 'ind1', 'ghost']);
    expect(report.indicators.map((record) => record.calculationText)).toEqual([
      '{ Confirmed malaria } / { Tested for malaria }',
      '{ Confirmed malaria } / { 1 }',
      '',
    ]);
    expect(report.indicators[2]?.findings).toEqual([Findings.indicatorNotInRegistry('ghost')]);
  });

  it('looks up a variable shared by several indicators once', async () => {
    const { deps, calls } = makeDeps();

    await scanGroup(deps, 'malaria');

    expect(calls.generic.filter((id) => id === 'de1')).toHaveLength(1);
  });

  it('returns no indicators for groups of other elements', async () => {
    const { deps, calls } = makeDeps();

    const report = (await scanGroup(deps, 'deg'))._unsafeUnwrap();

    expect(report).toEqual({
      groupId: 'deg',
      displayName: 'Raw data',
      elementType: 'dataElements',
      indicators: [],
    });
    expect(calls.knownType).toEqual(['dataElementGroups/deg']);
  });

  it('fails for unknown groups', async () => {
    const { deps } = makeDeps();

    const error = (await scanGroup(deps, 'nowhere'))._unsafeUnwrapErr();

    expect(error.type).toBe('GroupNotFoundError');
    expect(error.message).toBe('Group id nowhere not found in registry');
  });

  it('fails for groups without a display name', async () => {
    const { deps } = makeDeps();

    const error = (await scanGroup(deps, 'unnamed'))._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidGroupError');
  });

  it('keeps scanning when one indicator fails', async () => {
    const { deps } = makeDeps({
      ...REGISTRY,
      failures: { de2: createHttpError('https://registry.test/api/dataElements/de2', 503) },
    });

    const report = (await scanGroup(deps, 'malaria'))._unsafeUnwrap();

    expect(report.indicators[0]?.findings).toEqual([Findings.indicatorParseFailed('ind2')]);
    expect(report.indicators[1]?.findings).toEqual([]);
  });
});

describe('buildIndicatorReport', () => {
  it('collects scanned groups and lists failed ones', async () => {
    const { deps } = makeDeps();

    const report = await buildIndicatorReport(deps, ['nowhere', 'malaria', 'deg']);

    expect(report.groups.map((group) => group.groupId)).toEqual(['malaria', 'deg']);
    expect(report.failedGroupIds).toEqual(['nowhere']);
  });

  it('returns an empty report without groups', async () => {
    const { deps } = makeDeps();

    expect(await buildIndicatorReport(deps, [])).toEqual({ groups: [], failedGroupIds: [] });
  });
});

describe('findGroupsByDescription', () => {
  const { client: registry } = makeFakeRegistry({
    indicatorGroups: [
      { id: 'g1', displayName: 'Malaria indicators' },
      { id: 'g2', displayName: 'HIV' },
      { id: 'g3', displayName: 'Old MALARIA set' },
    ],
  });

  it('matches display names case-insensitively', async () => {
    const result = await findGroupsByDescription({ registry }, 'malaria');

    expect(result._unsafeUnwrap()).toEqual(['g1', 'g3']);
  });

  it('treats the description as a regular expression', async () => {
    const result = await findGroupsByDescription({ registry }, 'H.V');

    expect(result._unsafeUnwrap()).toEqual(['g2']);
  });

  it('matches any alternative of the pattern', async () => {
    const result = await findGroupsByDescription({ registry }, 'malaria|hiv');

    expect(result._unsafeUnwrap()).toEqual(['g1', 'g2', 'g3']);
  });

  it('rejects an invalid pattern', async () => {
    const result = await findGroupsByDescription({ registry }, '(');

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('InvalidGroupPatternError');
    expect(error).toMatchObject({ pattern: '(' });
  });

  it('matches nothing for a blank description', async () => {
    const result = await findGroupsByDescription({ registry }, '  ');

    expect(result._unsafeUnwrap()).toEqual([]);
  });
});
