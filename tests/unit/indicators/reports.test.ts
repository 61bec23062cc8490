import { describe, expect, it } from 'vitest';

import { Findings } from '@/modules/indicators/core/findings.js';
import { renderCsvReport } from '@/modules/indicators/shell/report/csv-report.js';
import { buildJsonReport, renderJsonReport } from '@/modules/indicators/shell/report/json-report.js';
import { hyperlinkFormula } from '@/modules/indicators/shell/report/links.js';

import type { IndicatorRecord, IndicatorReport } from '@/modules/indicators/core/types.js';

const BASE_URL = 'https://registry.test';

const clean: IndicatorRecord = {
  id: 'ind1',
  displayName: 'Cases',
  numeratorDescription: 'Confirmed',
  denominatorDescription: '1',
  numeratorFormula: '#{de1}',
  denominatorFormula: '1',
  indicatorTypeId: null,
  foundInRegistry: true,
  calculationText: '{ Confirmed malaria } / { 1 }',
  findings: [],
};

const flawed: IndicatorRecord = {
  id: 'ind2',
  displayName: 'Positivity',
  numeratorDescription: null,
  denominatorDescription: 'Population',
  numeratorFormula: '#{gone}',
  denominatorFormula: '#{de2}',
  indicatorTypeId: 'pct',
  foundInRegistry: true,
  calculationText: '{ ?????? } / { Population }',
  findings: [Findings.numeratorNoDescription(), Findings.variableNotInRegistry('gone', 'numerator')],
};

const missing: IndicatorRecord = {
  id: 'ghost',
  displayName: null,
  numeratorDescription: null,
  denominatorDescription: null,
  numeratorFormula: null,
  denominatorFormula: null,
  indicatorTypeId: null,
  foundInRegistry: false,
  calculationText: '',
  findings: [Findings.indicatorNotInRegistry('ghost')],
};

const REPORT: IndicatorReport = {
  groups: [
    { groupId: 'g1', displayName: 'Malaria', elementType: 'indicators', indicators: [clean, flawed] },
    { groupId: 'g2', displayName: 'Malaria', elementType: 'indicators', indicators: [missing] },
  ],
  failedGroupIds: [],
};

describe('hyperlinkFormula', () => {
  it('doubles quotes inside the label', () => {
    expect(hyperlinkFormula('https://registry.test/x', 'Say "hi"')).toBe(
      '=HYPERLINK("https://registry.test/x";"Say ""hi""")'
    );
  });
});

describe('renderCsvReport', () => {
  it('writes a header and one row per indicator', () => {
    const csv = renderCsvReport(REPORT, { registryBaseUrl: BASE_URL });

    expect(csv).toBe(
      'Group Description,Indicator id,Indicator name,Numerator description,Denominator description,Calculation,Validation Comments\n' +
        'Malaria,ind1,"=HYPERLINK(""https://registry.test/api/indicators/ind1"";""Cases"")",Confirmed,1,{ Confirmed malaria } / { 1 },\n' +
        'Malaria,ind2,"=HYPERLINK(""https://registry.test/api/indicators/ind2"";""Positivity"")",??????,Population,{ ?????? } / { Population },"No description of the numerator\n' +
        'Variable gone appearing in the formula for numerator is not in the registry"\n' +
        'Malaria,ghost,,,,,Indicator ghost not in registry\n'
    );
  });

  it('writes plain names without links', () => {
    const csv = renderCsvReport(
      {
        groups: [{ groupId: 'g1', displayName: 'Malaria', elementType: 'indicators', indicators: [clean] }],
        failedGroupIds: [],
      },
      { registryBaseUrl: BASE_URL, links: false }
    );

    expect(csv.split('\n')[1]).toBe('Malaria,ind1,Cases,Confirmed,1,{ Confirmed malaria } / { 1 },');
  });

  it('writes only the header for an empty report', () => {
    expect(renderCsvReport({ groups: [], failedGroupIds: [] }, { registryBaseUrl: BASE_URL })).toBe(
      'Group Description,Indicator id,Indicator name,Numerator description,Denominator description,Calculation,Validation Comments\n'
    );
  });
});

describe('buildJsonReport', () => {
  const json = buildJsonReport(REPORT, { registryBaseUrl: BASE_URL });

  it('merges groups sharing a description', () => {
    expect(json.indicatorGroups).toHaveLength(1);
    expect(json.indicatorGroups[0]?.groupDescription).toBe('Malaria');
    expect(json.indicatorGroups[0]?.indicators.map((indicator) => indicator.indicatorId)).toEqual([
      'ind1',
      'ind2',
      'ghost',
    ]);
  });

  it('describes each indicator', () => {
    expect(json.indicatorGroups[0]?.indicators[1]).toEqual({
      indicatorId: 'ind2',
      indicatorName: 'Positivity',
      indicatorUrl: 'https://registry.test/api/indicators/ind2',
      numeratorDescription: null,
      denominatorDescription: 'Population',
      numeratorFormula: '#{gone}',
      denominatorFormula: '#{de2}',
      calculation: '{ ?????? } / { Population }',
      validationCodes: {
        NumeratorNoDescription: [[]],
        VariableNotInRegistry: [['gone', 'numerator']],
      },
    });
  });

  it('reports NoErrors for clean indicators and no URL for missing ones', () => {
    const [first, , third] = json.indicatorGroups[0]?.indicators ?? [];

    expect(first?.validationCodes).toEqual({ NoErrors: [] });
    expect(third?.indicatorUrl).toBeNull();
    expect(third?.indicatorName).toBeNull();
  });

  it('includes the message template of every finding kind', () => {
    expect(Object.keys(json.validationCodeDict)).toHaveLength(14);
    expect(json.validationCodeDict['IndicatorParseFailed']).toBe('Parsing of indicator ___ failed');
  });
});

describe('renderJsonReport', () => {
  it('writes indented JSON followed by a newline', () => {
    const text = renderJsonReport(REPORT, { registryBaseUrl: BASE_URL });

    expect(text.startsWith('{\n    "indicatorGroups": [\n')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(buildJsonReport(REPORT, { registryBaseUrl: BASE_URL }));
  });
});
