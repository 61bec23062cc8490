/**
 * CSV rendering of an indicator report: one row per indicator.
 */

import { stringify } from 'csv-stringify/sync';

import { renderFinding } from '../../core/findings.js';
import { UNRESOLVED_MARKER, type IndicatorRecord, type IndicatorReport } from '../../core/types.js';
import { hyperlinkFormula, indicatorUrl } from './links.js';

export const CSV_HEADER = [
  'Group Description',
  'Indicator id',
  'Indicator name',
  'Numerator description',
  'Denominator description',
  'Calculation',
  'Validation Comments',
] as const;

export interface CsvReportOptions {
  registryBaseUrl: string;
  /** Render indicator names as spreadsheet hyperlinks to the registry. Default: true */
  links?: boolean;
}

const toRow = (
  groupDescription: string,
  record: IndicatorRecord,
  options: CsvReportOptions
): string[] => {
  const comments = record.findings.map(renderFinding).join('\n');
  if (!record.foundInRegistry) {
    return [groupDescription, record.id, '', '', '', '', comments];
  }

  const name = record.displayName ?? '';
  return [
    groupDescription,
    record.id,
    options.links === false
      ? name
      : hyperlinkFormula(indicatorUrl(options.registryBaseUrl, record.id), name),
    record.numeratorDescription ?? UNRESOLVED_MARKER,
    record.denominatorDescription ?? '',
    record.calculationText,
    comments,
  ];
};

export const renderCsvReport = (report: IndicatorReport, options: CsvReportOptions): string => {
  const rows: string[][] = [[...CSV_HEADER]];
  for (const group of report.groups) {
    for (const record of group.indicators) {
      rows.push(toRow(group.displayName, record, options));
    }
  }
  return stringify(rows);
};
