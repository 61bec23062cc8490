/**
 * JSON rendering of an indicator report.
 *
 * Indicators are listed under their group description (groups sharing a
 * description are merged) and findings are grouped by kind.
 */

import { FINDING_DEFINITIONS, groupFindingsByKind, type FindingKind } from '../../core/findings.js';
import { indicatorUrl } from './links.js';

import type { IndicatorRecord, IndicatorReport } from '../../core/types.js';

export interface JsonIndicator {
  indicatorId: string;
  indicatorName: string | null;
  indicatorUrl: string | null;
  numeratorDescription: string | null;
  denominatorDescription: string | null;
  numeratorFormula: string | null;
  denominatorFormula: string | null;
  calculation: string;
  validationCodes: Partial<Record<FindingKind, string[][]>>;
}

export interface JsonIndicatorGroup {
  groupDescription: string;
  indicators: JsonIndicator[];
}

export interface JsonReport {
  indicatorGroups: JsonIndicatorGroup[];
  validationCodeDict: Record<string, string>;
}

export interface JsonReportOptions {
  registryBaseUrl: string;
}

const toJsonIndicator = (record: IndicatorRecord, options: JsonReportOptions): JsonIndicator => ({
  indicatorId: record.id,
  indicatorName: record.displayName,
  indicatorUrl: record.foundInRegistry ? indicatorUrl(options.registryBaseUrl, record.id) : null,
  numeratorDescription: record.numeratorDescription,
  denominatorDescription: record.denominatorDescription,
  numeratorFormula: record.numeratorFormula,
  denominatorFormula: record.denominatorFormula,
  calculation: record.calculationText,
  validationCodes: groupFindingsByKind(record.findings),
});

export const buildJsonReport = (report: IndicatorReport, options: JsonReportOptions): JsonReport => {
  const byDescription = new Map<string, JsonIndicator[]>();
  for (const group of report.groups) {
    const indicators = byDescription.get(group.displayName) ?? [];
    indicators.push(...group.indicators.map((record) => toJsonIndicator(record, options)));
    byDescription.set(group.displayName, indicators);
  }

  return {
    indicatorGroups: Array.from(byDescription, ([groupDescription, indicators]) => ({
      groupDescription,
      indicators,
    })),
    validationCodeDict: Object.fromEntries(
      Object.entries(FINDING_DEFINITIONS).map(([kind, definition]) => [kind, definition.template])
    ),
  };
};

export const renderJsonReport = (report: IndicatorReport, options: JsonReportOptions): string =>
  `${JSON.stringify(buildJsonReport(report, options), null, 4)}\n`;
