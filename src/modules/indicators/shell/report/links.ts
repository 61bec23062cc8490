import { INDICATORS_COLLECTION } from '../../core/types.js';

/**
 * Registry API URL of an indicator.
 */
export const indicatorUrl = (registryBaseUrl: string, indicatorId: string): string =>
  `${registryBaseUrl}/api/${INDICATORS_COLLECTION}/${indicatorId}`;

/**
 * Spreadsheet formula rendering `label` as a link to `url`.
 */
export const hyperlinkFormula = (url: string, label: string): string =>
  `=HYPERLINK("${url}";"${label.replace(/"/g, '""')}")`;
