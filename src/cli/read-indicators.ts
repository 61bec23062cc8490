/**
 * read-indicators: audit the indicators of one or more registry groups.
 *
 * Usage:
 *   read-indicators --group-ids <id,id> [options]
 *   read-indicators --group-desc <text> [options]
 *
 * The report goes to stdout (or --out-file); logs go to stderr.
 */

import { writeFile } from 'node:fs/promises';

import { Command, InvalidArgumentError, Option } from 'commander';
import { err, ok, type Result } from 'neverthrow';

import {
  buildIndicatorReport,
  findGroupsByDescription,
  loadConnectionParams,
  makeDhis2RegistryClient,
  renderCsvReport,
  renderJsonReport,
  resolveRegistryConnection,
  type ConnectionConfigError,
  type ConnectionParams,
  type FetchFn,
  type GroupSelectionError,
  type IndicatorReport,
  type RegistryClient,
  type RegistryConnection,
} from '../modules/indicators/index.js';

import type { AppConfig } from '../infra/config/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export type OutputFormat = 'csv' | 'json';

export type ReadIndicatorsOptions = {
  country?: string | undefined;
  baseUrl?: string | undefined;
  authToken?: string | undefined;
  output: OutputFormat;
  groupIds: string[];
  groupDesc?: string | undefined;
  outFile?: string | undefined;
};

export const parseOutputFormat = (value: string): OutputFormat => {
  const format = value.trim().toLowerCase();
  if (format !== 'csv' && format !== 'json') {
    throw new InvalidArgumentError('Expected csv or json.');
  }
  return format;
};

export const parseGroupIds = (value: string): string[] =>
  value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id !== '');

/**
 * Command definition. Parsed values are read back with `opts<ReadIndicatorsOptions>()`.
 */
export const buildProgram = (): Command =>
  new Command('read-indicators')
    .description('Validate the indicator formulas of registry groups and report the findings')
    .option('--country <name>', 'Country entry of the connection parameters file')
    .option('--base-url <url>', 'Registry base URL (overrides configuration)')
    .option('--auth-token <token>', 'Bearer token (overrides configuration)')
    .addOption(
      new Option('--output <format>', 'Output format: csv|json')
        .default('csv')
        .argParser(parseOutputFormat)
    )
    .addOption(
      new Option('--group-ids <ids>', 'Comma-separated group ids').default([]).argParser(parseGroupIds)
    )
    .option('--group-desc <text>', 'Select indicator groups whose name matches this regular expression (case-insensitive)')
    .option('--out-file <path>', 'Write the report to a file instead of stdout');

// ─────────────────────────────────────────────────────────────────────────────
// Run
// ─────────────────────────────────────────────────────────────────────────────

export type ReadIndicatorsError = ConnectionConfigError | GroupSelectionError;

export interface ReadIndicatorsSummary {
  groupCount: number;
  indicatorCount: number;
  failedGroupIds: readonly string[];
}

export interface ReadIndicatorsDeps {
  config: AppConfig;
  logger: Logger;
  /** Receives the rendered report */
  write: (content: string, outFile: string | undefined) => Promise<void>;
  /** Defaults to the DHIS2 Web API client */
  createRegistry?: (connection: RegistryConnection) => RegistryClient;
  /** Passed to the default registry client */
  fetch?: FetchFn;
}

/**
 * Writes to `outFile` when given, otherwise to stdout.
 */
export const writeReport = async (content: string, outFile: string | undefined): Promise<void> => {
  if (outFile !== undefined) {
    await writeFile(outFile, content, 'utf-8');
    return;
  }
  process.stdout.write(content);
};

const loadParams = async (
  paramsFile: string | undefined
): Promise<Result<ConnectionParams | null, ConnectionConfigError>> =>
  paramsFile === undefined ? ok(null) : loadConnectionParams(paramsFile);

const selectGroupIds = async (
  registry: RegistryClient,
  options: ReadIndicatorsOptions
): Promise<Result<string[], GroupSelectionError>> => {
  if (options.groupIds.length > 0) {
    return ok(options.groupIds);
  }
  if (options.groupDesc !== undefined) {
    return findGroupsByDescription({ registry }, options.groupDesc);
  }
  return ok([]);
};

const render = (report: IndicatorReport, format: OutputFormat, registryBaseUrl: string): string =>
  format === 'json'
    ? renderJsonReport(report, { registryBaseUrl })
    : renderCsvReport(report, { registryBaseUrl });

export const runReadIndicators = async (
  options: ReadIndicatorsOptions,
  deps: ReadIndicatorsDeps
): Promise<Result<ReadIndicatorsSummary, ReadIndicatorsError>> => {
  const { config, logger } = deps;

  const paramsResult = await loadParams(config.registry.paramsFile);
  if (paramsResult.isErr()) {
    return err(paramsResult.error);
  }

  const connectionResult = resolveRegistryConnection({
    registry: config.registry,
    overrides: { country: options.country, baseUrl: options.baseUrl, authToken: options.authToken },
    params: paramsResult.value,
  });
  if (connectionResult.isErr()) {
    return err(connectionResult.error);
  }
  const connection = connectionResult.value;

  const registry =
    deps.createRegistry?.(connection) ??
    makeDhis2RegistryClient({
      connection,
      logger,
      timeoutMs: config.registry.requestTimeoutMs,
      ...(deps.fetch !== undefined ? { fetch: deps.fetch } : {}),
    });

  const factorsResult = await registry.fetchIndicatorTypeFactors();
  if (factorsResult.isErr()) {
    return err(factorsResult.error);
  }

  const groupIdsResult = await selectGroupIds(registry, options);
  if (groupIdsResult.isErr()) {
    return err(groupIdsResult.error);
  }
  const groupIds = groupIdsResult.value;
  if (groupIds.length === 0) {
    logger.warn('No groups selected; use --group-ids or --group-desc');
  }

  const report = await buildIndicatorReport(
    {
      registry,
      indicatorTypeFactors: factorsResult.value,
      logger,
      concurrency: config.registry.concurrency,
    },
    groupIds
  );

  await deps.write(render(report, options.output, connection.baseUrl), options.outFile);

  const indicatorCount = report.groups.reduce((sum, group) => sum + group.indicators.length, 0);
  logger.info(
    { groupCount: report.groups.length, indicatorCount, failedGroupIds: report.failedGroupIds },
    'Indicator report written'
  );

  return ok({
    groupCount: report.groups.length,
    indicatorCount,
    failedGroupIds: report.failedGroupIds,
  });
};
