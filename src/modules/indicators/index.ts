/**
 * Indicator Audit Module Public API
 *
 * Exports types, use cases, the registry adapter and report renderers.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  FormulaEvaluation,
  FormulaSide,
  FormulaToken,
  GroupContext,
  GroupMembers,
  GroupSummary,
  IdentifiableObject,
  IndicatorGroupReport,
  IndicatorMetadata,
  IndicatorRecord,
  IndicatorReport,
  IndicatorTypeFactors,
  RegistryObject,
  ResolvedVariable,
  VariableId,
} from './core/types.js';

export type { GroupScanError, GroupSelectionError, RegistryError } from './core/errors.js';

export type { RegistryClient, VariableLookup, VariableNameCache } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export {
  DEFAULT_WORKER_CONCURRENCY,
  INDICATORS_COLLECTION,
  UNRESOLVED_MARKER,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Findings
// ─────────────────────────────────────────────────────────────────────────────

export {
  ArgumentCountError,
  FINDING_DEFINITIONS,
  Findings,
  createFinding,
  groupFindingsByKind,
  renderFinding,
  type Finding,
  type FindingKind,
} from './core/findings.js';

// ─────────────────────────────────────────────────────────────────────────────
// Formula Analysis
// ─────────────────────────────────────────────────────────────────────────────

export { extractNumericFactor } from './core/numeric-factor.js';
export { tokenizeFormula } from './core/formula-lexer.js';
export { evaluateFormula } from './core/formula-evaluator.js';
export {
  createVariableNameCache,
  makeVariableResolver,
  type VariableResolver,
} from './core/variable-resolver.js';
export { runWorkerPool } from './core/worker-pool.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { validateIndicator, type ValidateIndicatorDeps } from './core/usecases/validate-indicator.js';
export { scanGroup, type ScanGroupDeps } from './core/usecases/scan-group.js';
export {
  buildIndicatorReport,
  type BuildIndicatorReportDeps,
} from './core/usecases/build-indicator-report.js';
export {
  findGroupsByDescription,
  type FindGroupsByDescriptionDeps,
} from './core/usecases/find-groups-by-description.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeDhis2RegistryClient,
  type FetchFn,
  type MakeDhis2RegistryClientOptions,
} from './shell/registry/dhis2-registry-client.js';
export {
  loadConnectionParams,
  parseConnectionParams,
  resolveRegistryConnection,
  type ConnectionConfigError,
  type ConnectionOverrides,
  type ConnectionParams,
  type RegistryConnection,
} from './shell/registry/connection.js';
export { CSV_HEADER, renderCsvReport, type CsvReportOptions } from './shell/report/csv-report.js';
export {
  buildJsonReport,
  renderJsonReport,
  type JsonReport,
  type JsonReportOptions,
} from './shell/report/json-report.js';
