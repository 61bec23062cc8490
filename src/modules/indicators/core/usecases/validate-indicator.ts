/**
 * Validate a single indicator and render its calculation.
 */

import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { createInvalidResponseError, type RegistryError } from '../errors.js';
import { Findings, type Finding } from '../findings.js';
import { evaluateFormula } from '../formula-evaluator.js';
import { extractNumericFactor } from '../numeric-factor.js';
import {
  DEFAULT_INDICATOR_TYPE_FACTOR,
  INDICATORS_COLLECTION,
  IndicatorMetadataSchema,
  UNRESOLVED_MARKER,
  type IndicatorMetadata,
  type IndicatorRecord,
  type IndicatorTypeFactors,
} from '../types.js';

import type { RegistryClient } from '../ports.js';
import type { VariableResolver } from '../variable-resolver.js';

export interface ValidateIndicatorDeps {
  registry: RegistryClient;
  resolver: VariableResolver;
  indicatorTypeFactors: IndicatorTypeFactors;
}

const emptyRecord = (id: string, findings: Finding[]): IndicatorRecord => ({
  id,
  displayName: null,
  numeratorDescription: null,
  denominatorDescription: null,
  numeratorFormula: null,
  denominatorFormula: null,
  indicatorTypeId: null,
  foundInRegistry: false,
  calculationText: '',
  findings,
});

/**
 * Record reported for an indicator whose validation failed unexpectedly.
 */
export const parseFailedRecord = (indicatorId: string): IndicatorRecord =>
  emptyRecord(indicatorId, [Findings.indicatorParseFailed(indicatorId)]);

/** A factor of 1 carries no constraint */
const ignoreUnitFactor = (factor: number | null): number | null => (factor === 1 ? null : factor);

/** Neither 0 nor 1 in an indicator name constrains its descriptions */
const ignoreTrivialFactor = (factor: number | null): number | null =>
  factor === 0 ? null : ignoreUnitFactor(factor);

const describeIndicator = async (
  deps: ValidateIndicatorDeps,
  indicatorId: string
): Promise<Result<IndicatorRecord, RegistryError>> => {
  const recordResult = await deps.registry.fetchKnownTypeRecord(INDICATORS_COLLECTION, indicatorId);
  if (recordResult.isErr()) {
    return err(recordResult.error);
  }
  if (recordResult.value === null) {
    return ok(emptyRecord(indicatorId, [Findings.indicatorNotInRegistry(indicatorId)]));
  }

  const raw = recordResult.value;
  if (!Value.Check(IndicatorMetadataSchema, raw)) {
    const details = [...Value.Errors(IndicatorMetadataSchema, raw)].map(
      (error) => `${error.path}: ${error.message}`
    );
    return err(createInvalidResponseError(`Indicator ${indicatorId} has malformed metadata`, details));
  }
  const metadata: IndicatorMetadata = raw;
  const findings: Finding[] = [];

  // Display name
  const displayName = metadata.displayName ?? '';
  if (metadata.displayName === undefined) {
    findings.push(Findings.indicatorNoDisplayName(indicatorId));
  }
  const indicatorNumber = ignoreTrivialFactor(extractNumericFactor(displayName, true));

  const indicatorTypeId = metadata.indicatorType?.id ?? null;
  const indicatorTypeFactor =
    (indicatorTypeId !== null ? deps.indicatorTypeFactors.get(indicatorTypeId) : undefined) ??
    DEFAULT_INDICATOR_TYPE_FACTOR;

  // Descriptions
  const numeratorDescription = metadata.numeratorDescription ?? null;
  if (numeratorDescription === null) {
    findings.push(Findings.numeratorNoDescription());
  }
  const numeratorNumber =
    numeratorDescription !== null ? extractNumericFactor(numeratorDescription, true) : null;

  let denominatorDescription = metadata.denominatorDescription ?? '';
  if (denominatorDescription === '') {
    findings.push(Findings.denominatorNoDescription());
    denominatorDescription = '1';
  }
  const denominatorNumber = ignoreUnitFactor(extractNumericFactor(denominatorDescription, true));

  if (
    indicatorNumber !== null &&
    indicatorNumber !== denominatorNumber &&
    indicatorNumber !== numeratorNumber &&
    indicatorNumber !== indicatorTypeFactor
  ) {
    findings.push(Findings.indicatorNumberMissing(indicatorNumber));
  }

  // Formulas
  if (metadata.numerator === undefined) {
    findings.push(Findings.numeratorNoFormula());
  }
  const numerator = metadata.numerator ?? UNRESOLVED_MARKER;

  if (metadata.denominator === undefined) {
    findings.push(Findings.denominatorNoFormula());
  }
  const denominator = metadata.denominator ?? UNRESOLVED_MARKER;

  if ((denominator === '1') !== (denominatorDescription === '1')) {
    findings.push(Findings.denominatorFormulaDescMismatch());
  }

  if (numerator === denominator) {
    findings.push(Findings.numeratorEqualsDenominator());
  }

  const numeratorResult = await evaluateFormula(deps, {
    formula: numerator,
    expectedNumber: numeratorNumber,
    side: 'numerator',
  });
  if (numeratorResult.isErr()) {
    return err(numeratorResult.error);
  }

  const denominatorResult = await evaluateFormula(deps, {
    formula: denominator,
    expectedNumber: denominatorNumber,
    side: 'denominator',
  });
  if (denominatorResult.isErr()) {
    return err(denominatorResult.error);
  }

  findings.push(...numeratorResult.value.findings, ...denominatorResult.value.findings);

  return ok({
    id: indicatorId,
    displayName,
    numeratorDescription,
    denominatorDescription,
    numeratorFormula: metadata.numerator ?? null,
    denominatorFormula: metadata.denominator ?? null,
    indicatorTypeId,
    foundInRegistry: true,
    calculationText: `{${numeratorResult.value.calculationText} } / {${denominatorResult.value.calculationText} }`,
    findings,
  });
};

/**
 * Builds the audited record of one indicator.
 *
 * Never fails: registry errors and unexpected exceptions are reported as a
 * single `IndicatorParseFailed` finding on an otherwise empty record.
 */
export const validateIndicator = async (
  deps: ValidateIndicatorDeps,
  indicatorId: string,
  onFailure?: (indicatorId: string, cause: unknown) => void
): Promise<IndicatorRecord> => {
  try {
    const result = await describeIndicator(deps, indicatorId);
    if (result.isOk()) {
      return result.value;
    }
    onFailure?.(indicatorId, result.error);
  } catch (error) {
    onFailure?.(indicatorId, error);
  }
  return parseFailedRecord(indicatorId);
};
