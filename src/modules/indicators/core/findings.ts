/**
 * Validation findings attached to indicators.
 *
 * Each kind has a fixed English message template whose `___` placeholders are
 * filled, in order, by the finding's arguments.
 */

import type { FormulaSide } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Definitions
// ─────────────────────────────────────────────────────────────────────────────

export const PLACEHOLDER = '___';

interface FindingDefinition {
  readonly code: number;
  readonly template: string;
  readonly arity: number;
}

export const FINDING_DEFINITIONS = {
  NoErrors: { code: 0, template: 'No errors found in indicator', arity: 0 },
  IndicatorNotInRegistry: { code: 1, template: 'Indicator ___ not in registry', arity: 1 },
  IndicatorNoDisplayName: { code: 2, template: 'Indicator ___ has no display name', arity: 1 },
  NumeratorNoDescription: { code: 3, template: 'No description of the numerator', arity: 0 },
  DenominatorNoDescription: {
    code: 4,
    template: 'No description of the denominator; we assume it is 1',
    arity: 0,
  },
  NumeratorNoFormula: { code: 5, template: 'Numerator has no formula', arity: 0 },
  DenominatorNoFormula: { code: 6, template: 'Denominator has no formula', arity: 0 },
  DenominatorFormulaDescMismatch: {
    code: 7,
    template: 'Denominator formula does not match description',
    arity: 0,
  },
  IndicatorNumberMissing: {
    code: 8,
    template:
      'Indicator description has a number in it (___) which does not appear in numerator or denominator descriptions or the indicator type',
    arity: 1,
  },
  FormulaNumberMissing: {
    code: 9,
    template: '___ description contains a number (___) which does not appear in the formula',
    arity: 2,
  },
  VariableNotInRegistry: {
    code: 10,
    template: 'Variable ___ appearing in the formula for ___ is not in the registry',
    arity: 2,
  },
  VariableNoMetadata: {
    code: 11,
    template: 'Variable ___ of type ___ appearing in the formula for ___ has no valid metadata',
    arity: 3,
  },
  NumeratorEqualsDenominator: {
    code: 12,
    template: 'Numerator and denominator have the same formula',
    arity: 0,
  },
  IndicatorParseFailed: { code: 13, template: 'Parsing of indicator ___ failed', arity: 1 },
} as const satisfies Record<string, FindingDefinition>;

export type FindingKind = keyof typeof FINDING_DEFINITIONS;

export interface Finding {
  readonly kind: FindingKind;
  readonly args: readonly string[];
}

/**
 * Raised when a finding carries a different number of arguments than its
 * template has placeholders. Indicates a programming error.
 */
export class ArgumentCountError extends Error {
  constructor(
    public readonly kind: FindingKind,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Finding #${String(FINDING_DEFINITIONS[kind].code)} of kind ${kind} takes ${String(expected)} argument(s), got ${String(actual)}`
    );
    this.name = 'ArgumentCountError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────────────────

export const createFinding = (kind: FindingKind, args: readonly string[] = []): Finding =>
  Object.freeze({ kind, args: Object.freeze([...args]) });

export const Findings = {
  indicatorNotInRegistry: (indicatorId: string): Finding =>
    createFinding('IndicatorNotInRegistry', [indicatorId]),
  indicatorNoDisplayName: (indicatorId: string): Finding =>
    createFinding('IndicatorNoDisplayName', [indicatorId]),
  numeratorNoDescription: (): Finding => createFinding('NumeratorNoDescription'),
  denominatorNoDescription: (): Finding => createFinding('DenominatorNoDescription'),
  numeratorNoFormula: (): Finding => createFinding('NumeratorNoFormula'),
  denominatorNoFormula: (): Finding => createFinding('DenominatorNoFormula'),
  denominatorFormulaDescMismatch: (): Finding => createFinding('DenominatorFormulaDescMismatch'),
  indicatorNumberMissing: (indicatorNumber: number): Finding =>
    createFinding('IndicatorNumberMissing', [String(indicatorNumber)]),
  formulaNumberMissing: (side: FormulaSide, expectedNumber: number): Finding =>
    createFinding('FormulaNumberMissing', [side, String(expectedNumber)]),
  variableNotInRegistry: (variableId: string, side: FormulaSide): Finding =>
    createFinding('VariableNotInRegistry', [variableId, side]),
  variableNoMetadata: (variableId: string, elementType: string, side: FormulaSide): Finding =>
    createFinding('VariableNoMetadata', [variableId, elementType, side]),
  numeratorEqualsDenominator: (): Finding => createFinding('NumeratorEqualsDenominator'),
  indicatorParseFailed: (indicatorId: string): Finding =>
    createFinding('IndicatorParseFailed', [indicatorId]),
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Renders the English message of a finding.
 * @throws ArgumentCountError when the argument count does not match the template
 */
export const renderFinding = (finding: Finding): string => {
  const definition = FINDING_DEFINITIONS[finding.kind];
  if (finding.args.length !== definition.arity) {
    throw new ArgumentCountError(finding.kind, definition.arity, finding.args.length);
  }

  const pieces = definition.template.split(PLACEHOLDER);
  return pieces.reduce(
    (message, piece, index) => message + (finding.args[index - 1] ?? '') + piece
  );
};

/**
 * Groups finding arguments by kind, preserving first-seen kind order.
 * An empty finding list reports `{ NoErrors: [] }`.
 */
export const groupFindingsByKind = (
  findings: readonly Finding[]
): Partial<Record<FindingKind, string[][]>> => {
  if (findings.length === 0) {
    return { NoErrors: [] };
  }

  const grouped: Partial<Record<FindingKind, string[][]>> = {};
  for (const finding of findings) {
    const bucket = grouped[finding.kind] ?? [];
    bucket.push([...finding.args]);
    grouped[finding.kind] = bucket;
  }
  return grouped;
};
