/**
 * Turns a formula into a readable calculation and collects the findings
 * about the variables it references.
 */

import { err, ok, type Result } from 'neverthrow';

import { Findings, type Finding } from './findings.js';
import { tokenizeFormula } from './formula-lexer.js';
import {
  DATA_SET_ELEMENT_TYPE,
  UNRESOLVED_MARKER,
  type FormulaEvaluation,
  type FormulaSide,
  type ResolvedVariable,
} from './types.js';

import type { RegistryError } from './errors.js';
import type { VariableResolver } from './variable-resolver.js';

export interface EvaluateFormulaDeps {
  resolver: VariableResolver;
}

export interface EvaluateFormulaInput {
  formula: string;
  /** Factor the description implies; null when there is nothing to look for */
  expectedNumber: number | null;
  side: FormulaSide;
}

const WILDCARD = '*';

const INTEGER_TEXT = /^\d+$/;

const isLookupPart = (part: string | undefined): part is string =>
  part !== undefined && part !== '' && part !== WILDCARD;

const findingFor = (
  id: string,
  variable: ResolvedVariable,
  side: FormulaSide
): Finding | null => {
  switch (variable.outcome) {
    case 'Resolved':
      return null;
    case 'NotInRegistry':
      return Findings.variableNotInRegistry(id, side);
    case 'NoMetadata':
      return Findings.variableNoMetadata(id, variable.elementType, side);
  }
};

/**
 * Evaluates one side of an indicator.
 *
 * Each emitted piece is preceded by a single space. A variable that cannot be
 * resolved is written as the unresolved marker and reported once per formula.
 */
export const evaluateFormula = async (
  deps: EvaluateFormulaDeps,
  input: EvaluateFormulaInput
): Promise<Result<FormulaEvaluation, RegistryError>> => {
  const { formula, expectedNumber, side } = input;
  const pieces: string[] = [];
  const findings: Finding[] = [];
  const reported = new Set<string>();
  let numberSeen = expectedNumber === null;

  const appendVariable = async (
    id: string
  ): Promise<Result<ResolvedVariable, RegistryError>> => {
    const result = await deps.resolver.resolve(id);
    if (result.isErr()) {
      return result;
    }

    const variable = result.value;
    pieces.push(variable.outcome === 'Resolved' ? variable.displayName : UNRESOLVED_MARKER);

    if (!reported.has(id)) {
      reported.add(id);
      const finding = findingFor(id, variable, side);
      if (finding !== null) {
        findings.push(finding);
      }
    }
    return result;
  };

  for (const token of tokenizeFormula(formula)) {
    if (token.kind === 'Operator') {
      pieces.push(token.text);
      continue;
    }

    if (token.kind === 'Literal') {
      pieces.push(token.text);
      if (INTEGER_TEXT.test(token.text) && token.value === expectedNumber) {
        numberSeen = true;
      }
      continue;
    }

    let primaryType: string | null = null;
    if (isLookupPart(token.primary)) {
      const primary = await appendVariable(token.primary);
      if (primary.isErr()) {
        return err(primary.error);
      }
      primaryType = primary.value.outcome === 'NotInRegistry' ? null : primary.value.elementType;
    } else {
      pieces.push(UNRESOLVED_MARKER);
    }

    const { secondary, tertiary } = token;
    if (isLookupPart(secondary)) {
      if (primaryType === DATA_SET_ELEMENT_TYPE && secondary.includes('_')) {
        // Data set metric such as REPORTING_RATE
        pieces.push(secondary);
      } else {
        const result = await appendVariable(secondary);
        if (result.isErr()) {
          return err(result.error);
        }
      }
    }

    if (isLookupPart(tertiary)) {
      const result = await appendVariable(tertiary);
      if (result.isErr()) {
        return err(result.error);
      }
    }
  }

  if (!numberSeen && expectedNumber !== null) {
    findings.push(Findings.formulaNumberMissing(side, expectedNumber));
  }

  return ok({
    calculationText: pieces.map((piece) => ` ${piece}`).join(''),
    findings,
  });
};
