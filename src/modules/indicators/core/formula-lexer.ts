/**
 * Lexer for the indicator formula language.
 *
 * A formula is read left to right as a sequence of terms:
 *   - variable references: `#{de.coc.aoc}`, `R{ds.REPORTING_RATE}`, `OUG{grp}`, ...
 *     with one to three dot-separated parts, each possibly empty or `*`
 *   - operators: `+ - * /`
 *   - number literals: `12`, `0.5`, standing on their own (not part of a word)
 * Anything else (parentheses, whitespace, unknown symbols and terms) is skipped.
 */

import type { FormulaOperator, FormulaToken } from './types.js';

const SINGLE_CHAR_PREFIXES = new Set(['#', 'A', 'C', 'D', 'I', 'R']);
const MULTI_CHAR_PREFIXES = ['OUG'];

const OPERATORS = new Set<string>(['+', '-', '*', '/']);

const VARIABLE_PART = /^[\w|*]*$/;
const MAX_VARIABLE_PARTS = 3;

// Digits inside identifiers of skipped terms (`N{ab12}`) are not literals
const LITERAL = /(?<![\w.])\d+(?:\.\d+)?(?![\w.])/y;

interface Match {
  readonly token: FormulaToken;
  readonly end: number;
}

const isOperator = (value: string): value is FormulaOperator => OPERATORS.has(value);

/**
 * Matches a variable reference starting at `position`.
 */
export const matchVariable = (formula: string, position: number): Match | null => {
  const prefix =
    MULTI_CHAR_PREFIXES.find((candidate) => formula.startsWith(`${candidate}{`, position)) ??
    (SINGLE_CHAR_PREFIXES.has(formula.charAt(position)) &&
    formula.charAt(position + 1) === '{'
      ? formula.charAt(position)
      : null);
  if (prefix === null) {
    return null;
  }

  const bodyStart = position + prefix.length + 1;
  const bodyEnd = formula.indexOf('}', bodyStart);
  if (bodyEnd === -1) {
    return null;
  }

  const parts = formula.slice(bodyStart, bodyEnd).split('.');
  if (parts.length > MAX_VARIABLE_PARTS || !parts.every((part) => VARIABLE_PART.test(part))) {
    return null;
  }

  const [primary = '', secondary, tertiary] = parts;
  return {
    token: {
      kind: 'VariableRef',
      prefix,
      primary,
      ...(secondary !== undefined && { secondary }),
      ...(tertiary !== undefined && { tertiary }),
      text: formula.slice(position, bodyEnd + 1),
    },
    end: bodyEnd + 1,
  };
};

const matchOperator = (formula: string, position: number): Match | null => {
  const char = formula.charAt(position);
  if (!isOperator(char)) {
    return null;
  }
  return { token: { kind: 'Operator', operator: char, text: char }, end: position + 1 };
};

const matchLiteral = (formula: string, position: number): Match | null => {
  LITERAL.lastIndex = position;
  const match = LITERAL.exec(formula);
  if (match === null) {
    return null;
  }
  const text = match[0];
  return {
    token: { kind: 'Literal', value: Number(text), text },
    end: position + text.length,
  };
};

/**
 * Splits a formula into its terms, in order.
 */
export const tokenizeFormula = (formula: string): FormulaToken[] => {
  const tokens: FormulaToken[] = [];
  let position = 0;

  while (position < formula.length) {
    const match =
      matchVariable(formula, position) ??
      matchOperator(formula, position) ??
      matchLiteral(formula, position);

    if (match === null) {
      position++;
      continue;
    }

    tokens.push(match.token);
    position = match.end;
  }

  return tokens;
};
