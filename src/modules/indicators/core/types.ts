/**
 * Indicator Audit Module - Core Types
 */

import { Type, type Static } from '@sinclair/typebox';

import type { Finding } from './findings.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Marker written wherever a name, description or formula is unavailable */
export const UNRESOLVED_MARKER = '??????';

/** Registry collection holding indicators */
export const INDICATORS_COLLECTION = 'indicators';

/** Singular element type of data sets; their formula sub-parts may name a metric */
export const DATA_SET_ELEMENT_TYPE = 'dataSet';

export const DEFAULT_WORKER_CONCURRENCY = 10;

/** Factor assumed for indicators without a (known) indicator type */
export const DEFAULT_INDICATOR_TYPE_FACTOR = 1;

// ─────────────────────────────────────────────────────────────────────────────
// Registry Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Opaque identifier issued by the registry */
export type VariableId = string;

/** Decoded JSON object returned by the registry */
export type RegistryObject = Readonly<Record<string, unknown>>;

/**
 * Generic identifiable-object lookup result.
 * `href` points at the object inside its own collection, e.g. `.../api/dataElements/abc`.
 */
export interface IdentifiableObject {
  readonly id: string;
  readonly href: string;
}

/**
 * Fields of an indicator record the audit reads.
 * Other fields are allowed and ignored.
 */
export const IndicatorMetadataSchema = Type.Object({
  id: Type.Optional(Type.String()),
  displayName: Type.Optional(Type.String()),
  numerator: Type.Optional(Type.String()),
  denominator: Type.Optional(Type.String()),
  numeratorDescription: Type.Optional(Type.String()),
  denominatorDescription: Type.Optional(Type.String()),
  indicatorType: Type.Optional(
    Type.Object({
      id: Type.Optional(Type.String()),
    })
  ),
});

export type IndicatorMetadata = Static<typeof IndicatorMetadataSchema>;

/** Maps an indicator-type id to its integer scale factor (e.g. "per 1000" → 1000) */
export type IndicatorTypeFactors = ReadonlyMap<string, number>;

/** Members of a registry group, in declared order */
export interface GroupMembers {
  /** Collection of the members, e.g. `indicators` or `dataElements` */
  readonly elementType: string;
  readonly memberIds: readonly string[];
  readonly displayName: string;
}

export interface GroupSummary {
  readonly id: string;
  readonly displayName: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Variable Resolution
// ─────────────────────────────────────────────────────────────────────────────

export type ResolutionOutcome = 'Resolved' | 'NotInRegistry' | 'NoMetadata';

/**
 * Result of looking up one variable id.
 * A display name exists exactly when the outcome is `Resolved`.
 */
export type ResolvedVariable =
  | {
      readonly outcome: 'Resolved';
      readonly displayName: string;
      /** Singular element type, e.g. `dataElement` */
      readonly elementType: string;
    }
  | {
      readonly outcome: 'NotInRegistry';
    }
  | {
      readonly outcome: 'NoMetadata';
      readonly elementType: string;
    };

/** Lookup context of the group currently being scanned */
export interface GroupContext {
  readonly elementType: string;
  readonly memberIds: ReadonlySet<string>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Formulas
// ─────────────────────────────────────────────────────────────────────────────

export type FormulaSide = 'numerator' | 'denominator';

export type FormulaOperator = '+' | '-' | '*' | '/';

export type FormulaToken =
  | {
      readonly kind: 'VariableRef';
      /** Prefix class: `#`, `A`, `C`, `D`, `I`, `R` or `OUG` */
      readonly prefix: string;
      readonly primary: string;
      readonly secondary?: string;
      readonly tertiary?: string;
      readonly text: string;
    }
  | {
      readonly kind: 'Operator';
      readonly operator: FormulaOperator;
      readonly text: string;
    }
  | {
      readonly kind: 'Literal';
      readonly value: number;
      readonly text: string;
    };

export interface FormulaEvaluation {
  /** Readable calculation; every emitted piece carries one leading space */
  readonly calculationText: string;
  readonly findings: readonly Finding[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Indicator Records
// ─────────────────────────────────────────────────────────────────────────────

export interface IndicatorRecord {
  readonly id: string;
  readonly displayName: string | null;
  readonly numeratorDescription: string | null;
  readonly denominatorDescription: string | null;
  readonly numeratorFormula: string | null;
  readonly denominatorFormula: string | null;
  readonly indicatorTypeId: string | null;
  /** `false` when the indicator itself could not be found or parsed */
  readonly foundInRegistry: boolean;
  readonly calculationText: string;
  readonly findings: readonly Finding[];
}

export interface IndicatorGroupReport {
  readonly groupId: string;
  readonly displayName: string;
  readonly elementType: string;
  /** In the group's declared member order */
  readonly indicators: readonly IndicatorRecord[];
}

export interface IndicatorReport {
  readonly groups: readonly IndicatorGroupReport[];
  readonly failedGroupIds: readonly string[];
}
