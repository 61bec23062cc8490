/**
 * TypeBox schemas for registry API responses.
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';

import type { RegistryObject } from '../../core/types.js';

export const IdentifiableObjectResponseSchema = Type.Object({
  id: Type.Optional(Type.String()),
  href: Type.String({ minLength: 1 }),
});

export const IndicatorTypesResponseSchema = Type.Object({
  indicatorTypes: Type.Array(
    Type.Object({
      id: Type.String(),
      displayName: Type.Optional(Type.String()),
      factor: Type.Optional(Type.Number()),
    })
  ),
});

export type IndicatorTypesResponse = Static<typeof IndicatorTypesResponseSchema>;

export const IndicatorGroupsResponseSchema = Type.Object({
  indicatorGroups: Type.Array(
    Type.Object({
      id: Type.String(),
      displayName: Type.Optional(Type.String()),
    })
  ),
});

export const GroupMemberListSchema = Type.Array(Type.Object({ id: Type.String() }));

export const identifiableObjectValidator = TypeCompiler.Compile(IdentifiableObjectResponseSchema);
export const indicatorTypesValidator = TypeCompiler.Compile(IndicatorTypesResponseSchema);
export const indicatorGroupsValidator = TypeCompiler.Compile(IndicatorGroupsResponseSchema);
export const groupMemberListValidator = TypeCompiler.Compile(GroupMemberListSchema);

export const isRegistryObject = (value: unknown): value is RegistryObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
