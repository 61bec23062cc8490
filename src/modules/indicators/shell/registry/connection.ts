/**
 * Registry connection settings: base URL and credentials.
 *
 * Sources, lowest precedence first: environment, the selected country of the
 * connection parameters file, explicit command-line overrides.
 */

import fs from 'node:fs/promises';

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { getErrorMessage } from '../../core/errors.js';

import type { AppConfig } from '../../../../infra/config/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type RegistryAuth =
  | { readonly type: 'token'; readonly token: string }
  | { readonly type: 'basic'; readonly username: string; readonly password: string }
  | { readonly type: 'none' };

export interface RegistryConnection {
  /** Absolute URL without trailing slash, e.g. `https://dhis.example.org/dhis` */
  readonly baseUrl: string;
  readonly auth: RegistryAuth;
}

export interface ConnectionOverrides {
  country?: string | undefined;
  baseUrl?: string | undefined;
  authToken?: string | undefined;
}

export interface ConnectionConfigError {
  readonly type: 'ConnectionConfigError';
  readonly message: string;
}

const createConnectionConfigError = (message: string): ConnectionConfigError => ({
  type: 'ConnectionConfigError',
  message,
});

// ─────────────────────────────────────────────────────────────────────────────
// Parameters File
// ─────────────────────────────────────────────────────────────────────────────

export const ConnectionParamsSchema = Type.Record(
  Type.String(),
  Type.Object({
    baseUrl: Type.Optional(Type.String()),
    username: Type.Optional(Type.String()),
    password: Type.Optional(Type.String()),
    token: Type.Optional(Type.String()),
  })
);

export type ConnectionParams = Static<typeof ConnectionParamsSchema>;

const paramsValidator = TypeCompiler.Compile(ConnectionParamsSchema);

export const parseConnectionParams = (
  contents: string,
  source: string
): Result<ConnectionParams, ConnectionConfigError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    return err(
      createConnectionConfigError(`Failed to parse JSON at ${source}: ${getErrorMessage(error)}`)
    );
  }

  if (!paramsValidator.Check(parsed)) {
    const details = [...paramsValidator.Errors(parsed)]
      .map((error) => `${error.path}: ${error.message}`)
      .join(', ');
    return err(createConnectionConfigError(`Invalid connection parameters in ${source}: ${details}`));
  }

  return ok(parsed);
};

export const loadConnectionParams = async (
  filePath: string
): Promise<Result<ConnectionParams, ConnectionConfigError>> => {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return err(
      createConnectionConfigError(
        `Failed to read connection parameters at ${filePath}: ${getErrorMessage(error)}`
      )
    );
  }
  return parseConnectionParams(contents, filePath);
};

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Adds `https://` when no scheme is given and drops trailing slashes.
 */
export const normalizeBaseUrl = (baseUrl: string): string => {
  const trimmed = baseUrl.trim().replace(/\/+$/, '');
  return /^[a-z][a-z\d+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
};

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim() !== '' ? value : undefined;

export interface ResolveRegistryConnectionInput {
  registry: AppConfig['registry'];
  overrides: ConnectionOverrides;
  /** Contents of the parameters file, when one is configured */
  params: ConnectionParams | null;
}

export const resolveRegistryConnection = (
  input: ResolveRegistryConnectionInput
): Result<RegistryConnection, ConnectionConfigError> => {
  const { registry, overrides, params } = input;
  let baseUrl = nonEmpty(registry.baseUrl);
  let username = nonEmpty(registry.username);
  let password = registry.password;
  let token = nonEmpty(registry.token);

  const country = nonEmpty(overrides.country);
  if (country !== undefined) {
    const entry = params?.[country];
    if (entry === undefined) {
      return err(
        createConnectionConfigError(
          params === null
            ? `Country ${country} requested but no connection parameters file is configured`
            : `No connection parameters for country ${country}`
        )
      );
    }
    baseUrl = nonEmpty(entry.baseUrl) ?? baseUrl;
    username = nonEmpty(entry.username) ?? username;
    password = entry.password ?? password;
    token = nonEmpty(entry.token) ?? token;
  }

  baseUrl = nonEmpty(overrides.baseUrl) ?? baseUrl;
  token = nonEmpty(overrides.authToken) ?? token;

  if (baseUrl === undefined) {
    return err(createConnectionConfigError('Invalid registry URL: no base URL configured'));
  }

  let auth: RegistryAuth = { type: 'none' };
  if (token !== undefined) {
    auth = { type: 'token', token };
  } else if (username !== undefined && password !== undefined) {
    auth = { type: 'basic', username, password };
  }

  return ok({ baseUrl: normalizeBaseUrl(baseUrl), auth });
};

/**
 * Value of the `Authorization` header for a connection, if it has credentials.
 */
export const authorizationHeader = (auth: RegistryAuth): string | undefined => {
  switch (auth.type) {
    case 'token':
      return `Bearer ${auth.token}`;
    case 'basic':
      return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`;
    case 'none':
      return undefined;
  }
};
