/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Registry connection
  DHIS2_BASE_URL: Type.Optional(Type.String({ minLength: 1 })),
  DHIS2_USERNAME: Type.Optional(Type.String()),
  DHIS2_PASSWORD: Type.Optional(Type.String()),
  DHIS2_TOKEN: Type.Optional(Type.String()),
  DHIS2_PARAMS_FILE: Type.Optional(Type.String()),

  // Registry access tuning
  DHIS2_CONCURRENCY: Type.Integer({ default: 10, minimum: 1, maximum: 100 }),
  DHIS2_REQUEST_TIMEOUT_MS: Type.Integer({ default: 30_000, minimum: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const parseIntOr = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === '' ? undefined : value;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DHIS2_BASE_URL: emptyToUndefined(env['DHIS2_BASE_URL']),
    DHIS2_USERNAME: emptyToUndefined(env['DHIS2_USERNAME']),
    DHIS2_PASSWORD: emptyToUndefined(env['DHIS2_PASSWORD']),
    DHIS2_TOKEN: emptyToUndefined(env['DHIS2_TOKEN']),
    DHIS2_PARAMS_FILE: emptyToUndefined(env['DHIS2_PARAMS_FILE']),
    DHIS2_CONCURRENCY: parseIntOr(env['DHIS2_CONCURRENCY'], 10),
    DHIS2_REQUEST_TIMEOUT_MS: parseIntOr(env['DHIS2_REQUEST_TIMEOUT_MS'], 30_000),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  runtime: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  registry: {
    /** Host and optional path of the registry; https is assumed when no scheme is given */
    baseUrl: env.DHIS2_BASE_URL,
    username: env.DHIS2_USERNAME,
    password: env.DHIS2_PASSWORD,
    /** Bearer token; takes precedence over username/password */
    token: env.DHIS2_TOKEN,
    /** JSON file with connection parameters keyed by country */
    paramsFile: env.DHIS2_PARAMS_FILE,
    concurrency: env.DHIS2_CONCURRENCY,
    requestTimeoutMs: env.DHIS2_REQUEST_TIMEOUT_MS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
