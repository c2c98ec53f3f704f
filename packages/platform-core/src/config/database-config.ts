/**
 * Database Configuration
 *
 * Connection settings resolved from environment variables
 */

import { z } from 'zod';
import { DomainError, DomainErrorCode } from '../error-handling/errors.js';

export const DEFAULT_STATEMENT_TIMEOUT_MS = 30000;

const DatabaseEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().optional(),
  DATABASE_SSL: z.enum(['true', 'false']).optional(),
  STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export interface DatabaseEnvOptions {
  serviceName: string;
  envVarName?: string;
  fallbackEnvVar?: string;
}

export interface DatabaseSettings {
  connectionString: string;
  poolMax: number;
  ssl: false | { rejectUnauthorized: boolean };
  statementTimeoutMs: number;
}

function resolveSsl(connectionString: string, explicit: 'true' | 'false' | undefined): DatabaseSettings['ssl'] {
  if (explicit === 'false') return false;
  if (explicit === 'true') return { rejectUnauthorized: false };
  try {
    const url = new URL(connectionString);
    if (url.hostname === 'localhost' || url.hostname === '127.0.0.1') {
      return false;
    }
    if (url.searchParams.get('sslmode') === 'disable') {
      return false;
    }
  } catch {
    return false;
  }
  return { rejectUnauthorized: false };
}

export function appendStatementTimeout(connectionString: string, statementTimeoutMs: number): string {
  if (connectionString.includes('statement_timeout=')) {
    return connectionString;
  }
  const separator = connectionString.includes('?') ? '&' : '?';
  return `${connectionString}${separator}statement_timeout=${statementTimeoutMs}`;
}

/**
 * Resolve connection settings for a service
 * @throws {DomainError} If no connection string is configured or an optional variable is malformed
 */
export function loadDatabaseSettings(
  options: DatabaseEnvOptions,
  env: NodeJS.ProcessEnv = process.env
): DatabaseSettings {
  const envVarName = options.envVarName || 'DATABASE_URL';
  const fallbackEnvVar = options.fallbackEnvVar || 'DATABASE_URL';
  const rawConnectionString = env[envVarName] || env[fallbackEnvVar];

  if (!rawConnectionString) {
    throw new DomainError(
      `${envVarName} or ${fallbackEnvVar} environment variable is required for ${options.serviceName}`,
      500,
      undefined,
      DomainErrorCode.CONFIGURATION_ERROR
    );
  }

  const parsed = DatabaseEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'environment';
    throw new DomainError(
      `Invalid database configuration for ${options.serviceName}: ${field} ${issue?.message ?? 'is invalid'}`,
      500,
      undefined,
      DomainErrorCode.VALIDATION_ERROR,
      { field }
    );
  }

  const { NODE_ENV, DATABASE_POOL_MAX, DATABASE_SSL, STATEMENT_TIMEOUT_MS } = parsed.data;
  const statementTimeoutMs = STATEMENT_TIMEOUT_MS ?? DEFAULT_STATEMENT_TIMEOUT_MS;

  return {
    connectionString: appendStatementTimeout(rawConnectionString, statementTimeoutMs),
    poolMax: DATABASE_POOL_MAX ?? (NODE_ENV === 'production' ? 20 : 5),
    ssl: resolveSsl(rawConnectionString, DATABASE_SSL),
    statementTimeoutMs,
  };
}
