import type { LogLevel } from '@nestjs/common';
import type { PoolConfig } from 'pg';

export interface AppConfig {
  port: number;
  host: string;
  apiPrefix: string;
  defaultPageSize: number;
  maximumPageSize: number;
  maximumAgeYears: number;
  apiTokens: string[];
  corsOrigins: string[];
  logLevels: LogLevel[];
  /** Null when no PostgreSQL connection is configured. */
  database: PoolConfig | null;
}

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function toNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function toLogLevels(value: string | undefined): LogLevel[] {
  const normalized = (value ?? 'log').trim().toLowerCase();
  const index = LOG_LEVELS.findIndex((level) => level === normalized);
  return LOG_LEVELS.slice(0, index >= 0 ? index + 1 : 3);
}

function toSsl(env: NodeJS.ProcessEnv): PoolConfig['ssl'] {
  const flag = (env.DATABASE_SSL ?? '').trim().toLowerCase();
  if (!flag || ['0', 'false', 'no', 'off'].includes(flag)) {
    return undefined;
  }
  const rejectUnauthorized =
    (env.DATABASE_SSL_REJECT_UNAUTHORIZED ?? 'true').trim().toLowerCase() !==
    'false';
  return { rejectUnauthorized };
}

function toDatabaseConfig(env: NodeJS.ProcessEnv): PoolConfig | null {
  const ssl = toSsl(env);
  const connectionString = env.DATABASE_URL?.trim();
  if (connectionString) {
    return { connectionString, ssl };
  }
  const host = env.DB_HOST?.trim();
  const database = env.DB_NAME?.trim();
  const user = env.DB_USER?.trim();
  if (!host || !database || !user) {
    return null;
  }
  return {
    host,
    port: toNumber(env.DB_PORT, 5432),
    database,
    user,
    password: env.DB_PASSWORD,
    ssl,
  };
}

export function loadAppConfig(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const maximumPageSize = Math.max(
    toNumber(env.CUSTOMERS_MAX_PAGE_SIZE, 100),
    1,
  );
  const defaultPageSize = Math.min(
    Math.max(toNumber(env.CUSTOMERS_DEFAULT_PAGE_SIZE, 10), 1),
    maximumPageSize,
  );
  const corsOrigins = toList(env.CORS_ORIGINS);
  return {
    port: toNumber(env.PORT, 3000),
    host: env.HOST?.trim() || '0.0.0.0',
    apiPrefix: 'api/v1',
    defaultPageSize,
    maximumPageSize,
    maximumAgeYears: Math.max(toNumber(env.CUSTOMERS_MAX_AGE_YEARS, 150), 1),
    apiTokens: toList(env.API_TOKENS),
    corsOrigins: corsOrigins.length
      ? corsOrigins
      : ['http://localhost:4200', 'http://localhost:3000'],
    logLevels: toLogLevels(env.LOG_LEVEL),
    database: toDatabaseConfig(env),
  };
}
