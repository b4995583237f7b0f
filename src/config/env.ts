import dotenv from 'dotenv';
import { resolve } from 'path';
import { ConfigurationError } from '../db/errors';

export type SetupVariant = 'full' | 'schema';

export interface DatabaseConfig {
  url: string;
  ssl: boolean;
  connectionTimeoutMillis?: number;
}

export interface SetupConfig {
  nodeEnv: string;
  database: DatabaseConfig;
  projectRoot: string;
  variant: SetupVariant;
}

export type Env = Record<string, string | undefined>;

const REQUIRED = ['DATABASE_URL'];

const DEFAULT_PROJECT_ROOT = resolve(__dirname, '..', '..');

export function loadEnvFile(): void {
  dotenv.config();
}

export function validateConfig(env: Env = process.env): void {
  const missing = REQUIRED.filter(key => !env[key]?.trim());

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
  }
}

export function loadConfig(
  env: Env = process.env,
  argv: string[] = process.argv.slice(2)
): SetupConfig {
  validateConfig(env);

  const nodeEnv = env.NODE_ENV || 'development';

  return {
    nodeEnv,
    database: {
      url: (env.DATABASE_URL ?? '').trim(),
      ssl: parseSsl(env.DATABASE_SSL, nodeEnv),
      connectionTimeoutMillis: parseTimeout(env.DATABASE_CONNECT_TIMEOUT_MS),
    },
    projectRoot: env.PROJECT_ROOT ? resolve(env.PROJECT_ROOT) : DEFAULT_PROJECT_ROOT,
    variant: parseVariant(argv[0]),
  };
}

function parseSsl(value: string | undefined, nodeEnv: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return nodeEnv === 'production';
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;

  const millis = Number(value);
  if (!Number.isInteger(millis) || millis <= 0) {
    throw new ConfigurationError(
      `DATABASE_CONNECT_TIMEOUT_MS must be a positive integer, got "${value}"`
    );
  }
  return millis;
}

function parseVariant(arg: string | undefined): SetupVariant {
  if (arg === undefined || arg === 'full') return 'full';
  if (arg === 'schema') return 'schema';
  throw new ConfigurationError(`Unknown setup variant "${arg}" (expected "full" or "schema")`);
}
