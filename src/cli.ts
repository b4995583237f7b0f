import { loadConfig, loadEnvFile, type Env, type SetupConfig } from './config/env';
import type { Logger } from './db/client';
import { formatError } from './db/errors';
import { setupDatabase, type SetupDeps } from './db/init';

export interface CliDeps extends SetupDeps {
  env?: Env;
  argv?: string[];
  loadEnv?: () => void;
}

export function readConfig(deps: CliDeps = {}): SetupConfig | null {
  const logger: Logger = deps.logger ?? console;
  (deps.loadEnv ?? loadEnvFile)();

  try {
    return loadConfig(deps.env ?? process.env, deps.argv ?? process.argv.slice(2));
  } catch (error) {
    logger.error(`Configuration error: ${formatError(error)}`);
    logger.log('\nPlease set up your .env file with the required variables.');
    logger.log('Copy .env.example to .env and fill in the values.\n');
    return null;
  }
}

export async function runSetup(deps: CliDeps = {}): Promise<number> {
  const logger = deps.logger ?? console;
  logger.log('Setting up tanker delivery database...');

  const config = readConfig(deps);
  if (!config) {
    return 1;
  }

  logger.log(`Running ${config.variant} setup from ${config.projectRoot}`);
  return setupDatabase(config, { logger, createClient: deps.createClient });
}
