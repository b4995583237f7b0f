import type { SetupConfig } from '../config/env';
import { withConnection, type ConnectionDeps } from './client';
import { formatError } from './errors';
import { resolveSqlFiles } from './files';
import { runAll } from './runner';

export type SetupDeps = ConnectionDeps;

export async function setupDatabase(config: SetupConfig, deps: SetupDeps = {}): Promise<number> {
  const logger = deps.logger ?? console;
  const files = resolveSqlFiles(config);

  try {
    const result = await withConnection(
      config.database,
      connection => runAll(connection, files, { logger }),
      deps
    );

    if (!result.ok) {
      logger.error(`\n✗ Error: ${result.error.message}`);
      return 1;
    }
  } catch (error) {
    logger.error(`\n✗ Error: ${formatError(error)}`);
    return 1;
  }

  logger.log('\n✓ Database setup completed successfully!');
  return 0;
}
