import { existsSync, readFileSync } from 'fs';
import type { Logger, SqlConnection } from './client';
import { ExecutionError, MissingFileError, formatError } from './errors';
import type { ResolvedSqlFile } from './files';

export type FileStatus = 'succeeded' | 'failed' | 'missing';

export interface FileOutcome {
  file: ResolvedSqlFile;
  status: FileStatus;
  error?: MissingFileError | ExecutionError;
}

export type RunResult =
  | { ok: true; outcomes: FileOutcome[] }
  | { ok: false; outcomes: FileOutcome[]; error: MissingFileError | ExecutionError };

export interface RunnerDeps {
  logger?: Logger;
}

/**
 * Executes each file as one transaction, in order. Stops at the first
 * failure: earlier files stay committed, later files are never read.
 * A missing optional file is recorded and skipped.
 */
export async function runAll(
  connection: SqlConnection,
  files: readonly ResolvedSqlFile[],
  deps: RunnerDeps = {}
): Promise<RunResult> {
  const logger = deps.logger ?? console;
  const outcomes: FileOutcome[] = [];

  for (const file of files) {
    if (!existsSync(file.path)) {
      logger.error(`✗ SQL file not found: ${file.relativePath}`);

      if (!file.required) {
        outcomes.push({ file, status: 'missing' });
        continue;
      }

      const error = new MissingFileError(file.label, file.relativePath);
      outcomes.push({ file, status: 'missing', error });
      return { ok: false, outcomes, error };
    }

    const outcome = await executeFile(connection, file, logger);
    outcomes.push(outcome);

    if (outcome.error) {
      return { ok: false, outcomes, error: outcome.error };
    }
  }

  return { ok: true, outcomes };
}

async function executeFile(
  connection: SqlConnection,
  file: ResolvedSqlFile,
  logger: Logger
): Promise<FileOutcome> {
  logger.log(`\nExecuting ${file.label} (${file.relativePath})...`);

  let sql: string;
  try {
    sql = readFileSync(file.path, 'utf-8');
  } catch (cause) {
    logger.error(`✗ Error reading ${file.label}: ${formatError(cause)}`);
    return { file, status: 'failed', error: new ExecutionError(file.label, file.relativePath, cause) };
  }

  try {
    await connection.query('BEGIN');
    await connection.query(sql);
    await connection.query('COMMIT');
  } catch (cause) {
    try {
      await connection.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error(`✗ Rollback of ${file.label} failed: ${formatError(rollbackError)}`);
    }

    const error = new ExecutionError(file.label, file.relativePath, cause);
    logger.error(`✗ Error executing ${file.label}: ${formatError(cause)}`);
    return { file, status: 'failed', error };
  }

  logger.log(`✓ Successfully executed ${file.label}`);
  return { file, status: 'succeeded' };
}
