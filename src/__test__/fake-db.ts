import { mkdirSync, mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { Logger, SqlConnection } from '../db/client';

type FailRule = (text: string) => Error | undefined;

/**
 * In-process stand-in for a pg client. Statements between BEGIN and COMMIT
 * are only moved to `committed` on COMMIT and are discarded on ROLLBACK.
 */
export class FakeConnection implements SqlConnection {
  readonly statements: string[] = [];
  readonly committed: string[] = [];
  readonly rolledBack: string[] = [];
  endCalls = 0;

  private pending: string[] = [];

  constructor(private readonly failWhen: FailRule = () => undefined) {}

  async query(text: string): Promise<unknown> {
    this.statements.push(text);

    const isControl = text === 'BEGIN' || text === 'COMMIT' || text === 'ROLLBACK';
    if (!isControl) {
      this.pending.push(text);
    }

    const failure = this.failWhen(text);
    if (failure) throw failure;

    if (text === 'BEGIN') {
      this.pending = [];
    } else if (text === 'COMMIT') {
      this.committed.push(...this.pending);
      this.pending = [];
    } else if (text === 'ROLLBACK') {
      this.rolledBack.push(...this.pending);
      this.pending = [];
    }
    return { rows: [] };
  }

  async end(): Promise<void> {
    this.endCalls += 1;
  }
}

export class FakeClient extends FakeConnection {
  connectCalls = 0;

  constructor(
    private readonly connectError?: Error,
    failWhen?: FailRule
  ) {
    super(failWhen);
  }

  async connect(): Promise<void> {
    this.connectCalls += 1;
    if (this.connectError) throw this.connectError;
  }
}

export function pgError(message: string, code: string, position?: string): Error {
  return Object.assign(new Error(message), { code, position });
}

export function createCapturingLogger(): { logger: Logger; lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  const logger: Logger = {
    log: (...args: unknown[]) => {
      lines.push(args.map(String).join(' '));
    },
    error: (...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    },
  };
  return { logger, lines, errors };
}

/** Creates a temporary project root holding the given files. */
export function makeProject(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), 'db-setup-'));
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content, 'utf-8');
  }
  return root;
}

export const SAMPLE_SQL = {
  'sql/schema.sql': 'CREATE TABLE IF NOT EXISTS users (user_id SERIAL PRIMARY KEY);\n',
  'sql/customer.sql': 'CREATE OR REPLACE FUNCTION customer_fn() RETURNS INT AS $$ SELECT 1 $$ LANGUAGE sql;\n',
  'sql/supplier.sql': 'CREATE OR REPLACE FUNCTION supplier_fn() RETURNS INT AS $$ SELECT 2 $$ LANGUAGE sql;\n',
  'sql/driver.sql': 'CREATE OR REPLACE FUNCTION driver_fn() RETURNS INT AS $$ SELECT 3 $$ LANGUAGE sql;\n',
} as const;
