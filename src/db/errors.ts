export type SetupErrorCode =
  | 'CONFIGURATION'
  | 'CONNECTION'
  | 'MISSING_FILE'
  | 'EXECUTION';

export class SetupError extends Error {
  readonly code: SetupErrorCode;

  constructor(code: SetupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SetupError';
    this.code = code;
  }
}

export class ConfigurationError extends SetupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

export class ConnectionError extends SetupError {
  constructor(cause: unknown) {
    super('CONNECTION', `Could not connect to database: ${describeCause(cause)}`, { cause });
    this.name = 'ConnectionError';
  }
}

export class MissingFileError extends SetupError {
  readonly label: string;
  readonly path: string;

  constructor(label: string, path: string) {
    super('MISSING_FILE', `SQL file not found: ${path}`);
    this.name = 'MissingFileError';
    this.label = label;
    this.path = path;
  }
}

export class ExecutionError extends SetupError {
  readonly label: string;
  readonly path: string;

  constructor(label: string, path: string, cause: unknown) {
    super('EXECUTION', `Error executing ${label} (${path}): ${describeCause(cause)}`, { cause });
    this.name = 'ExecutionError';
    this.label = label;
    this.path = path;
  }
}

function describeCause(cause: unknown): string {
  if (!(cause instanceof Error)) {
    return String(cause);
  }

  // node-postgres DatabaseError fields
  const code = 'code' in cause ? cause.code : undefined;
  const position = 'position' in cause ? cause.position : undefined;
  const details: string[] = [];
  if (typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code)) details.push(`SQLSTATE ${code}`);
  if (typeof position === 'string') details.push(`position ${position}`);

  return details.length > 0 ? `${cause.message} [${details.join(', ')}]` : cause.message;
}

export function formatError(error: unknown): string {
  if (error instanceof SetupError) {
    return error.message;
  }
  return describeCause(error);
}
