import { join } from 'path';
import type { SetupConfig, SetupVariant } from '../config/env';

export interface SqlFileDescriptor {
  label: string;
  relativePath: string;
  required: boolean;
}

export interface ResolvedSqlFile extends SqlFileDescriptor {
  path: string;
}

// Role functions reference tables and types created by the schema, so order matters.
export const SQL_FILE_SETS: Record<SetupVariant, readonly SqlFileDescriptor[]> = {
  full: [
    { label: 'schema', relativePath: 'sql/schema.sql', required: true },
    { label: 'customer', relativePath: 'sql/customer.sql', required: true },
    { label: 'supplier', relativePath: 'sql/supplier.sql', required: true },
    { label: 'driver', relativePath: 'sql/driver.sql', required: true },
  ],
  schema: [
    { label: 'schema', relativePath: 'sql/schema.sql', required: false },
  ],
};

export function resolveSqlFiles(
  config: Pick<SetupConfig, 'projectRoot' | 'variant'>
): ResolvedSqlFile[] {
  return SQL_FILE_SETS[config.variant].map(file => ({
    ...file,
    path: join(config.projectRoot, file.relativePath),
  }));
}
