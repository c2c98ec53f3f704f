import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const DDL_FILE = fileURLToPath(new URL('./catalog-schema.sql', import.meta.url));

/**
 * Splits a DDL script into executable statements. Comment lines are dropped; statements
 * must not contain semicolons inside literals.
 */
export function splitSqlStatements(script: string): string[] {
  return script
    .split('\n')
    .filter(line => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map(statement => statement.trim())
    .filter(statement => statement.length > 0);
}

export function loadCatalogDdlStatements(): string[] {
  return splitSqlStatements(readFileSync(DDL_FILE, 'utf8'));
}
