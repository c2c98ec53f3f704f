/**
 * SQLSTATE classification for store errors.
 * drizzle-orm wraps driver errors, so the code is searched along the cause chain.
 */

import type { RejectionReason } from '../../domains/catalog';

export const PG_ERROR_CODES = {
  UNIQUE_VIOLATION: '23505',
  FOREIGN_KEY_VIOLATION: '23503',
  NOT_NULL_VIOLATION: '23502',
  CHECK_VIOLATION: '23514',
  INVALID_TEXT_REPRESENTATION: '22P02',
  INVALID_DATETIME_FORMAT: '22007',
  DATETIME_FIELD_OVERFLOW: '22008',
  STRING_DATA_RIGHT_TRUNCATION: '22001',
  NUMERIC_VALUE_OUT_OF_RANGE: '22003',
} as const;

const SQLSTATE = /^[0-9A-Z]{5}$/;
const MAX_CAUSE_DEPTH = 8;

export function getPgErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current && typeof current === 'object'; depth++) {
    const code: unknown = Reflect.get(current, 'code');
    if (typeof code === 'string' && SQLSTATE.test(code)) {
      return code;
    }
    current = Reflect.get(current, 'cause');
  }
  return undefined;
}

const CONFLICT_CODES: ReadonlySet<string> = new Set([
  PG_ERROR_CODES.UNIQUE_VIOLATION,
  PG_ERROR_CODES.FOREIGN_KEY_VIOLATION,
]);

const VALIDATION_CODES: ReadonlySet<string> = new Set([
  PG_ERROR_CODES.NOT_NULL_VIOLATION,
  PG_ERROR_CODES.CHECK_VIOLATION,
  PG_ERROR_CODES.INVALID_TEXT_REPRESENTATION,
  PG_ERROR_CODES.INVALID_DATETIME_FORMAT,
  PG_ERROR_CODES.DATETIME_FIELD_OVERFLOW,
  PG_ERROR_CODES.STRING_DATA_RIGHT_TRUNCATION,
  PG_ERROR_CODES.NUMERIC_VALUE_OUT_OF_RANGE,
]);

export function classifyStoreError(error: unknown): RejectionReason {
  const code = getPgErrorCode(error);
  if (code && CONFLICT_CODES.has(code)) return 'conflict';
  if (code && VALIDATION_CODES.has(code)) return 'validation';
  return 'store_failure';
}
