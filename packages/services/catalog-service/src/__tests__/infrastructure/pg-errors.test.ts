import { describe, it, expect } from 'vitest';
import { classifyStoreError, getPgErrorCode } from '../../infrastructure/database/pg-errors';

function driverError(code: string): Error {
  return Object.assign(new Error(`driver error ${code}`), { code });
}

describe('pg-errors', () => {
  it('should find the SQLSTATE on the error itself', () => {
    expect(getPgErrorCode(driverError('23505'))).toBe('23505');
  });

  it('should follow the cause chain of wrapped errors', () => {
    const wrapped = new Error('Failed query: insert into "cat_song"', { cause: driverError('23503') });
    const rewrapped = Object.assign(new Error('song rejected', { cause: wrapped }), { code: 'SONG_REJECTED' });

    expect(getPgErrorCode(rewrapped)).toBe('23503');
  });

  it('should ignore codes that are not SQLSTATEs', () => {
    expect(getPgErrorCode(driverError('ECONNRESET'))).toBeUndefined();
    expect(getPgErrorCode('23505')).toBeUndefined();
    expect(getPgErrorCode(null)).toBeUndefined();
  });

  it('should classify uniqueness and foreign key failures as conflicts', () => {
    expect(classifyStoreError(driverError('23505'))).toBe('conflict');
    expect(classifyStoreError(driverError('23503'))).toBe('conflict');
  });

  it('should classify rejected values as validation failures', () => {
    expect(classifyStoreError(driverError('23514'))).toBe('validation');
    expect(classifyStoreError(driverError('22P02'))).toBe('validation');
    expect(classifyStoreError(driverError('22008'))).toBe('validation');
  });

  it('should treat everything else as a store failure', () => {
    expect(classifyStoreError(driverError('08006'))).toBe('store_failure');
    expect(classifyStoreError(new Error('socket hang up'))).toBe('store_failure');
  });
});
