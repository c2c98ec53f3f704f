import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { ACCEPT, reject, runItemTransaction } from '../../application/ingestion/runItemTransaction';
import { createTestDatabase, type TestDatabase } from '../helpers/testDatabase';

describe('runItemTransaction', () => {
  let store: TestDatabase;

  beforeAll(async () => {
    store = await createTestDatabase();
  });

  beforeEach(async () => {
    await store.reset();
  });

  afterAll(async () => {
    await store.close();
  });

  it('should commit accepted work', async () => {
    const outcome = await runItemTransaction(store.db, 'amy', async repository => {
      await repository.insertUser('amy');
      return ACCEPT;
    });

    expect(outcome).toEqual({ status: 'accepted', key: 'amy' });
    expect(await store.countRows('cat_user_account')).toBe(1);
  });

  it('should roll back a rejected item', async () => {
    const outcome = await runItemTransaction(store.db, 'amy', async repository => {
      await repository.insertUser('amy');
      return reject('validation', 'changed my mind');
    });

    expect(outcome).toEqual({ status: 'rejected', key: 'amy', reason: 'validation', detail: 'changed my mind' });
    expect(await store.countRows('cat_user_account')).toBe(0);
  });

  it('should commit side effects of a rejection that asks for it', async () => {
    const outcome = await runItemTransaction(store.db, 'Ana', async repository => {
      await repository.insertArtist('Ana');
      return { kind: 'reject', reason: 'conflict', detail: 'kept artist', commitSideEffects: true };
    });

    expect(outcome).toMatchObject({ status: 'rejected', reason: 'conflict' });
    expect(await store.countRows('cat_artist')).toBe(1);
  });

  it('should classify store errors raised by the work', async () => {
    await runItemTransaction(store.db, 'amy', async repository => {
      await repository.insertUser('amy');
      return ACCEPT;
    });

    const outcome = await runItemTransaction(store.db, 'amy', async repository => {
      await repository.insertUser('amy');
      return ACCEPT;
    });

    expect(outcome).toMatchObject({ status: 'rejected', key: 'amy', reason: 'conflict' });
  });

  it('should report unexpected failures as store failures and roll back', async () => {
    const outcome = await runItemTransaction(store.db, 'amy', async repository => {
      await repository.insertUser('amy');
      throw new Error('connection reset');
    });

    expect(outcome).toEqual({ status: 'rejected', key: 'amy', reason: 'store_failure', detail: 'connection reset' });
    expect(await store.countRows('cat_user_account')).toBe(0);
  });
});
