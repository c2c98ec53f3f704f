import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { LoadUsersUseCase } from '../../application/use-cases/ingestion/LoadUsersUseCase';
import { createTestDatabase, type TestDatabase } from '../helpers/testDatabase';

describe('LoadUsersUseCase', () => {
  let store: TestDatabase;
  let useCase: LoadUsersUseCase;

  beforeAll(async () => {
    store = await createTestDatabase();
  });

  beforeEach(async () => {
    await store.reset();
    useCase = new LoadUsersUseCase(store.db);
  });

  afterAll(async () => {
    await store.close();
  });

  it('should reject duplicate usernames once each', async () => {
    const report = await useCase.execute(['amy', 'bob', 'amy', 'amy']);

    expect(report.accepted).toEqual(['amy', 'bob']);
    expect(report.rejects.toArray()).toEqual(['amy']);
    expect(report.outcomes[2]).toMatchObject({ status: 'rejected', reason: 'conflict' });
    expect(await store.countRows('cat_user_account')).toBe(2);
  });

  it('should reject usernames that already exist from an earlier batch', async () => {
    await useCase.execute(['amy']);
    const report = await useCase.execute(['amy', 'cat']);

    expect(report.rejects.toArray()).toEqual(['amy']);
    expect(report.accepted).toEqual(['cat']);
  });

  it('should return an empty report for an empty batch', async () => {
    const report = await useCase.execute([]);

    expect(report.outcomes).toEqual([]);
    expect(report.rejects.isEmpty()).toBe(true);
  });
});
