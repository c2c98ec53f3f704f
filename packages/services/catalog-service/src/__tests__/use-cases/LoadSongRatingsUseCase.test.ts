import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { LoadSongRatingsUseCase } from '../../application/use-cases/ingestion/LoadSongRatingsUseCase';
import { createCatalogService } from '../../infrastructure/ServiceFactory';
import type { SongRatingInput } from '../../domains/catalog';
import { createTestDatabase, type TestDatabase } from '../helpers/testDatabase';

function rating(overrides: Partial<SongRatingInput> = {}): SongRatingInput {
  return { username: 'amy', artist: 'Ana', songTitle: 'Rise', rating: 4, ratedOn: '2020-01-01', ...overrides };
}

describe('LoadSongRatingsUseCase', () => {
  let store: TestDatabase;
  let useCase: LoadSongRatingsUseCase;

  beforeAll(async () => {
    store = await createTestDatabase();
  });

  beforeEach(async () => {
    await store.reset();
    const service = createCatalogService(store.db);
    await service.loadSingleSongs([{ title: 'Rise', genres: ['Pop'], artist: 'Ana', releaseDate: '2008-10-01' }]);
    await service.loadAlbums([
      { title: 'Blue', genre: 'Jazz', artist: 'Ben', releaseDate: '2007-01-01', songs: ['One'] },
    ]);
    await service.loadUsers(['amy', 'bob']);
    useCase = new LoadSongRatingsUseCase(store.db);
  });

  afterAll(async () => {
    await store.close();
  });

  it('should store ratings for singles and album songs', async () => {
    const report = await useCase.execute([rating(), rating({ artist: 'Ben', songTitle: 'One', rating: 1 })]);

    expect(report.rejects.isEmpty()).toBe(true);
    expect(await store.countRows('cat_rating')).toBe(2);
  });

  it('should reject an unknown user before looking at the rating value', async () => {
    const report = await useCase.execute([rating({ username: 'zed', rating: 9 })]);

    expect(report.outcomes).toEqual([
      {
        status: 'rejected',
        key: ['zed', 'Ana', 'Rise'],
        reason: 'unknown_reference',
        detail: "user 'zed' does not exist",
      },
    ]);
  });

  it('should reject an unknown song before looking at the rating value', async () => {
    const report = await useCase.execute([rating({ songTitle: 'Fall', rating: 0 })]);

    expect(report.outcomes[0]).toMatchObject({
      reason: 'unknown_reference',
      detail: "song 'Fall' by 'Ana' does not exist",
    });
  });

  it('should match songs by artist and title together', async () => {
    const report = await useCase.execute([rating({ artist: 'Ben', songTitle: 'Rise' })]);

    expect(report.outcomes[0]).toMatchObject({ reason: 'unknown_reference' });
  });

  it('should reject values outside 1..5', async () => {
    const report = await useCase.execute([rating({ rating: 0 }), rating({ username: 'bob', rating: 6 })]);

    expect(report.outcomes).toEqual([
      { status: 'rejected', key: ['amy', 'Ana', 'Rise'], reason: 'validation', detail: 'rating 0 is outside 1..5' },
      { status: 'rejected', key: ['bob', 'Ana', 'Rise'], reason: 'validation', detail: 'rating 6 is outside 1..5' },
    ]);
    expect(await store.countRows('cat_rating')).toBe(0);
  });

  it('should reject a non-integer rating', async () => {
    const report = await useCase.execute([rating({ rating: 4.5 })]);

    expect(report.outcomes[0]).toMatchObject({ status: 'rejected', reason: 'validation' });
  });

  it('should keep exactly one rating per user and song', async () => {
    const report = await useCase.execute([rating({ rating: 5 }), rating({ rating: 2, ratedOn: '2021-01-01' })]);

    expect(report.accepted).toEqual([['amy', 'Ana', 'Rise']]);
    expect(report.outcomes[1]).toMatchObject({
      reason: 'conflict',
      detail: "user 'amy' already rated this song",
    });
    expect(await store.countRows('cat_rating')).toBe(1);

    const stored = await store.client.query<{ rating_value: number }>('SELECT rating_value FROM cat_rating');
    expect(stored.rows).toEqual([{ rating_value: 5 }]);
  });

  it('should reject a duplicate from an earlier batch', async () => {
    await useCase.execute([rating()]);
    const report = await useCase.execute([rating({ rating: 3 })]);

    expect(report.rejects.has(['amy', 'Ana', 'Rise'])).toBe(true);
    expect(await store.countRows('cat_rating')).toBe(1);
  });
});
