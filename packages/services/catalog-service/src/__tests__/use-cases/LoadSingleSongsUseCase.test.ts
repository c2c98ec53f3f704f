import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { LoadSingleSongsUseCase } from '../../application/use-cases/ingestion/LoadSingleSongsUseCase';
import { createTestDatabase, type TestDatabase } from '../helpers/testDatabase';

describe('LoadSingleSongsUseCase', () => {
  let store: TestDatabase;
  let useCase: LoadSingleSongsUseCase;

  beforeAll(async () => {
    store = await createTestDatabase();
  });

  beforeEach(async () => {
    await store.reset();
    useCase = new LoadSingleSongsUseCase(store.db);
  });

  afterAll(async () => {
    await store.close();
  });

  it('should store a single with one link per genre', async () => {
    const report = await useCase.execute([
      { title: 'Rise', genres: ['Pop', 'Rock'], artist: 'Ana', releaseDate: '2008-10-01' },
    ]);

    expect(report.accepted).toEqual([['Rise', 'Ana']]);
    expect(report.rejects.isEmpty()).toBe(true);
    expect(await store.countRows('cat_song')).toBe(1);
    expect(await store.countRows('cat_song_genre')).toBe(2);
    expect(await store.countRows('cat_genre')).toBe(2);
  });

  it('should reject an empty genre list without touching the store', async () => {
    const report = await useCase.execute([{ title: 'S1', genres: [], artist: 'A1', releaseDate: '2009-01-01' }]);

    expect(report.outcomes).toEqual([
      { status: 'rejected', key: ['S1', 'A1'], reason: 'validation', detail: 'a single needs at least one genre' },
    ]);
    expect(await store.countRows('cat_song')).toBe(0);
    expect(await store.countRows('cat_artist')).toBe(0);
  });

  it('should reject a malformed release date', async () => {
    const report = await useCase.execute([{ title: 'S1', genres: ['Pop'], artist: 'A1', releaseDate: '2008-13-01' }]);

    expect(report.outcomes).toEqual([
      { status: 'rejected', key: ['S1', 'A1'], reason: 'validation', detail: 'releaseDate: not a calendar date' },
    ]);
  });

  it('should reject a second song with the same title by the same artist', async () => {
    const report = await useCase.execute([
      { title: 'S1', genres: ['Pop'], artist: 'A1', releaseDate: '2008-10-01' },
      { title: 'S1', genres: ['Rock'], artist: 'A1', releaseDate: '2009-10-01' },
    ]);

    expect(report.outcomes[1]).toMatchObject({ status: 'rejected', key: ['S1', 'A1'], reason: 'conflict' });
    expect(report.rejects.has(['S1', 'A1'])).toBe(true);
    expect(await store.countRows('cat_song')).toBe(1);
    expect(await store.countRows('cat_genre')).toBe(1);
  });

  it('should roll back the whole item when a genre is listed twice', async () => {
    const report = await useCase.execute([{ title: 'S1', genres: ['Pop', 'Pop'], artist: 'A1', releaseDate: '2008-10-01' }]);

    expect(report.outcomes[0]).toMatchObject({ status: 'rejected', reason: 'conflict' });
    expect(await store.countRows('cat_song')).toBe(0);
    expect(await store.countRows('cat_artist')).toBe(0);
    expect(await store.countRows('cat_genre')).toBe(0);
  });

  it('should keep going after a rejected item', async () => {
    const report = await useCase.execute([
      { title: 'S1', genres: [], artist: 'A1', releaseDate: '2008-10-01' },
      { title: 'S2', genres: ['Pop'], artist: 'A1', releaseDate: '2008-10-01' },
      { title: 'S3', genres: ['Pop'], artist: 'A1', releaseDate: '2008-11-01' },
    ]);

    expect(report.rejects.toArray()).toEqual([['S1', 'A1']]);
    expect(report.accepted).toEqual([
      ['S2', 'A1'],
      ['S3', 'A1'],
    ]);
    expect(report.outcomes).toHaveLength(3);
    expect(await store.countRows('cat_artist')).toBe(1);
    expect(await store.countRows('cat_genre')).toBe(1);
  });
});
