/**
 * Load Single Songs Use Case
 * Each single gets its artist resolved, a song row without album, and one genre link per genre.
 */

import type { CatalogDatabase } from '../../../infrastructure/database/types';
import { ReferenceResolver } from '../../../infrastructure/database/ReferenceResolver';
import { describeIssues, singleSongInputSchema } from '../../../schema/ingestion-schemas';
import {
  rejectedOutcome,
  type IngestionOutcome,
  type IngestionReport,
  type SingleSongInput,
  type SongKey,
} from '../../../domains/catalog';
import { ingestBatch } from '../../ingestion/ingestBatch';
import { ACCEPT, runItemTransaction } from '../../ingestion/runItemTransaction';

export class LoadSingleSongsUseCase {
  constructor(private readonly db: CatalogDatabase) {}

  async execute(singles: readonly SingleSongInput[]): Promise<IngestionReport<SongKey>> {
    return ingestBatch(singles, {
      operation: 'load-single-songs',
      keyOf: single => [single.title, single.artist] as const,
      ingestItem: (single, key) => this.ingestSingle(single, key),
    });
  }

  private async ingestSingle(input: SingleSongInput, key: SongKey): Promise<IngestionOutcome<SongKey>> {
    const parsed = singleSongInputSchema.safeParse(input);
    if (!parsed.success) {
      return rejectedOutcome(key, 'validation', describeIssues(parsed.error));
    }
    const single = parsed.data;
    if (single.genres.length === 0) {
      return rejectedOutcome(key, 'validation', 'a single needs at least one genre');
    }

    return runItemTransaction(this.db, key, async repository => {
      const resolver = new ReferenceResolver(repository);
      const artistId = await resolver.resolveArtist(single.artist);
      const songId = await repository.insertSong({
        title: single.title,
        artistId,
        albumId: null,
        singleReleaseDate: single.releaseDate,
      });
      for (const genreName of single.genres) {
        const genreId = await resolver.resolveGenre(genreName);
        await repository.linkSongGenre(songId, genreId);
      }
      return ACCEPT;
    });
  }
}
