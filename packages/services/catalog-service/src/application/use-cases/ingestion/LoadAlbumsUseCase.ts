/**
 * Load Albums Use Case
 * An album and all of its songs are stored together or not at all. A title the artist
 * already uses is rejected, but the artist and genre resolved for it are kept.
 */

import { toError } from '@music-catalog/platform-core';
import type { CatalogDatabase } from '../../../infrastructure/database/types';
import { ReferenceResolver } from '../../../infrastructure/database/ReferenceResolver';
import { albumInputSchema, describeIssues } from '../../../schema/ingestion-schemas';
import {
  rejectedOutcome,
  type AlbumInput,
  type AlbumKey,
  type IngestionOutcome,
  type IngestionReport,
} from '../../../domains/catalog';
import { CatalogError } from '../../errors';
import { ingestBatch } from '../../ingestion/ingestBatch';
import { ACCEPT, runItemTransaction } from '../../ingestion/runItemTransaction';

export class LoadAlbumsUseCase {
  constructor(private readonly db: CatalogDatabase) {}

  async execute(albums: readonly AlbumInput[]): Promise<IngestionReport<AlbumKey>> {
    return ingestBatch(albums, {
      operation: 'load-albums',
      keyOf: album => [album.title, album.artist] as const,
      ingestItem: (album, key) => this.ingestAlbum(album, key),
    });
  }

  private async ingestAlbum(input: AlbumInput, key: AlbumKey): Promise<IngestionOutcome<AlbumKey>> {
    const parsed = albumInputSchema.safeParse(input);
    if (!parsed.success) {
      return rejectedOutcome(key, 'validation', describeIssues(parsed.error));
    }
    const album = parsed.data;

    return runItemTransaction(this.db, key, async repository => {
      const resolver = new ReferenceResolver(repository);
      const artistId = await resolver.resolveArtist(album.artist);
      const genreId = await resolver.resolveGenre(album.genre);

      const existingAlbumId = await repository.findAlbumId(album.title, artistId);
      if (existingAlbumId !== null) {
        return {
          kind: 'reject',
          reason: 'conflict',
          detail: `artist '${album.artist}' already has an album titled '${album.title}'`,
          commitSideEffects: true,
        };
      }

      const albumId = await repository.insertAlbum({
        name: album.title,
        artistId,
        releaseDate: album.releaseDate,
        genreId,
      });

      for (const songTitle of album.songs) {
        try {
          const songId = await repository.insertSong({ title: songTitle, artistId, albumId, singleReleaseDate: null });
          await repository.linkSongGenre(songId, genreId);
        } catch (error) {
          throw CatalogError.albumSongRejected(album.title, songTitle, toError(error));
        }
      }
      return ACCEPT;
    });
  }
}
