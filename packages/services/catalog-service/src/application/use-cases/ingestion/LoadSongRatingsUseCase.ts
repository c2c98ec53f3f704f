/**
 * Load Song Ratings Use Case
 *
 * Rejection checks run in a fixed order and the first failing one decides:
 * unknown user, unknown (artist, title) song, rating outside 1..5, already rated by this user.
 */

import type { CatalogDatabase } from '../../../infrastructure/database/types';
import { describeIssues, songRatingInputSchema } from '../../../schema/ingestion-schemas';
import {
  rejectedOutcome,
  type IngestionOutcome,
  type IngestionReport,
  type RatingKey,
  type SongRatingInput,
} from '../../../domains/catalog';
import { ingestBatch } from '../../ingestion/ingestBatch';
import { ACCEPT, reject, runItemTransaction } from '../../ingestion/runItemTransaction';

export const MIN_RATING = 1;
export const MAX_RATING = 5;

export class LoadSongRatingsUseCase {
  constructor(private readonly db: CatalogDatabase) {}

  async execute(songRatings: readonly SongRatingInput[]): Promise<IngestionReport<RatingKey>> {
    return ingestBatch(songRatings, {
      operation: 'load-song-ratings',
      keyOf: rating => [rating.username, rating.artist, rating.songTitle] as const,
      ingestItem: (rating, key) => this.ingestRating(rating, key),
    });
  }

  private async ingestRating(input: SongRatingInput, key: RatingKey): Promise<IngestionOutcome<RatingKey>> {
    const parsed = songRatingInputSchema.safeParse(input);
    if (!parsed.success) {
      return rejectedOutcome(key, 'validation', describeIssues(parsed.error));
    }
    const rating = parsed.data;

    return runItemTransaction(this.db, key, async repository => {
      const userId = await repository.findUserId(rating.username);
      if (userId === null) {
        return reject('unknown_reference', `user '${rating.username}' does not exist`);
      }

      const songId = await repository.findSongId(rating.artist, rating.songTitle);
      if (songId === null) {
        return reject('unknown_reference', `song '${rating.songTitle}' by '${rating.artist}' does not exist`);
      }

      if (rating.rating < MIN_RATING || rating.rating > MAX_RATING) {
        return reject('validation', `rating ${rating.rating} is outside ${MIN_RATING}..${MAX_RATING}`);
      }

      if (await repository.hasRating(userId, songId)) {
        return reject('conflict', `user '${rating.username}' already rated this song`);
      }

      await repository.insertRating({ userId, songId, value: rating.rating, ratedOn: rating.ratedOn });
      return ACCEPT;
    });
  }
}
