/**
 * Catalog Analytics Service
 *
 * Argument checks and error wrapping around the analytics repository. Counts of zero
 * and reversed year ranges are valid and answer with an empty result.
 */

import { serializeError, toError } from '@music-catalog/platform-core';
import { getLogger } from '../../config/service-config';
import type { DrizzleCatalogAnalyticsRepository } from '../../infrastructure/database/DrizzleCatalogAnalyticsRepository';
import type {
  ArtistSingleCount,
  GenreSongCount,
  SongRatingCount,
  UserRatingCount,
  YearRange,
} from '../../domains/catalog';
import { CatalogError } from '../errors';

const logger = getLogger('catalog-analytics-service');

function requireCount(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw CatalogError.invalidQueryArgument('n', `expected a non-negative integer, got ${n}`);
  }
}

function requireYear(argument: string, year: number): void {
  if (!Number.isInteger(year)) {
    throw CatalogError.invalidQueryArgument(argument, `expected an integer year, got ${year}`);
  }
}

function requireYearRange([startYear, endYear]: YearRange): void {
  requireYear('startYear', startYear);
  requireYear('endYear', endYear);
}

function isEmptyRange([startYear, endYear]: YearRange): boolean {
  return startYear > endYear;
}

export class CatalogAnalyticsService {
  constructor(private readonly repository: DrizzleCatalogAnalyticsRepository) {}

  async getMostProlificIndividualArtists(n: number, yearRange: YearRange): Promise<ArtistSingleCount[]> {
    requireCount(n);
    requireYearRange(yearRange);
    if (n === 0 || isEmptyRange(yearRange)) return [];
    return this.run('most-prolific-individual-artists', () =>
      this.repository.findMostProlificIndividualArtists(n, yearRange)
    );
  }

  async getArtistsLastSingleInYear(year: number): Promise<Set<string>> {
    requireYear('year', year);
    const names = await this.run('artists-last-single-in-year', () =>
      this.repository.findArtistsWithLastSingleIn(year)
    );
    return new Set(names);
  }

  async getTopSongGenres(n: number): Promise<GenreSongCount[]> {
    requireCount(n);
    if (n === 0) return [];
    return this.run('top-song-genres', () => this.repository.findTopSongGenres(n));
  }

  async getAlbumAndSingleArtists(): Promise<Set<string>> {
    const names = await this.run('album-and-single-artists', () => this.repository.findAlbumAndSingleArtists());
    return new Set(names);
  }

  async getMostRatedSongs(yearRange: YearRange, n: number): Promise<SongRatingCount[]> {
    requireYearRange(yearRange);
    requireCount(n);
    if (n === 0 || isEmptyRange(yearRange)) return [];
    return this.run('most-rated-songs', () => this.repository.findMostRatedSongs(yearRange, n));
  }

  async getMostEngagedUsers(yearRange: YearRange, n: number): Promise<UserRatingCount[]> {
    requireYearRange(yearRange);
    requireCount(n);
    if (n === 0 || isEmptyRange(yearRange)) return [];
    return this.run('most-engaged-users', () => this.repository.findMostEngagedUsers(yearRange, n));
  }

  private async run<T>(query: string, execute: () => Promise<T>): Promise<T> {
    try {
      return await execute();
    } catch (error) {
      logger.error('Analytics query failed', { query, error: serializeError(error) });
      throw CatalogError.queryFailed(query, toError(error));
    }
  }
}
