/**
 * DrizzleCatalogAnalyticsRepository
 * Read-only aggregations. Rankings order by count descending, then by name ascending,
 * and are capped at the requested size.
 */

import { and, asc, between, count, desc, eq, exists, isNull, sql } from 'drizzle-orm';
import { albums, artists, genres, ratings, songGenres, songs, userAccounts } from '../../schema/catalog-schema';
import type {
  ArtistSingleCount,
  GenreSongCount,
  SongRatingCount,
  UserRatingCount,
  YearRange,
} from '../../domains/catalog';
import type { CatalogDatabase } from './types';

const singleReleaseYear = sql<number>`extract(year from ${songs.singleReleaseDate})`;
const ratingYear = sql<number>`extract(year from ${ratings.ratedOn})`;

export class DrizzleCatalogAnalyticsRepository {
  constructor(private readonly db: CatalogDatabase) {}

  async findMostProlificIndividualArtists(limit: number, [startYear, endYear]: YearRange): Promise<ArtistSingleCount[]> {
    const singleCount = count();
    const rows = await this.db
      .select({ artistName: artists.name, singleCount })
      .from(artists)
      .innerJoin(songs, eq(songs.artistId, artists.id))
      .where(and(isNull(songs.albumId), between(singleReleaseYear, startYear, endYear)))
      .groupBy(artists.name)
      .orderBy(desc(singleCount), asc(artists.name))
      .limit(limit);
    return rows;
  }

  async findArtistsWithLastSingleIn(year: number): Promise<string[]> {
    const rows = await this.db
      .select({ artistName: artists.name })
      .from(artists)
      .innerJoin(songs, eq(songs.artistId, artists.id))
      .where(isNull(songs.albumId))
      .groupBy(artists.id, artists.name)
      .having(sql`max(${singleReleaseYear}) = ${year}`);
    return rows.map(row => row.artistName);
  }

  async findTopSongGenres(limit: number): Promise<GenreSongCount[]> {
    const songCount = count(songGenres.songId);
    const rows = await this.db
      .select({ genreName: genres.name, songCount })
      .from(genres)
      .innerJoin(songGenres, eq(songGenres.genreId, genres.id))
      .groupBy(genres.name)
      .orderBy(desc(songCount), asc(genres.name))
      .limit(limit);
    return rows;
  }

  async findAlbumAndSingleArtists(): Promise<string[]> {
    const hasAlbum = this.db.select({ one: sql`1` }).from(albums).where(eq(albums.artistId, artists.id));
    const hasSingle = this.db
      .select({ one: sql`1` })
      .from(songs)
      .where(and(eq(songs.artistId, artists.id), isNull(songs.albumId)));
    const rows = await this.db
      .selectDistinct({ artistName: artists.name })
      .from(artists)
      .where(and(exists(hasAlbum), exists(hasSingle)));
    return rows.map(row => row.artistName);
  }

  // Artist name breaks ties between equally rated songs that share a title
  async findMostRatedSongs([startYear, endYear]: YearRange, limit: number): Promise<SongRatingCount[]> {
    const ratingCount = count(ratings.id);
    const rows = await this.db
      .select({ songTitle: songs.title, artistName: artists.name, ratingCount })
      .from(ratings)
      .innerJoin(songs, eq(ratings.songId, songs.id))
      .innerJoin(artists, eq(songs.artistId, artists.id))
      .where(between(ratingYear, startYear, endYear))
      .groupBy(songs.title, artists.name)
      .orderBy(desc(ratingCount), asc(songs.title), asc(artists.name))
      .limit(limit);
    return rows;
  }

  async findMostEngagedUsers([startYear, endYear]: YearRange, limit: number): Promise<UserRatingCount[]> {
    const ratingCount = count(ratings.id);
    const rows = await this.db
      .select({ username: userAccounts.username, ratingCount })
      .from(ratings)
      .innerJoin(userAccounts, eq(ratings.userId, userAccounts.id))
      .where(between(ratingYear, startYear, endYear))
      .groupBy(userAccounts.username)
      .orderBy(desc(ratingCount), asc(userAccounts.username))
      .limit(limit);
    return rows;
  }
}
