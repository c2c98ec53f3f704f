/**
 * DrizzleCatalogRepository
 * Row-level reads and writes used by ingestion. Constructed per item transaction,
 * so every call runs on that transaction's connection.
 */

import { and, eq } from 'drizzle-orm';
import { albums, artists, genres, ratings, songGenres, songs, userAccounts } from '../../schema/catalog-schema';
import { CatalogError } from '../../application/errors';
import type { CatalogDatabase } from './types';

export interface SongRow {
  title: string;
  artistId: number;
  albumId: number | null;
  singleReleaseDate: string | null;
}

export interface AlbumRow {
  name: string;
  artistId: number;
  releaseDate: string;
  genreId: number;
}

export interface RatingRow {
  userId: number;
  songId: number;
  value: number;
  ratedOn: string;
}

function firstId(rows: { id: number }[], entity: string): number {
  const row = rows[0];
  if (!row) {
    throw CatalogError.insertFailed(entity);
  }
  return row.id;
}

export class DrizzleCatalogRepository {
  constructor(private readonly db: CatalogDatabase) {}

  async findArtistId(name: string): Promise<number | null> {
    const rows = await this.db.select({ id: artists.id }).from(artists).where(eq(artists.name, name)).limit(1);
    return rows[0]?.id ?? null;
  }

  async insertArtist(name: string): Promise<number> {
    const rows = await this.db.insert(artists).values({ name }).returning({ id: artists.id });
    return firstId(rows, 'artist');
  }

  async findGenreId(name: string): Promise<number | null> {
    const rows = await this.db.select({ id: genres.id }).from(genres).where(eq(genres.name, name)).limit(1);
    return rows[0]?.id ?? null;
  }

  async insertGenre(name: string): Promise<number> {
    const rows = await this.db.insert(genres).values({ name }).returning({ id: genres.id });
    return firstId(rows, 'genre');
  }

  async insertSong(song: SongRow): Promise<number> {
    const rows = await this.db.insert(songs).values(song).returning({ id: songs.id });
    return firstId(rows, 'song');
  }

  async linkSongGenre(songId: number, genreId: number): Promise<void> {
    await this.db.insert(songGenres).values({ songId, genreId });
  }

  async findAlbumId(name: string, artistId: number): Promise<number | null> {
    const rows = await this.db
      .select({ id: albums.id })
      .from(albums)
      .where(and(eq(albums.name, name), eq(albums.artistId, artistId)))
      .limit(1);
    return rows[0]?.id ?? null;
  }

  async insertAlbum(album: AlbumRow): Promise<number> {
    const rows = await this.db.insert(albums).values(album).returning({ id: albums.id });
    return firstId(rows, 'album');
  }

  async insertUser(username: string): Promise<number> {
    const rows = await this.db.insert(userAccounts).values({ username }).returning({ id: userAccounts.id });
    return firstId(rows, 'user account');
  }

  async findUserId(username: string): Promise<number | null> {
    const rows = await this.db
      .select({ id: userAccounts.id })
      .from(userAccounts)
      .where(eq(userAccounts.username, username))
      .limit(1);
    return rows[0]?.id ?? null;
  }

  /** Songs are unique per (artist, title), singles and album tracks alike */
  async findSongId(artistName: string, title: string): Promise<number | null> {
    const rows = await this.db
      .select({ id: songs.id })
      .from(songs)
      .innerJoin(artists, eq(songs.artistId, artists.id))
      .where(and(eq(artists.name, artistName), eq(songs.title, title)))
      .limit(1);
    return rows[0]?.id ?? null;
  }

  async hasRating(userId: number, songId: number): Promise<boolean> {
    const rows = await this.db
      .select({ id: ratings.id })
      .from(ratings)
      .where(and(eq(ratings.userId, userId), eq(ratings.songId, songId)))
      .limit(1);
    return rows.length > 0;
  }

  async insertRating(rating: RatingRow): Promise<number> {
    const rows = await this.db.insert(ratings).values(rating).returning({ id: ratings.id });
    return firstId(rows, 'rating');
  }
}
