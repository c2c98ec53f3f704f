/**
 * Catalog Service - Schema
 * Normalized music catalog: artists, genres, albums, songs, users and ratings.
 * All tables use the 'cat_' prefix. Kept in lock-step with catalog-schema.sql,
 * which is what actually creates the tables.
 * The SQL also declares every foreign key DEFERRABLE INITIALLY IMMEDIATE, which
 * `.references()` has no option for.
 */

import {
  pgTable,
  serial,
  varchar,
  integer,
  smallint,
  date,
  primaryKey,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const artists = pgTable(
  'cat_artist',
  {
    id: serial('artist_id').primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
  },
  table => [uniqueIndex('uk_artist_name').on(table.name)]
);

export const genres = pgTable(
  'cat_genre',
  {
    id: serial('genre_id').primaryKey(),
    name: varchar('name', { length: 100 }).notNull(),
  },
  table => [uniqueIndex('uk_genre_name').on(table.name)]
);

export const albums = pgTable(
  'cat_album',
  {
    id: serial('album_id').primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    artistId: integer('artist_id')
      .notNull()
      .references(() => artists.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
    releaseDate: date('release_date', { mode: 'string' }).notNull(),
    genreId: integer('genre_id')
      .notNull()
      .references(() => genres.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  },
  table => [uniqueIndex('uk_album_name_artist').on(table.name, table.artistId)]
);

// A song either belongs to an album or is a single with its own release date, never both
export const songs = pgTable(
  'cat_song',
  {
    id: serial('song_id').primaryKey(),
    title: varchar('title', { length: 255 }).notNull(),
    artistId: integer('artist_id')
      .notNull()
      .references(() => artists.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
    albumId: integer('album_id').references(() => albums.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
    singleReleaseDate: date('single_release_date', { mode: 'string' }),
  },
  table => [
    uniqueIndex('uk_song_artist_title').on(table.artistId, table.title),
    check('ck_song_album_or_single', sql`(${table.albumId} IS NULL) <> (${table.singleReleaseDate} IS NULL)`),
  ]
);

export const songGenres = pgTable(
  'cat_song_genre',
  {
    songId: integer('song_id')
      .notNull()
      .references(() => songs.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    genreId: integer('genre_id')
      .notNull()
      .references(() => genres.id, { onDelete: 'restrict', onUpdate: 'cascade' }),
  },
  table => [primaryKey({ columns: [table.songId, table.genreId] })]
);

export const userAccounts = pgTable(
  'cat_user_account',
  {
    id: serial('user_id').primaryKey(),
    username: varchar('username', { length: 50 }).notNull(),
  },
  table => [uniqueIndex('uk_user_username').on(table.username)]
);

export const ratings = pgTable(
  'cat_rating',
  {
    id: serial('rating_id').primaryKey(),
    userId: integer('user_id')
      .notNull()
      .references(() => userAccounts.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    songId: integer('song_id')
      .notNull()
      .references(() => songs.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    value: smallint('rating_value').notNull(),
    ratedOn: date('rating_date', { mode: 'string' }).notNull(),
  },
  table => [
    uniqueIndex('uk_rating_user_song').on(table.userId, table.songId),
    check('ck_rating_value_range', sql`${table.value} BETWEEN 1 AND 5`),
  ]
);

export type Artist = typeof artists.$inferSelect;
export type Genre = typeof genres.$inferSelect;
export type Album = typeof albums.$inferSelect;
export type NewAlbum = typeof albums.$inferInsert;
export type Song = typeof songs.$inferSelect;
export type NewSong = typeof songs.$inferInsert;
export type SongGenre = typeof songGenres.$inferSelect;
export type UserAccount = typeof userAccounts.$inferSelect;
export type Rating = typeof ratings.$inferSelect;
export type NewRating = typeof ratings.$inferInsert;
