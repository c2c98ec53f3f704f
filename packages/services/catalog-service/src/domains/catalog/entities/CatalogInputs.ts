/**
 * Batch item shapes accepted by the ingestion use cases, and the keys their rejects are
 * reported under. Dates are calendar dates written YYYY-MM-DD.
 */

export interface SingleSongInput {
  title: string;
  /** at least one; order is kept when linking */
  genres: readonly string[];
  artist: string;
  releaseDate: string;
}

export interface AlbumInput {
  title: string;
  genre: string;
  artist: string;
  releaseDate: string;
  songs: readonly string[];
}

export interface SongRatingInput {
  username: string;
  artist: string;
  songTitle: string;
  rating: number;
  ratedOn: string;
}

export type SongKey = readonly [title: string, artist: string];
export type AlbumKey = readonly [albumTitle: string, artist: string];
export type UserKey = string;
export type RatingKey = readonly [username: string, artist: string, songTitle: string];

/** Inclusive on both ends */
export type YearRange = readonly [startYear: number, endYear: number];

export interface ArtistSingleCount {
  artistName: string;
  singleCount: number;
}

export interface GenreSongCount {
  genreName: string;
  songCount: number;
}

export interface SongRatingCount {
  songTitle: string;
  artistName: string;
  ratingCount: number;
}

export interface UserRatingCount {
  username: string;
  ratingCount: number;
}
