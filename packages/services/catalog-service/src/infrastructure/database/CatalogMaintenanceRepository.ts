/**
 * CatalogMaintenanceRepository
 * Whole-catalog operations: schema bootstrap, bulk reset and row counts.
 */

import { count, getTableName, sql } from 'drizzle-orm';
import type { AnyPgColumn, PgTable } from 'drizzle-orm/pg-core';
import { albums, artists, genres, ratings, songGenres, songs, userAccounts } from '../../schema/catalog-schema';
import { loadCatalogDdlStatements } from '../../schema/catalog-ddl';
import type { CatalogDatabase } from './types';

export type CatalogTableName = 'rating' | 'songGenre' | 'song' | 'album' | 'userAccount' | 'genre' | 'artist';

/** Children before parents */
export const CLEAR_ORDER: ReadonlyArray<readonly [CatalogTableName, PgTable]> = [
  ['rating', ratings],
  ['songGenre', songGenres],
  ['song', songs],
  ['album', albums],
  ['userAccount', userAccounts],
  ['genre', genres],
  ['artist', artists],
];

const SERIAL_KEYS: readonly AnyPgColumn[] = [ratings.id, songs.id, albums.id, userAccounts.id, genres.id, artists.id];

export class CatalogMaintenanceRepository {
  constructor(private readonly db: CatalogDatabase) {}

  /**
   * Drops and recreates every catalog table in one transaction.
   */
  async applySchema(statements: string[] = loadCatalogDdlStatements()): Promise<void> {
    await this.db.transaction(async tx => {
      for (const statement of statements) {
        await tx.execute(sql.raw(statement));
      }
    });
  }

  /**
   * Deletes every row and restarts the key sequences, in one transaction.
   *
   * Foreign keys are DEFERRABLE, so SET CONSTRAINTS needs no rights beyond the
   * table privileges. RESTRICT actions are never deferred, hence CLEAR_ORDER.
   * The deferral ends with the transaction whether it commits or rolls back.
   */
  async clearAll(): Promise<void> {
    await this.db.transaction(async tx => {
      await tx.execute(sql`SET CONSTRAINTS ALL DEFERRED`);
      for (const [, table] of CLEAR_ORDER) {
        await tx.delete(table);
      }
      await tx.execute(sql`SET CONSTRAINTS ALL IMMEDIATE`);
      for (const key of SERIAL_KEYS) {
        await tx.execute(sql`SELECT setval(pg_get_serial_sequence(${getTableName(key.table)}, ${key.name}), 1, false)`);
      }
    });
  }

  async countRows(): Promise<Record<CatalogTableName, number>> {
    const counts: Record<CatalogTableName, number> = {
      rating: 0,
      songGenre: 0,
      song: 0,
      album: 0,
      userAccount: 0,
      genre: 0,
      artist: 0,
    };
    for (const [name, table] of CLEAR_ORDER) {
      const rows = await this.db.select({ value: count() }).from(table);
      counts[name] = rows[0]?.value ?? 0;
    }
    return counts;
  }
}
