import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type * as schema from '../../schema/catalog-schema';

export type CatalogSchema = typeof schema;

/**
 * Any drizzle Postgres handle over the catalog schema: the node-postgres pool in production,
 * an in-process engine in tests, or an open transaction.
 */
export type CatalogDatabase = PgDatabase<PgQueryResultHKT, CatalogSchema>;
