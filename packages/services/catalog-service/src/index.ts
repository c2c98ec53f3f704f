/**
 * Catalog Service
 *
 * Music catalog over Postgres: artists, genres, albums, songs, users and ratings,
 * loaded in batches where each bad item is reported instead of failing the batch.
 */

export {
  getCatalogService,
  createCatalogService,
  healthCheck,
  closeCatalogService,
} from './infrastructure/ServiceFactory';
export { MusicCatalogService, CatalogAnalyticsService } from './application/services';
export { CatalogError, CatalogErrorCode, type CatalogErrorCodeType } from './application/errors';
export type { CatalogDatabase, CatalogSchema } from './infrastructure/database/types';
export type { CatalogTableName } from './infrastructure/database/CatalogMaintenanceRepository';
export * from './domains/catalog';
export * as catalogSchema from './schema/catalog-schema';
