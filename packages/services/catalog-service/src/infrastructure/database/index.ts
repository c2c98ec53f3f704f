export { DrizzleCatalogRepository, type SongRow, type AlbumRow, type RatingRow } from './DrizzleCatalogRepository';
export { ReferenceResolver } from './ReferenceResolver';
export { CatalogMaintenanceRepository, CLEAR_ORDER, type CatalogTableName } from './CatalogMaintenanceRepository';
export { DrizzleCatalogAnalyticsRepository } from './DrizzleCatalogAnalyticsRepository';
export { classifyStoreError, getPgErrorCode, PG_ERROR_CODES } from './pg-errors';
export type { CatalogDatabase, CatalogSchema } from './types';
