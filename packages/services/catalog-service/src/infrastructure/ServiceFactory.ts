import type { DatabaseHealth } from '@music-catalog/platform-core';
import { getLogger } from '../config/service-config';
import { MusicCatalogService } from '../application/services/MusicCatalogService';
import { checkDatabaseHealth, closeDatabase, getDatabase } from './database/DatabaseConnectionFactory';
import type { CatalogDatabase } from './database/types';

const logger = getLogger('service-factory');

let catalogService: MusicCatalogService | null = null;

/** Service bound to the database named by CATALOG_DATABASE_URL (or DATABASE_URL). */
export function getCatalogService(): MusicCatalogService {
  if (!catalogService) {
    logger.info('Creating catalog service');
    catalogService = new MusicCatalogService(getDatabase());
  }
  return catalogService;
}

/** Service over a handle the caller owns, e.g. an in-process database in tests. */
export function createCatalogService(db: CatalogDatabase): MusicCatalogService {
  return new MusicCatalogService(db);
}

export function healthCheck(): Promise<DatabaseHealth> {
  return checkDatabaseHealth();
}

export async function closeCatalogService(): Promise<void> {
  catalogService = null;
  await closeDatabase();
}
