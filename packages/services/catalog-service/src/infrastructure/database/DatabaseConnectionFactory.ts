/**
 * Catalog Service Database Connection Factory
 *
 * Uses the platform-core factory with catalog-specific configuration.
 */

import { createDatabaseConnectionFactory, type DatabaseHealth } from '@music-catalog/platform-core';
import * as schema from '../../schema/catalog-schema';
import { CATALOG_DATABASE_ENV, SERVICE_NAME } from '../../config/service-config';
import type { CatalogDatabase } from './types';

const factory = createDatabaseConnectionFactory({
  serviceName: SERVICE_NAME,
  envVarName: CATALOG_DATABASE_ENV,
  fallbackEnvVar: 'DATABASE_URL',
  schema,
});

export function getDatabase(): CatalogDatabase {
  return factory.getDatabase();
}

export function checkDatabaseHealth(): Promise<DatabaseHealth> {
  return factory.healthCheck();
}

export function closeDatabase(): Promise<void> {
  return factory.close();
}
