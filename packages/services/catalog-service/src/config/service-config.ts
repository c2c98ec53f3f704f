import { getLogger as getPlatformLogger, type Logger } from '@music-catalog/platform-core';

export const SERVICE_NAME = 'catalog-service';

export const CATALOG_DATABASE_ENV = 'CATALOG_DATABASE_URL';

export function getLogger(module: string): Logger {
  return getPlatformLogger(`${SERVICE_NAME}:${module}`);
}
