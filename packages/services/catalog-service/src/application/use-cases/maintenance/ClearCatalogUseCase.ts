/**
 * Clear Catalog Use Case
 * Empties every catalog table. Unlike ingestion, a failure here is thrown to the caller.
 */

import { generateCorrelationId, runWithContext, serializeError, toError } from '@music-catalog/platform-core';
import { getLogger } from '../../../config/service-config';
import type { CatalogMaintenanceRepository } from '../../../infrastructure/database/CatalogMaintenanceRepository';
import { CatalogError } from '../../errors';

const logger = getLogger('clear-catalog-use-case');

export class ClearCatalogUseCase {
  constructor(private readonly maintenanceRepository: CatalogMaintenanceRepository) {}

  async execute(): Promise<void> {
    return runWithContext({ correlationId: generateCorrelationId(), operation: 'clear-catalog' }, async () => {
      logger.info('Clearing catalog');
      try {
        await this.maintenanceRepository.clearAll();
      } catch (error) {
        logger.error('Catalog reset failed, transaction rolled back', { error: serializeError(error) });
        throw CatalogError.resetFailed(toError(error));
      }
      logger.info('Catalog cleared');
    });
  }
}
