/**
 * Batch ingestion loop
 *
 * Items are processed one after another and each ends in its own outcome; a failing item
 * never stops the batch and the call itself never throws for an item.
 */

import { errorMessage, generateCorrelationId, runWithContext, serializeError } from '@music-catalog/platform-core';
import { getLogger } from '../../config/service-config';
import {
  buildIngestionReport,
  rejectedOutcome,
  type IngestionOutcome,
  type IngestionReport,
  type RejectKey,
} from '../../domains/catalog';

const logger = getLogger('batch-ingestion');

export interface BatchIngestion<I, K extends RejectKey> {
  operation: string;
  keyOf: (item: I) => K;
  ingestItem: (item: I, key: K) => Promise<IngestionOutcome<K>>;
}

export async function ingestBatch<I, K extends RejectKey>(
  items: readonly I[],
  { operation, keyOf, ingestItem }: BatchIngestion<I, K>
): Promise<IngestionReport<K>> {
  return runWithContext({ correlationId: generateCorrelationId(), operation }, async () => {
    const outcomes: IngestionOutcome<K>[] = [];

    for (const item of items) {
      const key = keyOf(item);
      let outcome: IngestionOutcome<K>;
      try {
        outcome = await ingestItem(item, key);
      } catch (error) {
        logger.warn('Item processing raised outside its transaction', { key, error: serializeError(error) });
        outcome = rejectedOutcome(key, 'store_failure', errorMessage(error));
      }

      if (outcome.status === 'rejected') {
        logger.debug('Item rejected', { key, reason: outcome.reason, detail: outcome.detail });
      }
      outcomes.push(outcome);
    }

    const report = buildIngestionReport(operation, outcomes);
    logger.info('Batch ingested', {
      received: items.length,
      accepted: report.accepted.length,
      rejected: outcomes.length - report.accepted.length,
    });
    return report;
  });
}
