/**
 * Item-scoped transactions
 *
 * One transaction per batch item. The work callback decides the item's fate; anything it
 * throws rolls the item back and becomes a rejection classified from the store error.
 */

import { TransactionRollbackError } from 'drizzle-orm';
import { errorMessage } from '@music-catalog/platform-core';
import { DrizzleCatalogRepository } from '../../infrastructure/database/DrizzleCatalogRepository';
import { classifyStoreError } from '../../infrastructure/database/pg-errors';
import type { CatalogDatabase } from '../../infrastructure/database/types';
import {
  acceptedOutcome,
  rejectedOutcome,
  type IngestionOutcome,
  type RejectKey,
  type RejectionReason,
} from '../../domains/catalog';

export type ItemDecision =
  | { kind: 'accept' }
  | {
      kind: 'reject';
      reason: RejectionReason;
      detail: string;
      /** commit what the item already wrote (resolved references) instead of rolling back */
      commitSideEffects?: boolean;
    };

export const ACCEPT: ItemDecision = { kind: 'accept' };

export function reject(reason: RejectionReason, detail: string): ItemDecision {
  return { kind: 'reject', reason, detail };
}

function toOutcome<K extends RejectKey>(key: K, decision: ItemDecision): IngestionOutcome<K> {
  return decision.kind === 'accept' ? acceptedOutcome(key) : rejectedOutcome(key, decision.reason, decision.detail);
}

export async function runItemTransaction<K extends RejectKey>(
  db: CatalogDatabase,
  key: K,
  work: (repository: DrizzleCatalogRepository) => Promise<ItemDecision>
): Promise<IngestionOutcome<K>> {
  const pending: { decision?: ItemDecision } = {};
  try {
    const decision = await db.transaction(async tx => {
      const result = await work(new DrizzleCatalogRepository(tx));
      if (result.kind === 'reject' && !result.commitSideEffects) {
        pending.decision = result;
        tx.rollback();
      }
      return result;
    });
    return toOutcome(key, decision);
  } catch (error) {
    if (error instanceof TransactionRollbackError && pending.decision) {
      return toOutcome(key, pending.decision);
    }
    return rejectedOutcome(key, classifyStoreError(error), errorMessage(error));
  }
}
