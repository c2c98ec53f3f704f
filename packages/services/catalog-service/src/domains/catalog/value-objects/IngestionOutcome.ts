/**
 * Ingestion outcomes
 *
 * Every batch item ends as exactly one outcome. The reason is kept for logging and tests;
 * callers that only need the reject set never see it.
 */

import { RejectSet, type RejectKey } from './RejectSet';

export type RejectionReason =
  /** shape or value rule failed before the store was touched */
  | 'validation'
  /** a referenced user or song does not exist */
  | 'unknown_reference'
  /** uniqueness or foreign-key rejection, pre-checked or raised by the store */
  | 'conflict'
  | 'store_failure';

export type IngestionOutcome<K extends RejectKey> =
  | { status: 'accepted'; key: K }
  | { status: 'rejected'; key: K; reason: RejectionReason; detail: string };

export interface IngestionReport<K extends RejectKey> {
  operation: string;
  outcomes: IngestionOutcome<K>[];
  accepted: K[];
  rejects: RejectSet<K>;
}

export function acceptedOutcome<K extends RejectKey>(key: K): IngestionOutcome<K> {
  return { status: 'accepted', key };
}

export function rejectedOutcome<K extends RejectKey>(
  key: K,
  reason: RejectionReason,
  detail: string
): IngestionOutcome<K> {
  return { status: 'rejected', key, reason, detail };
}

export function buildIngestionReport<K extends RejectKey>(
  operation: string,
  outcomes: IngestionOutcome<K>[]
): IngestionReport<K> {
  const accepted: K[] = [];
  const rejects = new RejectSet<K>();
  for (const outcome of outcomes) {
    if (outcome.status === 'accepted') {
      accepted.push(outcome.key);
    } else {
      rejects.add(outcome.key);
    }
  }
  return { operation, outcomes, accepted, rejects };
}
