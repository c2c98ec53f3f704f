export { RejectSet, type RejectKey } from './RejectSet';
export {
  acceptedOutcome,
  rejectedOutcome,
  buildIngestionReport,
  type IngestionOutcome,
  type IngestionReport,
  type RejectionReason,
} from './IngestionOutcome';
