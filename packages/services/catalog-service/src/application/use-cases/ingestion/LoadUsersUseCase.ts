import type { CatalogDatabase } from '../../../infrastructure/database/types';
import { describeIssues, usernameSchema } from '../../../schema/ingestion-schemas';
import { rejectedOutcome, type IngestionOutcome, type IngestionReport, type UserKey } from '../../../domains/catalog';
import { ingestBatch } from '../../ingestion/ingestBatch';
import { ACCEPT, runItemTransaction } from '../../ingestion/runItemTransaction';

export class LoadUsersUseCase {
  constructor(private readonly db: CatalogDatabase) {}

  async execute(usernames: readonly string[]): Promise<IngestionReport<UserKey>> {
    return ingestBatch(usernames, {
      operation: 'load-users',
      keyOf: username => username,
      ingestItem: (username, key) => this.ingestUser(username, key),
    });
  }

  private async ingestUser(input: string, key: UserKey): Promise<IngestionOutcome<UserKey>> {
    const parsed = usernameSchema.safeParse(input);
    if (!parsed.success) {
      return rejectedOutcome(key, 'validation', describeIssues(parsed.error));
    }
    const username = parsed.data;

    return runItemTransaction(this.db, key, async repository => {
      await repository.insertUser(username);
      return ACCEPT;
    });
  }
}
