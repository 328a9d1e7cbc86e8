import { eq } from 'drizzle-orm';
import type { Database } from '../database/client.js';
import { credentials } from '../database/schema.js';
import type { CredentialRecord, CredentialRepository } from './types.js';

const SINGLETON_ID = 1;

/**
 * Credential row in PostgreSQL. The upsert replaces every column in one
 * statement, so concurrent readers see either the old or the new pair.
 */
export class DrizzleCredentialRepository implements CredentialRepository {
  constructor(private readonly db: Database) {}

  async load(): Promise<CredentialRecord | undefined> {
    const [row] = await this.db.select().from(credentials).where(eq(credentials.id, SINGLETON_ID));
    if (!row) return undefined;

    return {
      accessToken: row.accessToken,
      refreshToken: row.refreshToken,
      expiresAt: row.expiresAt,
      accountId: row.accountId,
    };
  }

  async replace(record: CredentialRecord): Promise<void> {
    const values = {
      accessToken: record.accessToken,
      refreshToken: record.refreshToken,
      expiresAt: record.expiresAt,
      accountId: record.accountId,
      updatedAt: new Date(),
    };

    await this.db
      .insert(credentials)
      .values({ id: SINGLETON_ID, ...values })
      .onConflictDoUpdate({ target: credentials.id, set: values });
  }
}
