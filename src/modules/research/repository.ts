import { desc } from 'drizzle-orm';
import type { Database } from '../database/client.js';
import { researchLogs } from '../database/schema.js';
import type { Recommendation, ResearchReport, ResearchRepository } from './types.js';

export class DrizzleResearchRepository implements ResearchRepository {
  constructor(private readonly db: Database) {}

  async save(recommendations: Recommendation[], researchedAt: Date): Promise<ResearchReport> {
    const [row] = await this.db.insert(researchLogs).values({ researchedAt, recommendations }).returning();
    return { id: row.id, researchedAt: row.researchedAt, recommendations: row.recommendations };
  }

  async latest(): Promise<ResearchReport | undefined> {
    const [row] = await this.db.select().from(researchLogs).orderBy(desc(researchLogs.researchedAt)).limit(1);
    if (!row) return undefined;
    return { id: row.id, researchedAt: row.researchedAt, recommendations: row.recommendations };
  }
}
