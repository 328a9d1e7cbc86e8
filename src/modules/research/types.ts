/**
 * A product idea suggested by market research, not yet a catalog item
 */
export interface Recommendation {
  productName: string;
  /** Free-form, e.g. "2000-3000" */
  priceRange: string | null;
  reason: string;
  searchKeywords: string[];
  targetAudience: string | null;
  category: string | null;
}

export interface ResearchReport {
  id: string;
  researchedAt: Date;
  recommendations: Recommendation[];
}

/**
 * Append-only log of research results
 */
export interface ResearchRepository {
  save(recommendations: Recommendation[], researchedAt: Date): Promise<ResearchReport>;
  /** Newest report, or undefined before the first research run */
  latest(): Promise<ResearchReport | undefined>;
}
