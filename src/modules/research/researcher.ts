/**
 * Product Research
 *
 * Asks Claude which products are likely to sell right now and keeps the
 * suggestions in the research log, where they wait for someone to turn
 * them into catalog items. Nothing here touches the catalog.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { CompleteFn } from '../publisher/captionWriter.js';
import type { Recommendation, ResearchReport, ResearchRepository } from './types.js';

export interface ResearchOptions {
  minRecommendations: number;
  maxRecommendations: number;
  /** Price band the suggestions should fall into, in the shop currency */
  minPrice: number;
  maxPrice: number;
}

export const DEFAULT_RESEARCH_OPTIONS: ResearchOptions = {
  minRecommendations: 5,
  maxRecommendations: 10,
  minPrice: 1000,
  maxPrice: 10000,
};

// =============================================================================
// RESPONSE PARSING
// =============================================================================

const optionalLabel = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    const text = value === null || value === undefined ? '' : String(value).trim();
    return text ? text : null;
  });

const recommendationSchema = z
  .object({
    product_name: z.string().trim().min(1, 'product_name must not be empty'),
    price_range: optionalLabel,
    reason: z.string().trim().default(''),
    search_keywords: z.array(z.string().trim().min(1)).default([]),
    target_audience: optionalLabel,
    category: optionalLabel,
  })
  .transform(
    (entry): Recommendation => ({
      productName: entry.product_name,
      priceRange: entry.price_range,
      reason: entry.reason,
      searchKeywords: entry.search_keywords,
      targetAudience: entry.target_audience,
      category: entry.category,
    })
  );

/**
 * Extract the JSON array from a model response. Entries that do not fit
 * are skipped with a warning.
 *
 * @throws ValidationError when the response holds no parseable array
 */
export function parseRecommendations(responseText: string): Recommendation[] {
  const start = responseText.indexOf('[');
  const end = responseText.lastIndexOf(']');
  if (start === -1 || end < start) {
    throw new ValidationError('No JSON array in the research response');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(responseText.slice(start, end + 1));
  } catch (error) {
    throw new ValidationError('Research response is not valid JSON', [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  if (!Array.isArray(parsed)) {
    throw new ValidationError('No JSON array in the research response');
  }

  const recommendations: Recommendation[] = [];
  for (const [index, entry] of parsed.entries()) {
    const result = recommendationSchema.safeParse(entry);
    if (result.success) {
      recommendations.push(result.data);
    } else {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'entry'}: ${issue.message}`);
      console.warn(`[Research] Skipping recommendation #${index}: ${issues.join('; ')}`);
    }
  }
  return recommendations;
}

// =============================================================================
// PROMPT
// =============================================================================

export function buildResearchPrompt(now: Date, options: ResearchOptions = DEFAULT_RESEARCH_OPTIONS): string {
  const month = now.toLocaleString('en-US', { month: 'long', year: 'numeric', timeZone: 'UTC' });

  return `You are a marketing researcher looking for products that sell well on TikTok Shop.

As of ${month}, suggest ${options.minRecommendations} to ${options.maxRecommendations} products likely to sell on TikTok Shop.

Look for:
- Products people are talking about on TikTok
- Products going viral on other social networks
- Seasonal products in high demand

Constraints:
- Price between ${options.minPrice} and ${options.maxPrice}
- Categories such as beauty, fashion, gadgets, health, home goods, kitchen
- Easy to introduce through an affiliate post

Output a JSON array in exactly this shape:

[
  {
    "product_name": "generic product name",
    "price_range": "2000-3000",
    "reason": "why it should sell, tied to current trends",
    "search_keywords": ["keyword 1", "keyword 2"],
    "target_audience": "who buys it",
    "category": "category"
  }
]`;
}

// =============================================================================
// RESEARCHER
// =============================================================================

export interface ResearcherDependencies {
  complete: CompleteFn;
  repository: ResearchRepository;
}

export class ProductResearcher {
  private readonly options: ResearchOptions;

  constructor(
    private readonly deps: ResearcherDependencies,
    options: Partial<ResearchOptions> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.options = { ...DEFAULT_RESEARCH_OPTIONS, ...options };
  }

  /**
   * Ask for suggestions and store them as one report
   *
   * @throws ValidationError when the response holds no usable suggestion
   */
  async run(signal?: AbortSignal): Promise<ResearchReport> {
    const researchedAt = this.clock();
    console.log('[Research] Asking for product suggestions...');

    const response = await this.deps.complete(buildResearchPrompt(researchedAt, this.options), signal);
    const recommendations = parseRecommendations(response).slice(0, this.options.maxRecommendations);

    if (recommendations.length === 0) {
      throw new ValidationError('The research response held no usable recommendations');
    }
    if (recommendations.length < this.options.minRecommendations) {
      console.warn(
        `[Research] Only ${recommendations.length} recommendation(s), asked for at least ${this.options.minRecommendations}`
      );
    }

    const report = await this.deps.repository.save(recommendations, researchedAt);
    console.log(`[Research] Saved ${recommendations.length} recommendation(s) as report ${report.id}`);
    return report;
  }
}

/**
 * Human-readable listing of a report
 */
export function formatReport(report: ResearchReport): string {
  const lines = [`Research ${report.id} (${report.researchedAt.toISOString()})`, ''];

  report.recommendations.forEach((item, index) => {
    lines.push(`${index + 1}. ${item.productName}`);
    lines.push(`   Price: ${item.priceRange ?? 'unknown'}`);
    lines.push(`   Category: ${item.category ?? 'unknown'}`);
    lines.push(`   Audience: ${item.targetAudience ?? 'unknown'}`);
    if (item.reason) lines.push(`   Why: ${item.reason}`);
    if (item.searchKeywords.length > 0) lines.push(`   Keywords: ${item.searchKeywords.join(', ')}`);
  });

  return lines.join('\n');
}
