/**
 * Research Module
 *
 * Product suggestions from Claude, logged for later catalog curation.
 */

export { type Recommendation, type ResearchReport, type ResearchRepository } from './types.js';

export {
  DEFAULT_RESEARCH_OPTIONS,
  ProductResearcher,
  buildResearchPrompt,
  formatReport,
  parseRecommendations,
  type ResearchOptions,
  type ResearcherDependencies,
} from './researcher.js';

export { DrizzleResearchRepository } from './repository.js';
