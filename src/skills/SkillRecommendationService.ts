import type { Logger } from '../types/index.js';
import type { WebSearchClient } from '../search/TavilyClient.js';
import type { SkillEvidenceAggregator } from './SkillEvidenceAggregator.js';
import type { RecommendedSkillsBundle } from './types.js';

export class SkillRecommendationService {
  constructor(
    private readonly webSearch: WebSearchClient,
    private readonly aggregator: SkillEvidenceAggregator,
    private readonly logger: Logger,
    private readonly options: { enabled: boolean; maxResults: number } = { enabled: true, maxResults: 5 }
  ) {}

  /**
   * Search the web for the query and aggregate skill evidence from the hits.
   */
  async recommend(query: string, maxResults = this.options.maxResults): Promise<RecommendedSkillsBundle> {
    const q = typeof query === 'string' ? query.trim() : '';
    if (!q || !this.options.enabled) return { skills: [], sources: [] };

    const results = await this.webSearch.search(q, maxResults);
    const bundle = this.aggregator.aggregate(results);
    this.logger.info('Skill recommendation', { results: results.length, skills: bundle.skills.length });
    return bundle;
  }
}
