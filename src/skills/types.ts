import { z } from 'zod';

export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
  source: string;
}

/**
 * Evidence for one recommended skill: the first snippet that mentioned it.
 */
export interface SkillEvidence {
  skill: string;
  sourceUrl: string;
  /** At most 300 characters of the originating snippet. */
  snippet: string;
  sourceName: string;
}

export interface RecommendedSkillsBundle {
  /** Distinct skills, sorted. */
  skills: string[];
  sources: SkillEvidence[];
}

/**
 * Loose input shape accepted by the aggregator; missing fields default.
 */
export const WebSearchResultInputSchema = z.object({
  title: z.string().optional(),
  url: z.string().optional(),
  snippet: z.string().optional(),
  source: z.string().optional()
});
export type WebSearchResultInput = z.infer<typeof WebSearchResultInputSchema>;
