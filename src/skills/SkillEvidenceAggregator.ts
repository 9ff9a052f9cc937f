import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { RecommendedSkillsBundle, SkillEvidence, WebSearchResultInput } from './types.js';

export const SNIPPET_MAX_CHARS = 300;

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function loadVocabulary(path: string | URL = new URL('./vocabulary.json', import.meta.url)): string[] {
  return z.array(z.string().min(1)).parse(JSON.parse(readFileSync(path, 'utf8')));
}

let cachedVocabulary: string[] | undefined;

/**
 * Matches a closed skill vocabulary against web snippets. The first result
 * mentioning a skill supplies its evidence; later mentions are ignored.
 */
export class SkillEvidenceAggregator {
  private readonly vocabulary: Array<{ skill: string; pattern: RegExp }>;

  constructor(vocabulary?: string[]) {
    const terms = vocabulary ?? (cachedVocabulary ??= loadVocabulary());
    this.vocabulary = terms.map((term) => {
      const skill = term.toLowerCase();
      return { skill, pattern: new RegExp(`(?<![a-z0-9_])${escapeRegExp(skill)}(?![a-z0-9_])`) };
    });
  }

  get size(): number {
    return this.vocabulary.length;
  }

  skillsIn(text: string): string[] {
    const lowered = text.toLowerCase();
    return this.vocabulary.filter(({ pattern }) => pattern.test(lowered)).map(({ skill }) => skill);
  }

  aggregate(results: readonly WebSearchResultInput[] | null | undefined): RecommendedSkillsBundle {
    const seen = new Set<string>();
    const sources: SkillEvidence[] = [];

    for (const item of results ?? []) {
      const snippet = item.snippet ?? '';
      if (!snippet) continue;

      for (const skill of this.skillsIn(snippet)) {
        if (seen.has(skill)) continue;
        seen.add(skill);
        sources.push({
          skill,
          sourceUrl: item.url ?? '',
          snippet: snippet.slice(0, SNIPPET_MAX_CHARS),
          sourceName: item.source || 'web'
        });
      }
    }

    return { skills: [...seen].sort(), sources };
  }
}
