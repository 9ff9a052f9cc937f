import { readFileSync } from 'node:fs';
import { z } from 'zod';

const CaseRuleSchema = z.enum(['title', 'upper', 'as-is']);
export type CaseRule = z.infer<typeof CaseRuleSchema>;

const TermGroupSchema = z.object({
  category: z.string().min(1),
  case: CaseRuleSchema.default('title'),
  terms: z.array(z.string().min(1))
});
export type TermGroup = z.infer<typeof TermGroupSchema>;

export const KeywordTaxonomySchema = z.object({
  technicalSkills: z.array(TermGroupSchema),
  softSkills: TermGroupSchema,
  domainTerms: TermGroupSchema,
  certifications: TermGroupSchema,
  degreeFields: z.array(z.string().min(1)),
  display: z.record(z.string()).default({}),
  stopWords: z.array(z.string()).default([])
});
export type KeywordTaxonomy = z.infer<typeof KeywordTaxonomySchema>;

export interface KeywordsByCategory {
  technicalSkills: string[];
  softSkills: string[];
  domainKeywords: string[];
  requirements: string[];
}

interface KeywordHit {
  keyword: string;
  occurrences: number;
}

// Counts are one or two digits, never a suffix of a longer number
const EXPERIENCE_PATTERNS = [
  /(?<!\d)(\d{1,2})\+?\s?years?\s(?:of\s)?experience/g,
  /(?<!\d)(\d{1,2})\+?\s?years?\s(?:in|with)/g,
  /(?<![a-z0-9_])minimum\s(\d{1,2})\s?years?/g,
  /(?<![a-z0-9_])at least\s(\d{1,2})\s?years?/g
];

const DEGREE_PATTERN = /(?<![a-z0-9_])(bachelor'?s?|master'?s?|phd|doctorate)\s+(?:degree\s+)?(?:in\s+)?(\w+)/g;
const DEGREE_ABBREVIATION_PATTERN = /(?<![a-z0-9_])(bs|ms|ba|ma)\s+(?:in\s+)?(\w+)/g;

const DEGREE_NAMES: Record<string, string> = {
  phd: 'PhD',
  doctorate: 'Doctorate',
  bs: 'BS',
  ms: 'MS',
  ba: 'BA',
  ma: 'MA'
};

export const DEFAULT_MAX_KEYWORDS = 50;
export const DEFAULT_MAX_INPUT_CHARS = 8000;

export interface KeywordExtractorOptions {
  /** Text beyond this many characters is ignored. */
  maxInputChars?: number;
}

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Word-boundary match that also holds for terms ending in symbols (c++, c#)
 * or containing them (ci/cd, asp.net), where \b does not.
 */
function termPattern(term: string): RegExp {
  return new RegExp(`(?<![a-z0-9_])${escapeRegExp(term)}(?![a-z0-9_])`, 'g');
}

function countMatches(pattern: RegExp, text: string): number {
  return text.match(pattern)?.length ?? 0;
}

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’ʼ]/g, "'")
    .replace(/[^\w\s\-+#./()']/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function titleCase(value: string): string {
  return value.replace(/(^|[^A-Za-z0-9'])([a-z])/g, (_m, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

function dedupe(hits: KeywordHit[]): KeywordHit[] {
  const seen = new Map<string, KeywordHit>();
  for (const hit of hits) {
    const key = hit.keyword.toLowerCase();
    const existing = seen.get(key);
    if (existing) {
      existing.occurrences = Math.max(existing.occurrences, hit.occurrences);
      continue;
    }
    seen.set(key, { ...hit });
  }
  return [...seen.values()];
}

let cachedTaxonomy: KeywordTaxonomy | undefined;

export function loadTaxonomy(path: string | URL = new URL('./taxonomy.json', import.meta.url)): KeywordTaxonomy {
  return KeywordTaxonomySchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

function defaultTaxonomy(): KeywordTaxonomy {
  cachedTaxonomy ??= loadTaxonomy();
  return cachedTaxonomy;
}

/**
 * Rule-based keyword extraction over a closed taxonomy. Output order is
 * technical skills, soft skills, domain terms, then requirements.
 */
export class KeywordExtractor {
  private readonly taxonomy: KeywordTaxonomy;
  private readonly stopWords: Set<string>;
  private readonly maxInputChars: number;
  private readonly patterns = new Map<string, RegExp>();

  constructor(taxonomy: KeywordTaxonomy = defaultTaxonomy(), options: KeywordExtractorOptions = {}) {
    this.taxonomy = taxonomy;
    this.maxInputChars = options.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
    this.stopWords = new Set(taxonomy.stopWords.map((w) => w.toLowerCase()));
  }

  extract(text: unknown, maxKeywords = DEFAULT_MAX_KEYWORDS): string[] {
    const limit = Number.isFinite(maxKeywords) ? Math.max(0, Math.floor(maxKeywords)) : DEFAULT_MAX_KEYWORDS;
    return this.collect(text).slice(0, limit).map((hit) => hit.keyword);
  }

  extractByCategory(text: unknown): KeywordsByCategory {
    const cleaned = this.clean(text);
    if (!cleaned) return { technicalSkills: [], softSkills: [], domainKeywords: [], requirements: [] };

    const keywords = (hits: KeywordHit[]) => dedupe(hits).map((hit) => hit.keyword);
    return {
      technicalSkills: keywords(this.technical(cleaned)),
      softSkills: keywords(this.matchGroup(this.taxonomy.softSkills, cleaned)),
      domainKeywords: keywords(this.matchGroup(this.taxonomy.domainTerms, cleaned)),
      requirements: keywords(this.requirements(cleaned))
    };
  }

  /**
   * Occurrence count of each extracted keyword in the text.
   */
  keywordFrequency(text: unknown): Record<string, number> {
    const frequency: Record<string, number> = {};
    for (const hit of this.collect(text).slice(0, DEFAULT_MAX_KEYWORDS)) {
      frequency[hit.keyword] = hit.occurrences;
    }
    return frequency;
  }

  private clean(text: unknown): string {
    return typeof text === 'string' ? normalizeText(text.slice(0, this.maxInputChars)) : '';
  }

  private collect(text: unknown): KeywordHit[] {
    const cleaned = this.clean(text);
    if (!cleaned) return [];

    return dedupe([
      ...this.technical(cleaned),
      ...this.matchGroup(this.taxonomy.softSkills, cleaned),
      ...this.matchGroup(this.taxonomy.domainTerms, cleaned),
      ...this.requirements(cleaned)
    ]);
  }

  private technical(text: string): KeywordHit[] {
    return this.taxonomy.technicalSkills.flatMap((group) => this.matchGroup(group, text));
  }

  private matchGroup(group: TermGroup, text: string): KeywordHit[] {
    const hits: KeywordHit[] = [];
    for (const term of group.terms) {
      const occurrences = countMatches(this.pattern(term), text);
      if (occurrences > 0) hits.push({ keyword: this.display(term, group.case), occurrences });
    }
    return hits;
  }

  private requirements(text: string): KeywordHit[] {
    const hits: KeywordHit[] = [];

    for (const pattern of EXPERIENCE_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        hits.push({ keyword: `${match[1]}+ years experience`, occurrences: 1 });
      }
    }

    for (const pattern of [DEGREE_PATTERN, DEGREE_ABBREVIATION_PATTERN]) {
      for (const match of text.matchAll(pattern)) {
        const degree = match[1] ?? '';
        const field = match[2] ?? '';
        if (!field || this.stopWords.has(field) || field === 'degree') continue;
        hits.push({ keyword: `${this.degreeName(degree)} in ${titleCase(field)}`, occurrences: 1 });
      }
    }

    for (const field of this.taxonomy.degreeFields) {
      const occurrences = countMatches(this.pattern(field), text);
      if (occurrences > 0) hits.push({ keyword: titleCase(field), occurrences });
    }

    hits.push(...this.matchGroup(this.taxonomy.certifications, text));
    return hits;
  }

  private degreeName(degree: string): string {
    return DEGREE_NAMES[degree] ?? titleCase(degree);
  }

  private display(term: string, rule: CaseRule): string {
    const override = this.taxonomy.display[term];
    if (override) return override;
    if (rule === 'upper') return term.toUpperCase();
    if (rule === 'as-is') return term;
    return titleCase(term);
  }

  private pattern(term: string): RegExp {
    const key = term.toLowerCase();
    let pattern = this.patterns.get(key);
    if (!pattern) {
      pattern = termPattern(key);
      this.patterns.set(key, pattern);
    }
    return pattern;
  }
}
