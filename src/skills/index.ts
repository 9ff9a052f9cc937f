export * from './types.js';
export * from './SkillEvidenceAggregator.js';
export * from './SkillRecommendationService.js';
