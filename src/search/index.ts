export * from './TavilyClient.js';
export * from './SemanticSearchService.js';
