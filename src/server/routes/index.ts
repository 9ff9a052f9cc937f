export * from './RouteContext.js';
export { HealthRoutes } from './HealthRoutes.js';
export { SearchRoutes } from './SearchRoutes.js';
export { DocumentRoutes } from './DocumentRoutes.js';
export { KeywordRoutes } from './KeywordRoutes.js';
export { SkillRoutes } from './SkillRoutes.js';
