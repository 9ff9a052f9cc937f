export { TailorMatchApp, createApp, buildContainer, type AppOptions } from './App.js';

export * from './types/index.js';

export * from './embedding/index.js';
export * from './vector/index.js';
export * from './documents/index.js';
export * from './keywords/index.js';
export * from './skills/index.js';
export * from './search/index.js';
export { HttpApiServer } from './server/HttpApiServer.js';

export { ConfigResolver, DEFAULT_CONFIG_PATH } from './config/ConfigResolver.js';
export { Container, Token } from './bootstrap/Container.js';
export { TOKENS } from './bootstrap/tokens.js';
export { PinoLogger } from './utils/PinoLogger.js';
export { UnifiedErrorHandler } from './utils/ErrorHandler.js';
export { ConfigurationError, VectorIndexError, TimeoutError } from './utils/errors.js';
