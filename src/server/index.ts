export { HttpApiServer } from './HttpApiServer.js';
export * from './routes/index.js';
