export { createAnalyzeRoutes } from './analyze.js';
export type { AnalyzeRouteDeps } from './analyze.js';
export { createHealthRoutes } from './health.js';
