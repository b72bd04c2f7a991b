// Main app
export { createApp } from './app.js';
export type { AppOptions } from './app.js';
export { startServer, installShutdownHandlers } from './server.js';
export type { ServerHandle } from './server.js';

// Routes
export { createAnalyzeRoutes, createHealthRoutes } from './routes/index.js';

// Models
export type { AnalysisResponse, AnalyzeYoutubeRequest, HealthStatus } from './models/analysis.js';
export {
  AnalyzeYoutubeRequestSchema,
  AnalysisResponseSchema,
  AnalysisListSchema,
  ErrorResponseSchema,
  HealthStatusSchema,
  toAnalysisResponse,
} from './models/analysis.js';

// Store
export { InMemoryAnalysisStore, getAnalysisStore, resetAnalysisStore } from './store/analysis-store.js';
export type { AnalysisRecord, AnalysisRepository, AnalysisPage } from './store/analysis-store.js';
