export * from './types.js';
export * from './state.js';
export * from './audio-gate.js';
export * from './flow-controller.js';
export * from './workflow.js';
export { ExtractionStage } from './stages/extraction-stage.js';
export { SentimentStage } from './stages/sentiment-stage.js';
export { StructuringStage, buildFinalResult } from './stages/structuring-stage.js';
export { SentimentResponseSchema, KeyPointsResponseSchema } from './stages/schemas.js';
