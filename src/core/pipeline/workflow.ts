/**
 * Video analysis workflow: extraction -> sentiment -> structuring
 */

import { FlowController } from './flow-controller.js';
import { ExtractionStage } from './stages/extraction-stage.js';
import { SentimentStage } from './stages/sentiment-stage.js';
import { StructuringStage } from './stages/structuring-stage.js';
import type { StageListener, WorkflowProviders, WorkflowSettings, WorkflowStage } from './types.js';

export function createDefaultStages(): WorkflowStage[] {
  return [new ExtractionStage(), new SentimentStage(), new StructuringStage()];
}

export function createVideoAnalysisWorkflow(
  providers: WorkflowProviders,
  settings: WorkflowSettings,
  onStage?: StageListener
): FlowController {
  return new FlowController({ providers, settings, stages: createDefaultStages(), onStage });
}
