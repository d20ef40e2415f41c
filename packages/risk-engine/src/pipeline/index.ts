export {
  AssessmentPipeline,
  assessApplication,
  ASSESSMENT_VERSION,
  DEFAULT_DYNAMIC_TIMEOUT_MS,
  type PipelineOptions,
  type StaticExtractionSource,
} from './assessmentPipeline.js';
export { PipelineStateMachine, type PipelineState, type StateTransition } from './pipelineState.js';
export { evaluateMetrics, type EvaluateOptions, type MetricEvaluation } from './evaluateMetrics.js';
