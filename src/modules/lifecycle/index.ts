/**
 * lifecycle module — Public API re-exports.
 */

export type { LifecycleCoordinator } from './lifecycle-coordinator.js'
export { createLifecycleCoordinator, runLifecyclePipeline } from './lifecycle-coordinator-impl.js'
export type {
  LifecycleCoordinatorDeps,
  LifecyclePipelineSteps,
  OperationRequest,
  OperationResult,
  PipelineOutcome,
  PipelineStage,
  FailedPhaseResult,
} from './types.js'
