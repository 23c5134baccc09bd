/**
 * Types for the Lifecycle Coordinator module.
 */

import type { Logger } from 'pino'
import type { OperationFailedError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { Hook, Operation, PhaseIdentifier, RenderedManifest } from '../../core/types.js'
import type { ExtractionOptions, UnrecognizedPhaseEntry } from '../hooks/types.js'
import type { PhaseExecutor } from '../phase-executor/phase-executor.js'
import type { PhaseResult } from '../phase-executor/types.js'

/** Step of the pre → main → post pipeline */
export type PipelineStage = 'pre' | 'main' | 'post'

/** A phase result that reported failure */
export type FailedPhaseResult = Extract<PhaseResult, { success: false }>

// ---------------------------------------------------------------------------
// Pipeline sequencing
// ---------------------------------------------------------------------------

/**
 * The three steps of a release operation.
 * `main` signals failure by rejecting.
 */
export interface LifecyclePipelineSteps<T> {
  pre: () => Promise<PhaseResult>
  main: () => Promise<T>
  post: () => Promise<PhaseResult>
}

/**
 * Outcome of running the pipeline. Steps after the failing one never ran.
 */
export type PipelineOutcome<T> =
  | { success: true; pre: PhaseResult; mainResult: T; post: PhaseResult }
  | { success: false; stage: 'pre'; pre: FailedPhaseResult }
  | { success: false; stage: 'main'; pre: PhaseResult; error: unknown }
  | { success: false; stage: 'post'; pre: PhaseResult; mainResult: T; post: FailedPhaseResult }

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

/**
 * Dependencies required to create a LifecycleCoordinator.
 */
export interface LifecycleCoordinatorDeps {
  executor: PhaseExecutor
  /** How hook annotations are read when assembling the HookSet */
  extraction?: ExtractionOptions
  eventBus?: TypedEventBus
  logger?: Logger
}

/**
 * A release operation request.
 */
export interface OperationRequest<T> {
  operation: Operation
  /** Flattened rendered manifests of the package and all its sub-packages */
  manifests: readonly RenderedManifest[]
  /**
   * The caller's non-hook step (e.g. apply or remove the ordinary resources).
   * Receives the manifests that are not hooks.
   */
  mainAction: (resources: RenderedManifest[]) => Promise<T>
  /** Cancels any in-flight readiness wait */
  signal?: AbortSignal
  /** Per-hook deadline override */
  timeoutMs?: number
  /** Skip both hook phases; only mainAction runs */
  disableHooks?: boolean
}

/**
 * Result of a release operation.
 */
export type OperationResult<T> =
  | {
      success: true
      operation: Operation
      /** Phase results in execution order (empty when hooks were disabled) */
      phases: PhaseResult[]
      resources: RenderedManifest[]
      mainResult: T
      unrecognized: UnrecognizedPhaseEntry[]
    }
  | {
      success: false
      operation: Operation
      stage: PipelineStage
      /** Set when a hook phase failed */
      phase?: PhaseIdentifier
      /** Set when a hook phase failed */
      failedHook?: Hook
      error: OperationFailedError
      phases: PhaseResult[]
      unrecognized: UnrecognizedPhaseEntry[]
    }
