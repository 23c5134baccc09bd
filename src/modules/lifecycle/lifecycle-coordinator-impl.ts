/**
 * LifecycleCoordinator implementation.
 *
 * Factory: createLifecycleCoordinator(deps) → LifecycleCoordinator
 *
 * Sequencing is rigid for every operation: pre → main → post. There is no
 * retry and no cleanup; the first failure ends the operation.
 */

import type { Logger } from 'pino'
import { OperationFailedError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { Operation, PhaseIdentifier } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import { assembleHookSet, hookLabel } from '../hooks/hook-set.js'
import { phasesFor } from '../hooks/phase-registry.js'
import type { ExtractionOptions } from '../hooks/types.js'
import type { PhaseExecutor } from '../phase-executor/phase-executor.js'
import type { PhaseResult } from '../phase-executor/types.js'
import type { LifecycleCoordinator } from './lifecycle-coordinator.js'
import type {
  FailedPhaseResult,
  LifecycleCoordinatorDeps,
  LifecyclePipelineSteps,
  OperationRequest,
  OperationResult,
  PipelineOutcome,
} from './types.js'

// ---------------------------------------------------------------------------
// Pipeline sequencing
// ---------------------------------------------------------------------------

/**
 * Run pre → main → post, stopping at the first failing step.
 *
 * A pre step that reports failure means main and post are never invoked.
 * A main step that rejects means post is never invoked.
 */
export async function runLifecyclePipeline<T>(
  steps: LifecyclePipelineSteps<T>
): Promise<PipelineOutcome<T>> {
  const pre = await steps.pre()
  if (!pre.success) {
    return { success: false, stage: 'pre', pre }
  }

  let mainResult: T
  try {
    mainResult = await steps.main()
  } catch (error) {
    return { success: false, stage: 'main', pre, error }
  }

  const post = await steps.post()
  if (!post.success) {
    return { success: false, stage: 'post', pre, mainResult, post }
  }

  return { success: true, pre, mainResult, post }
}

function phaseFailure(
  operation: Operation,
  result: FailedPhaseResult
): OperationFailedError {
  return new OperationFailedError(
    operation,
    result.error.message,
    { phase: result.phase, hook: hookLabel(result.failedHook), reason: result.error.context['reason'] },
    result.error
  )
}

// ---------------------------------------------------------------------------
// LifecycleCoordinatorImpl
// ---------------------------------------------------------------------------

class LifecycleCoordinatorImpl implements LifecycleCoordinator {
  private readonly _executor: PhaseExecutor
  private readonly _extraction: ExtractionOptions
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _logger: Logger

  constructor(deps: LifecycleCoordinatorDeps) {
    this._executor = deps.executor
    this._extraction = deps.extraction ?? {}
    this._eventBus = deps.eventBus
    this._logger = deps.logger ?? createLogger('lifecycle')
  }

  async perform<T>(request: OperationRequest<T>): Promise<OperationResult<T>> {
    const { operation } = request
    const { pre, post } = phasesFor(operation)
    const { hookSet, hooks, resources, unrecognized } = assembleHookSet(
      request.manifests,
      this._extraction
    )

    const log = this._logger.child({ operation })
    const startedAt = Date.now()
    const phases: PhaseResult[] = []

    log.info(
      { hooks: hooks.length, resources: resources.length, disableHooks: request.disableHooks === true },
      'Starting release operation'
    )
    this._eventBus?.emit('operation:started', {
      operation,
      hookCount: request.disableHooks === true ? 0 : hooks.length,
      resourceCount: resources.length,
    })

    const runPhase = async (phase: PhaseIdentifier): Promise<PhaseResult> => {
      if (request.disableHooks === true) {
        log.debug({ phase }, 'Hooks disabled; skipping phase')
        return { success: true, phase, hooks: [] }
      }
      const result = await this._executor.run(phase, hookSet, {
        ...(request.signal !== undefined ? { signal: request.signal } : {}),
        ...(request.timeoutMs !== undefined ? { timeoutMs: request.timeoutMs } : {}),
      })
      phases.push(result)
      return result
    }

    const outcome = await runLifecyclePipeline({
      pre: () => runPhase(pre),
      main: () => request.mainAction(resources),
      post: () => runPhase(post),
    })

    if (outcome.success) {
      const durationMs = Date.now() - startedAt
      log.info({ durationMs }, 'Release operation completed')
      this._eventBus?.emit('operation:completed', { operation, durationMs })
      return {
        success: true,
        operation,
        phases,
        resources,
        mainResult: outcome.mainResult,
        unrecognized,
      }
    }

    if (outcome.stage === 'main') {
      const error = new OperationFailedError(
        operation,
        `main action failed: ${errorMessage(outcome.error)}`,
        { stage: 'main' },
        outcome.error
      )
      return this._failed<T>(log, {
        success: false,
        operation,
        stage: 'main',
        error,
        phases,
        unrecognized,
      })
    }

    const failed = outcome.stage === 'pre' ? outcome.pre : outcome.post
    return this._failed<T>(log, {
      success: false,
      operation,
      stage: outcome.stage,
      phase: failed.phase,
      failedHook: failed.failedHook,
      error: phaseFailure(operation, failed),
      phases,
      unrecognized,
    })
  }

  private _failed<T>(
    log: Logger,
    result: Extract<OperationResult<T>, { success: false }>
  ): OperationResult<T> {
    log.error(
      { stage: result.stage, phase: result.phase, code: result.error.code },
      result.error.message
    )
    this._eventBus?.emit('operation:failed', {
      operation: result.operation,
      stage: result.stage,
      ...(result.phase !== undefined ? { phase: result.phase } : {}),
      error: { message: result.error.message, code: result.error.code },
    })
    return result
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new LifecycleCoordinator.
 *
 * @example
 * const coordinator = createLifecycleCoordinator({ executor })
 * const result = await coordinator.perform({
 *   operation: 'install',
 *   manifests,
 *   mainAction: (resources) => applyAll(resources),
 * })
 */
export function createLifecycleCoordinator(deps: LifecycleCoordinatorDeps): LifecycleCoordinator {
  return new LifecycleCoordinatorImpl(deps)
}
