/**
 * PhaseExecutor implementation.
 *
 * Factory: createPhaseExecutor(deps) → PhaseExecutor
 *
 * Per hook: submit → (run-to-completion kinds only) poll until terminal →
 * Ready or Failed. The first Failed hook aborts the phase.
 */

import type { Logger } from 'pino'
import {
  HookFailedError,
  HookstageError,
  PhaseAbortedError,
  ReadinessTimeoutError,
  SubmissionFailedError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { HookRef } from '../../core/event-bus.types.js'
import type { Hook, ObservedState, PhaseIdentifier } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage, sleep, untilAborted } from '../../utils/helpers.js'
import type { ApplyMechanism, ResourceHandle } from '../apply/apply-mechanism.js'
import { hookLabel, hooksFor } from '../hooks/hook-set.js'
import type { HookSet } from '../hooks/types.js'
import {
  evaluate,
  failureReason,
  policyForKind,
  requiresPolling,
} from '../readiness/readiness-evaluator.js'
import { DEFAULT_RUN_TO_COMPLETION_KINDS, type ReadinessPolicy } from '../readiness/types.js'
import type { PhaseExecutor } from './phase-executor.js'
import {
  DEFAULT_HOOK_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  type HookOutcome,
  type PhaseExecutorDeps,
  type PhaseResult,
  type PhaseRunOptions,
} from './types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Event payload identity for a hook */
export function toHookRef(hook: Hook): HookRef {
  return {
    kind: hook.resourceKind,
    name: hook.name,
    ...(hook.namespace !== undefined ? { namespace: hook.namespace } : {}),
    ...(hook.source !== undefined ? { source: hook.source } : {}),
  }
}

// ---------------------------------------------------------------------------
// PhaseExecutorImpl
// ---------------------------------------------------------------------------

class PhaseExecutorImpl implements PhaseExecutor {
  private readonly _apply: ApplyMechanism
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _runToCompletionKinds: readonly string[]
  private readonly _pollIntervalMs: number
  private readonly _timeoutMs: number
  private readonly _logger: Logger

  constructor(deps: PhaseExecutorDeps) {
    this._apply = deps.apply
    this._eventBus = deps.eventBus
    this._runToCompletionKinds = deps.runToCompletionKinds ?? DEFAULT_RUN_TO_COMPLETION_KINDS
    this._pollIntervalMs = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this._timeoutMs = deps.timeoutMs ?? DEFAULT_HOOK_TIMEOUT_MS
    this._logger = deps.logger ?? createLogger('phase-executor')
  }

  // -------------------------------------------------------------------------
  // run
  // -------------------------------------------------------------------------

  async run(
    phase: PhaseIdentifier,
    hookSet: HookSet,
    options: PhaseRunOptions = {}
  ): Promise<PhaseResult> {
    const hooks = hooksFor(hookSet, phase)
    const log = this._logger.child({ phase })

    if (hooks.length === 0) {
      log.debug('No hooks bound to phase')
      return { success: true, phase, hooks: [] }
    }

    log.info({ hookCount: hooks.length }, 'Running phase hooks')
    this._eventBus?.emit('phase:started', { phase, hookCount: hooks.length })

    const outcomes: HookOutcome[] = []

    for (const [index, hook] of hooks.entries()) {
      const outcome = await this._runHook(phase, hook, options, log)
      outcomes.push(outcome)

      if (outcome.state === 'Failed') {
        const cause = outcome.error ?? new HookFailedError(hookLabel(hook), 'unknown failure')
        const skipped = hooks.slice(index + 1)
        for (const skippedHook of skipped) {
          this._eventBus?.emit('hook:skipped', { phase, hook: toHookRef(skippedHook) })
        }

        const error = new PhaseAbortedError(
          phase,
          hookLabel(hook),
          cause,
          skipped.map((h) => hookLabel(h))
        )
        log.error(
          { hook: hookLabel(hook), reason: cause.code, skipped: skipped.length },
          'Phase aborted'
        )
        this._eventBus?.emit('phase:failed', {
          phase,
          hook: toHookRef(hook),
          error: { message: cause.message, code: cause.code },
        })
        return { success: false, phase, hooks: outcomes, failedHook: hook, error, skipped }
      }
    }

    log.info({ hookCount: hooks.length }, 'Phase hooks ready')
    this._eventBus?.emit('phase:completed', { phase, hookCount: hooks.length })
    return { success: true, phase, hooks: outcomes }
  }

  // -------------------------------------------------------------------------
  // Per-hook execution
  // -------------------------------------------------------------------------

  private async _runHook(
    phase: PhaseIdentifier,
    hook: Hook,
    options: PhaseRunOptions,
    parentLog: Logger
  ): Promise<HookOutcome> {
    const label = hookLabel(hook)
    const log = parentLog.child({ hook: label })
    const startedAt = Date.now()

    const fail = (error: HookstageError): HookOutcome => {
      log.warn({ code: error.code }, error.message)
      this._eventBus?.emit('hook:failed', {
        phase,
        hook: toHookRef(hook),
        error: { message: error.message, code: error.code },
      })
      return { hook, state: 'Failed', durationMs: Date.now() - startedAt, error }
    }

    // 1. Submit
    let handle: ResourceHandle
    try {
      const submitted = await this._apply.submit(hook.rawManifest)
      if (!submitted.accepted) {
        return fail(new SubmissionFailedError(label, submitted.error, { phase }))
      }
      handle = submitted.handle
    } catch (err) {
      return fail(new SubmissionFailedError(label, errorMessage(err), { phase }))
    }

    log.debug({ handle }, 'Hook submitted')
    this._eventBus?.emit('hook:submitted', { phase, hook: toHookRef(hook) })

    // 2. Readiness
    const policy = policyForKind(hook.resourceKind, this._runToCompletionKinds)
    if (requiresPolling(policy)) {
      const timeoutMs = options.timeoutMs ?? this._timeoutMs
      const failure = await this._waitForTerminal(label, handle, policy, timeoutMs, options.signal)
      if (failure !== undefined) return fail(failure)
    }

    const durationMs = Date.now() - startedAt
    log.info({ durationMs }, 'Hook ready')
    this._eventBus?.emit('hook:ready', { phase, hook: toHookRef(hook), durationMs })
    return { hook, state: 'Ready', durationMs }
  }

  /**
   * Poll until the hook reaches a terminal state.
   * Resolves undefined on Ready, or the error describing why the hook Failed.
   *
   * The deadline and the caller's signal are folded into one wait signal that
   * also bounds each in-flight poll, so a poll that never settles still ends
   * the wait on time.
   */
  private async _waitForTerminal(
    label: string,
    handle: ResourceHandle,
    policy: ReadinessPolicy,
    timeoutMs: number,
    signal: AbortSignal | undefined
  ): Promise<HookstageError | undefined> {
    const deadline = AbortSignal.timeout(timeoutMs)
    const wait = signal !== undefined ? AbortSignal.any([signal, deadline]) : deadline
    const stopped = (): ReadinessTimeoutError =>
      new ReadinessTimeoutError(label, timeoutMs, signal?.aborted === true)

    for (;;) {
      if (wait.aborted) return stopped()

      let observed: ObservedState
      try {
        observed = await untilAborted(this._apply.poll(handle, wait), wait)
      } catch (err) {
        if (wait.aborted) return stopped()
        return new HookFailedError(label, `status poll failed: ${errorMessage(err)}`, { handle })
      }

      const state = evaluate(policy, observed)
      if (state === 'Failed') {
        return new HookFailedError(label, failureReason(observed), { handle })
      }
      if (state === 'Ready') return undefined

      await sleep(this._pollIntervalMs, wait)
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new PhaseExecutor.
 *
 * @example
 * const executor = createPhaseExecutor({ apply, pollIntervalMs: 1000 })
 * const result = await executor.run('pre-install', hookSet)
 */
export function createPhaseExecutor(deps: PhaseExecutorDeps): PhaseExecutor {
  return new PhaseExecutorImpl(deps)
}
