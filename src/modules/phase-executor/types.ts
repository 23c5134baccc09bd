/**
 * Types for the Phase Executor module.
 */

import type { Logger } from 'pino'
import type { HookstageError, PhaseAbortedError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { Hook, PhaseIdentifier, ReadinessState } from '../../core/types.js'
import type { ApplyMechanism } from '../apply/apply-mechanism.js'

/** Default wait for a run-to-completion hook: 5 minutes */
export const DEFAULT_HOOK_TIMEOUT_MS = 300_000

/** Default delay between status polls */
export const DEFAULT_POLL_INTERVAL_MS = 2_000

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/**
 * Dependencies required to create a PhaseExecutor.
 */
export interface PhaseExecutorDeps {
  /** Capability used to create hook resources and read their state */
  apply: ApplyMechanism
  /** Optional event bus receiving phase and hook lifecycle events */
  eventBus?: TypedEventBus
  /** Kinds polled until completion (default: ['Job']) */
  runToCompletionKinds?: readonly string[]
  /** Delay between status polls in milliseconds */
  pollIntervalMs?: number
  /** Per-hook deadline for run-to-completion kinds in milliseconds */
  timeoutMs?: number
  /** Logger override (default: the 'phase-executor' logger) */
  logger?: Logger
}

/**
 * Per-run options.
 */
export interface PhaseRunOptions {
  /** Cancels any in-flight readiness wait; the waiting hook is reported Failed */
  signal?: AbortSignal
  /** Overrides the executor's per-hook deadline for this run */
  timeoutMs?: number
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/**
 * Terminal outcome of one hook.
 */
export interface HookOutcome {
  hook: Hook
  state: Exclude<ReadinessState, 'Pending'>
  durationMs: number
  /** Set when state is 'Failed' */
  error?: HookstageError
}

/**
 * Result of running one phase. `hooks` lists the hooks that were attempted,
 * in execution order.
 */
export type PhaseResult =
  | {
      success: true
      phase: PhaseIdentifier
      hooks: HookOutcome[]
    }
  | {
      success: false
      phase: PhaseIdentifier
      hooks: HookOutcome[]
      /** The first hook that reached Failed */
      failedHook: Hook
      /** Carries the hook-level error as `cause` */
      error: PhaseAbortedError
      /** Hooks never submitted because of the failure */
      skipped: Hook[]
    }
