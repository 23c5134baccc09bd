/**
 * phase-executor module — Public API re-exports.
 */

export type { PhaseExecutor } from './phase-executor.js'
export { createPhaseExecutor, toHookRef } from './phase-executor-impl.js'
export type {
  PhaseExecutorDeps,
  PhaseRunOptions,
  PhaseResult,
  HookOutcome,
} from './types.js'
export { DEFAULT_HOOK_TIMEOUT_MS, DEFAULT_POLL_INTERVAL_MS } from './types.js'
