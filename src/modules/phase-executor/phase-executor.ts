/**
 * PhaseExecutor interface.
 *
 * Runs every hook bound to one lifecycle phase, one at a time, and reports
 * whether the phase as a whole succeeded.
 */

import type { PhaseIdentifier } from '../../core/types.js'
import type { HookSet } from '../hooks/types.js'
import type { PhaseResult, PhaseRunOptions } from './types.js'

/**
 * Executes the hooks of a single phase.
 *
 * Guarantees:
 *   - hooks run strictly serially, in the order the HookSet bucket holds them
 *   - the phase halts at the first hook that reaches Failed; later hooks are never submitted
 *   - a phase with no hooks succeeds without touching the apply mechanism
 *   - submitted hook resources are left in place whatever the outcome
 */
export interface PhaseExecutor {
  /**
   * Run all hooks bound to `phase`.
   *
   * Never rejects for hook failures; they are reported in the returned result.
   *
   * @param phase - Phase to run
   * @param hookSet - Assembled hook set
   * @param options - Cancellation signal and deadline override
   */
  run(phase: PhaseIdentifier, hookSet: HookSet, options?: PhaseRunOptions): Promise<PhaseResult>
}
