/**
 * ReadinessEvaluator — decides whether a hook resource is Ready, Pending or Failed.
 *
 * Dispatch is over the closed ReadinessPolicy variant, never over open-ended
 * kind strings: `policyForKind` maps a kind onto a variant once, and every
 * evaluation switches on the variant tag.
 */

import type { ObservedCondition, ObservedState, ReadinessState } from '../../core/types.js'
import { DEFAULT_RUN_TO_COMPLETION_KINDS, type ReadinessPolicy } from './types.js'

// ---------------------------------------------------------------------------
// Policy selection
// ---------------------------------------------------------------------------

/**
 * Pick the readiness policy for a resource kind.
 * Kinds are compared case-sensitively.
 */
export function policyForKind(
  kind: string,
  runToCompletionKinds: readonly string[] = DEFAULT_RUN_TO_COMPLETION_KINDS
): ReadinessPolicy {
  return runToCompletionKinds.includes(kind)
    ? { type: 'run-to-completion', kind }
    : { type: 'immediate', kind }
}

/** Whether the policy needs observed state to be polled after submission */
export function requiresPolling(policy: ReadinessPolicy): boolean {
  switch (policy.type) {
    case 'run-to-completion':
      return true
    case 'immediate':
      return false
  }
}

// ---------------------------------------------------------------------------
// Condition helpers
// ---------------------------------------------------------------------------

function findTrueCondition(
  observed: ObservedState,
  type: string
): ObservedCondition | undefined {
  return observed.conditions?.find((c) => c.type === type && c.status === 'True')
}

// Pod counts are not terminal: a Job between retries reports failed pods
// with none active, and one with several completions reports succeeded pods
// before it is done. Only the True conditions decide.
function hasTerminalFailure(observed: ObservedState): boolean {
  return findTrueCondition(observed, 'Failed') !== undefined
}

function hasTerminalSuccess(observed: ObservedState): boolean {
  return findTrueCondition(observed, 'Complete') !== undefined
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * State of a hook right after its submission attempt.
 * A rejected apply call is Failed regardless of kind.
 */
export function evaluateSubmission(accepted: boolean): ReadinessState {
  return accepted ? 'Pending' : 'Failed'
}

/**
 * Evaluate readiness from the resource's current observed state.
 *
 * For run-to-completion kinds a reported failure wins over a reported success.
 * Immediate kinds are Ready whatever `observed` holds.
 */
export function evaluate(policy: ReadinessPolicy, observed: ObservedState = {}): ReadinessState {
  switch (policy.type) {
    case 'immediate':
      return 'Ready'
    case 'run-to-completion':
      if (hasTerminalFailure(observed)) return 'Failed'
      if (hasTerminalSuccess(observed)) return 'Ready'
      return 'Pending'
  }
}

/**
 * Human-readable reason for a Failed observed state, taken from the
 * Failed condition when one is present.
 */
export function failureReason(observed: ObservedState): string {
  const condition = findTrueCondition(observed, 'Failed')
  if (condition !== undefined) {
    const parts = [condition.reason, condition.message].filter(
      (part): part is string => part !== undefined && part !== ''
    )
    if (parts.length > 0) return parts.join(': ')
  }
  if ((observed.failed ?? 0) > 0) {
    return `${String(observed.failed)} failed pod(s)`
  }
  return 'reported terminal failure'
}
