/**
 * Barrel exports for the readiness module.
 */

export type { ReadinessPolicy, ReadinessPolicyType } from './types.js'
export { DEFAULT_RUN_TO_COMPLETION_KINDS } from './types.js'
export {
  policyForKind,
  requiresPolling,
  evaluate,
  evaluateSubmission,
  failureReason,
} from './readiness-evaluator.js'
