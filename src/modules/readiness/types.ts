/**
 * Readiness Module — Types
 */

/** Kinds treated as run-to-completion when no list is configured */
export const DEFAULT_RUN_TO_COMPLETION_KINDS: readonly string[] = ['Job']

/**
 * Readiness policy for a resource kind. Closed variant set:
 *  - 'run-to-completion': poll until the workload reports terminal success or failure
 *  - 'immediate': Ready as soon as the apply mechanism accepts the resource
 */
export type ReadinessPolicy =
  | { type: 'run-to-completion'; kind: string }
  | { type: 'immediate'; kind: string }

/** Policy variant names */
export type ReadinessPolicyType = ReadinessPolicy['type']
