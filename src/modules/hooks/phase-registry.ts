/**
 * Phase Registry — fixed mapping from release operation to its pre/post phases.
 *
 * PHASE_IDENTIFIERS and OPERATIONS (src/core/types.ts) are the single source of
 * truth for the closed sets; nothing here can be extended at runtime.
 */

import { UnknownOperationError } from '../../core/errors.js'
import {
  OPERATIONS,
  PHASE_IDENTIFIERS,
  type Operation,
  type PhaseIdentifier,
} from '../../core/types.js'
import type { OperationPhases } from './types.js'

const OPERATION_PHASES: Readonly<Record<Operation, OperationPhases>> = Object.freeze({
  install: Object.freeze({ pre: 'pre-install', post: 'post-install' }),
  upgrade: Object.freeze({ pre: 'pre-upgrade', post: 'post-upgrade' }),
  delete: Object.freeze({ pre: 'pre-delete', post: 'post-delete' }),
  rollback: Object.freeze({ pre: 'pre-rollback', post: 'post-rollback' }),
})

/** All phase identifiers in canonical order */
export const ALL_PHASES: readonly PhaseIdentifier[] = PHASE_IDENTIFIERS

/** All release operations in canonical order */
export const ALL_OPERATIONS: readonly Operation[] = OPERATIONS

/** Whether `value` is one of the eight recognized phase identifiers */
export function isPhaseIdentifier(value: string): value is PhaseIdentifier {
  return PHASE_IDENTIFIERS.some((phase) => phase === value)
}

/** Whether `value` is one of the four release operations */
export function isOperation(value: string): value is Operation {
  return OPERATIONS.some((operation) => operation === value)
}

/**
 * Look up the ordered (pre, post) phase pair for an operation.
 *
 * @throws {UnknownOperationError} when `operation` is outside the closed set
 */
export function phasesFor(operation: string): OperationPhases {
  if (!isOperation(operation)) {
    throw new UnknownOperationError(operation)
  }
  return OPERATION_PHASES[operation]
}
