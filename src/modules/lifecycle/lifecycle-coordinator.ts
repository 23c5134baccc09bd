/**
 * LifecycleCoordinator interface.
 *
 * Top-level driver of a release operation:
 *   pre-phase hooks → caller's main action → post-phase hooks
 */

import type { OperationRequest, OperationResult } from './types.js'

export interface LifecycleCoordinator {
  /**
   * Perform a release operation.
   *
   * A failing pre-phase prevents the main action and the post-phase from
   * running; a failing main action prevents the post-phase. Hook resources
   * already submitted are left in the target system.
   *
   * @throws {UnknownOperationError} for an operation outside the closed set
   * @throws {UnrecognizedPhaseError} under the 'reject' extraction policy
   * @throws {ManifestParseError} when a manifest header is malformed
   */
  perform<T>(request: OperationRequest<T>): Promise<OperationResult<T>>
}
