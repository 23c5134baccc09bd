/**
 * ApplyMechanism interface — the capability hookstage uses to talk to the
 * target system.
 *
 * The orchestrator treats it as opaque: it never assumes a protocol, and it
 * relies on the implementation's own idempotency and conflict handling.
 */

import type { ObservedState, RenderedManifest } from '../../core/types.js'

/**
 * Opaque reference to a created resource, returned by `submit` and passed
 * back to `poll`.
 */
export interface ResourceHandle {
  kind: string
  name: string
  namespace?: string
}

/** Outcome of a submit call */
export type SubmitResult =
  | { accepted: true; handle: ResourceHandle }
  | { accepted: false; error: string }

/**
 * Creates resources in the target system and reports their observed state.
 */
export interface ApplyMechanism {
  /**
   * Create or update the resource described by `manifest`.
   * A rejection may be returned as `{ accepted: false }` or thrown.
   */
  submit(manifest: RenderedManifest): Promise<SubmitResult>

  /**
   * Read the current observed state of a previously submitted resource.
   * `signal` aborts when the caller stops waiting (deadline or cancellation);
   * implementations should abandon the in-flight read then.
   */
  poll(handle: ResourceHandle, signal?: AbortSignal): Promise<ObservedState>
}
