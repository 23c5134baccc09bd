/**
 * HookstageEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {scope}:{action} (e.g., "hook:ready", "phase:failed")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { Operation, PhaseIdentifier } from './types.js'

// ---------------------------------------------------------------------------
// Shared payload subtypes
// ---------------------------------------------------------------------------

/** Identity of a hook resource as shown in events and logs */
export interface HookRef {
  kind: string
  name: string
  namespace?: string
  source?: string
}

/** Error payload for a failed hook, phase or operation */
export interface EventError {
  message: string
  code?: string
}

// ---------------------------------------------------------------------------
// HookstageEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the hookstage event bus.
 * Use `keyof HookstageEvents` to constrain event keys.
 */
export interface HookstageEvents {
  // -------------------------------------------------------------------------
  // Operation lifecycle events
  // -------------------------------------------------------------------------

  /** A release operation has begun */
  'operation:started': { operation: Operation; hookCount: number; resourceCount: number }

  /** A release operation finished with every step successful */
  'operation:completed': { operation: Operation; durationMs: number }

  /** A release operation halted */
  'operation:failed': {
    operation: Operation
    stage: 'pre' | 'main' | 'post'
    phase?: PhaseIdentifier
    error: EventError
  }

  // -------------------------------------------------------------------------
  // Phase lifecycle events
  // -------------------------------------------------------------------------

  /** Execution of a phase's hooks has begun */
  'phase:started': { phase: PhaseIdentifier; hookCount: number }

  /** Every hook in the phase reached Ready */
  'phase:completed': { phase: PhaseIdentifier; hookCount: number }

  /** A hook in the phase failed; remaining hooks were skipped */
  'phase:failed': { phase: PhaseIdentifier; hook: HookRef; error: EventError }

  // -------------------------------------------------------------------------
  // Hook lifecycle events
  // -------------------------------------------------------------------------

  /** The apply mechanism accepted a hook resource */
  'hook:submitted': { phase: PhaseIdentifier; hook: HookRef }

  /** A hook reached Ready */
  'hook:ready': { phase: PhaseIdentifier; hook: HookRef; durationMs: number }

  /** A hook reached Failed */
  'hook:failed': { phase: PhaseIdentifier; hook: HookRef; error: EventError }

  /** A hook was not submitted because an earlier hook in the phase failed */
  'hook:skipped': { phase: PhaseIdentifier; hook: HookRef }
}
