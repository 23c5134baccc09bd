/**
 * Core types for hookstage
 * Shared type definitions used across all modules
 */

/** Lifecycle phases a hook can bind to. Closed set; never extended at runtime. */
export const PHASE_IDENTIFIERS = [
  'pre-install',
  'post-install',
  'pre-delete',
  'post-delete',
  'pre-upgrade',
  'post-upgrade',
  'pre-rollback',
  'post-rollback',
] as const

/** One of the eight lifecycle phases */
export type PhaseIdentifier = (typeof PHASE_IDENTIFIERS)[number]

/** Caller-initiated release actions */
export const OPERATIONS = ['install', 'upgrade', 'delete', 'rollback'] as const

/** A release operation; each maps to exactly one pre/post phase pair */
export type Operation = (typeof OPERATIONS)[number]

/** Readiness of a submitted hook resource */
export type ReadinessState = 'Pending' | 'Ready' | 'Failed'

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Policy applied when an annotation names a phase outside the closed set */
export type UnrecognizedPhasePolicy = 'ignore' | 'reject'

/**
 * A rendered manifest as handed over by the rendering collaborator.
 * `document` is passed through to the apply mechanism unmodified.
 */
export interface RenderedManifest {
  /** File the manifest was read from, when known */
  source?: string
  document: Record<string, unknown>
}

/** A rendered manifest bound to one or more lifecycle phases */
export interface Hook {
  /** metadata.name of the resource */
  name: string
  resourceKind: string
  namespace?: string
  phases: ReadonlySet<PhaseIdentifier>
  rawManifest: RenderedManifest
  source?: string
}

/** Status condition reported for a resource */
export interface ObservedCondition {
  type: string
  status: string
  reason?: string
  message?: string
}

/** Current state of a submitted resource as reported by the apply mechanism */
export interface ObservedState {
  conditions?: ObservedCondition[]
  active?: number
  succeeded?: number
  failed?: number
}
