/**
 * Hooks Module — Types
 *
 * Types shared by annotation extraction, the phase registry and HookSet assembly.
 */

import type {
  Hook,
  PhaseIdentifier,
  RenderedManifest,
  UnrecognizedPhasePolicy,
} from '../../core/types.js'

/** Annotation read when no key is configured */
export const DEFAULT_HOOK_ANNOTATION = 'hookstage.dev/hook'

/** The ordered pre/post phase pair an operation triggers */
export interface OperationPhases {
  pre: PhaseIdentifier
  post: PhaseIdentifier
}

/**
 * Options controlling how hook annotations are read.
 */
export interface ExtractionOptions {
  /** Annotation key holding the comma-separated phase list (default: hookstage.dev/hook) */
  annotationKey?: string
  /**
   * What to do with an entry outside the closed phase set.
   *  - 'ignore' (default): skip it, keep the valid entries, report it in `unrecognized`
   *  - 'reject': throw UnrecognizedPhaseError
   */
  unrecognizedPolicy?: UnrecognizedPhasePolicy
}

/**
 * Result of extracting the phase set from one manifest.
 */
export interface ExtractionResult {
  phases: Set<PhaseIdentifier>
  /** Trimmed entries that matched no known phase (only populated under 'ignore') */
  unrecognized: string[]
}

/** Kind/name/namespace read from a manifest header */
export interface ManifestIdentity {
  kind: string
  name: string
  namespace?: string
}

/** An annotation entry that was skipped under the 'ignore' policy */
export interface UnrecognizedPhaseEntry {
  value: string
  manifest: ManifestIdentity
  source?: string
}

/**
 * Phase → hooks, in manifest discovery order.
 * Discovery order is not an execution-order guarantee.
 */
export type HookSet = ReadonlyMap<PhaseIdentifier, readonly Hook[]>

/**
 * Result of partitioning rendered manifests into hooks and ordinary resources.
 */
export interface HookSetAssembly {
  hookSet: HookSet
  /** Every distinct hook, once, in discovery order */
  hooks: Hook[]
  /** Manifests with no recognized phase: tracked release resources */
  resources: RenderedManifest[]
  unrecognized: UnrecognizedPhaseEntry[]
}
