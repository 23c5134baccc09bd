/**
 * Hooks Module
 *
 * Recognizes hook manifests and groups them by lifecycle phase.
 *
 * Usage:
 *   import { assembleHookSet, hooksFor, phasesFor } from './modules/hooks/index.js'
 *
 *   const { hookSet, resources } = assembleHookSet(manifests)
 *   const { pre, post } = phasesFor('install')
 *   const preHooks = hooksFor(hookSet, pre)
 */

export type {
  ExtractionOptions,
  ExtractionResult,
  HookSet,
  HookSetAssembly,
  ManifestIdentity,
  OperationPhases,
  UnrecognizedPhaseEntry,
} from './types.js'
export { DEFAULT_HOOK_ANNOTATION } from './types.js'
export { extractPhases, describeManifest, serializePhases } from './annotation-extractor.js'
export {
  phasesFor,
  isPhaseIdentifier,
  isOperation,
  ALL_PHASES,
  ALL_OPERATIONS,
} from './phase-registry.js'
export { assembleHookSet, hooksFor, hookLabel } from './hook-set.js'
