/**
 * HookSet assembly — partitions rendered manifests into hooks and ordinary resources.
 *
 * The caller supplies one already-flattened manifest sequence covering the
 * top-level package and all of its sub-packages. Nothing is filtered or
 * reordered by origin package: a parent cannot opt a sub-package's hooks out.
 */

import { createLogger } from '../../utils/logger.js'
import type { Hook, PhaseIdentifier, RenderedManifest } from '../../core/types.js'
import { describeManifest, extractPhases } from './annotation-extractor.js'
import type {
  ExtractionOptions,
  HookSet,
  HookSetAssembly,
  UnrecognizedPhaseEntry,
} from './types.js'

const logger = createLogger('hook-set')

/**
 * Build the HookSet for a sequence of rendered manifests.
 *
 * A manifest declaring several phases becomes a single Hook that is indexed
 * into each of those phase buckets independently. Bucket order follows the
 * manifest order given here.
 *
 * @throws {UnrecognizedPhaseError} under the 'reject' policy
 * @throws {ManifestParseError} when a manifest header is malformed
 */
export function assembleHookSet(
  manifests: readonly RenderedManifest[],
  options: ExtractionOptions = {}
): HookSetAssembly {
  const buckets = new Map<PhaseIdentifier, Hook[]>()
  const hooks: Hook[] = []
  const resources: RenderedManifest[] = []
  const unrecognized: UnrecognizedPhaseEntry[] = []

  for (const manifest of manifests) {
    const extraction = extractPhases(manifest, options)
    const identity = describeManifest(manifest)

    for (const value of extraction.unrecognized) {
      logger.warn(
        { value, kind: identity.kind, name: identity.name, source: manifest.source },
        'Ignoring unrecognized hook phase'
      )
      unrecognized.push(
        manifest.source !== undefined
          ? { value, manifest: identity, source: manifest.source }
          : { value, manifest: identity }
      )
    }

    if (extraction.phases.size === 0) {
      resources.push(manifest)
      continue
    }

    const hook: Hook = {
      name: identity.name,
      resourceKind: identity.kind,
      phases: extraction.phases,
      rawManifest: manifest,
      ...(identity.namespace !== undefined ? { namespace: identity.namespace } : {}),
      ...(manifest.source !== undefined ? { source: manifest.source } : {}),
    }
    hooks.push(hook)

    for (const phase of extraction.phases) {
      const bucket = buckets.get(phase)
      if (bucket === undefined) {
        buckets.set(phase, [hook])
      } else {
        bucket.push(hook)
      }
    }
  }

  logger.debug(
    { hooks: hooks.length, resources: resources.length, phases: [...buckets.keys()] },
    'Assembled hook set'
  )

  return { hookSet: buckets, hooks, resources, unrecognized }
}

/**
 * Hooks bound to `phase`, or an empty array when the phase has none.
 */
export function hooksFor(hookSet: HookSet, phase: PhaseIdentifier): readonly Hook[] {
  return hookSet.get(phase) ?? []
}

/**
 * Display label for a hook: Kind/name, with the namespace when set.
 */
export function hookLabel(hook: Pick<Hook, 'resourceKind' | 'name' | 'namespace'>): string {
  const base = `${hook.resourceKind}/${hook.name}`
  return hook.namespace !== undefined ? `${hook.namespace}/${base}` : base
}
