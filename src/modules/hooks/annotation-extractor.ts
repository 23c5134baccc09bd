/**
 * Annotation extraction — reads the lifecycle phases a rendered manifest is bound to.
 *
 * The hook annotation holds a comma-separated list of phase identifiers.
 * Entries are trimmed and matched case-sensitively against the closed set.
 */

import { z } from 'zod'
import { ManifestParseError, UnrecognizedPhaseError } from '../../core/errors.js'
import { PHASE_IDENTIFIERS, type PhaseIdentifier, type RenderedManifest } from '../../core/types.js'
import { isPhaseIdentifier } from './phase-registry.js'
import {
  DEFAULT_HOOK_ANNOTATION,
  type ExtractionOptions,
  type ExtractionResult,
  type ManifestIdentity,
} from './types.js'

// ---------------------------------------------------------------------------
// Manifest header schema
// ---------------------------------------------------------------------------

/**
 * The only part of a manifest the orchestrator reads. Everything else is
 * passed through untouched.
 */
const ManifestHeaderSchema = z
  .object({
    kind: z.string().optional(),
    metadata: z
      .object({
        name: z.string().optional(),
        generateName: z.string().optional(),
        namespace: z.string().optional(),
        annotations: z.record(z.unknown()).nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough()

type ManifestHeader = z.infer<typeof ManifestHeaderSchema>

function parseHeader(manifest: RenderedManifest): ManifestHeader {
  const result = ManifestHeaderSchema.safeParse(manifest.document)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new ManifestParseError(
      `Invalid manifest header${manifest.source !== undefined ? ` in ${manifest.source}` : ''}:\n${issues}`,
      { source: manifest.source, issues: result.error.issues }
    )
  }
  return result.data
}

// ---------------------------------------------------------------------------
// describeManifest
// ---------------------------------------------------------------------------

/**
 * Read kind/name/namespace from a manifest.
 * A missing kind reads as "Unknown"; a missing name falls back to generateName.
 *
 * @throws {ManifestParseError} when metadata has the wrong shape
 */
export function describeManifest(manifest: RenderedManifest): ManifestIdentity {
  const header = parseHeader(manifest)
  const kind = header.kind !== undefined && header.kind !== '' ? header.kind : 'Unknown'
  const name = header.metadata?.name ?? header.metadata?.generateName ?? ''
  const namespace = header.metadata?.namespace
  return namespace !== undefined ? { kind, name, namespace } : { kind, name }
}

// ---------------------------------------------------------------------------
// extractPhases
// ---------------------------------------------------------------------------

/**
 * Extract the set of phases a manifest declares through the hook annotation.
 *
 * A manifest without the annotation, or with an empty value, yields the empty
 * set and is therefore an ordinary release resource.
 *
 * @throws {UnrecognizedPhaseError} under the 'reject' policy, on the first unknown entry
 * @throws {ManifestParseError} when the annotation value is not a string
 */
export function extractPhases(
  manifest: RenderedManifest,
  options: ExtractionOptions = {}
): ExtractionResult {
  const annotationKey = options.annotationKey ?? DEFAULT_HOOK_ANNOTATION
  const policy = options.unrecognizedPolicy ?? 'ignore'

  const header = parseHeader(manifest)
  const raw = header.metadata?.annotations?.[annotationKey]

  const phases = new Set<PhaseIdentifier>()
  const unrecognized: string[] = []

  if (raw === undefined || raw === null) {
    return { phases, unrecognized }
  }
  if (typeof raw !== 'string') {
    throw new ManifestParseError(
      `Annotation "${annotationKey}" must be a string, got ${typeof raw}`,
      { source: manifest.source, annotationKey }
    )
  }

  for (const entry of raw.split(',')) {
    const value = entry.trim()
    if (value === '') continue
    if (isPhaseIdentifier(value)) {
      phases.add(value)
      continue
    }
    if (policy === 'reject') {
      throw new UnrecognizedPhaseError(value, {
        annotationKey,
        source: manifest.source,
        manifest: describeManifest(manifest),
      })
    }
    unrecognized.push(value)
  }

  return { phases, unrecognized }
}

// ---------------------------------------------------------------------------
// serializePhases
// ---------------------------------------------------------------------------

/**
 * Render a phase set as an annotation value, in canonical phase order.
 * `extractPhases` on the result yields the same set.
 */
export function serializePhases(phases: Iterable<PhaseIdentifier>): string {
  const wanted = new Set(phases)
  return PHASE_IDENTIFIERS.filter((phase) => wanted.has(phase)).join(',')
}
