/**
 * Unit tests for annotation-extractor.ts
 */

import { ManifestParseError, UnrecognizedPhaseError } from '../../../core/errors.js'
import type { RenderedManifest } from '../../../core/types.js'
import { describeManifest, extractPhases, serializePhases } from '../annotation-extractor.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function manifest(annotations?: Record<string, unknown>, kind = 'Job', name = 'migrate'): RenderedManifest {
  return {
    source: 'templates/job.yaml',
    document: {
      apiVersion: 'batch/v1',
      kind,
      metadata: { name, ...(annotations !== undefined ? { annotations } : {}) },
    },
  }
}

const hook = (value: unknown): RenderedManifest => manifest({ 'hookstage.dev/hook': value })

// ---------------------------------------------------------------------------
// extractPhases
// ---------------------------------------------------------------------------

describe('extractPhases', () => {
  it('returns the empty set when the annotation is absent', () => {
    const result = extractPhases(manifest())
    expect(result.phases.size).toBe(0)
    expect(result.unrecognized).toEqual([])
  })

  it('returns the empty set when metadata has no annotations', () => {
    expect(extractPhases(manifest({ 'other.io/x': 'y' })).phases.size).toBe(0)
  })

  it('returns the empty set for an empty annotation value', () => {
    expect(extractPhases(hook('')).phases.size).toBe(0)
  })

  it('reads a single phase', () => {
    expect([...extractPhases(hook('pre-install')).phases]).toEqual(['pre-install'])
  })

  it('reads a comma-separated list, trimming whitespace and skipping empty entries', () => {
    const result = extractPhases(hook(' pre-install , ,post-upgrade,'))
    expect([...result.phases]).toEqual(['pre-install', 'post-upgrade'])
    expect(result.unrecognized).toEqual([])
  })

  it('collapses duplicate entries', () => {
    expect(extractPhases(hook('pre-delete,pre-delete')).phases.size).toBe(1)
  })

  it('matches phase names case-sensitively', () => {
    const result = extractPhases(hook('Pre-Install'))
    expect(result.phases.size).toBe(0)
    expect(result.unrecognized).toEqual(['Pre-Install'])
  })

  it('reads a custom annotation key', () => {
    const m = manifest({ 'example.com/phases': 'post-rollback' })
    expect([...extractPhases(m, { annotationKey: 'example.com/phases' }).phases]).toEqual([
      'post-rollback',
    ])
    expect(extractPhases(m).phases.size).toBe(0)
  })

  it('throws ManifestParseError when the annotation is not a string', () => {
    expect(() => extractPhases(hook(42))).toThrow(ManifestParseError)
  })

  it('throws ManifestParseError when annotations is not a mapping', () => {
    const m: RenderedManifest = {
      document: { kind: 'Job', metadata: { name: 'x', annotations: ['pre-install'] } },
    }
    expect(() => extractPhases(m)).toThrow(ManifestParseError)
  })

  // -------------------------------------------------------------------------
  // Unrecognized-phase policy
  // -------------------------------------------------------------------------

  describe("'ignore' policy (default)", () => {
    it('keeps valid entries and reports unknown ones', () => {
      const result = extractPhases(hook('pre-install,pre-instal,post-install,mid-install'))
      expect([...result.phases]).toEqual(['pre-install', 'post-install'])
      expect(result.unrecognized).toEqual(['pre-instal', 'mid-install'])
    })

    it('yields the empty set when every entry is unknown', () => {
      const result = extractPhases(hook('before-install'), { unrecognizedPolicy: 'ignore' })
      expect(result.phases.size).toBe(0)
      expect(result.unrecognized).toEqual(['before-install'])
    })

    it('accepts a fully valid annotation', () => {
      const result = extractPhases(hook('pre-upgrade,post-upgrade'), { unrecognizedPolicy: 'ignore' })
      expect([...result.phases]).toEqual(['pre-upgrade', 'post-upgrade'])
      expect(result.unrecognized).toEqual([])
    })
  })

  describe("'reject' policy", () => {
    it('throws UnrecognizedPhaseError naming the value', () => {
      expect(() =>
        extractPhases(hook('pre-install,mid-install'), { unrecognizedPolicy: 'reject' })
      ).toThrow('Unrecognized hook phase: "mid-install"')
    })

    it('records the manifest identity in the error context', () => {
      let caught: unknown
      try {
        extractPhases(hook('sometime'), { unrecognizedPolicy: 'reject' })
      } catch (err) {
        caught = err
      }
      expect(caught).toBeInstanceOf(UnrecognizedPhaseError)
      expect(caught).toMatchObject({
        code: 'UNRECOGNIZED_PHASE',
        context: {
          value: 'sometime',
          annotationKey: 'hookstage.dev/hook',
          source: 'templates/job.yaml',
          manifest: { kind: 'Job', name: 'migrate' },
        },
      })
    })

    it('accepts a fully valid annotation', () => {
      const result = extractPhases(hook('pre-delete,post-delete'), { unrecognizedPolicy: 'reject' })
      expect([...result.phases]).toEqual(['pre-delete', 'post-delete'])
    })
  })
})

// ---------------------------------------------------------------------------
// serializePhases
// ---------------------------------------------------------------------------

describe('serializePhases', () => {
  it('joins phases in canonical order', () => {
    expect(serializePhases(['post-rollback', 'pre-install', 'post-install'])).toBe(
      'pre-install,post-install,post-rollback'
    )
  })

  it('returns an empty string for the empty set', () => {
    expect(serializePhases([])).toBe('')
  })

  it('round-trips through extractPhases', () => {
    const phases = new Set(['pre-upgrade', 'post-delete', 'pre-install'] as const)
    const extracted = extractPhases(hook(serializePhases(phases))).phases
    expect(extracted).toEqual(new Set(phases))
  })
})

// ---------------------------------------------------------------------------
// describeManifest
// ---------------------------------------------------------------------------

describe('describeManifest', () => {
  it('reads kind, name and namespace', () => {
    const m: RenderedManifest = {
      document: { kind: 'ConfigMap', metadata: { name: 'settings', namespace: 'apps' } },
    }
    expect(describeManifest(m)).toEqual({ kind: 'ConfigMap', name: 'settings', namespace: 'apps' })
  })

  it('omits namespace when unset', () => {
    expect(describeManifest(manifest())).toEqual({ kind: 'Job', name: 'migrate' })
  })

  it('falls back to generateName, then to an empty name', () => {
    expect(describeManifest({ document: { kind: 'Job', metadata: { generateName: 'seed-' } } })).toEqual({
      kind: 'Job',
      name: 'seed-',
    })
    expect(describeManifest({ document: { kind: 'Job' } })).toEqual({ kind: 'Job', name: '' })
  })

  it('reports a missing kind as Unknown', () => {
    expect(describeManifest({ document: { metadata: { name: 'x' } } })).toEqual({
      kind: 'Unknown',
      name: 'x',
    })
  })

  it('throws ManifestParseError for a non-string kind', () => {
    expect(() => describeManifest({ source: 'bad.yaml', document: { kind: 7 } })).toThrow(
      ManifestParseError
    )
  })
})
