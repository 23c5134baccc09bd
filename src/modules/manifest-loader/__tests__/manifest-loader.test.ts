/**
 * Unit tests for manifest-loader.ts
 */

import { mkdir, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { ManifestParseError } from '../../../core/errors.js'
import { loadRenderedManifests, parseManifestDocuments } from '../manifest-loader.js'

// ---------------------------------------------------------------------------
// parseManifestDocuments
// ---------------------------------------------------------------------------

describe('parseManifestDocuments', () => {
  it('parses every document of a multi-document stream', () => {
    const content = [
      'kind: ConfigMap',
      'metadata:',
      '  name: a',
      '---',
      'kind: Job',
      'metadata:',
      '  name: b',
    ].join('\n')

    const manifests = parseManifestDocuments(content, 'all.yaml')

    expect(manifests).toEqual([
      { source: 'all.yaml', document: { kind: 'ConfigMap', metadata: { name: 'a' } } },
      { source: 'all.yaml', document: { kind: 'Job', metadata: { name: 'b' } } },
    ])
  })

  it('skips empty documents', () => {
    const manifests = parseManifestDocuments('---\n---\nkind: Service\n---\n')
    expect(manifests).toEqual([{ document: { kind: 'Service' } }])
  })

  it('parses JSON content', () => {
    expect(parseManifestDocuments('{"kind": "Secret"}')).toEqual([{ document: { kind: 'Secret' } }])
  })

  it('throws ManifestParseError for a document that is not a mapping', () => {
    expect(() => parseManifestDocuments('- a\n- b\n', 'list.yaml')).toThrow(
      'Document 0 in list.yaml is not a mapping'
    )
  })

  it('throws ManifestParseError for invalid YAML', () => {
    expect(() => parseManifestDocuments('kind: [Job', 'broken.yaml')).toThrow(ManifestParseError)
  })
})

// ---------------------------------------------------------------------------
// loadRenderedManifests
// ---------------------------------------------------------------------------

describe('loadRenderedManifests', () => {
  let dir: string

  beforeEach(async () => {
    dir = join(tmpdir(), `hookstage-manifests-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
    await mkdir(join(dir, 'charts', 'db', 'templates'), { recursive: true })
    await mkdir(join(dir, 'templates'), { recursive: true })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  const named = (name: string): string => `kind: ConfigMap\nmetadata:\n  name: ${name}\n`

  it('reads files before subdirectories, each sorted by name', async () => {
    await writeFile(join(dir, 'z-root.yaml'), named('z-root'))
    await writeFile(join(dir, 'a-root.yml'), named('a-root'))
    await writeFile(join(dir, 'templates', 'web.yaml'), named('web'))
    await writeFile(join(dir, 'charts', 'db', 'templates', 'migrate.json'), '{"kind":"Job","metadata":{"name":"migrate"}}')

    const manifests = await loadRenderedManifests(dir)

    expect(manifests.map((m) => m.document['metadata'])).toEqual([
      { name: 'a-root' },
      { name: 'z-root' },
      { name: 'migrate' },
      { name: 'web' },
    ])
    expect(manifests[2]?.source).toBe(join(dir, 'charts', 'db', 'templates', 'migrate.json'))
  })

  it('ignores files with other extensions', async () => {
    await writeFile(join(dir, 'NOTES.txt'), 'Thank you for installing')
    await writeFile(join(dir, 'templates', 'svc.yaml'), named('svc'))

    const manifests = await loadRenderedManifests(dir)

    expect(manifests).toHaveLength(1)
  })

  it('returns an empty list for a directory without manifests', async () => {
    expect(await loadRenderedManifests(dir)).toEqual([])
  })

  it('names the failing file in parse errors', async () => {
    await writeFile(join(dir, 'templates', 'bad.yaml'), '- not\n- a mapping\n')

    await expect(loadRenderedManifests(dir)).rejects.toThrow(
      `Document 0 in ${join(dir, 'templates', 'bad.yaml')} is not a mapping`
    )
  })
})
