/**
 * Rendered manifest loader.
 *
 * Reads the output of the rendering engine from a directory tree and returns
 * one flattened manifest sequence. Sub-packages are nested directories (for
 * example `charts/<name>/`) and are included like any other directory.
 *
 * Discovery order is deterministic: within a directory, files sorted by name
 * come first, then subdirectories sorted by name, depth-first.
 */

import { readFile, readdir } from 'node:fs/promises'
import { extname, join } from 'node:path'
import yaml from 'js-yaml'
import { ManifestParseError } from '../../core/errors.js'
import type { RenderedManifest } from '../../core/types.js'
import { isPlainObject } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('manifest-loader')

/** File extensions treated as rendered manifests */
export const MANIFEST_EXTENSIONS: readonly string[] = ['.yaml', '.yml', '.json']

// ---------------------------------------------------------------------------
// parseManifestDocuments
// ---------------------------------------------------------------------------

/**
 * Parse every document in a (possibly multi-document) YAML or JSON string.
 * Empty documents are skipped.
 *
 * @param content - File content
 * @param source - Path recorded on each manifest and used in error messages
 * @throws {ManifestParseError} on syntax errors or a document that is not a mapping
 */
export function parseManifestDocuments(content: string, source?: string): RenderedManifest[] {
  let documents: unknown[]
  try {
    documents = yaml.loadAll(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ManifestParseError(
      `Failed to parse manifest${source !== undefined ? ` ${source}` : ''}: ${message}`,
      { source }
    )
  }

  const manifests: RenderedManifest[] = []
  for (const [index, document] of documents.entries()) {
    if (document === null || document === undefined) continue
    if (!isPlainObject(document)) {
      throw new ManifestParseError(
        `Document ${String(index)}${source !== undefined ? ` in ${source}` : ''} is not a mapping`,
        { source, index }
      )
    }
    manifests.push(source !== undefined ? { source, document } : { document })
  }
  return manifests
}

// ---------------------------------------------------------------------------
// loadRenderedManifests
// ---------------------------------------------------------------------------

async function collectFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  const byName = (a: { name: string }, b: { name: string }): number =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0

  const files = entries
    .filter((e) => e.isFile() && MANIFEST_EXTENSIONS.includes(extname(e.name).toLowerCase()))
    .sort(byName)
    .map((e) => join(dir, e.name))

  const subdirs = entries.filter((e) => e.isDirectory()).sort(byName)
  for (const subdir of subdirs) {
    files.push(...(await collectFiles(join(dir, subdir.name))))
  }
  return files
}

/**
 * Load every rendered manifest under `dir`, flattened into one sequence.
 *
 * @throws {ManifestParseError} when a file cannot be parsed
 */
export async function loadRenderedManifests(dir: string): Promise<RenderedManifest[]> {
  const files = await collectFiles(dir)
  const manifests: RenderedManifest[] = []

  for (const file of files) {
    const content = await readFile(file, 'utf-8')
    manifests.push(...parseManifestDocuments(content, file))
  }

  logger.debug({ dir, files: files.length, manifests: manifests.length }, 'Loaded rendered manifests')
  return manifests
}
