/**
 * Barrel exports for the manifest-loader module.
 */

export {
  loadRenderedManifests,
  parseManifestDocuments,
  MANIFEST_EXTENSIONS,
} from './manifest-loader.js'
