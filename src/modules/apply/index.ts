/**
 * Barrel exports for the apply module.
 */

export type { ApplyMechanism, ResourceHandle, SubmitResult } from './apply-mechanism.js'
export {
  KubectlApplyMechanism,
  createKubectlApplyMechanism,
  spawnKubectl,
  parseObservedState,
} from './kubectl-apply.js'
export type { KubectlApplyOptions, KubectlRunner, KubectlSpawnResult } from './kubectl-apply.js'
