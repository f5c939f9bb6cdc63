/**
 * Forge Adapter Module
 *
 * Provides adapters for interacting with git forges.
 *
 * Usage:
 * ```typescript
 * import { GhCliAdapter } from './adapters/forge'
 *
 * const forge = new GhCliAdapter()
 * const owner = await forge.getAuthenticatedUser()
 * const exists = await forge.repoExists(owner, 'my-project')
 * ```
 */

export type { CreateRepoRequest, GitForgeAdapter } from '../../../shared/types/git-forge'

// Adapter implementations
export { GhCliAdapter } from './github/GhCliAdapter'
