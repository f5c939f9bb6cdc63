/**
 * Git Adapter Module
 *
 * Usage:
 * ```typescript
 * import { getGitAdapter } from './adapters/git'
 *
 * const git = getGitAdapter()
 * if (!(await git.isRepositoryRoot(repoPath))) await git.init(repoPath)
 * ```
 */

export { createGitAdapter, getGitAdapter, resetGitAdapter } from './factory'
export type { GitAdapterConfig } from './factory'

export type { GitAdapter } from './interface'

export type { CommitOptions, PushOptions, Remote } from './types'

// Adapter implementations (for testing)
export { SimpleGitAdapter } from './SimpleGitAdapter'
