/**
 * Types shared by the bootstrap workflow, its adapters and the CLI.
 */

export type RepoVisibility = 'private' | 'public'

export const REPO_VISIBILITIES: readonly RepoVisibility[] = ['private', 'public']

export function isRepoVisibility(value: string): value is RepoVisibility {
  return value === 'private' || value === 'public'
}

/**
 * Whether a repository is present, as reported by the collaborator that owns it.
 * Queried on every run; never cached.
 */
export type RepoState = 'absent' | 'exists'

export type ProjectNameValidation = { valid: true } | { valid: false; error: string }

export type BootstrapOptions = {
  /** Working directory to turn into a repository */
  repoPath: string
  projectName: string
  /** Visibility for a newly created remote. Prompted for when omitted. */
  visibility?: RepoVisibility
  /** Register repoPath as a global git safe.directory before touching the index */
  markSafeDirectory?: boolean
  /** Top-level entries the content check ignores (in addition to `.git`) */
  excludedEntries?: string[]
}

export type BootstrapResult = {
  owner: string
  projectName: string
  remoteUrl: string
  /** Branch that was pushed */
  branch: string
  createdRemote: boolean
  initializedLocal: boolean
  gitignoreUpdated: boolean
  committed: boolean
  addedRemote: boolean
  renamedBranch: boolean
}
