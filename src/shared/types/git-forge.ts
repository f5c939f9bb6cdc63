import type { RepoVisibility } from './bootstrap'

export type CreateRepoRequest = {
  owner: string
  name: string
  visibility: RepoVisibility
}

/**
 * Hosted-repository operations the bootstrap workflow needs from a git forge.
 *
 * Query methods report absence through their return value; only mutations
 * (createRepo) throw when the forge rejects them.
 */
export interface GitForgeAdapter {
  readonly name: string

  /**
   * Whether the forge client can be invoked at all
   */
  isAvailable(): Promise<boolean>

  isAuthenticated(): Promise<boolean>

  /**
   * Run the forge's interactive login flow once.
   * @returns true when the login flow exited successfully
   */
  login(): Promise<boolean>

  /**
   * Login of the authenticated account, or an empty string when it cannot be resolved
   */
  getAuthenticatedUser(): Promise<string>

  repoExists(owner: string, name: string): Promise<boolean>

  createRepo(request: CreateRepoRequest): Promise<void>

  /**
   * Name of the repository's default branch, or null when the forge does not report one
   */
  getDefaultBranch(owner: string, name: string): Promise<string | null>
}
