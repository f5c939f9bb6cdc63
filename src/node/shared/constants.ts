/**
 * Node-specific constants for the backend.
 */

/**
 * Branch used when the forge does not report a default branch.
 */
export const FALLBACK_DEFAULT_BRANCH = 'main'

/**
 * Remote name the bootstrap binds to the hosted repository.
 */
export const ORIGIN_REMOTE = 'origin'

export const INITIAL_COMMIT_MESSAGE = 'Initial commit'

export const GITHUB_HOST = 'github.com'

export const GITIGNORE_FILE = '.gitignore'

/**
 * Version-control metadata directory. Never counted as project content.
 */
export const GIT_DIR = '.git'

/** Default timeout for non-interactive gh commands */
export const GH_TIMEOUT_MS = 30_000

export function buildRemoteUrl(owner: string, name: string): string {
  return `https://${GITHUB_HOST}/${owner}/${name}.git`
}
