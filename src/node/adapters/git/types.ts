/**
 * Git Adapter Types
 *
 * Type definitions for Git operations that are independent of the underlying
 * Git implementation.
 */

/**
 * Git remote information
 */
export type Remote = {
  name: string
  url: string
}

/**
 * Options for git commit operations
 */
export type CommitOptions = {
  message: string
}

/**
 * Options for git push operations
 */
export type PushOptions = {
  remote: string
  ref: string
  /**
   * Set upstream tracking
   */
  setUpstream?: boolean
}
