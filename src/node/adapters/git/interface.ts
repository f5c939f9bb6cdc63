/**
 * Git Adapter Interface
 *
 * Defines the Git operations the bootstrap workflow depends on, independent
 * of the backend that runs them. The workflow only ever talks to this
 * interface, so tests can substitute an in-memory implementation.
 */

import type { CommitOptions, PushOptions, Remote } from './types'

/**
 * Main Git adapter interface
 *
 * Mutations throw GitError on failure. Queries that can only answer yes/no
 * return false instead of throwing.
 */
export interface GitAdapter {
  /**
   * Get the adapter name for logging/debugging
   */
  readonly name: string

  // ============================================================================
  // Environment
  // ============================================================================

  /**
   * Whether the git executable can be invoked
   */
  isAvailable(): Promise<boolean>

  /**
   * Register a directory as a global safe.directory
   *
   * @param dir - Absolute directory path
   */
  addSafeDirectory(dir: string): Promise<void>

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  /**
   * Whether `dir` is the root of a repository (holds the metadata directory
   * itself, not merely nested inside another repository)
   */
  isRepositoryRoot(dir: string): Promise<boolean>

  /**
   * Whether HEAD points at a commit
   */
  hasCommits(dir: string): Promise<boolean>

  /**
   * Whether the index holds changes relative to HEAD
   */
  hasStagedChanges(dir: string): Promise<boolean>

  /**
   * Get the current branch name
   *
   * @returns Branch name (also for an unborn branch) or null if detached HEAD
   */
  currentBranch(dir: string): Promise<string | null>

  /**
   * Whether a local branch exists
   */
  branchExists(dir: string, ref: string): Promise<boolean>

  /**
   * List all remotes configured in the repository
   */
  listRemotes(dir: string): Promise<Remote[]>

  // ============================================================================
  // Repository Mutation
  // ============================================================================

  /**
   * Create a repository in `dir`
   */
  init(dir: string): Promise<void>

  /**
   * Stage a file or files for commit
   *
   * @param filepath - Relative path to file(s) (or "." for all)
   */
  add(dir: string, filepath: string | string[]): Promise<void>

  /**
   * Create a commit with staged changes
   *
   * @returns SHA of the created commit
   */
  commit(dir: string, options: CommitOptions): Promise<string>

  /**
   * Rename a branch
   */
  renameBranch(dir: string, oldRef: string, newRef: string): Promise<void>

  addRemote(dir: string, name: string, url: string): Promise<void>

  // ============================================================================
  // Network Operations
  // ============================================================================

  /**
   * Push commits to a remote repository
   */
  push(dir: string, options: PushOptions): Promise<void>
}
