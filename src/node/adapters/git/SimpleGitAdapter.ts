/**
 * Simple-Git Adapter
 *
 * Git adapter implementation using simple-git library.
 * This uses the native Git CLI under the hood, so the same git binary the
 * user works with owns the repository state.
 */

import { log } from '../../../shared/logger'
import simpleGit, { CheckRepoActions, type SimpleGit } from 'simple-git'
import { GitError } from '../../shared/errors'
import type { GitAdapter } from './interface'
import type { CommitOptions, PushOptions, Remote } from './types'

export class SimpleGitAdapter implements GitAdapter {
  readonly name = 'simple-git'

  private createGit(dir?: string): SimpleGit {
    return dir ? simpleGit(dir) : simpleGit()
  }

  // ============================================================================
  // Environment
  // ============================================================================

  async isAvailable(): Promise<boolean> {
    try {
      const version = await this.createGit().version()
      return version.installed
    } catch (error) {
      log.debug('[SimpleGitAdapter] git --version failed:', error)
      return false
    }
  }

  async addSafeDirectory(dir: string): Promise<void> {
    try {
      const git = this.createGit(dir)
      await git.raw(['config', '--global', '--add', 'safe.directory', dir])
    } catch (error) {
      throw this.createError('addSafeDirectory', error)
    }
  }

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  async isRepositoryRoot(dir: string): Promise<boolean> {
    try {
      const git = this.createGit(dir)
      return await git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT)
    } catch (error) {
      log.debug(`[SimpleGitAdapter] repository check failed for ${dir}:`, error)
      return false
    }
  }

  async hasCommits(dir: string): Promise<boolean> {
    try {
      const git = this.createGit(dir)
      // --quiet exits non-zero without stderr, which simple-git resolves
      // with empty output instead of rejecting
      const sha = await git.revparse(['--verify', '--quiet', 'HEAD'])
      return sha.length > 0
    } catch (error) {
      log.debug(`[SimpleGitAdapter] HEAD lookup failed for ${dir}:`, error)
      return false
    }
  }

  async hasStagedChanges(dir: string): Promise<boolean> {
    try {
      const git = this.createGit(dir)
      const output = await git.diff(['--cached', '--name-only'])
      return output.trim().length > 0
    } catch (error) {
      throw this.createError('hasStagedChanges', error)
    }
  }

  async currentBranch(dir: string): Promise<string | null> {
    try {
      const git = this.createGit(dir)
      // --show-current prints nothing for a detached HEAD and the branch name
      // for an unborn branch, unlike rev-parse --abbrev-ref
      const output = await git.raw(['branch', '--show-current'])
      return output.trim() || null
    } catch (error) {
      throw this.createError('currentBranch', error)
    }
  }

  async branchExists(dir: string, ref: string): Promise<boolean> {
    try {
      const git = this.createGit(dir)
      const output = await git.raw(['branch', '--list', ref])
      return output.trim().length > 0
    } catch (error) {
      throw this.createError('branchExists', error)
    }
  }

  async listRemotes(dir: string): Promise<Remote[]> {
    try {
      const git = this.createGit(dir)
      const remotes = await git.getRemotes(true)
      return remotes.map((r) => ({
        name: r.name,
        url: r.refs.fetch || r.refs.push || ''
      }))
    } catch (error) {
      throw this.createError('listRemotes', error)
    }
  }

  // ============================================================================
  // Repository Mutation
  // ============================================================================

  async init(dir: string): Promise<void> {
    try {
      const git = this.createGit(dir)
      await git.init()
    } catch (error) {
      throw this.createError('init', error)
    }
  }

  async add(dir: string, filepath: string | string[]): Promise<void> {
    try {
      const git = this.createGit(dir)
      await git.add(filepath)
    } catch (error) {
      throw this.createError('add', error)
    }
  }

  async commit(dir: string, options: CommitOptions): Promise<string> {
    let sha: string
    try {
      const result = await this.createGit(dir).commit(options.message)
      sha = result.commit
    } catch (error) {
      throw this.createError('commit', error)
    }

    // git exits non-zero with "nothing to commit" on stdout, which simple-git
    // reports as an empty commit result rather than an error
    if (!sha) {
      throw this.createError('commit', new Error('nothing to commit'))
    }
    return sha
  }

  async renameBranch(dir: string, oldRef: string, newRef: string): Promise<void> {
    try {
      const git = this.createGit(dir)
      await git.raw(['branch', '-m', oldRef, newRef])
    } catch (error) {
      throw this.createError('renameBranch', error)
    }
  }

  async addRemote(dir: string, name: string, url: string): Promise<void> {
    try {
      const git = this.createGit(dir)
      await git.addRemote(name, url)
    } catch (error) {
      throw this.createError('addRemote', error)
    }
  }

  // ============================================================================
  // Network Operations
  // ============================================================================

  async push(dir: string, options: PushOptions): Promise<void> {
    try {
      const git = this.createGit(dir)
      const args: string[] = [options.remote, options.ref]

      if (options.setUpstream) {
        args.push('--set-upstream')
      }

      await git.push(args)
    } catch (error) {
      throw this.createError('push', error)
    }
  }

  private createError(operation: string, originalError: unknown): GitError {
    const message = originalError instanceof Error ? originalError.message : String(originalError)
    return new GitError(`[SimpleGitAdapter] ${operation} failed: ${message}`, operation, originalError)
  }
}
