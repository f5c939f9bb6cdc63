/**
 * BootstrapOperation - Orchestrates first-time repository setup
 *
 * Turns a working directory into a repository with one commit, bound to a
 * GitHub remote of the same name, with its default branch pushed. Every step
 * checks for already-satisfied state first, so a run that failed midway can
 * simply be repeated once the cause is fixed. Nothing is rolled back.
 */

import { log } from '../../shared/logger'
import {
  REPO_VISIBILITIES,
  type BootstrapOptions,
  type BootstrapResult,
  type RepoState,
  type RepoVisibility
} from '../../shared/types/bootstrap'
import type { GitForgeAdapter } from '../../shared/types/git-forge'
import fs from 'fs'
import path from 'path'
import type { GitAdapter } from '../adapters/git'
import { GitignoreBuilder, ProjectNameValidator } from '../domain'
import {
  FALLBACK_DEFAULT_BRANCH,
  GIT_DIR,
  GITIGNORE_FILE,
  INITIAL_COMMIT_MESSAGE,
  ORIGIN_REMOTE,
  buildRemoteUrl
} from '../shared/constants'
import {
  BootstrapError,
  isBootstrapError,
  ValidationError,
  type BootstrapErrorKind
} from '../shared/errors'
import type { Prompter } from '../utils/prompter'

export type BootstrapDependencies = {
  git: GitAdapter
  forge: GitForgeAdapter
  prompter: Prompter
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class BootstrapOperation {
  constructor(private readonly deps: BootstrapDependencies) {}

  async run(options: BootstrapOptions): Promise<BootstrapResult> {
    const { repoPath, projectName } = options

    this.validateProjectName(projectName)
    await this.checkDependencies()
    await this.ensureAuthenticated()
    const owner = await this.resolveOwner()

    const entries = await this.listContent(repoPath, options.excludedEntries ?? [])
    await this.confirmContent(repoPath, entries)

    const createdRemote = await this.ensureRemoteRepo(owner, projectName, options.visibility)
    const initializedLocal = await this.ensureLocalRepo(repoPath)

    if (options.markSafeDirectory) {
      await this.attempt('LocalInitFailed', `Could not mark ${repoPath} as a safe directory`, () =>
        this.deps.git.addSafeDirectory(repoPath)
      )
      log.info(`[BootstrapOperation] Registered ${repoPath} as a safe directory`)
    }

    const gitignoreUpdated = await this.writeGitignore(repoPath, entries)

    await this.attempt('StageFailed', 'Failed to stage files', () =>
      this.deps.git.add(repoPath, '.')
    )
    log.info('[BootstrapOperation] Staged all files')

    const committed = await this.commit(repoPath)

    const remoteUrl = buildRemoteUrl(owner, projectName)
    const addedRemote = await this.ensureOrigin(repoPath, remoteUrl)

    const branch = await this.resolveDefaultBranch(owner, projectName)
    const renamedBranch = await this.alignBranch(repoPath, branch)

    await this.attempt('PushFailed', `Failed to push ${branch} to ${ORIGIN_REMOTE}`, () =>
      this.deps.git.push(repoPath, { remote: ORIGIN_REMOTE, ref: branch, setUpstream: true })
    )
    log.info(`[BootstrapOperation] Pushed ${branch} to ${remoteUrl}`)

    return {
      owner,
      projectName,
      remoteUrl,
      branch,
      createdRemote,
      initializedLocal,
      gitignoreUpdated,
      committed,
      addedRemote,
      renamedBranch
    }
  }

  // ============================================================================
  // Preconditions
  // ============================================================================

  private validateProjectName(projectName: string): void {
    try {
      ProjectNameValidator.assertValid(projectName)
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new BootstrapError(error.message, 'InvalidProjectName', error)
      }
      throw error
    }
  }

  private async checkDependencies(): Promise<void> {
    const { git, forge } = this.deps

    const gitAvailable = await this.attempt('DependencyMissing', 'Could not run git', () =>
      git.isAvailable()
    )
    if (!gitAvailable) {
      throw new BootstrapError('git is not installed or not on PATH', 'DependencyMissing')
    }

    const forgeAvailable = await this.attempt(
      'DependencyMissing',
      'Could not run the GitHub CLI',
      () => forge.isAvailable()
    )
    if (!forgeAvailable) {
      throw new BootstrapError(
        'GitHub CLI (gh) is not installed or not on PATH',
        'DependencyMissing'
      )
    }
  }

  private async ensureAuthenticated(): Promise<void> {
    const { forge } = this.deps
    const check = () =>
      this.attempt('AuthenticationFailed', 'Could not check GitHub CLI authentication', () =>
        forge.isAuthenticated()
      )

    if (await check()) {
      log.debug('[BootstrapOperation] GitHub CLI is authenticated')
      return
    }

    log.warn('[BootstrapOperation] GitHub CLI is not authenticated, starting login')
    const loggedIn = await this.attempt('AuthenticationFailed', 'GitHub login failed', () =>
      forge.login()
    )

    if (!loggedIn || !(await check())) {
      throw new BootstrapError(
        'GitHub CLI authentication failed. Run "gh auth login" and try again.',
        'AuthenticationFailed'
      )
    }
  }

  private async resolveOwner(): Promise<string> {
    const owner = (
      await this.attempt('IdentityUnresolved', 'Could not resolve the GitHub user', () =>
        this.deps.forge.getAuthenticatedUser()
      )
    ).trim()

    if (!owner) {
      throw new BootstrapError(
        'Could not resolve the authenticated GitHub user',
        'IdentityUnresolved'
      )
    }

    log.info(`[BootstrapOperation] Authenticated as ${owner}`)
    return owner
  }

  /**
   * Top-level entries that count as project content: everything except the
   * metadata directory and the configured exclusions.
   */
  private async listContent(repoPath: string, excluded: string[]): Promise<string[]> {
    let entries: string[]
    try {
      entries = await fs.promises.readdir(repoPath)
    } catch (error) {
      throw new BootstrapError(
        `Cannot read working directory ${repoPath}: ${reasonOf(error)}`,
        'LocalInitFailed',
        error
      )
    }

    return entries.filter((entry) => entry !== GIT_DIR && !excluded.includes(entry)).sort()
  }

  private async confirmContent(repoPath: string, entries: string[]): Promise<void> {
    if (entries.length > 0) {
      log.info(`[BootstrapOperation] Found ${entries.length} entries to commit in ${repoPath}`)
      return
    }

    const proceed = await this.deps.prompter.confirm(
      `No files found in ${repoPath}. Continue with an empty project?`,
      false
    )
    if (!proceed) {
      throw new BootstrapError('Cancelled: the working directory has no files', 'UserCancelled')
    }
  }

  // ============================================================================
  // Remote and local repositories
  // ============================================================================

  /**
   * @returns true when the remote repository was created by this run
   */
  private async ensureRemoteRepo(
    owner: string,
    projectName: string,
    visibility: RepoVisibility | undefined
  ): Promise<boolean> {
    const { forge, prompter } = this.deps
    const fullName = `${owner}/${projectName}`

    const exists = await this.attempt('RemoteCreateFailed', `Could not look up ${fullName}`, () =>
      forge.repoExists(owner, projectName)
    )
    const state: RepoState = exists ? 'exists' : 'absent'
    log.debug(`[BootstrapOperation] Remote ${fullName}: ${state}`)

    if (state === 'exists') {
      const proceed = await prompter.confirm(
        `Repository ${fullName} already exists on GitHub. Continue using it?`,
        false
      )
      if (!proceed) {
        throw new BootstrapError(`Cancelled: ${fullName} already exists`, 'UserCancelled')
      }
      return false
    }

    const chosen =
      visibility ??
      (await prompter.select(`Visibility for ${fullName}?`, REPO_VISIBILITIES, 'private'))

    await this.attempt('RemoteCreateFailed', `Failed to create ${fullName}`, () =>
      forge.createRepo({ owner, name: projectName, visibility: chosen })
    )
    log.info(`[BootstrapOperation] Created ${chosen} repository ${fullName}`)
    return true
  }

  /**
   * @returns true when the repository was initialized by this run
   */
  private async ensureLocalRepo(repoPath: string): Promise<boolean> {
    const { git } = this.deps
    const state: RepoState = (await git.isRepositoryRoot(repoPath)) ? 'exists' : 'absent'

    if (state === 'exists') {
      log.info(`[BootstrapOperation] ${repoPath} is already a repository`)
      return false
    }

    await this.attempt('LocalInitFailed', `Failed to initialize a repository in ${repoPath}`, () =>
      git.init(repoPath)
    )
    log.info(`[BootstrapOperation] Initialized repository in ${repoPath}`)
    return true
  }

  // ============================================================================
  // Content
  // ============================================================================

  private async writeGitignore(repoPath: string, entries: string[]): Promise<boolean> {
    const gitignorePath = path.join(repoPath, GITIGNORE_FILE)

    return this.attempt('IgnoreFileFailed', `Failed to update ${gitignorePath}`, async () => {
      let existing = ''
      try {
        existing = await fs.promises.readFile(gitignorePath, 'utf-8')
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
          throw error
        }
      }

      const result = GitignoreBuilder.build(existing, entries)
      if (!result.changed) {
        log.info(`[BootstrapOperation] ${GITIGNORE_FILE} already covers the detected patterns`)
        return false
      }

      await fs.promises.writeFile(gitignorePath, result.content, 'utf-8')
      log.info(`[BootstrapOperation] Added ${result.added.length} patterns to ${GITIGNORE_FILE}`)
      return true
    })
  }

  /**
   * @returns false when there was nothing new to commit on top of existing history
   */
  private async commit(repoPath: string): Promise<boolean> {
    const { git } = this.deps

    return this.attempt('CommitFailed', 'Failed to commit', async () => {
      if (!(await git.hasStagedChanges(repoPath)) && (await git.hasCommits(repoPath))) {
        log.info('[BootstrapOperation] Nothing new to commit, keeping existing history')
        return false
      }

      const sha = await git.commit(repoPath, { message: INITIAL_COMMIT_MESSAGE })
      log.info(`[BootstrapOperation] Committed ${sha.slice(0, 7)} "${INITIAL_COMMIT_MESSAGE}"`)
      return true
    })
  }

  // ============================================================================
  // Remote binding and branches
  // ============================================================================

  /**
   * @returns true when origin was registered by this run
   */
  private async ensureOrigin(repoPath: string, remoteUrl: string): Promise<boolean> {
    const { git } = this.deps

    const remotes = await this.attempt('RemoteAddFailed', 'Could not list remotes', () =>
      git.listRemotes(repoPath)
    )
    const origin = remotes.find((remote) => remote.name === ORIGIN_REMOTE)

    if (origin) {
      if (origin.url !== remoteUrl) {
        log.warn(
          `[BootstrapOperation] ${ORIGIN_REMOTE} points at ${origin.url}, not ${remoteUrl}; leaving it unchanged`
        )
      } else {
        log.info(`[BootstrapOperation] ${ORIGIN_REMOTE} already points at ${remoteUrl}`)
      }
      return false
    }

    await this.attempt('RemoteAddFailed', `Failed to add ${ORIGIN_REMOTE}`, () =>
      git.addRemote(repoPath, ORIGIN_REMOTE, remoteUrl)
    )
    log.info(`[BootstrapOperation] Added ${ORIGIN_REMOTE} -> ${remoteUrl}`)
    return true
  }

  private async resolveDefaultBranch(owner: string, projectName: string): Promise<string> {
    try {
      const branch = (await this.deps.forge.getDefaultBranch(owner, projectName))?.trim()
      if (branch) {
        log.debug(`[BootstrapOperation] Remote default branch: ${branch}`)
        return branch
      }
      log.info(
        `[BootstrapOperation] Remote reports no default branch, using ${FALLBACK_DEFAULT_BRANCH}`
      )
    } catch (error) {
      log.warn(
        `[BootstrapOperation] Could not read the default branch, using ${FALLBACK_DEFAULT_BRANCH}:`,
        error
      )
    }
    return FALLBACK_DEFAULT_BRANCH
  }

  /**
   * Rename the current branch to `target`. `branch -m` creates the target
   * name, so there is no separate create step.
   *
   * @returns true when a rename happened
   */
  private async alignBranch(repoPath: string, target: string): Promise<boolean> {
    const { git } = this.deps

    const failure = `Failed to rename the current branch to ${target}`
    return this.attempt('BranchRenameFailed', failure, async () => {
      const current = await git.currentBranch(repoPath)
      if (current === null) {
        throw new BootstrapError(
          'HEAD is detached; check out a branch and run again',
          'BranchRenameFailed'
        )
      }

      if (current === target) {
        log.info(`[BootstrapOperation] Already on ${target}`)
        return false
      }

      if (await git.branchExists(repoPath, target)) {
        throw new BootstrapError(
          `Cannot rename ${current} to ${target}: a local ${target} branch already exists`,
          'BranchRenameFailed'
        )
      }

      await git.renameBranch(repoPath, current, target)
      log.info(`[BootstrapOperation] Renamed ${current} to ${target}`)
      return true
    })
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  /**
   * Run one external step; any failure becomes a terminal BootstrapError of
   * `kind` with the original error as its cause.
   */
  private async attempt<T>(
    kind: BootstrapErrorKind,
    message: string,
    action: () => Promise<T>
  ): Promise<T> {
    try {
      return await action()
    } catch (error) {
      if (isBootstrapError(error)) {
        throw error
      }
      throw new BootstrapError(`${message}: ${reasonOf(error)}`, kind, error)
    }
  }
}
