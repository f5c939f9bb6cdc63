/**
 * In-memory collaborators for BootstrapOperation tests.
 *
 * Each fake keeps just enough state to answer the workflow's queries
 * consistently across repeated runs, and records the mutations it applied.
 */

import type { GitAdapter } from '../../adapters/git'
import type { CommitOptions, PushOptions, Remote } from '../../adapters/git/types'
import type { CreateRepoRequest, GitForgeAdapter } from '../../../shared/types/git-forge'
import { ForgeError, GitError } from '../../shared/errors'
import type { Prompter } from '../../utils/prompter'

export type GitMutation = 'init' | 'add' | 'commit' | 'addRemote' | 'renameBranch' | 'push'

export type FakeGitState = {
  available?: boolean
  repository?: boolean
  /** Branch that init checks out, and the current branch of an existing repository */
  branch?: string | null
  branches?: string[]
  commits?: number
  remotes?: Remote[]
  failOn?: GitMutation | 'addSafeDirectory'
}

export class FakeGit implements GitAdapter {
  readonly name = 'fake-git'

  available: boolean
  repository: boolean
  branch: string | null
  branches: Set<string>
  commits: number
  remotes: Remote[]
  failOn: FakeGitState['failOn']

  /** Working tree differs from HEAD; cleared by commit */
  dirty = true
  staged = false

  mutations: GitMutation[] = []
  pushed: PushOptions[] = []
  safeDirectories: string[] = []

  constructor(state: FakeGitState = {}) {
    this.available = state.available ?? true
    this.repository = state.repository ?? false
    this.branch = state.branch === undefined ? 'master' : state.branch
    this.branches = new Set(state.branches ?? [])
    this.commits = state.commits ?? 0
    this.remotes = state.remotes ?? []
    this.failOn = state.failOn
  }

  private guard(operation: GitMutation | 'addSafeDirectory'): void {
    if (this.failOn === operation) {
      throw new GitError(`[FakeGit] ${operation} failed: simulated`, operation)
    }
  }

  async isAvailable(): Promise<boolean> {
    return this.available
  }

  async addSafeDirectory(dir: string): Promise<void> {
    this.guard('addSafeDirectory')
    this.safeDirectories.push(dir)
  }

  async isRepositoryRoot(): Promise<boolean> {
    return this.repository
  }

  async hasCommits(): Promise<boolean> {
    return this.commits > 0
  }

  async hasStagedChanges(): Promise<boolean> {
    return this.staged
  }

  async currentBranch(): Promise<string | null> {
    return this.branch
  }

  async branchExists(_dir: string, ref: string): Promise<boolean> {
    return this.branches.has(ref)
  }

  async listRemotes(): Promise<Remote[]> {
    return [...this.remotes]
  }

  async init(): Promise<void> {
    this.guard('init')
    this.repository = true
    this.mutations.push('init')
  }

  async add(): Promise<void> {
    this.guard('add')
    this.staged = this.dirty
    this.mutations.push('add')
  }

  async commit(_dir: string, _options: CommitOptions): Promise<string> {
    this.guard('commit')
    if (!this.staged) {
      throw new GitError('[FakeGit] commit failed: nothing to commit', 'commit')
    }
    this.commits += 1
    this.staged = false
    this.dirty = false
    if (this.branch) this.branches.add(this.branch)
    this.mutations.push('commit')
    return `${this.commits}`.padStart(40, '0')
  }

  async renameBranch(_dir: string, oldRef: string, newRef: string): Promise<void> {
    this.guard('renameBranch')
    this.branches.delete(oldRef)
    this.branches.add(newRef)
    if (this.branch === oldRef) this.branch = newRef
    this.mutations.push('renameBranch')
  }

  async addRemote(_dir: string, name: string, url: string): Promise<void> {
    this.guard('addRemote')
    this.remotes.push({ name, url })
    this.mutations.push('addRemote')
  }

  async push(_dir: string, options: PushOptions): Promise<void> {
    this.guard('push')
    this.pushed.push(options)
    this.mutations.push('push')
  }

  /** Forget recorded calls while keeping repository state */
  clearRecords(): void {
    this.mutations = []
    this.pushed = []
    this.safeDirectories = []
  }
}

export type FakeForgeState = {
  available?: boolean
  authenticated?: boolean
  /** Whether running the login flow authenticates the session */
  loginSucceeds?: boolean
  user?: string
  repos?: string[]
  defaultBranch?: string | null | Error
  failCreate?: boolean
}

export class FakeForge implements GitForgeAdapter {
  readonly name = 'fake-forge'

  available: boolean
  authenticated: boolean
  loginSucceeds: boolean
  user: string
  repos: Set<string>
  defaultBranch: string | null | Error
  failCreate: boolean

  queried: string[] = []
  created: CreateRepoRequest[] = []
  loginCalls = 0

  constructor(state: FakeForgeState = {}) {
    this.available = state.available ?? true
    this.authenticated = state.authenticated ?? true
    this.loginSucceeds = state.loginSucceeds ?? true
    this.user = state.user ?? 'test-owner'
    this.repos = new Set(state.repos ?? [])
    this.defaultBranch = state.defaultBranch === undefined ? 'main' : state.defaultBranch
    this.failCreate = state.failCreate ?? false
  }

  async isAvailable(): Promise<boolean> {
    this.queried.push('isAvailable')
    return this.available
  }

  async isAuthenticated(): Promise<boolean> {
    this.queried.push('isAuthenticated')
    return this.authenticated
  }

  async login(): Promise<boolean> {
    this.loginCalls += 1
    if (this.loginSucceeds) this.authenticated = true
    return this.loginSucceeds
  }

  async getAuthenticatedUser(): Promise<string> {
    this.queried.push('getAuthenticatedUser')
    return this.user
  }

  async repoExists(owner: string, name: string): Promise<boolean> {
    this.queried.push('repoExists')
    return this.repos.has(`${owner}/${name}`)
  }

  async createRepo(request: CreateRepoRequest): Promise<void> {
    if (this.failCreate) {
      throw new ForgeError('gh repo create failed: simulated', 'create-repo', 1)
    }
    this.repos.add(`${request.owner}/${request.name}`)
    this.created.push(request)
  }

  async getDefaultBranch(): Promise<string | null> {
    this.queried.push('getDefaultBranch')
    if (this.defaultBranch instanceof Error) throw this.defaultBranch
    return this.defaultBranch
  }

  clearRecords(): void {
    this.queried = []
    this.created = []
    this.loginCalls = 0
  }
}

/**
 * Answers prompts from a script. An unscripted prompt fails the test.
 */
export class ScriptedPrompter implements Prompter {
  questions: string[] = []

  constructor(
    private readonly confirmations: boolean[] = [],
    private readonly selections: string[] = []
  ) {}

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question)
    const answer = this.confirmations.shift()
    if (answer === undefined) throw new Error(`Unexpected confirm: ${question}`)
    return answer
  }

  async promptString(question: string, defaultValue: string): Promise<string> {
    this.questions.push(question)
    return defaultValue
  }

  async select<T extends string>(question: string, choices: readonly T[], defaultValue: T): Promise<T> {
    this.questions.push(question)
    const answer = this.selections.shift()
    if (answer === undefined) throw new Error(`Unexpected select: ${question}`)
    return choices.find((choice) => choice === answer) ?? defaultValue
  }
}
