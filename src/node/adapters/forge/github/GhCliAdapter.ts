import { log } from '../../../../shared/logger'
import type { CreateRepoRequest, GitForgeAdapter } from '../../../../shared/types/git-forge'
import { CommandNotFoundError, ForgeError } from '../../../shared/errors'
import { GH_TIMEOUT_MS } from '../../../shared/constants'
import { runCommand, type CommandRunner, type ExecResult } from '../../../utils/exec'

/** gh environment variables to prevent interactive prompts */
const GH_ENV: Record<string, string> = {
  GH_PROMPT_DISABLED: '1',
  NO_COLOR: '1'
}

/**
 * GitHub forge adapter backed by the `gh` CLI.
 *
 * Authentication, identity and repository state all come from gh's own
 * session, so no token handling happens here.
 */
export class GhCliAdapter implements GitForgeAdapter {
  readonly name = 'gh-cli'

  constructor(
    private readonly run: CommandRunner = runCommand,
    private readonly timeoutMs: number = GH_TIMEOUT_MS
  ) {}

  /**
   * Execute a gh CLI command with timeout and prompt-free environment
   */
  private execGh(args: string[]): Promise<ExecResult> {
    log.debug(`[GhCliAdapter] gh ${args.join(' ')}`)
    return this.run('gh', args, {
      timeoutMs: this.timeoutMs,
      env: { ...process.env, ...GH_ENV }
    })
  }

  async isAvailable(): Promise<boolean> {
    try {
      const { exitCode } = await this.execGh(['--version'])
      return exitCode === 0
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        return false
      }
      throw error
    }
  }

  async isAuthenticated(): Promise<boolean> {
    // gh auth status returns non-zero exit code when not logged in
    const { exitCode } = await this.execGh(['auth', 'status'])
    return exitCode === 0
  }

  async login(): Promise<boolean> {
    log.debug('[GhCliAdapter] gh auth login')
    const { exitCode } = await this.run('gh', ['auth', 'login'], { interactive: true })
    return exitCode === 0
  }

  async getAuthenticatedUser(): Promise<string> {
    const { stdout, stderr, exitCode } = await this.execGh(['api', 'user', '--jq', '.login'])
    if (exitCode !== 0) {
      log.debug(`[GhCliAdapter] Failed to resolve authenticated user: ${stderr.trim()}`)
      return ''
    }
    return stdout.trim()
  }

  async repoExists(owner: string, name: string): Promise<boolean> {
    const { exitCode } = await this.execGh(['repo', 'view', `${owner}/${name}`, '--json', 'name'])
    return exitCode === 0
  }

  async createRepo(request: CreateRepoRequest): Promise<void> {
    const fullName = `${request.owner}/${request.name}`
    const { stderr, exitCode } = await this.execGh([
      'repo',
      'create',
      fullName,
      `--${request.visibility}`
    ])

    if (exitCode !== 0) {
      throw new ForgeError(
        `gh repo create ${fullName} failed: ${stderr.trim() || `exit code ${exitCode}`}`,
        'create-repo',
        exitCode
      )
    }
  }

  async getDefaultBranch(owner: string, name: string): Promise<string | null> {
    const { stdout, stderr, exitCode } = await this.execGh([
      'repo',
      'view',
      `${owner}/${name}`,
      '--json',
      'defaultBranchRef',
      '--jq',
      '.defaultBranchRef.name'
    ])

    if (exitCode !== 0) {
      log.debug(`[GhCliAdapter] Failed to read default branch: ${stderr.trim()}`)
      return null
    }
    return stdout.trim() || null
  }
}
