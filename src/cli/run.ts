import path from 'path'
import { log, setLogLevel } from '../shared/logger'
import { GhCliAdapter } from '../node/adapters/forge'
import { getGitAdapter } from '../node/adapters/git'
import { loadConfiguration } from '../node/core/config'
import { ProjectNameValidator } from '../node/domain'
import { BootstrapOperation, type BootstrapDependencies } from '../node/operations/BootstrapOperation'
import { AppError, ValidationError } from '../node/shared/errors'
import { ConsolePrompter } from '../node/utils/prompter'

export const USAGE = `Usage: repo-bootstrap [project-name]

Creates {github-user}/{project-name} on GitHub (if missing), initializes a
local repository (if missing), writes .gitignore, commits everything and
pushes the default branch.

The project name defaults to the current directory's name. A script run
from directly inside the directory is not counted as project content.

Environment:
  REPO_PATH                      directory to bootstrap (default: cwd)
  REPO_BOOTSTRAP_VISIBILITY      public | private (skips the prompt)
  REPO_BOOTSTRAP_SAFE_DIRECTORY  true to add the directory to safe.directory
  REPO_BOOTSTRAP_EXCLUDE         comma-separated entries to ignore when checking for files
  LOG_LEVEL                      debug | info | warn | error (default: info)`

export type CliArgs = {
  help: boolean
  projectName?: string
}

export type CliOverrides = Partial<BootstrapDependencies> & {
  env?: NodeJS.ProcessEnv
  cwd?: string
  /** Path of the running script, excluded from the content check when directly inside the project */
  scriptPath?: string
  /** Answers for the console prompter when no prompter is given */
  stdin?: NodeJS.ReadableStream
}

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = []
  let help = false

  for (const arg of argv) {
    if (arg === '-h' || arg === '--help') {
      help = true
    } else if (arg.startsWith('-')) {
      throw new ValidationError(`Unknown option: ${arg}`, 'argv')
    } else {
      positional.push(arg)
    }
  }

  if (positional.length > 1) {
    throw new ValidationError(`Expected at most one project name, got ${positional.length}`, 'argv')
  }

  return { help, projectName: positional[0] }
}

/**
 * Entries of repoPath that belong to this tool rather than the project: only
 * a copy of the script placed at the top of the directory. An installed
 * binary lives elsewhere and is never excluded.
 */
function ownEntries(repoPath: string, scriptPath: string | undefined): string[] {
  if (!scriptPath) return []
  const resolved = path.resolve(scriptPath)
  return path.dirname(resolved) === repoPath ? [path.basename(resolved)] : []
}

/**
 * Run the CLI.
 *
 * @returns process exit code: 0 on success, 1 on any failure
 */
export async function run(argv: string[], overrides: CliOverrides = {}): Promise<number> {
  let consolePrompter: ConsolePrompter | undefined
  try {
    const args = parseArgs(argv)
    if (args.help) {
      console.log(USAGE)
      return 0
    }

    const config = loadConfiguration(overrides.env ?? process.env, overrides.cwd ?? process.cwd())
    setLogLevel(config.logLevel)

    const prompter = overrides.prompter ?? (consolePrompter = new ConsolePrompter(overrides.stdin))
    const git = overrides.git ?? getGitAdapter({ verbose: config.logLevel === 'debug' })
    const forge = overrides.forge ?? new GhCliAdapter()

    const projectName =
      args.projectName ??
      (await prompter.promptString(
        'Project name',
        ProjectNameValidator.defaultFor(config.repoPath)
      ))

    log.info(`Bootstrapping ${projectName} in ${config.repoPath}`)

    const operation = new BootstrapOperation({ git, forge, prompter })
    const result = await operation.run({
      repoPath: config.repoPath,
      projectName,
      visibility: config.visibility,
      markSafeDirectory: config.markSafeDirectory,
      excludedEntries: [
        ...config.excludedEntries,
        ...ownEntries(config.repoPath, overrides.scriptPath ?? process.argv[1])
      ]
    })

    log.info(`Done: ${result.branch} is pushed to ${result.remoteUrl}`)
    return 0
  } catch (error) {
    if (error instanceof AppError) {
      log.error(error.message)
    } else {
      log.error('Unexpected error:', error)
    }
    return 1
  } finally {
    consolePrompter?.close()
  }
}
