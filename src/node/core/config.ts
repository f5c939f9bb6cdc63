import dotenv from 'dotenv'
import path from 'path'
import { isLogLevel, type LogLevel } from '../../shared/logger'
import { isRepoVisibility, type RepoVisibility } from '../../shared/types/bootstrap'
import { ValidationError } from '../shared/errors'

export type Configuration = {
  repoPath: string
  logLevel: LogLevel
  /** Skips the visibility prompt when set */
  visibility?: RepoVisibility
  markSafeDirectory: boolean
  excludedEntries: string[]
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on'])
const FALSY = new Set(['0', 'false', 'no', 'off', ''])

function parseFlag(name: string, value: string | undefined): boolean {
  const normalized = (value ?? '').trim().toLowerCase()
  if (TRUTHY.has(normalized)) return true
  if (FALSY.has(normalized)) return false
  throw new ValidationError(`${name} must be true or false, got "${value}"`, name)
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
}

/**
 * Load a `.env` from the current directory into process.env.
 * Variables already set in the environment win.
 */
export function loadEnvironment(): void {
  dotenv.config()
}

export function loadConfiguration(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Configuration {
  const repoPath = path.resolve(cwd, env.REPO_PATH || '.')

  const logLevel = (env.LOG_LEVEL || 'info').trim().toLowerCase()
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(
      `LOG_LEVEL must be one of debug, info, warn, error, got "${env.LOG_LEVEL}"`,
      'LOG_LEVEL'
    )
  }

  const rawVisibility = env.REPO_BOOTSTRAP_VISIBILITY?.trim().toLowerCase()
  let visibility: RepoVisibility | undefined
  if (rawVisibility) {
    if (!isRepoVisibility(rawVisibility)) {
      throw new ValidationError(
        `REPO_BOOTSTRAP_VISIBILITY must be public or private, got "${env.REPO_BOOTSTRAP_VISIBILITY}"`,
        'REPO_BOOTSTRAP_VISIBILITY'
      )
    }
    visibility = rawVisibility
  }

  return {
    repoPath,
    logLevel,
    visibility,
    markSafeDirectory: parseFlag(
      'REPO_BOOTSTRAP_SAFE_DIRECTORY',
      env.REPO_BOOTSTRAP_SAFE_DIRECTORY
    ),
    excludedEntries: parseList(env.REPO_BOOTSTRAP_EXCLUDE)
  }
}
