/**
 * Thin wrapper over child_process for running external CLIs.
 *
 * A non-zero exit is reported through `exitCode`, never thrown; callers
 * decide what a failure means. Only a missing binary or a timeout rejects.
 */

import { execFile, spawn } from 'child_process'
import { CommandNotFoundError, TimeoutError } from '../shared/errors'

export type ExecResult = {
  stdout: string
  stderr: string
  exitCode: number
}

export type ExecOptions = {
  cwd?: string
  env?: NodeJS.ProcessEnv
  timeoutMs?: number
  /**
   * Inherit the terminal's stdio so the command can prompt the user.
   * Output is not captured in this mode.
   */
  interactive?: boolean
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>

function isMissingBinary(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}

function runInteractive(command: string, args: string[], options: ExecOptions): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: 'inherit'
    })

    child.on('error', (error) => {
      reject(isMissingBinary(error) ? new CommandNotFoundError(command, error) : error)
    })

    child.on('close', (code) => {
      resolve({ stdout: '', stderr: '', exitCode: code ?? 1 })
    })
  })
}

function runCaptured(command: string, args: string[], options: ExecOptions): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        env: options.env ?? process.env,
        timeout: options.timeoutMs,
        maxBuffer: 10 * 1024 * 1024 // 10MB buffer
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 })
          return
        }

        if (isMissingBinary(error)) {
          reject(new CommandNotFoundError(command, error))
          return
        }

        if (error.killed && options.timeoutMs !== undefined) {
          reject(
            new TimeoutError(
              `${command} ${args.join(' ')} timed out after ${options.timeoutMs}ms`,
              options.timeoutMs
            )
          )
          return
        }

        resolve({
          stdout,
          stderr,
          exitCode: typeof error.code === 'number' ? error.code : 1
        })
      }
    )
  })
}

export const runCommand: CommandRunner = (command, args, options = {}) =>
  options.interactive
    ? runInteractive(command, args, options)
    : runCaptured(command, args, options)
