/**
 * Custom error classes for the backend.
 * Provides typed errors for different failure scenarios.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when a git operation fails.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

/**
 * Error thrown when a forge (GitHub) operation fails.
 */
export class ForgeError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly exitCode?: number,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'ForgeError'
  }
}

/**
 * Error thrown when a validation check fails.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message)
    this.name = 'TimeoutError'
  }
}

/**
 * Error thrown when an external executable is not on PATH.
 */
export class CommandNotFoundError extends AppError {
  constructor(
    public readonly command: string,
    cause?: unknown
  ) {
    super(`Command not found: ${command}`, cause)
    this.name = 'CommandNotFoundError'
  }
}

export type BootstrapErrorKind =
  | 'InvalidProjectName'
  | 'DependencyMissing'
  | 'AuthenticationFailed'
  | 'IdentityUnresolved'
  | 'UserCancelled'
  | 'RemoteCreateFailed'
  | 'LocalInitFailed'
  | 'IgnoreFileFailed'
  | 'StageFailed'
  | 'CommitFailed'
  | 'RemoteAddFailed'
  | 'BranchRenameFailed'
  | 'PushFailed'

/**
 * Error that ends a bootstrap run. Every kind is terminal.
 */
export class BootstrapError extends AppError {
  constructor(
    message: string,
    public readonly kind: BootstrapErrorKind,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'BootstrapError'
  }
}

export function isBootstrapError(error: unknown): error is BootstrapError {
  return error instanceof BootstrapError
}
