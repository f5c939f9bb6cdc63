/**
 * Git Adapter Factory
 *
 * Provides a centralized way to create and access Git adapter instances.
 */

import { log } from '../../../shared/logger'
import type { GitAdapter } from './interface'
import { SimpleGitAdapter } from './SimpleGitAdapter'

/**
 * Configuration for adapter creation
 */
export interface GitAdapterConfig {
  /**
   * Whether to log adapter creation
   */
  verbose?: boolean
}

/**
 * Singleton adapter instance
 * Cached to avoid recreating adapters on every operation
 */
let cachedAdapter: GitAdapter | null = null

/**
 * Create a Git adapter instance
 */
export function createGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  if (config.verbose) {
    log.debug('[GitAdapter] Creating adapter: simple-git')
  }

  return new SimpleGitAdapter()
}

/**
 * Get the singleton Git adapter instance
 *
 * @param config - Optional configuration (only used on first call)
 */
export function getGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  if (cachedAdapter) {
    return cachedAdapter
  }

  cachedAdapter = createGitAdapter(config)
  return cachedAdapter
}

/**
 * Reset the cached adapter instance
 *
 * Useful for testing or when switching adapters at runtime
 */
export function resetGitAdapter(): void {
  cachedAdapter = null
}
