/**
 * ProjectNameValidator - Pure domain logic for repository name rules.
 *
 * A project name doubles as the hosted repository's name, so it has to be
 * accepted by the forge as-is.
 */

import path from 'path'
import type { ProjectNameValidation } from '../../shared/types/bootstrap'
import { ValidationError } from '../shared/errors'

const PROJECT_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9-._]*[a-zA-Z0-9]$/

export class ProjectNameValidator {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static validate(name: string): ProjectNameValidation {
    if (!name) {
      return { valid: false, error: 'Project name is required' }
    }

    if (name.length < 2) {
      return { valid: false, error: 'Project name must be at least 2 characters long' }
    }

    if (name.includes('..')) {
      return { valid: false, error: 'Project name cannot contain ".."' }
    }

    if (name.endsWith('.')) {
      return { valid: false, error: 'Project name cannot end with "."' }
    }

    if (!PROJECT_NAME_PATTERN.test(name)) {
      return {
        valid: false,
        error:
          'Project name may only contain letters, digits, "-", "." and "_", and must start and end with a letter or digit'
      }
    }

    return { valid: true }
  }

  /**
   * @throws ValidationError when the name is rejected
   */
  public static assertValid(name: string): void {
    const result = ProjectNameValidator.validate(name)
    if (!result.valid) {
      throw new ValidationError(`Invalid project name "${name}": ${result.error}`, 'projectName')
    }
  }

  /**
   * Default project name for a working directory: its base name.
   */
  public static defaultFor(dir: string): string {
    return path.basename(path.resolve(dir))
  }
}
