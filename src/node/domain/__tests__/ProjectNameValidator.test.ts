import { describe, expect, it } from 'vitest'
import { ValidationError } from '../../shared/errors'
import { ProjectNameValidator } from '../ProjectNameValidator'

describe('ProjectNameValidator', () => {
  describe('validate', () => {
    it.each(['my-project', 'ab', 'repo.js', 'Under_score9', '0x1', 'a.b-c_d'])(
      'accepts %s',
      (name) => {
        expect(ProjectNameValidator.validate(name)).toEqual({ valid: true })
      }
    )

    it('rejects an empty name', () => {
      expect(ProjectNameValidator.validate('')).toEqual({
        valid: false,
        error: 'Project name is required'
      })
    })

    it('rejects single-character names', () => {
      expect(ProjectNameValidator.validate('a')).toEqual({
        valid: false,
        error: 'Project name must be at least 2 characters long'
      })
    })

    it('rejects names containing ".."', () => {
      expect(ProjectNameValidator.validate('my..project')).toEqual({
        valid: false,
        error: 'Project name cannot contain ".."'
      })
    })

    it('rejects names ending with "."', () => {
      expect(ProjectNameValidator.validate('project.')).toEqual({
        valid: false,
        error: 'Project name cannot end with "."'
      })
    })

    it.each(['-project', 'project-', '_project', 'my project', 'proj/ect', 'naïve'])(
      'rejects %s',
      (name) => {
        const result = ProjectNameValidator.validate(name)
        expect(result.valid).toBe(false)
      }
    )
  })

  describe('assertValid', () => {
    it('throws a ValidationError naming the field', () => {
      let caught: unknown
      try {
        ProjectNameValidator.assertValid('bad name')
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(ValidationError)
      expect(caught).toMatchObject({ field: 'projectName' })
    })

    it('does not throw for valid names', () => {
      expect(() => ProjectNameValidator.assertValid('good-name')).not.toThrow()
    })
  })

  describe('defaultFor', () => {
    it('returns the base name of the directory', () => {
      expect(ProjectNameValidator.defaultFor('/home/user/work/my-app')).toBe('my-app')
    })

    it('ignores a trailing separator', () => {
      expect(ProjectNameValidator.defaultFor('/home/user/work/my-app/')).toBe('my-app')
    })
  })
})
