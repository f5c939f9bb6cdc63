/**
 * GitignoreBuilder - Pure domain logic for synthesizing `.gitignore` content.
 *
 * Sections are picked from the top-level entries of the working directory
 * (marker file names and file extensions) and merged into whatever the
 * existing ignore file already holds. Patterns already present are never
 * appended again, so merging is stable across repeated runs.
 */

import path from 'path'
import templates from './gitignore-templates.json'

export type GitignoreSection = {
  id: string
  title: string
  patterns: string[]
}

type GitignoreTemplate = GitignoreSection & {
  markers: string[]
  extensions: string[]
}

export type GitignoreMergeResult = {
  content: string
  /** False when every synthesized pattern was already present */
  changed: boolean
  /** Patterns appended by this merge, in output order */
  added: string[]
}

const GENERIC_TEMPLATE: GitignoreTemplate = templates.generic
const ECOSYSTEM_TEMPLATES: GitignoreTemplate[] = templates.ecosystems

function toSection(template: GitignoreTemplate): GitignoreSection {
  return { id: template.id, title: template.title, patterns: [...template.patterns] }
}

function matches(template: GitignoreTemplate, entries: string[]): boolean {
  return entries.some(
    (entry) =>
      template.markers.includes(entry) ||
      template.extensions.includes(path.extname(entry).toLowerCase())
  )
}

export class GitignoreBuilder {
  private constructor() {}

  /**
   * Sections for a directory: the generic block, then every ecosystem whose
   * marker file or extension appears among `entries`, in template order.
   */
  public static detectSections(entries: string[]): GitignoreSection[] {
    return [
      toSection(GENERIC_TEMPLATE),
      ...ECOSYSTEM_TEMPLATES.filter((template) => matches(template, entries)).map(toSection)
    ]
  }

  public static merge(existing: string, sections: GitignoreSection[]): GitignoreMergeResult {
    const seen = new Set(
      existing
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter(Boolean)
    )
    const added: string[] = []
    const blocks: string[] = []

    for (const section of sections) {
      const fresh = section.patterns.filter((pattern) => {
        if (seen.has(pattern)) return false
        seen.add(pattern)
        return true
      })
      if (fresh.length === 0) continue

      added.push(...fresh)
      blocks.push(`# ${section.title}\n${fresh.map((pattern) => `${pattern}\n`).join('')}`)
    }

    if (blocks.length === 0) {
      return { content: existing, changed: false, added }
    }

    let prefix = existing
    if (prefix.length > 0) {
      if (!prefix.endsWith('\n')) prefix += '\n'
      prefix += '\n'
    }

    return { content: prefix + blocks.join('\n'), changed: true, added }
  }

  /**
   * Convenience: detect sections for `entries` and merge them into `existing`.
   */
  public static build(existing: string, entries: string[]): GitignoreMergeResult {
    return GitignoreBuilder.merge(existing, GitignoreBuilder.detectSections(entries))
  }
}
