/**
 * Domain Layer - Pure business logic with no I/O dependencies.
 *
 * All classes in this module are pure - they contain only synchronous functions
 * that operate on data without side effects. Filesystem and process work
 * belongs to the operations layer.
 */

export { GitignoreBuilder } from './GitignoreBuilder'
export type { GitignoreMergeResult, GitignoreSection } from './GitignoreBuilder'
export { ProjectNameValidator } from './ProjectNameValidator'
