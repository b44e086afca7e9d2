/**
 * @structmerge/core
 *
 * AST-aware three-way merge engine for TypeScript sources:
 *
 * - Unit extraction over an injected ast-grep parser
 * - Three-way classification and reconciliation (with first-parameter
 *   rename reconciliation)
 * - Import unification and splicing
 * - Conflict reporting
 * - Repository-wide merge over an injected git reader
 */

export * from './merge/index.js';
export * from './repository/index.js';
export type { Logger } from './logger.js';
