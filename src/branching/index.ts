/**
 * Branching Module
 *
 * Sessions, thoughts, the branch forest and cross-references.
 */

export { SessionStore, type AddThoughtOptions } from './session-store.js';
export { BranchStore, type BranchStoreOptions, type CrossRefOptions } from './branch-store.js';
export {
  CROSS_REF_KINDS,
  type Session,
  type Thought,
  type Branch,
  type BranchState,
  type CreateBranchInput,
  type CrossRef,
  type CrossRefKind,
} from './types.js';
