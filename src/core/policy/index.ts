/**
 * Policy exports barrel file.
 */
export {
  INSERTION_POLICIES,
  INSERTION_POLICY_NAMES,
  findAnchorNearCursor,
  isInsertionPolicyName,
} from './insertion.js';
export type { InsertionPolicy, InsertionPolicyName } from './insertion.js';
export { CONFLICT_POLICIES, CONFLICT_POLICY_NAMES, isConflictPolicyName } from './conflict.js';
export type {
  ConflictPolicyName,
  ConflictResolutionPolicy,
  ReplacePolicy,
  DuplicatePolicy,
  CancelPolicy,
  PlacementContext,
} from './conflict.js';
export {
  findMethodByName,
  findEqualsMethod,
  findHashCodeMethod,
  findMainMethod,
  matchesSignature,
} from './signature.js';
export type { SignatureMatcher } from './signature.js';
