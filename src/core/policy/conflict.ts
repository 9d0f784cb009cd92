/**
 * Conflict resolution policies: what happens when the class already has a
 * method with the target name.
 */
import type { ClassHandle, CodeHost, MethodHandle } from '../host/types.js';
import type { InsertionPolicy } from './insertion.js';

export const CONFLICT_POLICY_NAMES = ['replace', 'duplicate', 'cancel'] as const;

export type ConflictPolicyName = (typeof CONFLICT_POLICY_NAMES)[number];

export interface PlacementContext {
  readonly cls: ClassHandle;
  readonly existing: MethodHandle;
  /** Detached method to place. */
  readonly created: MethodHandle;
  readonly host: CodeHost;
  readonly insertion: InsertionPolicy;
}

interface PlacingPolicy<N extends ConflictPolicyName> {
  readonly name: N;
  readonly label: string;
  /** Place the new method; returns the attached node. */
  place(context: PlacementContext): MethodHandle;
}

export type ReplacePolicy = PlacingPolicy<'replace'>;
export type DuplicatePolicy = PlacingPolicy<'duplicate'>;

/**
 * Aborts the whole operation. Checked before any edit, so it has nothing
 * to place.
 */
export interface CancelPolicy {
  readonly name: 'cancel';
  readonly label: string;
}

export type ConflictResolutionPolicy = ReplacePolicy | DuplicatePolicy | CancelPolicy;

const replace: ReplacePolicy = {
  name: 'replace',
  label: 'Replace existing',
  place({ existing, created, host }) {
    return host.replace(existing, created);
  },
};

const duplicate: DuplicatePolicy = {
  name: 'duplicate',
  label: 'Duplicate',
  place({ cls, created, host, insertion }) {
    return insertion.insert(cls, created, host);
  },
};

const cancel: CancelPolicy = {
  name: 'cancel',
  label: 'Cancel',
};

export const CONFLICT_POLICIES: Record<ConflictPolicyName, ConflictResolutionPolicy> = {
  replace,
  duplicate,
  cancel,
};

export function isConflictPolicyName(value: string): value is ConflictPolicyName {
  return CONFLICT_POLICY_NAMES.some((name) => name === value);
}
