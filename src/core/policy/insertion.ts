/**
 * Insertion policies: where a new method lands in the class body when no
 * same-named method dictates its position.
 */
import type { ClassHandle, CodeHost, MethodHandle, SourceElement } from '../host/types.js';
import { findEqualsMethod, findHashCodeMethod, findMainMethod } from './signature.js';

export const INSERTION_POLICY_NAMES = ['at-caret', 'after-equals-hashcode', 'last'] as const;

export type InsertionPolicyName = (typeof INSERTION_POLICY_NAMES)[number];

export interface InsertionPolicy {
  readonly name: InsertionPolicyName;
  readonly label: string;
  /** Insert the detached method into the class and return the attached node. */
  insert(cls: ClassHandle, method: MethodHandle, host: CodeHost): MethodHandle;
}

function enclosingMethod(element: SourceElement): SourceElement | null {
  for (let current: SourceElement | null = element; current !== null; current = current.parent) {
    if (current.kind === 'method') return current;
  }
  return null;
}

/**
 * Walk up from the element under the cursor to the nearest element a method
 * can be inserted after. Only direct children of the target class qualify,
 * so a cursor in another class (or outside any class) yields null.
 */
export function findAnchorNearCursor(start: SourceElement | null, cls: ClassHandle): SourceElement | null {
  for (let element = start; element !== null; element = element.parent) {
    switch (element.kind) {
      case 'file':
        return null;
      case 'whitespace': {
        const method = enclosingMethod(element);
        if (method !== null && method.parent === cls) return method;
        if (element.parent === cls) return element;
        break;
      }
      case 'method':
      case 'field':
        if (element.parent === cls) return element;
        break;
      case 'class':
        // a nested class is a member of the target; the target itself is not an anchor
        if (element !== cls && element.parent === cls) return element;
        break;
      default:
        break;
    }
  }
  return null;
}

function beforeRightBrace(element: SourceElement | null, cls: ClassHandle): boolean {
  if (element === null) {
    return true;
  }
  return element.textOffset < cls.rBrace.textOffset;
}

const atCaret: InsertionPolicy = {
  name: 'at-caret',
  label: 'At caret',
  insert(cls, method, host) {
    const cursor = host.elementAtCursor?.() ?? null;
    const anchor = findAnchorNearCursor(cursor, cls);
    if (anchor !== null) {
      return host.insertAfter(anchor, method);
    }
    // cursor is outside the class body: fall back to the braces
    return beforeRightBrace(cursor, cls)
      ? host.insertAfter(cls.lBrace, method)
      : host.insertBefore(cls.rBrace, method);
  },
};

const afterEqualsHashCode: InsertionPolicy = {
  name: 'after-equals-hashcode',
  label: 'After equals/hashCode',
  insert(cls, method, host) {
    const equals = findEqualsMethod(cls);
    const hashCode = findHashCodeMethod(cls);

    let anchor: MethodHandle | null;
    if (equals !== null && hashCode !== null) {
      anchor = equals.textOffset > hashCode.textOffset ? equals : hashCode;
    } else {
      anchor = hashCode ?? equals;
    }

    if (anchor === null) {
      return atCaret.insert(cls, method, host);
    }
    return host.insertAfter(anchor, method);
  },
};

const last: InsertionPolicy = {
  name: 'last',
  label: 'Last',
  insert(cls, method, host) {
    const main = findMainMethod(cls);
    const methods = cls.methods;
    if (main !== null && methods[methods.length - 1] === main) {
      return host.insertBefore(main, method);
    }
    // never after the closing brace
    return host.insertBefore(cls.rBrace, method);
  },
};

export const INSERTION_POLICIES: Record<InsertionPolicyName, InsertionPolicy> = {
  'at-caret': atCaret,
  'after-equals-hashcode': afterEqualsHashCode,
  last,
};

export function isInsertionPolicyName(value: string): value is InsertionPolicyName {
  return INSERTION_POLICY_NAMES.some((name) => name === value);
}
