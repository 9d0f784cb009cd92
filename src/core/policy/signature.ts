/**
 * Method lookup by name and by exact signature.
 */
import type { ClassHandle, MethodHandle } from '../host/types.js';

export interface SignatureMatcher {
  readonly name: string;
  readonly isStatic: boolean;
  /** Exact canonical return type text. */
  readonly returnType: string;
  /** Exact canonical parameter type texts, in order. */
  readonly parameterTypes: readonly string[];
}

const EQUALS: SignatureMatcher = {
  name: 'equals',
  isStatic: false,
  returnType: 'boolean',
  parameterTypes: ['java.lang.Object'],
};

const HASH_CODE: SignatureMatcher = {
  name: 'hashCode',
  isStatic: false,
  returnType: 'int',
  parameterTypes: [],
};

const MAIN: SignatureMatcher = {
  name: 'main',
  isStatic: true,
  returnType: 'void',
  parameterTypes: ['java.lang.String[]'],
};

/** A variable-arity parameter has the array type: `String...` matches `String[]`. */
function parameterTypeText(canonicalText: string): string {
  return canonicalText.endsWith('...') ? `${canonicalText.slice(0, -3)}[]` : canonicalText;
}

/**
 * Public method with the given name, static-ness, return type and
 * parameter types. Overloads with other signatures do not match.
 */
export function matchesSignature(method: MethodHandle, matcher: SignatureMatcher): boolean {
  if (method.name !== matcher.name) return false;
  if (!method.hasModifier('public')) return false;
  if (method.hasModifier('static') !== matcher.isStatic) return false;
  if (method.returnType === null || method.returnType.canonicalText !== matcher.returnType) return false;
  if (method.parameters.length !== matcher.parameterTypes.length) return false;
  return method.parameters.every((p, i) => parameterTypeText(p.type.canonicalText) === matcher.parameterTypes[i]);
}

function findBySignature(cls: ClassHandle, matcher: SignatureMatcher): MethodHandle | null {
  return cls.methods.find((method) => matchesSignature(method, matcher)) ?? null;
}

/**
 * Last declared method with the name. Scanning from the bottom keeps
 * Replace and Duplicate stable when the class already holds duplicates.
 */
export function findMethodByName(cls: ClassHandle, name: string): MethodHandle | null {
  const methods = cls.methods;
  for (let i = methods.length - 1; i >= 0; i--) {
    if (methods[i].name === name) {
      return methods[i];
    }
  }
  return null;
}

/** `public boolean equals(Object)` */
export function findEqualsMethod(cls: ClassHandle): MethodHandle | null {
  return findBySignature(cls, EQUALS);
}

/** `public int hashCode()` */
export function findHashCodeMethod(cls: ClassHandle): MethodHandle | null {
  return findBySignature(cls, HASH_CODE);
}

/** `public static void main(String[])`, or its `String...` form */
export function findMainMethod(cls: ClassHandle): MethodHandle | null {
  return findBySignature(cls, MAIN);
}
