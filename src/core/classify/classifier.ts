/**
 * Member and class classification.
 *
 * Pure functions of a member's modifiers and its type; nothing here reads
 * editor state or keeps a reference to a host node.
 */
import type { ClassHandle, ClassRef, FieldHandle, MemberHandle, MethodHandle } from '../host/types.js';
import type { ClassFacts, MemberFacts, Visibility } from './types.js';
import {
  OBJECT_TYPE,
  THROWABLE_TYPE,
  classifyType,
  isBooleanType,
  isPrimitiveType,
  isVoidType,
} from './type-facts.js';

const BOOLEAN_GETTER = /^(is|has)\p{Lu}/u;
const GETTER = /^get\p{Lu}/u;
const LOWERCASE = /\p{Ll}/u;

/**
 * A field is constant when it is static and its name has no lowercase letter.
 */
export function isConstantField(field: FieldHandle): boolean {
  if (!field.hasModifier('static')) {
    return false;
  }
  return !LOWERCASE.test(field.name);
}

export function isGetterMethod(method: MethodHandle): boolean {
  if (method.returnType === null || isVoidType(method.returnType)) {
    return false;
  }
  if (BOOLEAN_GETTER.test(method.name)) {
    return isBooleanType(method.returnType);
  }
  return GETTER.test(method.name);
}

/**
 * Field name implied by a getter (`getFirstName` -> `firstName`), or null
 * when the method is not a getter.
 */
export function getterFieldName(method: MethodHandle): string | null {
  if (!isGetterMethod(method)) {
    return null;
  }
  const prefix = ['get', 'is', 'has'].find((p) => method.name.startsWith(p)) ?? '';
  const suffix = method.name.slice(prefix.length);
  return suffix.charAt(0).toLowerCase() + suffix.slice(1);
}

function visibilityOf(member: MemberHandle): Visibility {
  if (member.hasModifier('public')) return 'public';
  if (member.hasModifier('protected')) return 'protected';
  if (member.hasModifier('private')) return 'private';
  return 'package';
}

export function classifyField(owner: ClassHandle, field: FieldHandle): MemberFacts {
  return {
    ...classifyType(field.type),
    ownerName: owner.name,
    name: field.name,
    accessor: field.name,
    isField: true,
    isMethod: false,
    constant: isConstantField(field),
    transient: field.hasModifier('transient'),
    volatile: field.hasModifier('volatile'),
    static: field.hasModifier('static'),
    final: field.hasModifier('final'),
    enumValued: !isPrimitiveType(field.type) && field.type.resolvesToEnum(),
    deprecated: field.isDeprecated,
    visibility: visibilityOf(field),
    getter: false,
    impliedFieldName: null,
  };
}

export function classifyMethod(owner: ClassHandle, method: MethodHandle): MemberFacts {
  const returnType = method.returnType;
  const enumValued = returnType !== null
    && !isVoidType(returnType)
    && !isPrimitiveType(returnType)
    && returnType.resolvesToEnum();

  return {
    ...classifyType(returnType),
    ownerName: owner.name,
    name: method.name,
    accessor: `${method.name}()`,
    isField: false,
    isMethod: true,
    constant: false,
    transient: false,
    volatile: false,
    static: method.hasModifier('static'),
    final: method.hasModifier('final'),
    enumValued,
    deprecated: method.isDeprecated,
    visibility: visibilityOf(method),
    getter: isGetterMethod(method),
    impliedFieldName: getterFieldName(method),
  };
}

/**
 * Whether the class transitively extends java.lang.Throwable.
 */
export function isExceptionClass(supers: readonly ClassRef[]): boolean {
  const seen = new Set<string>();
  const queue = [...supers];
  while (queue.length > 0) {
    const next = queue.shift();
    if (!next || seen.has(next.qualifiedName)) continue;
    if (next.qualifiedName === THROWABLE_TYPE) return true;
    seen.add(next.qualifiedName);
    queue.push(...next.supers());
  }
  return false;
}

export function buildClassFacts(cls: ClassHandle): ClassFacts {
  const superclass = cls.superclass;
  const hasSuperclass = superclass !== null && superclass.qualifiedName !== OBJECT_TYPE;
  const supers: ClassRef[] = [...(superclass ? [superclass] : []), ...cls.interfaces];

  return {
    name: cls.name,
    qualifiedName: cls.qualifiedName,
    hasSuperclass,
    superclassName: hasSuperclass ? superclass.name : null,
    superclassQualifiedName: hasSuperclass ? superclass.qualifiedName : null,
    implementNames: cls.interfaces.map((ref) => ref.name),
    isException: isExceptionClass(supers),
    isEnum: cls.isEnum,
    isAbstract: cls.hasModifier('abstract'),
    isDeprecated: cls.isDeprecated,
  };
}
