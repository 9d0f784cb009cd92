/**
 * Type classification from a type's canonical text and the host's
 * assignability queries. Never throws: a type the host cannot resolve
 * answers false to every assignability query and ends up in no category.
 */
import type { TypeRef } from '../host/types.js';
import type { MemberCategory, TypeFacts } from './types.js';

const PRIMITIVE_WRAPPERS: Record<string, string> = {
  boolean: 'java.lang.Boolean',
  byte: 'java.lang.Byte',
  char: 'java.lang.Character',
  double: 'java.lang.Double',
  float: 'java.lang.Float',
  int: 'java.lang.Integer',
  long: 'java.lang.Long',
  short: 'java.lang.Short',
};

const NUMERIC_PRIMITIVES = new Set(['byte', 'short', 'int', 'long', 'float', 'double']);

export const OBJECT_TYPE = 'java.lang.Object';
export const THROWABLE_TYPE = 'java.lang.Throwable';

/**
 * Order in which category tags compete for the governing category.
 */
const CATEGORY_ORDER: readonly Exclude<MemberCategory, 'other'>[] = [
  'primitiveArray',
  'stringArray',
  'objectArray',
  'string',
  'boolean',
  'numeric',
  'primitive',
  'date',
  'calendar',
  'map',
  'list',
  'set',
  'collection',
  'object',
];

export function isVoidType(type: TypeRef | null): boolean {
  return type !== null && type.canonicalText === 'void';
}

function stripArrayDimensions(text: string): string {
  let result = text;
  while (result.endsWith('[]')) {
    result = result.slice(0, -2);
  }
  return result;
}

/**
 * Primitive scalar or array of primitives.
 *
 * Anything whose canonical text starts with `java` is treated as a library
 * type and never primitive. This also catches user types in packages such
 * as `javafoo`; the approximation is kept deliberately.
 */
export function isPrimitiveType(type: TypeRef): boolean {
  const text = type.canonicalText;
  if (text.startsWith('java')) {
    return false;
  }
  return stripArrayDimensions(text) in PRIMITIVE_WRAPPERS;
}

function isArrayText(text: string): boolean {
  return text.indexOf('[]') > 0;
}

export function isTypeOf(type: TypeRef, qualifiedName: string): boolean {
  if (isVoidType(type) || isPrimitiveType(type)) {
    return false;
  }
  return type.isAssignableTo(qualifiedName);
}

export function isBooleanType(type: TypeRef): boolean {
  if (isVoidType(type)) {
    return false;
  }
  if (isPrimitiveType(type)) {
    return type.canonicalText === 'boolean';
  }
  return isTypeOf(type, 'java.lang.Boolean');
}

export function isNumericType(type: TypeRef): boolean {
  if (isVoidType(type)) {
    return false;
  }
  if (isPrimitiveType(type)) {
    return NUMERIC_PRIMITIVES.has(type.canonicalText);
  }
  return isTypeOf(type, 'java.lang.Number');
}

/**
 * Exactly one `<` and one `>` with a single type argument.
 */
export function isGenericSingleParameter(text: string): boolean {
  const opens = text.split('<').length - 1;
  const closes = text.split('>').length - 1;
  return opens === 1 && closes === 1 && !text.includes(',');
}

/**
 * Qualified class name used by templates: wrapper for primitives, element
 * type for arrays, type argument for single-parameter generics.
 */
export function qualifiedTypeName(type: TypeRef): string {
  const text = type.canonicalText;
  if (isPrimitiveType(type)) {
    return PRIMITIVE_WRAPPERS[stripArrayDimensions(text)] ?? text;
  }
  if (text.endsWith('[]')) {
    return text.slice(0, -2);
  }
  if (isGenericSingleParameter(text)) {
    return text.slice(text.indexOf('<') + 1, text.lastIndexOf('>')).trim();
  }
  return text;
}

export function simpleTypeName(qualifiedName: string): string {
  return qualifiedName.slice(qualifiedName.lastIndexOf('.') + 1);
}

/**
 * Classify a type. A null or void type yields a fact set with every tag false.
 */
export function classifyType(type: TypeRef | null): TypeFacts {
  if (type === null || isVoidType(type)) {
    const text = type?.canonicalText ?? 'void';
    return {
      typeName: text,
      typeQualifiedName: text,
      typeCanonicalText: text,
      isGenericSingleParameter: false,
      primitive: false,
      primitiveArray: false,
      objectArray: false,
      array: false,
      string: false,
      stringArray: false,
      collection: false,
      map: false,
      set: false,
      list: false,
      date: false,
      calendar: false,
      boolean: false,
      numeric: false,
      object: false,
      category: 'other',
    };
  }

  const text = type.canonicalText;
  const primitive = isPrimitiveType(type);
  const array = isArrayText(text);
  const qualifiedName = qualifiedTypeName(type);

  const tags: Omit<TypeFacts, 'category' | 'typeName' | 'typeQualifiedName' | 'typeCanonicalText' | 'isGenericSingleParameter'> = {
    primitive,
    primitiveArray: primitive && array,
    objectArray: !primitive && array,
    array,
    string: isTypeOf(type, 'java.lang.String'),
    stringArray: !primitive && text.indexOf('String[]') > 0,
    collection: isTypeOf(type, 'java.util.Collection'),
    map: isTypeOf(type, 'java.util.Map'),
    set: isTypeOf(type, 'java.util.Set'),
    list: isTypeOf(type, 'java.util.List'),
    date: isTypeOf(type, 'java.util.Date'),
    calendar: isTypeOf(type, 'java.util.Calendar'),
    boolean: isBooleanType(type),
    numeric: isNumericType(type),
    object: isTypeOf(type, OBJECT_TYPE),
  };

  return {
    typeName: simpleTypeName(qualifiedName),
    typeQualifiedName: qualifiedName,
    typeCanonicalText: text,
    isGenericSingleParameter: isGenericSingleParameter(text),
    ...tags,
    category: CATEGORY_ORDER.find((tag) => tags[tag]) ?? 'other',
  };
}
