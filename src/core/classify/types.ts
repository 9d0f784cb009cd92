/**
 * Facts derived from a class and its members for one generation pass.
 *
 * Every key is always present (null where a value does not apply) so that
 * templates compiled in strict mode can test any fact on any member.
 */

export type Visibility = 'public' | 'protected' | 'package' | 'private';

/**
 * The category that governs how a member's value is rendered by the
 * bundled templates. Custom templates may ignore it.
 */
export type MemberCategory =
  | 'primitiveArray'
  | 'stringArray'
  | 'objectArray'
  | 'string'
  | 'boolean'
  | 'numeric'
  | 'primitive'
  | 'date'
  | 'calendar'
  | 'map'
  | 'list'
  | 'set'
  | 'collection'
  | 'object'
  | 'other';

export interface ClassFacts {
  readonly name: string;
  readonly qualifiedName: string;
  /** False when the superclass is java.lang.Object. */
  readonly hasSuperclass: boolean;
  readonly superclassName: string | null;
  readonly superclassQualifiedName: string | null;
  /** Simple names of directly implemented interfaces. */
  readonly implementNames: readonly string[];
  readonly isException: boolean;
  readonly isEnum: boolean;
  readonly isAbstract: boolean;
  readonly isDeprecated: boolean;
}

export interface TypeFacts {
  readonly typeName: string;
  readonly typeQualifiedName: string;
  readonly typeCanonicalText: string;
  readonly isGenericSingleParameter: boolean;

  readonly primitive: boolean;
  readonly primitiveArray: boolean;
  readonly objectArray: boolean;
  readonly array: boolean;
  readonly string: boolean;
  readonly stringArray: boolean;
  readonly collection: boolean;
  readonly map: boolean;
  readonly set: boolean;
  readonly list: boolean;
  readonly date: boolean;
  readonly calendar: boolean;
  readonly boolean: boolean;
  readonly numeric: boolean;
  readonly object: boolean;
  readonly category: MemberCategory;
}

export interface MemberFacts extends TypeFacts {
  /** Simple name of the owning class. */
  readonly ownerName: string;
  readonly name: string;
  /** Expression that reads the value: the field name, or `getX()` for methods. */
  readonly accessor: string;
  readonly isField: boolean;
  readonly isMethod: boolean;

  readonly constant: boolean;
  readonly transient: boolean;
  readonly volatile: boolean;
  readonly static: boolean;
  readonly final: boolean;
  readonly enumValued: boolean;
  readonly deprecated: boolean;
  readonly visibility: Visibility;

  readonly getter: boolean;
  /** Getter name without its get/is/has prefix, first letter lower-cased. */
  readonly impliedFieldName: string | null;
}
