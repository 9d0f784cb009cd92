/**
 * Host capability contract.
 *
 * The generation engine never touches a concrete syntax tree. It reads
 * classes and members through these interfaces and edits them only through
 * the CodeHost mutation primitives.
 */

export const MODIFIERS = [
  'public',
  'protected',
  'private',
  'abstract',
  'static',
  'final',
  'transient',
  'volatile',
  'synchronized',
  'native',
] as const;

export type Modifier = (typeof MODIFIERS)[number];

export type ElementKind =
  | 'file'
  | 'class'
  | 'field'
  | 'method'
  | 'l-brace'
  | 'r-brace'
  | 'whitespace'
  | 'code'
  | 'token';

/**
 * Any node of the host tree. `parent` is null only for the file root.
 */
export interface SourceElement {
  readonly kind: ElementKind;
  readonly parent: SourceElement | null;
  /** Offset of the element's first character in the current file text. */
  readonly textOffset: number;
}

/**
 * A resolvable type reference.
 */
export interface TypeRef {
  /** Fully qualified text, e.g. `java.util.List<java.lang.String>` or `int[]`. */
  readonly canonicalText: string;
  /** Short display text, e.g. `List<String>`. */
  readonly presentableText: string;
  /** Whether a value of this type can be assigned to the named type. Unresolvable types answer false. */
  isAssignableTo(qualifiedName: string): boolean;
  /** Whether the type resolves to an enumerated class. */
  resolvesToEnum(): boolean;
}

/**
 * A class reference that may lie outside the current file.
 */
export interface ClassRef {
  readonly name: string;
  readonly qualifiedName: string;
  readonly isInterface: boolean;
  readonly isEnum: boolean;
  /** Direct supertypes (superclass and interfaces). */
  supers(): readonly ClassRef[];
}

export interface ParameterInfo {
  readonly name: string;
  readonly type: TypeRef;
}

export interface MemberHandle extends SourceElement {
  readonly name: string;
  hasModifier(modifier: Modifier): boolean;
  readonly isDeprecated: boolean;
  /** Full text of the documentation comment, or null. */
  readonly docComment: string | null;
  /** Annotation texts in declaration order, e.g. `@Override`. */
  readonly annotations: readonly string[];
}

export interface FieldHandle extends MemberHandle {
  readonly kind: 'field';
  readonly type: TypeRef;
}

export interface MethodHandle extends MemberHandle {
  readonly kind: 'method';
  /** Null for constructors. */
  readonly returnType: TypeRef | null;
  readonly parameters: readonly ParameterInfo[];
  /** Rendered text of the whole method, including doc comment and annotations. */
  readonly text: string;
}

export interface ClassHandle extends SourceElement {
  readonly kind: 'class';
  readonly name: string;
  readonly qualifiedName: string;
  readonly isEnum: boolean;
  readonly isInterface: boolean;
  readonly isDeprecated: boolean;
  hasModifier(modifier: Modifier): boolean;
  readonly superclass: ClassRef | null;
  readonly interfaces: readonly ClassRef[];
  /** Declared fields in source order. */
  readonly fields: readonly FieldHandle[];
  /** Declared methods in source order. */
  readonly methods: readonly MethodHandle[];
  readonly lBrace: SourceElement;
  readonly rBrace: SourceElement;
}

/**
 * Signature of a method to be created by the host.
 */
export interface MethodSignature {
  readonly name: string;
  /** Qualified return type text. */
  readonly returnType: string;
  readonly parameters: readonly { name: string; type: string }[];
  readonly modifiers: readonly Modifier[];
}

export interface NewMethod {
  readonly signature: MethodSignature;
  readonly body: string;
}

/**
 * Mutation and editor capabilities supplied by the host.
 *
 * All mutations for one generation request run inside a single
 * `runInEditScope` call; the host decides whether a failed scope is rolled
 * back.
 */
export interface CodeHost {
  /** Build a detached method node. */
  createMethod(method: NewMethod): MethodHandle;
  insertBefore(anchor: SourceElement, method: MethodHandle): MethodHandle;
  insertAfter(anchor: SourceElement, method: MethodHandle): MethodHandle;
  remove(member: MethodHandle): void;
  replace(existing: MethodHandle, method: MethodHandle): MethodHandle;
  /** Set or clear (null) the doc comment of a method. */
  setDocComment(method: MethodHandle, docComment: string | null): void;
  /** Add an annotation, replacing an existing annotation of the same name. */
  addAnnotation(method: MethodHandle, annotation: string): void;
  hasImport(owner: ClassHandle, importText: string): boolean;
  addImport(owner: ClassHandle, importText: string): void;
  runInEditScope<T>(action: () => T): T;

  elementAtCursor?(): SourceElement | null;
  moveCursorTo?(element: SourceElement): void;
  /** Reformat / optimize imports once after all structural edits. */
  reformat?(owner: ClassHandle): void;
}

