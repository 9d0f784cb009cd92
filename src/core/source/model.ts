/**
 * Node classes of the in-memory source tree.
 *
 * A JavaFile owns top-level classes; a JavaClass owns an ordered list of
 * members (fields, methods, nested classes). Offsets are assigned by the
 * renderer each time the file is laid out, so they always describe the
 * current text.
 */
import type {
  ClassHandle,
  ClassRef,
  FieldHandle,
  MethodHandle,
  Modifier,
  ParameterInfo,
  SourceElement,
  TypeRef,
} from '../host/types.js';
import { renderMethod } from './renderer.js';
import type { TypeKind, TypeResolver } from './type-resolver.js';

const DEPRECATED_TAG = /@deprecated\b/;

function isDeprecatedAnnotation(annotation: string): boolean {
  return /^@(?:java\.lang\.)?Deprecated\b/.test(annotation);
}

/** `@Override` / `@SuppressWarnings("x")` -> `Override` / `SuppressWarnings`. */
export function annotationName(annotation: string): string {
  const match = /^@([\w$.]+)/.exec(annotation.trim());
  return match ? match[1].slice(match[1].lastIndexOf('.') + 1) : annotation.trim();
}

abstract class Node {
  textOffset = 0;
  /** End offset (exclusive) from the last layout. */
  textEnd = 0;
}

export abstract class MemberNode extends Node {
  parent: JavaClass | null = null;
  readonly modifiers: Set<Modifier>;
  docComment: string | null;
  annotations: string[];

  constructor(
    public readonly name: string,
    options: MemberOptions
  ) {
    super();
    this.modifiers = new Set(options.modifiers ?? []);
    this.docComment = options.docComment ?? null;
    this.annotations = [...(options.annotations ?? [])];
  }

  hasModifier(modifier: Modifier): boolean {
    return this.modifiers.has(modifier);
  }

  get isDeprecated(): boolean {
    return this.annotations.some(isDeprecatedAnnotation)
      || (this.docComment !== null && DEPRECATED_TAG.test(this.docComment));
  }
}

export interface MemberOptions {
  modifiers?: readonly Modifier[];
  docComment?: string | null;
  annotations?: readonly string[];
}

export class JavaField extends MemberNode implements FieldHandle {
  readonly kind = 'field';
  readonly initializer: string | null;

  constructor(
    name: string,
    public readonly type: TypeRef,
    options: MemberOptions & { initializer?: string | null } = {}
  ) {
    super(name, options);
    this.initializer = options.initializer ?? null;
  }
}

/**
 * A method. `body` is the text between the braces without indentation, or
 * null for an abstract or interface method.
 */
export class JavaMethod extends MemberNode implements MethodHandle {
  readonly kind = 'method';

  constructor(
    name: string,
    public readonly returnType: TypeRef | null,
    public readonly parameters: readonly ParameterInfo[],
    public body: string | null,
    options: MemberOptions = {}
  ) {
    super(name, options);
  }

  get text(): string {
    return renderMethod(this);
  }
}

export class TokenElement extends Node implements SourceElement {
  constructor(
    public readonly kind: 'l-brace' | 'r-brace' | 'token',
    public readonly parent: SourceElement,
    public readonly text: string
  ) {
    super();
  }
}

/**
 * Whitespace between members (or between top-level constructs). `after`
 * is the member it follows inside its class, null at the start of the body.
 */
export class WhitespaceElement extends Node implements SourceElement {
  readonly kind = 'whitespace';

  constructor(
    public readonly parent: JavaClass | JavaFile,
    public readonly after: ClassMember | null
  ) {
    super();
  }
}

/** The statements of a method body. */
export class CodeElement extends Node implements SourceElement {
  readonly kind = 'code';

  constructor(public readonly parent: JavaMethod) {
    super();
  }
}

export type ClassMember = JavaField | JavaMethod | JavaClass;

export interface ClassOptions extends MemberOptions {
  declarationKind?: TypeKind;
  /** Qualified superclass name. */
  superclass?: string | null;
  /** Qualified interface names, possibly generic. */
  interfaces?: readonly string[];
  enumConstants?: readonly string[];
}

export class JavaClass extends Node implements ClassHandle {
  readonly kind = 'class';
  readonly declarationKind: TypeKind;
  readonly modifiers: Set<Modifier>;
  docComment: string | null;
  annotations: string[];
  readonly superclassName: string | null;
  readonly interfaceNames: readonly string[];
  readonly enumConstants: readonly string[];
  members: ClassMember[] = [];
  readonly lBrace: TokenElement;
  readonly rBrace: TokenElement;

  constructor(
    public parent: JavaFile | JavaClass | null,
    public readonly name: string,
    private readonly resolver: TypeResolver,
    options: ClassOptions = {}
  ) {
    super();
    this.declarationKind = options.declarationKind ?? 'class';
    this.modifiers = new Set(options.modifiers ?? []);
    this.docComment = options.docComment ?? null;
    this.annotations = [...(options.annotations ?? [])];
    this.superclassName = options.superclass ?? null;
    this.interfaceNames = [...(options.interfaces ?? [])];
    this.enumConstants = [...(options.enumConstants ?? [])];
    this.lBrace = new TokenElement('l-brace', this, '{');
    this.rBrace = new TokenElement('r-brace', this, '}');
  }

  get qualifiedName(): string {
    if (this.parent instanceof JavaClass) {
      return `${this.parent.qualifiedName}.${this.name}`;
    }
    const packageName = this.parent?.packageName ?? '';
    return packageName ? `${packageName}.${this.name}` : this.name;
  }

  get isEnum(): boolean {
    return this.declarationKind === 'enum';
  }

  get isInterface(): boolean {
    return this.declarationKind === 'interface';
  }

  get isDeprecated(): boolean {
    return this.annotations.some(isDeprecatedAnnotation)
      || (this.docComment !== null && DEPRECATED_TAG.test(this.docComment));
  }

  hasModifier(modifier: Modifier): boolean {
    return this.modifiers.has(modifier);
  }

  /** Declared superclass; classes implicitly extend Object and enums Enum. */
  get superclass(): ClassRef | null {
    if (this.superclassName !== null) {
      return this.resolver.classRef(this.superclassName);
    }
    switch (this.declarationKind) {
      case 'class':
        return this.resolver.classRef('java.lang.Object');
      case 'enum':
        return this.resolver.classRef('java.lang.Enum');
      case 'interface':
        return null;
    }
  }

  get interfaces(): ClassRef[] {
    return this.interfaceNames.map((name) => this.resolver.classRef(eraseGenerics(name)));
  }

  get fields(): JavaField[] {
    return this.members.filter((member): member is JavaField => member instanceof JavaField);
  }

  get methods(): JavaMethod[] {
    return this.members.filter((member): member is JavaMethod => member instanceof JavaMethod);
  }

  get nestedClasses(): JavaClass[] {
    return this.members.filter((member): member is JavaClass => member instanceof JavaClass);
  }

  addMember(member: ClassMember, index: number = this.members.length): void {
    member.parent = this;
    this.members.splice(index, 0, member);
  }
}

function eraseGenerics(name: string): string {
  const open = name.indexOf('<');
  return open < 0 ? name : name.slice(0, open);
}

export class JavaFile extends Node implements SourceElement {
  readonly kind = 'file';
  readonly parent = null;
  imports: string[];
  classes: JavaClass[] = [];

  constructor(
    public readonly packageName: string,
    imports: readonly string[] = []
  ) {
    super();
    this.imports = [...imports];
  }

  addClass(cls: JavaClass): void {
    cls.parent = this;
    this.classes.push(cls);
  }

  /** Every class in the file, nested ones included, outermost first. */
  allClasses(): JavaClass[] {
    const result: JavaClass[] = [];
    const visit = (cls: JavaClass): void => {
      result.push(cls);
      cls.nestedClasses.forEach(visit);
    };
    this.classes.forEach(visit);
    return result;
  }

  findClass(name: string): JavaClass | undefined {
    return this.allClasses().find((cls) => cls.qualifiedName === name || cls.name === name);
  }
}
