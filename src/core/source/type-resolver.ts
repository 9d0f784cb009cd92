/**
 * Type resolution for the in-memory host.
 *
 * Knows a fixed set of standard-library types (data/jdk-types.json) plus the
 * types a class model declares. Types it does not know stay unresolved:
 * they are assignable to nothing and are never enums.
 */
import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ClassRef, TypeRef } from '../host/types.js';

export const TypeKindSchema = z.enum(['class', 'interface', 'enum']);

export const TypeDeclarationSchema = z.object({
  name: z.string().min(1),
  kind: TypeKindSchema.default('class'),
  superclass: z.string().optional(),
  interfaces: z.array(z.string()).default([]),
});

export type TypeKind = z.infer<typeof TypeKindSchema>;
export type TypeDeclaration = z.infer<typeof TypeDeclarationSchema>;

const OBJECT = 'java.lang.Object';
const ARRAY_SUPERTYPES = new Set([OBJECT, 'java.lang.Cloneable', 'java.io.Serializable']);
const PRIMITIVES = new Set(['boolean', 'byte', 'char', 'double', 'float', 'int', 'long', 'short', 'void']);

const JDK_TYPES_PATH = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../data/jdk-types.json');

let jdkTypes: TypeDeclaration[] | undefined;

function loadJdkTypes(): TypeDeclaration[] {
  if (!jdkTypes) {
    const raw: unknown = JSON.parse(readFileSync(JDK_TYPES_PATH, 'utf-8'));
    jdkTypes = z.array(TypeDeclarationSchema).parse(raw);
  }
  return jdkTypes;
}

/** `java.util.Map<K, V>` -> `java.util.Map`. Arrays keep their dimensions. */
export function erasure(text: string): string {
  const open = text.indexOf('<');
  if (open < 0) return text.trim();
  const close = text.lastIndexOf('>');
  return (text.slice(0, open) + text.slice(close + 1)).trim();
}

/** Drop lowercase package qualifiers: `java.util.List<java.lang.String>` -> `List<String>`. */
export function presentable(text: string): string {
  return text.replace(/\b(?:[a-z_$][\w$]*\.)+(?=[A-Za-z_$])/g, '');
}

export function simpleName(qualifiedName: string): string {
  return qualifiedName.slice(qualifiedName.lastIndexOf('.') + 1);
}

export interface NameScope {
  readonly packageName: string;
  readonly imports: readonly string[];
  /** Simple names declared in the file itself, nested classes included. */
  readonly locals?: ReadonlyMap<string, string>;
}

export class TypeResolver {
  private readonly declarations = new Map<string, TypeDeclaration>();

  constructor(declarations: readonly TypeDeclaration[] = []) {
    for (const declaration of [...loadJdkTypes(), ...declarations]) {
      this.declarations.set(declaration.name, declaration);
    }
  }

  declare(declaration: TypeDeclaration): void {
    this.declarations.set(declaration.name, declaration);
  }

  find(qualifiedName: string): TypeDeclaration | undefined {
    return this.declarations.get(qualifiedName);
  }

  /**
   * Qualify the simple class names in a type text the way a compiler would
   * look them up: the file's own classes, explicit imports, the current
   * package, on-demand imports, then java.lang.
   * Names that resolve nowhere are left as written.
   */
  qualify(text: string, scope: NameScope): string {
    return text.replace(/(?<![\w$.])([A-Z][\w$]*)/g, (name: string) => {
      const local = scope.locals?.get(name);
      if (local) return local;

      const explicit = scope.imports.find((imp) => !imp.endsWith('.*') && simpleName(imp) === name);
      if (explicit) return explicit;

      const candidates = [
        scope.packageName ? `${scope.packageName}.${name}` : name,
        ...scope.imports.filter((imp) => imp.endsWith('.*')).map((imp) => `${imp.slice(0, -2)}.${name}`),
        `java.lang.${name}`,
      ];
      return candidates.find((candidate) => this.declarations.has(candidate)) ?? name;
    });
  }

  /**
   * Direct supertypes of a declared type. Classes without an explicit
   * superclass extend java.lang.Object.
   */
  supertypes(qualifiedName: string): string[] {
    const declaration = this.declarations.get(qualifiedName);
    if (!declaration || qualifiedName === OBJECT) return [];
    const result: string[] = [];
    if (declaration.superclass) {
      result.push(declaration.superclass);
    } else if (declaration.kind === 'enum') {
      result.push('java.lang.Enum');
    } else if (declaration.kind === 'class') {
      result.push(OBJECT);
    }
    return [...result, ...declaration.interfaces];
  }

  isAssignable(canonicalText: string, target: string): boolean {
    const type = erasure(canonicalText);
    if (PRIMITIVES.has(type)) return false;
    if (type.endsWith('[]')) return ARRAY_SUPERTYPES.has(target);
    if (!this.declarations.has(type)) return false;
    if (target === OBJECT) return true;

    const seen = new Set<string>();
    const queue = [type];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      if (next === target) return true;
      seen.add(next);
      queue.push(...this.supertypes(next));
    }
    return false;
  }

  typeRef(canonicalText: string): TypeRef {
    return {
      canonicalText,
      presentableText: presentable(canonicalText),
      isAssignableTo: (qualifiedName: string): boolean => this.isAssignable(canonicalText, qualifiedName),
      resolvesToEnum: (): boolean => this.find(erasure(canonicalText))?.kind === 'enum',
    };
  }

  /**
   * Reference to a class by qualified name. Unknown names still produce a
   * reference, with no supertypes.
   */
  classRef(qualifiedName: string): ClassRef {
    const declaration = this.declarations.get(qualifiedName);
    return {
      name: simpleName(qualifiedName),
      qualifiedName,
      isInterface: declaration?.kind === 'interface',
      isEnum: declaration?.kind === 'enum',
      supers: (): ClassRef[] => this.supertypes(qualifiedName).map((name) => this.classRef(name)),
    };
  }
}
