/**
 * Java-flavoured text for the in-memory tree. Lines are produced without
 * their leading indentation; the layout pass indents them by nesting level.
 */
import { MODIFIERS } from '../host/types.js';
import type { Modifier, TypeRef } from '../host/types.js';
import type { JavaClass, JavaField, JavaMethod } from './model.js';
import { presentable } from './type-resolver.js';

export const INDENT = '    ';

export function indent(level: number): string {
  return INDENT.repeat(level);
}

/**
 * Re-align a doc comment so continuation lines start with ` *`.
 */
export function docCommentLines(docComment: string): string[] {
  return docComment
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line, i) => (i === 0 ? line.trim() : ` ${line.trim()}`));
}

/** Modifiers in declaration order, with a trailing space when non-empty. */
function modifierPrefix(modifiers: ReadonlySet<Modifier>): string {
  const text = MODIFIERS.filter((modifier) => modifiers.has(modifier)).join(' ');
  return text ? `${text} ` : '';
}

function typeText(type: TypeRef): string {
  return type.presentableText;
}

function leadingLines(member: { docComment: string | null; annotations: readonly string[] }): string[] {
  return [...(member.docComment !== null ? docCommentLines(member.docComment) : []), ...member.annotations];
}

export function fieldLines(field: JavaField): string[] {
  const initializer = field.initializer !== null ? ` = ${field.initializer}` : '';
  return [
    ...leadingLines(field),
    `${modifierPrefix(field.modifiers)}${typeText(field.type)} ${field.name}${initializer};`,
  ];
}

export interface MethodLines {
  readonly lines: string[];
  /** Half-open range of body statement lines, null when there are none. */
  readonly body: { readonly first: number; readonly end: number } | null;
}

export function methodLines(method: JavaMethod): MethodLines {
  const returnType = method.returnType !== null ? `${typeText(method.returnType)} ` : '';
  const parameters = method.parameters.map((p) => `${typeText(p.type)} ${p.name}`).join(', ');
  const header = `${modifierPrefix(method.modifiers)}${returnType}${method.name}(${parameters})`;
  const lines = leadingLines(method);

  if (method.body === null) {
    return { lines: [...lines, `${header};`], body: null };
  }

  lines.push(`${header} {`);
  const first = lines.length;
  if (method.body !== '') {
    for (const line of method.body.split('\n')) {
      lines.push(line.trim() === '' ? '' : `${INDENT}${line.trimEnd()}`);
    }
  }
  const end = lines.length;
  lines.push('}');
  return { lines, body: end > first ? { first, end } : null };
}

export function classHeaderLines(cls: JavaClass): string[] {
  let header = `${modifierPrefix(cls.modifiers)}${cls.declarationKind} ${cls.name}`;
  const interfaces = cls.interfaceNames.map(presentable);
  if (cls.isInterface) {
    if (interfaces.length > 0) header += ` extends ${interfaces.join(', ')}`;
  } else {
    if (cls.superclassName !== null) header += ` extends ${presentable(cls.superclassName)}`;
    if (interfaces.length > 0) header += ` implements ${interfaces.join(', ')}`;
  }
  return [...leadingLines(cls), `${header} {`];
}

/** Join lines at a nesting level; the first line is not indented. */
export function joinLines(lines: readonly string[], level: number): string {
  return lines.map((line, i) => (i === 0 || line === '' ? line : `${indent(level)}${line}`)).join('\n');
}

/** Standalone text of a method, e.g. for previews and JSON output. */
export function renderMethod(method: JavaMethod): string {
  return joinLines(methodLines(method).lines, 0);
}
