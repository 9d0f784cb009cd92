/**
 * Lays out a JavaFile as text and assigns every element its offsets.
 */
import type { SourceElement } from '../host/types.js';
import {
  CodeElement,
  JavaClass,
  JavaField,
  JavaMethod,
  TokenElement,
  WhitespaceElement,
} from './model.js';
import type { ClassMember, JavaFile } from './model.js';
import { classHeaderLines, fieldLines, indent, joinLines, methodLines } from './renderer.js';

type Positioned = JavaFile | JavaClass | JavaField | JavaMethod | TokenElement | WhitespaceElement | CodeElement;

interface Span {
  readonly element: Positioned;
  readonly start: number;
  end: number;
  readonly depth: number;
}

export interface Position {
  /** 1-based. */
  readonly line: number;
  /** 1-based. */
  readonly column: number;
}

export interface Layout {
  readonly text: string;
  /** Innermost element covering the offset; the file when none does. */
  elementAt(offset: number): SourceElement;
  offsetOf(position: Position): number | null;
  positionOf(offset: number): Position;
}

class LayoutBuilder {
  private text = '';
  private depth = 0;
  readonly spans: Span[] = [];

  get offset(): number {
    return this.text.length;
  }

  write(text: string): void {
    this.text += text;
  }

  open(element: Positioned): Span {
    const span: Span = { element, start: this.offset, end: this.offset, depth: this.depth++ };
    this.spans.push(span);
    return span;
  }

  close(span: Span): void {
    span.end = this.offset;
    span.element.textOffset = span.start;
    span.element.textEnd = span.end;
    this.depth--;
  }

  leaf(element: Positioned, text: string): void {
    const span = this.open(element);
    this.write(text);
    this.close(span);
  }

  build(): string {
    return this.text;
  }
}

function layoutField(b: LayoutBuilder, field: JavaField, level: number): void {
  const span = b.open(field);
  b.write(joinLines(fieldLines(field), level));
  b.close(span);
}

function layoutMethod(b: LayoutBuilder, method: JavaMethod, level: number): void {
  const span = b.open(method);
  const { lines, body } = methodLines(method);
  let code: Span | null = null;

  lines.forEach((line, i) => {
    if (i > 0) b.write('\n');
    if (body !== null && i === body.first) code = b.open(new CodeElement(method));
    b.write(i === 0 || line === '' ? line : `${indent(level)}${line}`);
    if (body !== null && i === body.end - 1 && code !== null) {
      b.close(code);
      code = null;
    }
  });
  b.close(span);
}

function layoutMember(b: LayoutBuilder, member: ClassMember, level: number): void {
  if (member instanceof JavaField) {
    layoutField(b, member, level);
  } else if (member instanceof JavaMethod) {
    layoutMethod(b, member, level);
  } else {
    layoutClass(b, member, level);
  }
}

function layoutClass(b: LayoutBuilder, cls: JavaClass, level: number): void {
  const span = b.open(cls);
  const header = joinLines(classHeaderLines(cls), level);
  b.write(header.slice(0, -1));
  b.leaf(cls.lBrace, '{');

  const inner = indent(level + 1);
  let separator = '\n';
  if (cls.enumConstants.length > 0) {
    b.leaf(new WhitespaceElement(cls, null), `\n${inner}`);
    b.leaf(new TokenElement('token', cls, `${cls.enumConstants.join(', ')};`), `${cls.enumConstants.join(', ')};`);
    separator = '\n\n';
  }

  let previous: ClassMember | null = null;
  for (const member of cls.members) {
    b.leaf(new WhitespaceElement(cls, previous), `${separator}${inner}`);
    layoutMember(b, member, level + 1);
    previous = member;
    separator = '\n\n';
  }

  b.leaf(new WhitespaceElement(cls, previous), `\n${indent(level)}`);
  b.leaf(cls.rBrace, '}');
  b.close(span);
}

export function layoutFile(file: JavaFile): Layout {
  const b = new LayoutBuilder();
  const root = b.open(file);

  if (file.packageName) {
    b.leaf(new TokenElement('token', file, `package ${file.packageName};`), `package ${file.packageName};`);
    b.leaf(new WhitespaceElement(file, null), '\n\n');
  }
  file.imports.forEach((name, i) => {
    b.leaf(new TokenElement('token', file, `import ${name};`), `import ${name};`);
    b.leaf(new WhitespaceElement(file, null), i === file.imports.length - 1 ? '\n\n' : '\n');
  });
  file.classes.forEach((cls, i) => {
    layoutClass(b, cls, 0);
    b.leaf(new WhitespaceElement(file, null), i === file.classes.length - 1 ? '\n' : '\n\n');
  });

  b.close(root);
  const text = b.build();
  const spans = b.spans;
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') lineStarts.push(i + 1);
  }

  return {
    text,
    elementAt(offset: number): SourceElement {
      let best: Span | null = null;
      for (const span of spans) {
        if (offset >= span.start && offset < span.end && (best === null || span.depth > best.depth)) {
          best = span;
        }
      }
      return best?.element ?? file;
    },
    offsetOf({ line, column }: Position): number | null {
      if (line < 1 || line > lineStarts.length || column < 1) return null;
      const start = lineStarts[line - 1];
      const lineEnd = line < lineStarts.length ? lineStarts[line] - 1 : text.length;
      const offset = start + column - 1;
      return offset <= lineEnd ? offset : null;
    },
    positionOf(offset: number): Position {
      let line = 0;
      while (line + 1 < lineStarts.length && lineStarts[line + 1] <= offset) line++;
      return { line: line + 1, column: offset - lineStarts[line] + 1 };
    },
  };
}
