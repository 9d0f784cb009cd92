/**
 * In-memory implementation of the host capabilities, backed by a JavaFile.
 *
 * Every structural edit re-lays out the file, so offsets read from any
 * element always describe the current text.
 */
import type {
  ClassHandle,
  CodeHost,
  MethodHandle,
  NewMethod,
  SourceElement,
} from '../host/types.js';
import { InsertionError, ModelError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { layoutFile } from './layout.js';
import type { Layout, Position } from './layout.js';
import { JavaClass, JavaField, JavaMethod, TokenElement, WhitespaceElement, annotationName } from './model.js';
import type { ClassMember, JavaFile } from './model.js';
import type { TypeResolver } from './type-resolver.js';

const log = logger.child('host');

interface Slot {
  readonly cls: JavaClass;
  readonly index: number;
}

interface Snapshot {
  readonly imports: string[];
  readonly classes: { cls: JavaClass; members: ClassMember[] }[];
  readonly members: { member: JavaField | JavaMethod; docComment: string | null; annotations: string[] }[];
  readonly cursor: number | null;
}

export interface InMemoryHostOptions {
  /** Initial cursor position. */
  cursor?: Position | null;
}

export class InMemoryHost implements CodeHost {
  private layout: Layout;
  private cursor: number | null = null;

  constructor(
    readonly file: JavaFile,
    private readonly resolver: TypeResolver,
    options: InMemoryHostOptions = {}
  ) {
    this.layout = layoutFile(file);
    if (options.cursor) {
      this.setCursor(options.cursor);
    }
  }

  get text(): string {
    return this.layout.text;
  }

  positionOf(element: SourceElement): Position {
    return this.layout.positionOf(element.textOffset);
  }

  get cursorPosition(): Position | null {
    return this.cursor === null ? null : this.layout.positionOf(this.cursor);
  }

  setCursor(position: Position): void {
    const offset = this.layout.offsetOf(position);
    if (offset === null) {
      throw new ModelError(
        ErrorCodes.INVALID_CURSOR,
        `Cursor ${position.line}:${position.column} is outside the file`,
        { line: position.line, column: position.column }
      );
    }
    this.cursor = offset;
  }

  createMethod({ signature, body }: NewMethod): JavaMethod {
    return new JavaMethod(
      signature.name,
      this.resolver.typeRef(signature.returnType),
      signature.parameters.map((p) => ({ name: p.name, type: this.resolver.typeRef(p.type) })),
      body,
      { modifiers: signature.modifiers }
    );
  }

  insertBefore(anchor: SourceElement, method: MethodHandle): JavaMethod {
    return this.insertAt(this.slotFor(anchor, 'before'), this.detached(method));
  }

  insertAfter(anchor: SourceElement, method: MethodHandle): JavaMethod {
    return this.insertAt(this.slotFor(anchor, 'after'), this.detached(method));
  }

  remove(member: MethodHandle): void {
    const { cls, index } = this.attached(member);
    const [removed] = cls.members.splice(index, 1);
    removed.parent = null;
    this.relayout();
  }

  replace(existing: MethodHandle, method: MethodHandle): JavaMethod {
    const replacement = this.detached(method);
    const { cls, index } = this.attached(existing);
    const [removed] = cls.members.splice(index, 1, replacement);
    removed.parent = null;
    replacement.parent = cls;
    this.relayout();
    log.debug('Replaced method', { class: cls.qualifiedName, method: replacement.name, index });
    return replacement;
  }

  setDocComment(method: MethodHandle, docComment: string | null): void {
    this.ownMethod(method).docComment = docComment;
    this.relayout();
  }

  addAnnotation(method: MethodHandle, annotation: string): void {
    const target = this.ownMethod(method);
    const name = annotationName(annotation);
    const index = target.annotations.findIndex((existing) => annotationName(existing) === name);
    if (index >= 0) {
      target.annotations[index] = annotation;
    } else {
      target.annotations.push(annotation);
    }
    this.relayout();
  }

  /**
   * Whether `importText` (`java.util.Arrays` or `java.util.*`) is already
   * visible: imported explicitly or on demand, in java.lang, or in the
   * file's own package.
   */
  hasImport(owner: ClassHandle, importText: string): boolean {
    const file = this.fileOf(owner);
    if (file.imports.includes(importText)) return true;
    if (importText.endsWith('.*')) return false;
    const packageName = importText.slice(0, importText.lastIndexOf('.'));
    return file.imports.includes(`${packageName}.*`)
      || packageName === 'java.lang'
      || packageName === file.packageName;
  }

  addImport(owner: ClassHandle, importText: string): void {
    const file = this.fileOf(owner);
    if (!this.hasImport(owner, importText)) {
      file.imports.push(importText);
      this.relayout();
    }
  }

  runInEditScope<T>(action: () => T): T {
    const snapshot = this.snapshot();
    try {
      return action();
    } catch (error) {
      this.restore(snapshot);
      log.debug('Edit scope rolled back', { error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  elementAtCursor(): SourceElement | null {
    return this.cursor === null ? null : this.layout.elementAt(this.cursor);
  }

  moveCursorTo(element: SourceElement): void {
    this.cursor = element.textOffset;
  }

  /** Sort and de-duplicate the imports of the owner's file. */
  reformat(owner: ClassHandle): void {
    const file = this.fileOf(owner);
    file.imports = [...new Set(file.imports)].sort();
    this.relayout();
  }

  private relayout(): void {
    this.layout = layoutFile(this.file);
  }

  private ownClass(cls: ClassHandle): JavaClass {
    if (!(cls instanceof JavaClass) || !this.file.allClasses().includes(cls)) {
      throw new InsertionError(ErrorCodes.DETACHED_NODE, `Class ${cls.name} is not part of this file`, {
        class: cls.qualifiedName,
      });
    }
    return cls;
  }

  private fileOf(owner: ClassHandle): JavaFile {
    this.ownClass(owner);
    return this.file;
  }

  private ownMethod(method: MethodHandle): JavaMethod {
    if (!(method instanceof JavaMethod)) {
      throw new InsertionError(ErrorCodes.EDIT_REJECTED, `Method ${method.name} was not created by this host`, {
        method: method.name,
      });
    }
    return method;
  }

  private detached(method: MethodHandle): JavaMethod {
    const own = this.ownMethod(method);
    if (own.parent !== null) {
      throw new InsertionError(ErrorCodes.EDIT_REJECTED, `Method ${own.name} is already part of a class`, {
        method: own.name,
        class: own.parent.qualifiedName,
      });
    }
    return own;
  }

  private attached(member: MethodHandle): Slot {
    const own = this.ownMethod(member);
    const cls = own.parent;
    const index = cls ? cls.members.indexOf(own) : -1;
    if (cls === null || index < 0 || !this.file.allClasses().includes(cls)) {
      throw new InsertionError(ErrorCodes.DETACHED_NODE, `Method ${own.name} is not attached to this file`, {
        method: own.name,
      });
    }
    return { cls, index };
  }

  /**
   * Member slot next to an anchor. Valid anchors are members of a class,
   * whitespace inside a class body, and the class braces (after `{`,
   * before `}`).
   */
  private slotFor(anchor: SourceElement, where: 'before' | 'after'): Slot {
    const invalid = (reason: string): InsertionError =>
      new InsertionError(ErrorCodes.INVALID_ANCHOR, `Cannot insert ${where} ${anchor.kind}: ${reason}`, {
        anchor: anchor.kind,
        where,
      });

    if (anchor instanceof TokenElement) {
      if (!(anchor.parent instanceof JavaClass)) throw invalid('not inside a class body');
      const cls = this.ownClass(anchor.parent);
      if (anchor.kind === 'l-brace' && where === 'after') return { cls, index: 0 };
      if (anchor.kind === 'r-brace' && where === 'before') return { cls, index: cls.members.length };
      throw invalid('outside the class body');
    }

    if (anchor instanceof WhitespaceElement) {
      if (!(anchor.parent instanceof JavaClass)) throw invalid('not inside a class body');
      const cls = this.ownClass(anchor.parent);
      if (anchor.after === null) return { cls, index: 0 };
      const index = cls.members.indexOf(anchor.after);
      if (index < 0) throw invalid('stale whitespace');
      return { cls, index: index + 1 };
    }

    if (anchor instanceof JavaField || anchor instanceof JavaMethod || anchor instanceof JavaClass) {
      const cls = anchor.parent;
      if (!(cls instanceof JavaClass)) {
        throw anchor instanceof JavaClass
          ? invalid('top-level class')
          : new InsertionError(ErrorCodes.DETACHED_NODE, `Anchor ${anchor.name} is not attached`, { anchor: anchor.name });
      }
      const index = this.ownClass(cls).members.indexOf(anchor);
      if (index < 0) {
        throw new InsertionError(ErrorCodes.DETACHED_NODE, `Anchor ${anchor.name} is not attached`, { anchor: anchor.name });
      }
      return { cls, index: where === 'after' ? index + 1 : index };
    }

    throw invalid('not a class member');
  }

  private insertAt({ cls, index }: Slot, method: JavaMethod): JavaMethod {
    cls.addMember(method, index);
    this.relayout();
    log.debug('Inserted method', { class: cls.qualifiedName, method: method.name, index });
    return method;
  }

  private snapshot(): Snapshot {
    const classes = this.file.allClasses();
    const members: Snapshot['members'] = [];
    for (const cls of classes) {
      for (const member of cls.members) {
        if (member instanceof JavaClass) continue;
        members.push({ member, docComment: member.docComment, annotations: [...member.annotations] });
      }
    }
    return {
      imports: [...this.file.imports],
      classes: classes.map((cls) => ({ cls, members: [...cls.members] })),
      members,
      cursor: this.cursor,
    };
  }

  private restore(snapshot: Snapshot): void {
    this.file.imports = [...snapshot.imports];
    for (const { cls, members } of snapshot.classes) {
      for (const member of cls.members) {
        if (!members.includes(member)) member.parent = null;
      }
      cls.members = [...members];
      for (const member of members) member.parent = cls;
    }
    for (const { member, docComment, annotations } of snapshot.members) {
      member.docComment = docComment;
      member.annotations = annotations;
    }
    this.cursor = snapshot.cursor;
    this.relayout();
  }
}
