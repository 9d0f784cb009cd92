/**
 * Tests for the in-memory host.
 */
import { describe, it, expect } from 'vitest';
import { InsertionError, ModelError, ErrorCodes } from '../../../../src/utils/errors.js';
import { fromModel, memberNames, PERSON, personWith } from '../../../helpers/model.js';

const TO_STRING = {
  signature: { name: 'toString', returnType: 'java.lang.String', parameters: [], modifiers: ['public' as const] },
  body: 'return "Person";',
};

function thrown(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return null;
}

describe('InMemoryHost', () => {
  describe('cursor', () => {
    it('should start without a cursor', () => {
      const { host } = fromModel(PERSON);

      expect(host.cursorPosition).toBeNull();
      expect(host.elementAtCursor()).toBeNull();
    });

    it('should reject a cursor outside the file', () => {
      const error = thrown(() => fromModel(PERSON, { line: 40, column: 1 }));

      expect(error).toBeInstanceOf(ModelError);
      expect(error).toMatchObject({ code: ErrorCodes.INVALID_CURSOR });
    });

    it('should move the cursor to an element', () => {
      const { host, cls } = fromModel(PERSON);

      host.moveCursorTo(cls.fields[1]);

      expect(host.cursorPosition).toEqual({ line: 6, column: 5 });
      expect(host.elementAtCursor()).toBe(cls.fields[1]);
    });
  });

  describe('structural edits', () => {
    it('should insert a created method and lay it out', () => {
      const { host, cls } = fromModel(PERSON);

      const method = host.insertBefore(cls.rBrace, host.createMethod(TO_STRING));

      expect(method.parent).toBe(cls);
      expect(host.text).toBe(
        [
          'package com.example;',
          '',
          'public class Person {',
          '    private String name;',
          '',
          '    private int age;',
          '',
          '    public String toString() {',
          '        return "Person";',
          '    }',
          '}',
          '',
        ].join('\n')
      );
      expect(host.positionOf(method)).toEqual({ line: 8, column: 5 });
    });

    it('should insert after the opening brace', () => {
      const { host, cls } = fromModel(PERSON);

      host.insertAfter(cls.lBrace, host.createMethod(TO_STRING));

      expect(memberNames(cls)).toEqual(['toString', 'name', 'age']);
    });

    it('should reject braces used from the wrong side', () => {
      const { host, cls } = fromModel(PERSON);

      const error = thrown(() => host.insertAfter(cls.rBrace, host.createMethod(TO_STRING)));

      expect(error).toBeInstanceOf(InsertionError);
      expect(error).toMatchObject({ code: ErrorCodes.INVALID_ANCHOR });
    });

    it('should reject a top-level class as anchor', () => {
      const { host, cls } = fromModel(PERSON);

      expect(thrown(() => host.insertAfter(cls, host.createMethod(TO_STRING)))).toMatchObject({
        code: ErrorCodes.INVALID_ANCHOR,
      });
    });

    it('should reject a method that is already attached', () => {
      const { host, cls } = fromModel(PERSON);
      const method = host.insertBefore(cls.rBrace, host.createMethod(TO_STRING));

      expect(thrown(() => host.insertAfter(cls.lBrace, method))).toMatchObject({ code: ErrorCodes.EDIT_REJECTED });
    });

    it('should reject nodes of another file', () => {
      const first = fromModel(personWith({ kind: 'method', name: 'toString', returns: 'String', modifiers: ['public'] }));
      const second = fromModel(PERSON);

      expect(
        thrown(() => second.host.replace(first.cls.methods[0], second.host.createMethod(TO_STRING)))
      ).toMatchObject({ code: ErrorCodes.DETACHED_NODE });
      expect(thrown(() => second.host.insertAfter(first.cls.fields[0], second.host.createMethod(TO_STRING)))).toMatchObject({
        code: ErrorCodes.DETACHED_NODE,
      });
    });

    it('should replace a method in place', () => {
      const { host, cls } = fromModel(
        personWith({ kind: 'method', name: 'toString', returns: 'String', modifiers: ['public'], body: 'return "";' })
      );
      const old = cls.methods[0];

      const replacement = host.replace(old, host.createMethod(TO_STRING));

      expect(cls.members[2]).toBe(replacement);
      expect(old.parent).toBeNull();
      expect(host.text).toContain('        return "Person";\n');
    });

    it('should remove a method', () => {
      const { host, cls } = fromModel(
        personWith({ kind: 'method', name: 'toString', returns: 'String', modifiers: ['public'], body: 'return "";' })
      );

      host.remove(cls.methods[0]);

      expect(memberNames(cls)).toEqual(['name', 'age']);
      expect(host.text).toBe(fromModel(PERSON).host.text);
    });
  });

  describe('doc comments and annotations', () => {
    it('should set and clear the doc comment', () => {
      const { host, cls } = fromModel(PERSON);
      const method = host.insertBefore(cls.rBrace, host.createMethod(TO_STRING));

      host.setDocComment(method, '/** Describes the person. */');
      expect(method.text.split('\n')[0]).toBe('/** Describes the person. */');

      host.setDocComment(method, null);
      expect(method.text.split('\n')[0]).toBe('public String toString() {');
    });

    it('should replace an annotation of the same name', () => {
      const { host, cls } = fromModel(PERSON);
      const method = host.insertBefore(cls.rBrace, host.createMethod(TO_STRING));

      host.addAnnotation(method, '@SuppressWarnings("a")');
      host.addAnnotation(method, '@Override');
      host.addAnnotation(method, '@java.lang.SuppressWarnings("b")');

      expect(method.annotations).toEqual(['@java.lang.SuppressWarnings("b")', '@Override']);
    });
  });

  describe('imports', () => {
    const model = { package: 'com.example', imports: ['java.util.Map', 'java.io.*'], classes: [{ name: 'Holder' }] };

    it('should see explicit, on-demand, java.lang and same-package names', () => {
      const { host, cls } = fromModel(model);

      expect(host.hasImport(cls, 'java.util.Map')).toBe(true);
      expect(host.hasImport(cls, 'java.io.File')).toBe(true);
      expect(host.hasImport(cls, 'java.lang.StringBuilder')).toBe(true);
      expect(host.hasImport(cls, 'com.example.Other')).toBe(true);
      expect(host.hasImport(cls, 'java.util.Arrays')).toBe(false);
      expect(host.hasImport(cls, 'java.util.*')).toBe(false);
    });

    it('should add an import once and sort on reformat', () => {
      const { host, cls, file } = fromModel(model);

      host.addImport(cls, 'java.util.Arrays');
      host.addImport(cls, 'java.util.Arrays');
      expect(file.imports).toEqual(['java.util.Map', 'java.io.*', 'java.util.Arrays']);

      host.reformat(cls);
      expect(file.imports).toEqual(['java.io.*', 'java.util.Arrays', 'java.util.Map']);
      expect(host.text.split('\n').slice(2, 5)).toEqual([
        'import java.io.*;',
        'import java.util.Arrays;',
        'import java.util.Map;',
      ]);
    });
  });

  describe('runInEditScope', () => {
    it('should return the action result', () => {
      const { host } = fromModel(PERSON);

      expect(host.runInEditScope(() => 42)).toBe(42);
    });

    it('should roll back every edit when the action throws', () => {
      const { host, cls, file } = fromModel(
        personWith({ kind: 'method', name: 'toString', returns: 'String', modifiers: ['public'], body: 'return "";' }),
        { line: 4, column: 5 }
      );
      const before = host.text;
      const old = cls.methods[0];
      const failure = new Error('interrupted');
      let created: unknown = null;

      const error = thrown(() =>
        host.runInEditScope(() => {
          const replacement = host.replace(old, host.createMethod(TO_STRING));
          created = replacement;
          host.addAnnotation(replacement, '@Override');
          host.addImport(cls, 'java.util.Arrays');
          host.moveCursorTo(replacement);
          throw failure;
        })
      );

      expect(error).toBe(failure);
      expect(host.text).toBe(before);
      expect(cls.methods[0]).toBe(old);
      expect(old.parent).toBe(cls);
      expect(file.imports).toEqual([]);
      expect(host.cursorPosition).toEqual({ line: 4, column: 5 });
      expect(created).not.toBeNull();
      expect(cls.members).not.toContain(created);
    });
  });
});
