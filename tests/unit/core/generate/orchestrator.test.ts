/**
 * Tests for the generation orchestrator.
 */
import { describe, it, expect, beforeAll } from 'vitest';
import { generate } from '../../../../src/core/generate/orchestrator.js';
import type {
  GenerateOptions,
  GenerationPhase,
  GenerationResult,
} from '../../../../src/core/generate/orchestrator.js';
import type { MethodHandle } from '../../../../src/core/host/types.js';
import { InMemoryHost } from '../../../../src/core/source/host.js';
import { JavaMethod } from '../../../../src/core/source/model.js';
import { loadTemplate } from '../../../../src/core/template/resources.js';
import { ErrorCodes, InsertionError } from '../../../../src/utils/errors.js';
import { fromModel, memberNames, PERSON, personWith, POINT } from '../../../helpers/model.js';

const DEFAULTS: GenerateOptions = { insertion: 'at-caret', conflict: 'replace' };

const PLAIN = 'public String toString() {\n    return "{{classname}}";\n}';

const EXISTING = {
  kind: 'method',
  name: 'toString',
  returns: 'String',
  modifiers: ['public'],
  doc: 'Old doc.',
  body: 'return "old";',
};

const PERSON_WITH_TO_STRING = [
  'package com.example;',
  '',
  'public class Person {',
  '    /**',
  '     * Returns a string representation of this Person.',
  '     */',
  '    @Override',
  '    public String toString() {',
  '        return "Person{" +',
  '                "name=\'" + name + \'\\\'\' +',
  '                ", age=" + age +',
  "                '}';",
  '    }',
  '',
  '    private String name;',
  '',
  '    private int age;',
  '}',
  '',
].join('\n');

function generated(result: GenerationResult): { method: MethodHandle; replaced: boolean } {
  if (!result.success) throw result.error;
  if (result.outcome.kind !== 'generated') throw new Error(`Expected a generated method, got ${result.outcome.kind}`);
  return result.outcome;
}

describe('generate', () => {
  let concat: string;

  beforeAll(async () => {
    concat = (await loadTemplate('string-concat')).source;
  });

  it('should insert the bundled toString at the top of the class without a cursor', () => {
    const { cls, host } = fromModel(PERSON);

    const { method, replaced } = generated(generate(cls, concat, host, DEFAULTS));

    expect(replaced).toBe(false);
    expect(host.text).toBe(PERSON_WITH_TO_STRING);
    expect(host.positionOf(method)).toEqual({ line: 4, column: 5 });
  });

  it('should write a multi-line template annotation as one line', () => {
    const { cls, host } = fromModel(PERSON);
    const template = '@SuppressWarnings({\n    "unchecked"\n})\n' + PLAIN;

    generated(generate(cls, template, host, DEFAULTS));

    expect(host.text.split('\n').slice(3, 7)).toEqual([
      '    @SuppressWarnings({ "unchecked" })',
      '    public String toString() {',
      '        return "Person";',
      '    }',
    ]);
  });

  it('should report an empty outcome and leave the class alone when no member survives filtering', () => {
    const { cls, host } = fromModel({
      classes: [{ name: 'Constants', members: [{ kind: 'field', name: 'MAX', type: 'int', modifiers: ['public', 'static', 'final'] }] }],
    });
    const before = host.text;
    const phases: GenerationPhase[] = [];

    const result = generate(cls, concat, host, { ...DEFAULTS, onPhase: (phase) => phases.push(phase) });

    expect(result).toMatchObject({ success: true, outcome: { kind: 'empty', target: { name: 'toString' } } });
    expect(host.text).toBe(before);
    expect(phases).toEqual(['classifying']);
  });

  it('should record every phase of a generation', () => {
    const { cls, host } = fromModel(PERSON);
    const phases: GenerationPhase[] = [];

    generated(generate(cls, concat, host, { ...DEFAULTS, onPhase: (phase) => phases.push(phase) }));

    expect(phases).toEqual([
      'classifying',
      'templating',
      'conflict-check',
      'inserting',
      'javadoc-merge',
      'annotation-merge',
      'done',
    ]);
  });

  describe('insertion', () => {
    it('should insert after hashCode when it follows equals', () => {
      const { cls, host } = fromModel(POINT);

      generated(generate(cls, concat, host, { ...DEFAULTS, insertion: 'after-equals-hashcode' }));

      expect(memberNames(cls)).toEqual(['x', 'y', 'equals', 'hashCode', 'toString']);
    });

    it('should fall back to the cursor without equals and hashCode', () => {
      const { cls, host } = fromModel(PERSON, { line: 4, column: 5 });

      generated(generate(cls, concat, host, { ...DEFAULTS, insertion: 'after-equals-hashcode' }));

      expect(memberNames(cls)).toEqual(['name', 'toString', 'age']);
    });

    it('should insert last but before a trailing main method', () => {
      const { cls, host } = fromModel(
        personWith({
          kind: 'method',
          name: 'main',
          returns: 'void',
          modifiers: ['public', 'static'],
          params: [{ name: 'args', type: 'String[]' }],
        })
      );

      generated(generate(cls, concat, host, { ...DEFAULTS, insertion: 'last' }));

      expect(memberNames(cls)).toEqual(['name', 'age', 'toString', 'main']);
    });

    it('should move the cursor to the generated method', () => {
      const { cls, host } = fromModel(PERSON);

      generated(generate(cls, concat, host, { ...DEFAULTS, jumpToMethod: true }));

      expect(host.cursorPosition).toEqual({ line: 4, column: 5 });
    });

    it('should leave the cursor where it was unless asked to jump', () => {
      const { cls, host } = fromModel(PERSON);

      generated(generate(cls, concat, host, DEFAULTS));

      expect(host.cursorPosition).toBeNull();
    });
  });

  describe('conflicts', () => {
    it('should cancel without touching the file', () => {
      const { cls, host } = fromModel(personWith(EXISTING));
      const before = host.text;
      const phases: GenerationPhase[] = [];

      const result = generate(cls, concat, host, {
        ...DEFAULTS,
        conflict: 'cancel',
        onPhase: (phase) => phases.push(phase),
      });

      expect(result).toMatchObject({ success: true, outcome: { kind: 'cancelled', existing: cls.methods[0] } });
      expect(host.text).toBe(before);
      expect(phases).toEqual(['classifying', 'templating', 'conflict-check', 'cancelled']);
    });

    it('should replace in place and keep the old doc comment when the template has none', () => {
      const { cls, host } = fromModel(personWith(EXISTING));

      const { method, replaced } = generated(generate(cls, PLAIN, host, DEFAULTS));

      expect(replaced).toBe(true);
      expect(memberNames(cls)).toEqual(['name', 'age', 'toString']);
      expect(cls.methods).toEqual([method]);
      expect(method.docComment).toBe('/**\n * Old doc.\n */');
      expect(cls.methods[0].body).toBe('return "Person";');
    });

    it('should prefer the template doc comment when replacing', () => {
      const { cls, host } = fromModel(personWith(EXISTING));

      const { method } = generated(generate(cls, concat, host, DEFAULTS));

      expect(method.docComment).toBe('/**\n * Returns a string representation of this Person.\n */');
    });

    it('should add a second method on duplicate', () => {
      const { cls, host } = fromModel(personWith(EXISTING));

      const { replaced } = generated(generate(cls, PLAIN, host, { ...DEFAULTS, conflict: 'duplicate', insertion: 'last' }));

      expect(replaced).toBe(false);
      expect(memberNames(cls)).toEqual(['name', 'age', 'toString', 'toString']);
    });

    it('should produce the same text when run twice with replace', () => {
      const { cls, host } = fromModel(PERSON);

      generated(generate(cls, concat, host, { ...DEFAULTS, jumpToMethod: true }));
      const first = host.text;
      generated(generate(cls, concat, host, { ...DEFAULTS, jumpToMethod: true }));

      expect(host.text).toBe(first);
      expect(first).toBe(PERSON_WITH_TO_STRING);
    });
  });

  describe('imports', () => {
    const scores = { kind: 'field', name: 'scores', type: 'int[]', modifiers: ['private'] };

    it('should add imports the generated method needs', () => {
      const { cls, host, file } = fromModel(personWith(scores));

      generated(generate(cls, concat, host, DEFAULTS));

      expect(file.imports).toEqual(['java.util.Arrays']);
      expect(host.text.split('\n').slice(0, 4)).toEqual([
        'package com.example;',
        '',
        'import java.util.Arrays;',
        '',
      ]);
    });

    it('should not add an import that is already visible', () => {
      const { cls, host, file } = fromModel({ ...PERSON, imports: ['java.util.*'], classes: [{ name: 'Scores', members: [scores] }] });

      generated(generate(cls, concat, host, DEFAULTS));

      expect(file.imports).toEqual(['java.util.*']);
    });
  });

  describe('failures', () => {
    it('should return template errors without editing', () => {
      const { cls, host } = fromModel(PERSON);
      const before = host.text;

      const result = generate(cls, 'public String toString() {\n    return {{missing}};\n}', host, DEFAULTS);

      expect(result).toMatchObject({ success: false, error: { code: ErrorCodes.TEMPLATE_RUNTIME } });
      expect(host.text).toBe(before);
    });

    it('should roll back and report a host that rejects an edit', () => {
      class ReadOnlyAnnotations extends InMemoryHost {
        addAnnotation(): void {
          throw new Error('annotations are read-only');
        }
      }
      const { file, resolver, cls } = fromModel(PERSON);
      const host = new ReadOnlyAnnotations(file, resolver);
      const before = host.text;

      const result = generate(cls, concat, host, DEFAULTS);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(InsertionError);
      expect(result.error).toMatchObject({
        code: ErrorCodes.EDIT_REJECTED,
        message: 'Host rejected the edit while annotation-merge: annotations are read-only',
      });
      expect(host.text).toBe(before);
      expect(cls.members.some((member) => member instanceof JavaMethod)).toBe(false);
    });
  });
});
