/**
 * Builds an in-memory host from a class model literal.
 */
import { buildSourceFile, findTargetClass } from '../../src/core/model/loader.js';
import { ClassModelFileSchema } from '../../src/core/model/schema.js';
import { InMemoryHost } from '../../src/core/source/host.js';
import type { Position } from '../../src/core/source/layout.js';
import type { JavaClass, JavaFile } from '../../src/core/source/model.js';
import type { TypeResolver } from '../../src/core/source/type-resolver.js';

export interface ModelFixture {
  file: JavaFile;
  resolver: TypeResolver;
  host: InMemoryHost;
  /** First top-level class. */
  cls: JavaClass;
}

export function fromModel(model: unknown, cursor: Position | null = null): ModelFixture {
  const { file, resolver } = buildSourceFile(ClassModelFileSchema.parse(model));
  return { file, resolver, host: new InMemoryHost(file, resolver, { cursor }), cls: findTargetClass(file) };
}

/** `public class Person { private String name; private int age; }` */
export const PERSON = {
  package: 'com.example',
  classes: [
    {
      name: 'Person',
      modifiers: ['public'],
      members: [
        { kind: 'field', name: 'name', type: 'String', modifiers: ['private'] },
        { kind: 'field', name: 'age', type: 'int', modifiers: ['private'] },
      ],
    },
  ],
};

/** PERSON with extra members appended after the fields. */
export function personWith(...members: unknown[]): unknown {
  return {
    package: 'com.example',
    classes: [{ ...PERSON.classes[0], members: [...PERSON.classes[0].members, ...members] }],
  };
}

/** Two int fields followed by equals and hashCode. */
export const POINT = {
  package: 'com.example',
  classes: [
    {
      name: 'Point',
      modifiers: ['public'],
      members: [
        { kind: 'field', name: 'x', type: 'int', modifiers: ['private'] },
        { kind: 'field', name: 'y', type: 'int', modifiers: ['private'] },
        {
          kind: 'method',
          name: 'equals',
          returns: 'boolean',
          modifiers: ['public'],
          params: [{ name: 'o', type: 'Object' }],
          body: 'return false;',
        },
        { kind: 'method', name: 'hashCode', returns: 'int', modifiers: ['public'], body: 'return 0;' },
      ],
    },
  ],
};

/** Names of the class members in declaration order. */
export function memberNames(cls: JavaClass): string[] {
  return cls.members.map((member) => member.name);
}
