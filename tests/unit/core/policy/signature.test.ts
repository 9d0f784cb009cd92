/**
 * Tests for method lookup.
 */
import { describe, it, expect } from 'vitest';
import {
  findEqualsMethod,
  findHashCodeMethod,
  findMainMethod,
  findMethodByName,
} from '../../../../src/core/policy/signature.js';
import { fromModel } from '../../../helpers/model.js';

const method = (name: string, returns: string, params: { name: string; type: string }[] = [], modifiers = ['public']) => ({
  kind: 'method',
  name,
  returns,
  modifiers,
  params,
  body: '',
});

function classWith(...members: unknown[]) {
  return fromModel({ package: 'com.example', classes: [{ name: 'Sample', members }] }).cls;
}

describe('findEqualsMethod', () => {
  it('should match equals(Object) only', () => {
    const cls = classWith(
      method('equals', 'boolean', [{ name: 'other', type: 'Sample' }]),
      method('equals', 'boolean', [{ name: 'o', type: 'Object' }])
    );

    expect(findEqualsMethod(cls)).toBe(cls.methods[1]);
  });

  it('should ignore non-public and static variants', () => {
    const cls = classWith(
      method('equals', 'boolean', [{ name: 'o', type: 'Object' }], ['protected']),
      method('equals', 'boolean', [{ name: 'o', type: 'Object' }], ['public', 'static'])
    );

    expect(findEqualsMethod(cls)).toBeNull();
  });
});

describe('findHashCodeMethod', () => {
  it('should require an int result and no parameters', () => {
    const cls = classWith(method('hashCode', 'long'), method('hashCode', 'int', [{ name: 'seed', type: 'int' }]));

    expect(findHashCodeMethod(cls)).toBeNull();
    expect(findHashCodeMethod(classWith(method('hashCode', 'int')))).not.toBeNull();
  });
});

describe('findMainMethod', () => {
  it('should require public static void main(String[])', () => {
    const args = [{ name: 'args', type: 'String[]' }];

    expect(findMainMethod(classWith(method('main', 'void', args, ['public', 'static'])))).not.toBeNull();
    expect(findMainMethod(classWith(method('main', 'int', args, ['public', 'static'])))).toBeNull();
    expect(findMainMethod(classWith(method('main', 'void', args)))).toBeNull();
  });

  it('should accept a variable-arity String parameter', () => {
    const cls = classWith(method('main', 'void', [{ name: 'args', type: 'String...' }], ['public', 'static']));

    expect(findMainMethod(cls)).toBe(cls.methods[0]);
  });
});

describe('findMethodByName', () => {
  it('should return the last method with the name', () => {
    const cls = classWith(method('toString', 'String'), method('size', 'int'), method('toString', 'String'));

    expect(findMethodByName(cls, 'toString')).toBe(cls.methods[2]);
    expect(findMethodByName(cls, 'compareTo')).toBeNull();
  });
});
