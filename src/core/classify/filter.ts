/**
 * User-configured member filtering. Runs once per generation request,
 * before the template context is built.
 */
import type { ClassHandle, FieldHandle, MethodHandle, Modifier } from '../host/types.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { classifyField, classifyMethod } from './classifier.js';
import type { MemberFacts } from './types.js';

export interface FilterConfig {
  /** Members carrying any of these modifiers are excluded. */
  readonly excludeModifiers: readonly Modifier[];
  /** Regex matched against the whole member name. */
  readonly excludeNamePattern?: string;
  /** Regex matched against the whole field type / method return type. */
  readonly excludeTypePattern?: string;
  readonly excludeConstants: boolean;
  readonly excludeEnums: boolean;
  readonly excludeLoggers: boolean;
  readonly includeGetters: boolean;
  readonly sortMembers: boolean;
}

export const DEFAULT_FILTER: FilterConfig = {
  excludeModifiers: ['static', 'transient'],
  excludeConstants: true,
  excludeEnums: false,
  excludeLoggers: true,
  includeGetters: false,
  sortMembers: false,
};

const LOGGER_TYPES = new Set([
  'java.util.logging.Logger',
  'org.apache.log4j.Logger',
  'org.apache.logging.log4j.Logger',
  'org.apache.commons.logging.Log',
  'org.slf4j.Logger',
]);

export interface AvailableMembers {
  readonly fields: readonly MemberFacts[];
  readonly methods: readonly MemberFacts[];
  /** Fields followed by methods, or all members by name when sorting. */
  readonly members: readonly MemberFacts[];
}

function compilePattern(pattern: string | undefined, option: string): RegExp | null {
  if (!pattern) {
    return null;
  }
  try {
    return new RegExp(`^(?:${pattern})$`);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Invalid ${option} pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`,
      { option, pattern }
    );
  }
}

function byName(a: MemberFacts, b: MemberFacts): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Classify the class's declared fields and getters and keep those the
 * filter admits.
 */
export function collectAvailableMembers(cls: ClassHandle, filter: FilterConfig): AvailableMembers {
  const namePattern = compilePattern(filter.excludeNamePattern, 'name');
  const typePattern = compilePattern(filter.excludeTypePattern, 'type');

  const excludedByModifier = (member: FieldHandle | MethodHandle): boolean =>
    filter.excludeModifiers.some((modifier) => member.hasModifier(modifier));

  const fields: MemberFacts[] = [];
  for (const field of cls.fields) {
    if (excludedByModifier(field)) continue;
    const facts = classifyField(cls, field);
    if (filter.excludeConstants && facts.constant) continue;
    if (filter.excludeEnums && facts.enumValued) continue;
    if (filter.excludeLoggers && LOGGER_TYPES.has(field.type.canonicalText)) continue;
    if (namePattern?.test(field.name)) continue;
    if (typePattern?.test(field.type.canonicalText)) continue;
    fields.push(facts);
  }

  const methods: MemberFacts[] = [];
  if (filter.includeGetters) {
    const fieldNames = new Set(fields.map((f) => f.name));
    for (const method of cls.methods) {
      if (excludedByModifier(method)) continue;
      const facts = classifyMethod(cls, method);
      if (!facts.getter || facts.static || method.name === 'getClass') continue;
      if (facts.impliedFieldName !== null && fieldNames.has(facts.impliedFieldName)) continue;
      if (filter.excludeEnums && facts.enumValued) continue;
      if (namePattern?.test(method.name)) continue;
      if (typePattern && method.returnType && typePattern.test(method.returnType.canonicalText)) continue;
      methods.push(facts);
    }
  }

  if (filter.sortMembers) {
    fields.sort(byName);
    methods.sort(byName);
    return { fields, methods, members: [...fields, ...methods].sort(byName) };
  }
  return { fields, methods, members: [...fields, ...methods] };
}
