/**
 * Template context and the helpers callable from templates.
 */
import type { AvailableMembers } from '../classify/filter.js';
import type { ClassFacts } from '../classify/types.js';
import { simpleTypeName } from '../classify/type-facts.js';
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import type { TemplateContext } from './types.js';

export function buildTemplateContext(cls: ClassFacts, available: AvailableMembers): TemplateContext {
  return {
    class: cls,
    classname: cls.name,
    FQClassname: cls.qualifiedName,
    fields: available.fields,
    methods: available.methods,
    members: available.members,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Handlebars passes an options hash as the last argument of every helper
 * call; strip it to get the template's own arguments.
 */
function templateArgs(args: unknown[]): unknown[] {
  return args.slice(0, -1);
}

function hasFlag(item: unknown, flag: unknown): boolean {
  return isRecord(item) && typeof flag === 'string' && Boolean(item[flag]);
}

export type TemplateHelper = (...args: unknown[]) => unknown;

/**
 * Helpers bound to one context. Built per evaluation; nothing is
 * registered globally.
 */
export function createTemplateHelpers(context: TemplateContext): Record<string, TemplateHelper> {
  return {
    /** `(implements "Serializable")`: class directly implements the interface. */
    implements: (...args: unknown[]): boolean => {
      const [name] = templateArgs(args);
      if (typeof name !== 'string') return false;
      return context.class.implementNames.includes(simpleTypeName(name));
    },

    /** `(extends "Base")`: simple or qualified superclass name matches. */
    extends: (...args: unknown[]): boolean => {
      const [name] = templateArgs(args);
      if (typeof name !== 'string' || !context.class.hasSuperclass) return false;
      return name === context.class.superclassName || name === context.class.superclassQualifiedName;
    },

    /** `(matchesType this "java\.util\..*")`: whole canonical type text matches. */
    matchesType: (...args: unknown[]): boolean => {
      const [member, pattern] = templateArgs(args);
      if (!isRecord(member) || typeof pattern !== 'string') return false;
      let regex: RegExp;
      try {
        regex = new RegExp(`^(?:${pattern})$`);
      } catch (error) {
        throw new TemplateError(
          ErrorCodes.TEMPLATE_RUNTIME,
          `matchesType: invalid pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`,
          { pattern }
        );
      }
      const text = member.typeCanonicalText;
      return typeof text === 'string' && regex.test(text);
    },

    /** `(some members "array")`: any member has the flag set. */
    some: (...args: unknown[]): boolean => {
      const [list, flag] = templateArgs(args);
      return Array.isArray(list) && list.some((item) => hasFlag(item, flag));
    },

    /** `(hasAny this "string" "numeric")`: member has at least one of the flags. */
    hasAny: (...args: unknown[]): boolean => {
      const [member, ...flags] = templateArgs(args);
      return flags.some((flag) => hasFlag(member, flag));
    },

    eq: (...args: unknown[]): boolean => {
      const [a, b] = templateArgs(args);
      return a === b;
    },
  };
}

export const TEMPLATE_HELPER_NAMES = ['implements', 'extends', 'matchesType', 'some', 'hasAny', 'eq'] as const;
