/**
 * Methods the engine knows how to generate. The signature of each is fixed
 * here; templates only supply javadoc, annotations and the body.
 */
import type { MethodSignature } from '../host/types.js';
import type { ClassFacts } from '../classify/types.js';

export const GENERATION_TARGETS = ['toString', 'compareTo'] as const;

export type GenerationTarget = (typeof GENERATION_TARGETS)[number];

/** Bundled template used when none is configured. */
export const DEFAULT_TEMPLATES: Record<GenerationTarget, string> = {
  toString: 'string-concat',
  compareTo: 'compare-to',
};

export function targetSignature(target: GenerationTarget, cls: ClassFacts): MethodSignature {
  switch (target) {
    case 'toString':
      return {
        name: 'toString',
        returnType: 'java.lang.String',
        parameters: [],
        modifiers: ['public'],
      };
    case 'compareTo':
      return {
        name: 'compareTo',
        returnType: 'int',
        parameters: [{ name: 'other', type: cls.qualifiedName }],
        modifiers: ['public'],
      };
  }
}

export function isGenerationTarget(value: string): value is GenerationTarget {
  return GENERATION_TARGETS.some((target) => target === value);
}
