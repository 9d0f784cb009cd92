/**
 * Code generation orchestrator.
 *
 * One call classifies the class, evaluates the template, resolves a name
 * conflict and inserts the generated method, all inside a single host edit
 * scope:
 *
 *   classifying -> templating -> conflict-check -> (cancelled | inserting)
 *     -> javadoc-merge -> annotation-merge -> done
 *
 * Facts and the generated unit live only for the duration of the call.
 */
import type { ClassHandle, CodeHost, MethodHandle, MethodSignature } from '../host/types.js';
import { buildClassFacts } from '../classify/classifier.js';
import { collectAvailableMembers, DEFAULT_FILTER } from '../classify/filter.js';
import type { FilterConfig } from '../classify/filter.js';
import { buildTemplateContext } from '../template/context.js';
import { TemplateEngine } from '../template/engine.js';
import { targetSignature } from '../template/targets.js';
import type { GenerationTarget } from '../template/targets.js';
import type { GeneratedUnit } from '../template/types.js';
import { CONFLICT_POLICIES } from '../policy/conflict.js';
import type { ConflictPolicyName } from '../policy/conflict.js';
import { INSERTION_POLICIES } from '../policy/insertion.js';
import type { InsertionPolicyName } from '../policy/insertion.js';
import { findMethodByName } from '../policy/signature.js';
import { GenMethodError, InsertionError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('generate');

export type GenerationPhase =
  | 'classifying'
  | 'templating'
  | 'conflict-check'
  | 'cancelled'
  | 'inserting'
  | 'javadoc-merge'
  | 'annotation-merge'
  | 'done';

/** Phases that run inside the host edit scope. */
const EDIT_PHASES: ReadonlySet<GenerationPhase> = new Set(['inserting', 'javadoc-merge', 'annotation-merge']);

export interface GenerateOptions {
  target?: GenerationTarget;
  insertion: InsertionPolicyName;
  conflict: ConflictPolicyName;
  filter?: FilterConfig;
  /** Move the cursor to the generated method when done. */
  jumpToMethod?: boolean;
  engine?: TemplateEngine;
  /** Called on every state transition. */
  onPhase?: (phase: GenerationPhase) => void;
}

export type GenerationOutcome =
  | {
      readonly kind: 'generated';
      readonly unit: GeneratedUnit;
      readonly method: MethodHandle;
      /** True when an existing method was replaced in place. */
      readonly replaced: boolean;
    }
  | {
      /** No members survived filtering; nothing was templated or inserted. */
      readonly kind: 'empty';
      readonly target: MethodSignature;
    }
  | {
      /** A method with the target name exists and the conflict policy is cancel. */
      readonly kind: 'cancelled';
      readonly unit: GeneratedUnit;
      readonly existing: MethodHandle;
    };

export type GenerationResult =
  | { readonly success: true; readonly outcome: GenerationOutcome }
  | { readonly success: false; readonly error: GenMethodError };

/**
 * Generate the target method into `cls`.
 *
 * Template, configuration and insertion errors are returned, not thrown.
 * A host failure that is not a GenMethodError is reported as an
 * InsertionError when it happens during the edit phases.
 */
export function generate(
  cls: ClassHandle,
  templateSource: string,
  host: CodeHost,
  options: GenerateOptions
): GenerationResult {
  const targetName = options.target ?? 'toString';
  let phase: GenerationPhase = 'classifying';
  const enter = (next: GenerationPhase): void => {
    log.debug(`${phase} -> ${next}`, { class: cls.qualifiedName, target: targetName });
    phase = next;
    options.onPhase?.(next);
  };

  try {
    options.onPhase?.('classifying');
    const classFacts = buildClassFacts(cls);
    const available = collectAvailableMembers(cls, options.filter ?? DEFAULT_FILTER);
    const signature = targetSignature(targetName, classFacts);

    if (available.members.length === 0) {
      log.debug('No members to generate from', { class: cls.qualifiedName });
      return { success: true, outcome: { kind: 'empty', target: signature } };
    }

    enter('templating');
    const engine = options.engine ?? new TemplateEngine();
    const unit = engine.evaluate(templateSource, buildTemplateContext(classFacts, available), signature);

    enter('conflict-check');
    const existing = findMethodByName(cls, signature.name);
    const conflict = CONFLICT_POLICIES[options.conflict];
    if (existing !== null && conflict.name === 'cancel') {
      enter('cancelled');
      return { success: true, outcome: { kind: 'cancelled', unit, existing } };
    }
    const resolution = existing !== null && conflict.name !== 'cancel' ? { policy: conflict, existing } : null;
    const insertion = INSERTION_POLICIES[options.insertion];

    const method = host.runInEditScope(() => {
      enter('inserting');
      const created = host.createMethod({ signature, body: unit.body });
      const placed = resolution !== null
        ? resolution.policy.place({ cls, existing: resolution.existing, created, host, insertion })
        : insertion.insert(cls, created, host);

      enter('javadoc-merge');
      const previousDoc = resolution?.policy.name === 'replace' ? resolution.existing.docComment : null;
      if (unit.javadoc !== null) {
        host.setDocComment(placed, unit.javadoc);
      } else if (previousDoc !== null) {
        host.setDocComment(placed, previousDoc);
      }

      enter('annotation-merge');
      for (const annotation of unit.annotations) {
        host.addAnnotation(placed, annotation);
      }
      for (const importText of unit.imports) {
        if (!host.hasImport(cls, importText)) {
          host.addImport(cls, importText);
        }
      }
      host.reformat?.(cls);
      return placed;
    });

    enter('done');
    if (options.jumpToMethod) {
      host.moveCursorTo?.(method);
    }
    return {
      success: true,
      outcome: { kind: 'generated', unit, method, replaced: resolution?.policy.name === 'replace' },
    };
  } catch (error) {
    if (error instanceof GenMethodError) {
      log.debug('Generation failed', { phase, code: error.code });
      return { success: false, error };
    }
    if (EDIT_PHASES.has(phase)) {
      return {
        success: false,
        error: new InsertionError(
          ErrorCodes.EDIT_REJECTED,
          `Host rejected the edit while ${phase}: ${error instanceof Error ? error.message : String(error)}`,
          { phase, class: cls.qualifiedName }
        ),
      };
    }
    throw error;
  }
}
