/**
 * Template evaluation types.
 */
import type { MethodSignature } from '../host/types.js';
import type { ClassFacts, MemberFacts } from '../classify/types.js';

/**
 * The read-only view a template is evaluated against.
 */
export interface TemplateContext {
  readonly class: ClassFacts;
  readonly classname: string;
  readonly FQClassname: string;
  readonly fields: readonly MemberFacts[];
  readonly methods: readonly MemberFacts[];
  readonly members: readonly MemberFacts[];
}

/**
 * Output of template evaluation, prior to insertion.
 */
export interface GeneratedUnit {
  /** Fixed by the operation, never derived from the template. */
  readonly target: MethodSignature;
  readonly javadoc: string | null;
  readonly annotations: readonly string[];
  /** Imported names, e.g. `java.util.Arrays` or `java.util.*`. */
  readonly imports: readonly string[];
  readonly body: string;
}

export interface TemplateResource {
  readonly name: string;
  readonly path: string;
}
