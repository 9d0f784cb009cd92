/**
 * Template evaluation with Handlebars.
 *
 * A template is the full text of the generated method, in this order: an
 * optional leading doc comment (rendered on its own), optional
 * `import x.y.Z;` statements, annotations, the signature (ignored, the
 * operation fixes it) and the braces enclosing the body. Annotations may span
 * lines or share a line with the signature.
 */
import Handlebars from 'handlebars';
import type { MethodSignature } from '../host/types.js';
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { normalizeBlock } from '../../utils/text.js';
import { createTemplateHelpers, TEMPLATE_HELPER_NAMES } from './context.js';
import type { GeneratedUnit, TemplateContext } from './types.js';

const log = logger.child('template');

const LEADING_JAVADOC = /^\s*(\/\*\*[\s\S]*?\*\/)[ \t]*(?:\r?\n)?/;
const LEADING_HANDLEBARS_COMMENT = /^\s*\{\{!(?:--[\s\S]*?--\}\}|[\s\S]*?\}\})/;
const IMPORT_STATEMENT = /import\s+([\w$]+(?:\.[\w$]+)*(?:\.\*)?)\s*;/y;
const ANNOTATION_NAME = /@[\w$]+(?:\.[\w$]+)*/y;

interface TemplateParts {
  javadoc: string | null;
  remainder: string;
  /** Lines consumed by the doc comment, for reporting positions in the remainder. */
  remainderLineOffset: number;
}

interface FailurePosition {
  message: string;
  line?: number;
  column?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pull the message and position out of whatever Handlebars threw. Its own
 * exceptions carry `lineNumber`/`column`; grammar errors carry a
 * `hash.loc` and a "Parse error on line N" message.
 */
function describeFailure(error: unknown): FailurePosition {
  if (!isRecord(error)) {
    return { message: String(error) };
  }
  const message = typeof error.message === 'string' ? error.message : String(error);

  if (typeof error.lineNumber === 'number') {
    return {
      message,
      line: error.lineNumber,
      column: typeof error.column === 'number' ? error.column : undefined,
    };
  }

  const loc = isRecord(error.hash) && isRecord(error.hash.loc) ? error.hash.loc : null;
  if (loc && typeof loc.first_line === 'number') {
    return {
      message,
      line: loc.first_line,
      column: typeof loc.first_column === 'number' ? loc.first_column : undefined,
    };
  }

  const match = /on line (\d+)/.exec(message);
  return match ? { message, line: Number(match[1]) } : { message };
}

/**
 * Separate the leading doc comment from the rest of the template. Handlebars
 * comments ahead of it are dropped, since they render to nothing.
 */
export function splitTemplate(source: string): TemplateParts {
  let prefix = 0;
  for (let m = LEADING_HANDLEBARS_COMMENT.exec(source); m; m = LEADING_HANDLEBARS_COMMENT.exec(source.slice(prefix))) {
    prefix += m[0].length;
  }

  const match = LEADING_JAVADOC.exec(source.slice(prefix));
  if (!match) {
    return { javadoc: null, remainder: source, remainderLineOffset: 0 };
  }
  const consumed = prefix + match[0].length;
  return {
    javadoc: match[1],
    remainder: source.slice(consumed),
    remainderLineOffset: source.slice(0, consumed).split('\n').length - 1,
  };
}

/** Index just past the string or char literal opening at `start`. */
function skipLiteral(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length && text[i] !== quote) {
    i += text[i] === '\\' ? 2 : 1;
  }
  return Math.min(i + 1, text.length);
}

/** Index of the bracket closing the one at `start`, or -1 when unbalanced. Literals are skipped. */
function matchingClose(text: string, start: number, open: string, close: string): number {
  let depth = 0;
  let i = start;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      i = skipLiteral(text, i);
      continue;
    }
    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  return -1;
}

/** Collapse whitespace runs outside literals, so a multi-line annotation fits on one line. */
function compactAnnotation(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      const end = skipLiteral(text, i);
      out += text.slice(i, end);
      i = end;
    } else if (/\s/.test(ch)) {
      while (i < text.length && /\s/.test(text[i])) i++;
      out += ' ';
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

export class TemplateEngine {
  private readonly handlebars = Handlebars.create();

  /**
   * Evaluate a template against a context.
   * @throws TemplateError when the template does not parse, references
   *   something the context does not have, or has no method body.
   */
  evaluate(templateSource: string, context: TemplateContext, target: MethodSignature): GeneratedUnit {
    const parts = splitTemplate(templateSource);

    const javadocText = parts.javadoc !== null ? this.render(parts.javadoc, context, 'javadoc', 0) : null;
    let javadoc = javadocText !== null && javadocText.trim() !== '' ? normalizeBlock(javadocText) : null;

    const text = this.render(parts.remainder, context, 'method', parts.remainderLineOffset).replace(/\r\n/g, '\n');
    let pos = 0;
    const skipSpace = (): void => {
      while (pos < text.length && /\s/.test(text[pos])) pos++;
    };
    skipSpace();

    // A doc comment produced by a block or partial ahead of it is still the doc comment.
    if (text.startsWith('/**', pos)) {
      const end = text.indexOf('*/', pos + 3);
      if (end >= 0) {
        javadoc ??= normalizeBlock(text.slice(pos, end + 2));
        pos = end + 2;
        skipSpace();
      }
    }

    const imports: string[] = [];
    IMPORT_STATEMENT.lastIndex = pos;
    for (let m = IMPORT_STATEMENT.exec(text); m; m = IMPORT_STATEMENT.exec(text)) {
      if (!imports.includes(m[1])) imports.push(m[1]);
      pos = IMPORT_STATEMENT.lastIndex;
      skipSpace();
      IMPORT_STATEMENT.lastIndex = pos;
    }

    const annotations: string[] = [];
    ANNOTATION_NAME.lastIndex = pos;
    for (let m = ANNOTATION_NAME.exec(text); m; m = ANNOTATION_NAME.exec(text)) {
      const start = pos;
      pos = ANNOTATION_NAME.lastIndex;
      let lookahead = pos;
      while (text[lookahead] === ' ' || text[lookahead] === '\t') lookahead++;
      if (text[lookahead] === '(') {
        const closeParen = matchingClose(text, lookahead, '(', ')');
        if (closeParen < 0) {
          throw new TemplateError(
            ErrorCodes.TEMPLATE_PARSE,
            `Template method failed: unbalanced parentheses in annotation ${m[0]}`,
            { section: 'method', target: target.name }
          );
        }
        pos = closeParen + 1;
      }
      annotations.push(compactAnnotation(text.slice(start, pos)));
      skipSpace();
      ANNOTATION_NAME.lastIndex = pos;
    }

    // The body opens at the first '{' after the parameter list.
    const rest = text.slice(pos);
    const paren = rest.indexOf('(');
    const brace = rest.indexOf('{');
    let signatureEnd = 0;
    if (paren >= 0 && (brace < 0 || paren < brace)) {
      const closeParen = matchingClose(rest, paren, '(', ')');
      signatureEnd = closeParen < 0 ? rest.length : closeParen + 1;
    }
    const open = rest.indexOf('{', signatureEnd);
    const close = rest.lastIndexOf('}');
    if (open < 0 || close < open) {
      throw new TemplateError(
        ErrorCodes.TEMPLATE_NO_BODY,
        `Template for ${target.name}() has no method body delimited by '{' and '}'`,
        { target: target.name }
      );
    }

    const unit: GeneratedUnit = {
      target,
      javadoc,
      annotations,
      imports,
      body: normalizeBlock(rest.slice(open + 1, close)),
    };
    log.debug('Evaluated template', {
      target: target.name,
      imports: unit.imports.length,
      annotations: unit.annotations.length,
      hasJavadoc: unit.javadoc !== null,
    });
    return unit;
  }

  private render(
    source: string,
    context: TemplateContext,
    section: 'javadoc' | 'method',
    lineOffset: number
  ): string {
    let ast: ReturnType<typeof Handlebars.parse>;
    try {
      ast = this.handlebars.parse(source);
    } catch (error) {
      throw this.failure(ErrorCodes.TEMPLATE_PARSE, error, section, lineOffset);
    }

    try {
      const template = this.handlebars.compile(ast, {
        strict: true,
        noEscape: true,
        knownHelpers: Object.fromEntries(TEMPLATE_HELPER_NAMES.map((name) => [name, true])),
        knownHelpersOnly: true,
      });
      return template(context, { helpers: createTemplateHelpers(context) });
    } catch (error) {
      if (error instanceof TemplateError) {
        throw error;
      }
      throw this.failure(ErrorCodes.TEMPLATE_RUNTIME, error, section, lineOffset);
    }
  }

  private failure(code: string, error: unknown, section: 'javadoc' | 'method', lineOffset: number): TemplateError {
    const failure = describeFailure(error);
    return new TemplateError(code, `Template ${section} failed: ${failure.message}`, {
      section,
      line: failure.line !== undefined ? failure.line + lineOffset : undefined,
      column: failure.column,
    });
  }
}
