/**
 * Builds the in-memory source tree from a class model file.
 */
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { GenMethodError, ModelError, ErrorCodes } from '../../utils/errors.js';
import { normalizeBlock } from '../../utils/text.js';
import { JavaClass, JavaField, JavaFile, JavaMethod } from '../source/model.js';
import { TypeResolver, erasure } from '../source/type-resolver.js';
import type { NameScope } from '../source/type-resolver.js';
import { ClassModelFileSchema } from './schema.js';
import type { ClassModel, ClassModelFile, FieldModel, MethodModel } from './schema.js';

export interface LoadedModel {
  readonly file: JavaFile;
  readonly resolver: TypeResolver;
}

interface PlannedClass {
  readonly model: ClassModel;
  readonly qualifiedName: string;
  readonly enclosing: string | null;
}

/** Plain text becomes a doc comment; text already written as a doc comment is kept. */
function toDocComment(doc: string | null): string | null {
  if (doc === null) return null;
  const text = doc.trim();
  if (text.startsWith('/**')) return text;
  const lines = normalizeBlock(text).split('\n').map((line) => (line ? ` * ${line}` : ' *'));
  return ['/**', ...lines, ' */'].join('\n');
}

function planClasses(model: ClassModelFile): PlannedClass[] {
  const planned: PlannedClass[] = [];
  for (const cls of model.classes) {
    let enclosing: string | null = null;
    let qualifiedName = model.package ? `${model.package}.${cls.name}` : cls.name;

    if (cls.enclosing !== undefined) {
      const outer = planned.find(
        (p) => p.qualifiedName === cls.enclosing || p.model.name === cls.enclosing
      );
      if (!outer) {
        throw new ModelError(
          ErrorCodes.UNKNOWN_CLASS,
          `Class ${cls.name} is nested in ${cls.enclosing}, which is not declared before it`,
          { class: cls.name, enclosing: cls.enclosing }
        );
      }
      enclosing = outer.qualifiedName;
      qualifiedName = `${outer.qualifiedName}.${cls.name}`;
    }

    if (planned.some((p) => p.qualifiedName === qualifiedName)) {
      throw new ModelError(ErrorCodes.INVALID_MODEL, `Class ${qualifiedName} is declared twice`, {
        class: qualifiedName,
      });
    }
    if (cls.constants.length > 0 && cls.kind !== 'enum') {
      throw new ModelError(ErrorCodes.INVALID_MODEL, `Class ${qualifiedName} declares constants but is not an enum`, {
        class: qualifiedName,
      });
    }
    planned.push({ model: cls, qualifiedName, enclosing });
  }
  return planned;
}

function buildField(field: FieldModel, qualify: (text: string) => string, resolver: TypeResolver): JavaField {
  return new JavaField(field.name, resolver.typeRef(qualify(field.type)), {
    modifiers: field.modifiers,
    annotations: field.annotations,
    docComment: toDocComment(field.doc),
    initializer: field.initializer ?? null,
  });
}

function buildMethod(
  method: MethodModel,
  owner: PlannedClass,
  qualify: (text: string) => string,
  resolver: TypeResolver
): JavaMethod {
  if (method.returns === undefined && method.name !== owner.model.name) {
    throw new ModelError(
      ErrorCodes.INVALID_MODEL,
      `Method ${owner.qualifiedName}.${method.name} has no return type and is not a constructor`,
      { class: owner.qualifiedName, method: method.name }
    );
  }

  let body: string | null;
  if (method.body === undefined) {
    const bodiless = method.modifiers.includes('abstract')
      || method.modifiers.includes('native')
      || (owner.model.kind === 'interface' && !method.modifiers.includes('static'));
    body = bodiless ? null : '';
  } else {
    body = method.body === null ? null : normalizeBlock(method.body);
  }

  return new JavaMethod(
    method.name,
    method.returns !== undefined ? resolver.typeRef(qualify(method.returns)) : null,
    method.params.map((p) => ({ name: p.name, type: resolver.typeRef(qualify(p.type)) })),
    body,
    { modifiers: method.modifiers, annotations: method.annotations, docComment: toDocComment(method.doc) }
  );
}

/**
 * Build a JavaFile and a resolver that knows the file's own classes.
 * @throws ModelError when a nested class names an unknown enclosing class,
 *   a class is declared twice, or a method without return type is not a
 *   constructor.
 */
export function buildSourceFile(model: ClassModelFile): LoadedModel {
  const resolver = new TypeResolver(model.types);
  const planned = planClasses(model);

  const scope: NameScope = {
    packageName: model.package,
    imports: model.imports,
    locals: new Map(planned.map((p) => [p.model.name, p.qualifiedName])),
  };
  const qualify = (text: string): string => resolver.qualify(text.trim(), scope);

  for (const p of planned) {
    resolver.declare({ name: p.qualifiedName, kind: p.model.kind, interfaces: [] });
  }

  const file = new JavaFile(model.package, model.imports);
  const built = new Map<string, JavaClass>();

  for (const p of planned) {
    const { model: cls } = p;
    const isInterface = cls.kind === 'interface';
    const superclass = !isInterface && cls.extends !== undefined ? qualify(cls.extends) : null;
    const interfaces = [
      ...cls.implements,
      ...(isInterface && cls.extends !== undefined ? [cls.extends] : []),
    ].map(qualify);

    resolver.declare({
      name: p.qualifiedName,
      kind: cls.kind,
      superclass: superclass !== null ? erasure(superclass) : undefined,
      interfaces: interfaces.map(erasure),
    });

    const javaClass = new JavaClass(null, cls.name, resolver, {
      declarationKind: cls.kind,
      modifiers: cls.modifiers,
      annotations: cls.annotations,
      docComment: toDocComment(cls.doc),
      superclass: superclass !== null ? erasure(superclass) : null,
      interfaces,
      enumConstants: cls.constants,
    });
    for (const member of cls.members) {
      javaClass.addMember(
        member.kind === 'field' ? buildField(member, qualify, resolver) : buildMethod(member, p, qualify, resolver)
      );
    }

    const outer = p.enclosing !== null ? built.get(p.enclosing) : undefined;
    if (outer) {
      outer.addMember(javaClass);
    } else {
      file.addClass(javaClass);
    }
    built.set(p.qualifiedName, javaClass);
  }

  return { file, resolver };
}

/**
 * Load a class model from a YAML (or JSON) file.
 */
export async function loadClassModel(filePath: string): Promise<LoadedModel> {
  let model: ClassModelFile;
  try {
    model = await loadYamlWithSchema(filePath, ClassModelFileSchema);
  } catch (error) {
    if (error instanceof GenMethodError) {
      throw new ModelError(ErrorCodes.INVALID_MODEL, `Invalid class model: ${error.message}`, {
        path: filePath,
        originalCode: error.code,
      });
    }
    throw error;
  }
  return buildSourceFile(model);
}

/**
 * The class to generate into: the named one (simple or qualified name), or
 * the first top-level class.
 */
export function findTargetClass(file: JavaFile, name?: string): JavaClass {
  const cls = name !== undefined ? file.findClass(name) : file.classes[0];
  if (!cls) {
    throw new ModelError(
      ErrorCodes.UNKNOWN_CLASS,
      name !== undefined ? `Class ${name} not found in the model` : 'The model declares no classes',
      { class: name, available: file.allClasses().map((c) => c.qualifiedName) }
    );
  }
  return cls;
}
