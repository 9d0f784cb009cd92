/**
 * Zod schema for class model files.
 *
 * A class model describes one source file declaratively: package, imports,
 * classes and their members. Type texts are written as in source
 * (`List<String>`, `int[]`) and qualified on load.
 */
import { z } from 'zod';
import { MODIFIERS } from '../host/types.js';
import { TypeDeclarationSchema, TypeKindSchema } from '../source/type-resolver.js';

export const ModifierSchema = z.enum(MODIFIERS);

const JavaIdentifier = z.string().regex(/^[A-Za-z_$][\w$]*$/, 'must be a valid identifier');

export const ParameterModelSchema = z.object({
  name: JavaIdentifier,
  type: z.string().min(1),
});

const memberBase = {
  name: JavaIdentifier,
  modifiers: z.array(ModifierSchema).default([]),
  annotations: z.array(z.string().startsWith('@')).default([]),
  doc: z.string().nullable().default(null),
};

export const FieldModelSchema = z.object({
  kind: z.literal('field'),
  ...memberBase,
  type: z.string().min(1),
  initializer: z.string().optional(),
});

export const MethodModelSchema = z.object({
  kind: z.literal('method'),
  ...memberBase,
  /** Absent for constructors. */
  returns: z.string().min(1).optional(),
  params: z.array(ParameterModelSchema).default([]),
  /** Statements between the braces. Absent means an empty body, or none for abstract methods. */
  body: z.string().nullable().optional(),
});

export const MemberModelSchema = z.discriminatedUnion('kind', [FieldModelSchema, MethodModelSchema]);

export const ClassModelSchema = z.object({
  name: JavaIdentifier,
  kind: TypeKindSchema.default('class'),
  /** Simple or qualified name of the enclosing class, for nested classes. */
  enclosing: z.string().optional(),
  modifiers: z.array(ModifierSchema).default([]),
  annotations: z.array(z.string().startsWith('@')).default([]),
  doc: z.string().nullable().default(null),
  extends: z.string().optional(),
  implements: z.array(z.string()).default([]),
  /** Enum constants, in declaration order. */
  constants: z.array(JavaIdentifier).default([]),
  members: z.array(MemberModelSchema).default([]),
});

export const ClassModelFileSchema = z.object({
  package: z.string().default(''),
  imports: z.array(z.string()).default([]),
  /** Library types the file refers to beyond the bundled standard-library set. */
  types: z.array(TypeDeclarationSchema).default([]),
  classes: z.array(ClassModelSchema).min(1),
});

export type ParameterModel = z.infer<typeof ParameterModelSchema>;
export type FieldModel = z.infer<typeof FieldModelSchema>;
export type MethodModel = z.infer<typeof MethodModelSchema>;
export type MemberModel = z.infer<typeof MemberModelSchema>;
export type ClassModel = z.infer<typeof ClassModelSchema>;
export type ClassModelFile = z.infer<typeof ClassModelFileSchema>;
