/**
 * Class model exports barrel file.
 */
export { buildSourceFile, loadClassModel, findTargetClass } from './loader.js';
export type { LoadedModel } from './loader.js';
export { ClassModelFileSchema, ClassModelSchema, MemberModelSchema } from './schema.js';
export type { ClassModel, ClassModelFile, FieldModel, MemberModel, MethodModel } from './schema.js';
