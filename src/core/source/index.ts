/**
 * In-memory source tree exports barrel file.
 */
export { InMemoryHost } from './host.js';
export type { InMemoryHostOptions } from './host.js';
export { layoutFile } from './layout.js';
export type { Layout, Position } from './layout.js';
export {
  JavaFile,
  JavaClass,
  JavaField,
  JavaMethod,
  TokenElement,
  WhitespaceElement,
  CodeElement,
  annotationName,
} from './model.js';
export type { ClassMember, ClassOptions, MemberOptions } from './model.js';
export { renderMethod } from './renderer.js';
export { TypeResolver, TypeDeclarationSchema, erasure, presentable, simpleName } from './type-resolver.js';
export type { NameScope, TypeDeclaration, TypeKind } from './type-resolver.js';
