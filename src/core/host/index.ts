/**
 * Host contract exports barrel file.
 */
export { MODIFIERS } from './types.js';
export type {
  ClassHandle,
  ClassRef,
  CodeHost,
  ElementKind,
  FieldHandle,
  MemberHandle,
  MethodHandle,
  MethodSignature,
  Modifier,
  NewMethod,
  ParameterInfo,
  SourceElement,
  TypeRef,
} from './types.js';
