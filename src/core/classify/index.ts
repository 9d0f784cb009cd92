/**
 * Member classification exports barrel file.
 */
export {
  classifyField,
  classifyMethod,
  buildClassFacts,
  isConstantField,
  isGetterMethod,
  getterFieldName,
  isExceptionClass,
} from './classifier.js';
export { classifyType, isPrimitiveType, qualifiedTypeName } from './type-facts.js';
export { collectAvailableMembers, DEFAULT_FILTER } from './filter.js';
export type { FilterConfig, AvailableMembers } from './filter.js';
export type { ClassFacts, MemberFacts, MemberCategory, TypeFacts, Visibility } from './types.js';
