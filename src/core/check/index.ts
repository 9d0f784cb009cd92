/**
 * Missing-method check exports barrel file.
 */
export { checkClass, DEFAULT_CHECK_OPTIONS } from './missing-method.js';
export type { CheckOptions, ClassCheckResult, SkipReason } from './missing-method.js';
