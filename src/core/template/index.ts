/**
 * Template engine exports barrel file.
 */
export { TemplateEngine, splitTemplate } from './engine.js';
export { buildTemplateContext, createTemplateHelpers } from './context.js';
export { listTemplates, loadTemplate, BUNDLED_TEMPLATE_DIR } from './resources.js';
export { GENERATION_TARGETS, DEFAULT_TEMPLATES, targetSignature, isGenerationTarget } from './targets.js';
export type { GenerationTarget } from './targets.js';
export type { GeneratedUnit, TemplateContext, TemplateResource } from './types.js';
