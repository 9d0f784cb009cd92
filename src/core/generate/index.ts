/**
 * Generation exports barrel file.
 */
export { generate } from './orchestrator.js';
export type { GenerateOptions, GenerationOutcome, GenerationPhase, GenerationResult } from './orchestrator.js';
