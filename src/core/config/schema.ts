/**
 * Schema for `.genmethod.yaml`.
 */
import { z } from 'zod';
import { ModifierSchema } from '../model/schema.js';
import { INSERTION_POLICY_NAMES } from '../policy/insertion.js';
import { CONFLICT_POLICY_NAMES } from '../policy/conflict.js';
import { GENERATION_TARGETS } from '../template/targets.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const InsertionPolicySchema = z.enum(INSERTION_POLICY_NAMES);
export const ConflictPolicySchema = z.enum(CONFLICT_POLICY_NAMES);
export const GenerationTargetSchema = z.enum(GENERATION_TARGETS);

/** Which members reach the template. */
export const FilterSettingsSchema = z.object({
  exclude_modifiers: z.array(ModifierSchema).default(['static', 'transient']),
  /** Regex matched against the whole member name. */
  exclude_name_pattern: z.string().optional(),
  /** Regex matched against the whole field type or getter return type. */
  exclude_type_pattern: z.string().optional(),
  exclude_constants: z.boolean().default(true),
  exclude_enums: z.boolean().default(false),
  exclude_loggers: z.boolean().default(true),
  include_getters: z.boolean().default(false),
  sort_members: z.boolean().default(false),
});

/** Which classes the missing-method check skips. */
export const CheckSettingsSchema = z.object({
  exclude_exceptions: z.boolean().default(true),
  exclude_deprecated: z.boolean().default(true),
  exclude_enums: z.boolean().default(false),
  exclude_abstract: z.boolean().default(false),
  exclude_class_pattern: z.string().optional(),
});

export const ConfigSchema = z.object({
  /** Bundled template name or path; defaults to the target's bundled template. */
  template: z.string().optional(),
  target: GenerationTargetSchema.default('toString'),
  insertion: InsertionPolicySchema.default('at-caret'),
  conflict: ConflictPolicySchema.default('replace'),
  jump_to_method: z.boolean().default(true),
  filter: withDefaults(FilterSettingsSchema),
  check: withDefaults(CheckSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type FilterSettings = z.infer<typeof FilterSettingsSchema>;
export type CheckSettings = z.infer<typeof CheckSettingsSchema>;
