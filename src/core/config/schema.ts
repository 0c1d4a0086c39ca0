/**
 * Configuration schema for `.hexprobe/config.yaml`.
 */
import { z } from 'zod';
import { DEFAULT_CONTAINER_TYPES } from '../graph/derived-edges.js';
import { DOMAIN_KINDS } from '../classification/domain/kinds.js';
import { PORT_KINDS } from '../classification/port/kinds.js';

/**
 * Helper to create an optional field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Container types unwrapped by the derived-edge computer. */
export const GraphSettingsSchema = z.object({
  collection_types: z.array(z.string()).default([...DEFAULT_CONTAINER_TYPES.collections]),
  optional_types: z.array(z.string()).default([...DEFAULT_CONTAINER_TYPES.optionals]),
});

export const DecisionPolicyNameSchema = z.enum(['default', 'strict']);

export const ClassificationKindSchema = z.enum([...DOMAIN_KINDS, ...PORT_KINDS]);

export const ClassificationSettingsSchema = z.object({
  /** Path to a YAML criteria profile, relative to the project root */
  profile: z.string().optional(),
  /** Inline priority overrides, applied over the profile */
  priorities: z.record(z.string(), z.number().int()).default({}),
  decision_policy: DecisionPolicyNameSchema.default('default'),
  /** Glob patterns over qualified names; matching types are not classified */
  exclude: z.array(z.string()).default([]),
  /** Qualified name -> kind */
  explicit: z.record(z.string(), ClassificationKindSchema).default({}),
});

/**
 * Layer definition for dependency rules.
 */
export const LayerConfigSchema = z.object({
  name: z.string(),
  /** Glob patterns over package names */
  packages: z.array(z.string()),
  can_depend_on: z.array(z.string()).default([]),
});

export const AnalysisSettingsSchema = z.object({
  layers: z.preprocess((val) => val ?? [], z.array(LayerConfigSchema)),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  log_level: LogLevelSchema.default('info'),
  graph: withDefaults(GraphSettingsSchema),
  classification: withDefaults(ClassificationSettingsSchema),
  analysis: withDefaults(AnalysisSettingsSchema),
});

export type LogLevelSetting = z.infer<typeof LogLevelSchema>;
export type GraphSettings = z.infer<typeof GraphSettingsSchema>;
export type DecisionPolicySetting = z.infer<typeof DecisionPolicyNameSchema>;
export type ClassificationSettings = z.infer<typeof ClassificationSettingsSchema>;
export type LayerConfig = z.infer<typeof LayerConfigSchema>;
export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
/** Config as written by users: every section optional */
export type ConfigInput = z.input<typeof ConfigSchema>;
