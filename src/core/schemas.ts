// Zod schemas for settings files, state snapshots and CLI options

import { z, type ZodError } from 'zod';

/**
 * Report output format enum
 */
export const OutputFormatSchema = z.enum(['text', 'json', 'yaml']);

/**
 * Log level names accepted on the command line and in settings
 */
export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * List matching strategy enum
 */
export const ListMatchingSchema = z.enum(['bipartite', 'greedy']);

const PositiveInt = z.number().int().positive();
const PositiveNumber = z.number().positive();

/**
 * Retry policy overrides
 */
export const RetrySettingsSchema = z
  .object({
    maxElapsedMs: PositiveNumber,
    baseDelayMs: PositiveNumber,
    multiplier: z.number().min(1, 'multiplier must be at least 1'),
    maxDelayMs: PositiveNumber
  })
  .partial()
  .strict();

/**
 * Live-result cache overrides
 */
export const CacheSettingsSchema = z
  .object({
    ttlMs: z.number().int().nonnegative(),
    maxEntries: PositiveInt
  })
  .partial()
  .strict();

/**
 * Settings file schema (.infra-drift.yaml). Every key is optional.
 */
export const SettingsFileSchema = z
  .object({
    region: z.string().min(1),
    attributes: z.array(z.string().min(1)).min(1, 'attributes must not be empty'),
    concurrency: PositiveInt,
    output: OutputFormatSchema,
    logLevel: LogLevelNameSchema,
    resourceType: z.string().min(1),
    matchAttribute: z.string().min(1),
    listMatching: ListMatchingSchema,
    retry: RetrySettingsSchema,
    cache: CacheSettingsSchema
  })
  .partial()
  .strict();

/**
 * One resource in the `terraform show -json` layout
 */
export const ShowJsonResourceSchema = z
  .object({
    address: z.string().optional(),
    mode: z.string().optional(),
    type: z.string(),
    name: z.string().optional(),
    values: z.record(z.unknown()).nullable().optional()
  })
  .passthrough();

export interface ShowJsonModule {
  address?: string;
  resources?: z.infer<typeof ShowJsonResourceSchema>[];
  child_modules?: ShowJsonModule[];
}

/**
 * A module in the `terraform show -json` layout; modules nest
 */
export const ShowJsonModuleSchema: z.ZodType<ShowJsonModule> = z.lazy(() =>
  z
    .object({
      address: z.string().optional(),
      resources: z.array(ShowJsonResourceSchema).optional(),
      child_modules: z.array(ShowJsonModuleSchema).optional()
    })
    .passthrough()
);

/**
 * `terraform show -json` output
 */
export const ShowJsonStateSchema = z
  .object({
    format_version: z.string().optional(),
    values: z
      .object({
        root_module: ShowJsonModuleSchema
      })
      .passthrough()
  })
  .passthrough();

/**
 * One resource in the raw state file (version 4) layout
 */
export const RawStateResourceSchema = z
  .object({
    module: z.string().optional(),
    mode: z.string().optional(),
    type: z.string(),
    name: z.string().optional(),
    instances: z.array(
      z
        .object({
          index_key: z.union([z.string(), z.number()]).optional(),
          attributes: z.record(z.unknown()).optional()
        })
        .passthrough()
    )
  })
  .passthrough();

/**
 * Raw `terraform.tfstate` (version 4)
 */
export const RawStateSchema = z
  .object({
    version: z.number().int(),
    resources: z.array(RawStateResourceSchema)
  })
  .passthrough();

/**
 * Either state snapshot layout
 */
export const StateFileSchema = z.union([ShowJsonStateSchema, RawStateSchema]);

/**
 * Options of a drift run once CLI flags and settings are merged
 */
export const DriftRunOptionsSchema = z
  .object({
    instances: z.array(z.string().min(1)).min(1, 'at least one instance id is required'),
    statePath: z.string().min(1).optional(),
    configPath: z.string().min(1).optional(),
    simulate: z.boolean(),
    targetStatePath: z.string().min(1).optional(),
    attributes: z.array(z.string().min(1)).min(1),
    concurrency: PositiveInt,
    output: OutputFormatSchema,
    logLevel: LogLevelNameSchema,
    region: z.string().min(1).optional(),
    metricsOut: z.string().min(1).optional(),
    progress: z.boolean()
  })
  .strict();

/**
 * Type exports
 */
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type LogLevelName = z.infer<typeof LogLevelNameSchema>;
export type SettingsFile = z.infer<typeof SettingsFileSchema>;
export type ShowJsonState = z.infer<typeof ShowJsonStateSchema>;
export type RawState = z.infer<typeof RawStateSchema>;
export type StateFile = z.infer<typeof StateFileSchema>;
export type DriftRunOptions = z.infer<typeof DriftRunOptionsSchema>;

/**
 * Validation helper functions
 */
export function validateSettings(data: unknown): SettingsFile {
  return SettingsFileSchema.parse(data);
}

export function isShowJsonState(state: StateFile): state is ShowJsonState {
  return 'values' in state && state.values !== undefined && typeof state.values === 'object';
}

/**
 * Flattens zod issues into one line, e.g. `concurrency: Expected number, received string`
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
