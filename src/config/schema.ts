/**
 * @fileoverview Zod schema for `.convention-lint.yaml`
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

/** Rule level as written in the config file */
export const RuleLevelSchema = z.enum(['off', 'warning', 'error']);

/**
 * `rxjs/finnish-notation: warning` or `angular/component-selector: [error, { prefix: acme }]`
 */
export const RuleSettingSchema = z.union([
  RuleLevelSchema,
  z.tuple([RuleLevelSchema]),
  z.tuple([RuleLevelSchema, z.record(z.unknown())]),
]);

export const RuleSettingsSchema = z.record(RuleSettingSchema);

export const OverrideSchema = z
  .object({
    files: z.array(z.string().min(1)).min(1).describe('Globs matched against workspace-relative paths'),
    rules: RuleSettingsSchema.describe('Rule settings applied to matching files'),
  })
  .strict();

export const ConfigFileSchema = z
  .object({
    include: z.array(z.string().min(1)).min(1).optional().describe('Globs of files to lint'),
    exclude: z.array(z.string().min(1)).optional().describe('Globs of files to skip'),
    maxFileBytes: z.number().int().positive().optional().describe('Files larger than this are skipped'),
    maxWarnings: z.number().int().min(-1).optional().describe('Warnings allowed before the run fails (-1 = unlimited)'),
    rules: RuleSettingsSchema.optional(),
    overrides: z.array(OverrideSchema).optional(),
  })
  .strict();

export type RuleSettingInput = z.infer<typeof RuleSettingSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
