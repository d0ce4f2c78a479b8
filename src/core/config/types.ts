/**
 * checkpost Config Types
 */

import { z } from 'zod';

export const ResultStatusSchema = z.enum(['pass', 'warn', 'fail']);

/**
 * Settings for a single hook. The same shape is used for the `ALL` entry,
 * whose values apply to every hook of that type.
 */
export const HookConfigSchema = z
  .object({
    /** Whether the hook runs at all */
    enabled: z.boolean().optional(),
    /** Required hooks cannot be skipped */
    required: z.boolean().optional(),
    /** Skip the hook unless it is required */
    skip: z.boolean().optional(),
    /** Hide output when the hook passes */
    quiet: z.boolean().optional(),
    description: z.string().optional(),
    /** Argument vector prefix used to invoke the tool */
    command: z.array(z.string()).min(1).optional(),
    flags: z.array(z.string()).optional(),
    /** Glob patterns selecting the files the hook applies to */
    include: z.array(z.string()).optional(),
    exclude: z.array(z.string()).optional(),
    /** Append applicable files to ad-hoc commands */
    passFiles: z.boolean().optional(),
    /** Status reported in place of `fail` */
    onFail: ResultStatusSchema.optional(),
    /** Status reported in place of `warn` */
    onWarn: ResultStatusSchema.optional(),
    requiredExecutable: z.string().min(1).optional(),
    installCommand: z.string().optional(),
  })
  .strict();

export type HookConfig = z.infer<typeof HookConfigSchema>;

export const HookTypeConfigSchema = z.record(HookConfigSchema);

export const CheckpostConfigSchema = z
  .object({
    /** Directory (relative to the repository root) holding plugin hooks */
    pluginDirectory: z.string().min(1).optional(),
    hooks: z.record(HookTypeConfigSchema).optional(),
  })
  .strict();

export type CheckpostConfigInput = z.infer<typeof CheckpostConfigSchema>;

/**
 * Main checkpost configuration after defaults have been applied
 */
export interface CheckpostConfig {
  pluginDirectory: string;
  /** Hook settings by hook type, then by hook name */
  hooks: Record<string, Record<string, HookConfig>>;
}

/** Key whose settings apply to every hook of a type */
export const ALL_HOOKS_KEY = 'ALL';

export const SUPPORTED_HOOK_TYPES = ['pre-commit'] as const;

export type HookType = (typeof SUPPORTED_HOOK_TYPES)[number];
