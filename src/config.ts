import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';
import { BROWSER_VARIANTS } from './browser/installations.js';
import type { BrowserVariant } from './browser/types.js';

export const HOME_DIR_ENV = 'WEBHARNESS_HOME';

const browserVariantSchema = z
  .string()
  .refine((value): value is BrowserVariant => (BROWSER_VARIANTS as readonly string[]).includes(value), {
    message: `Expected one of: ${BROWSER_VARIANTS.join(', ')}`,
  });

const userConfigSchema = z
  .object({
    browser: z
      .object({
        variant: browserVariantSchema.optional(),
        preferEmbedded: z.boolean().optional(),
        runtimeDir: z.string().min(1).nullable().optional(),
        args: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    run: z
      .object({
        directory: z.string().min(1).optional(),
        htmlFile: z.string().min(1).optional(),
        idleTimeoutMs: z.number().int().positive().optional(),
        tabTimeoutMs: z.number().int().positive().optional(),
        debugPort: z.number().int().min(1).max(65535).nullable().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type UserConfig = z.infer<typeof userConfigSchema>;

export interface LoadConfigResult {
  config: UserConfig;
  path: string;
  loaded: boolean;
  /** Set when the file exists but could not be read or validated. */
  error?: string;
}

export function getHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[HOME_DIR_ENV]?.trim();
  return override ? path.resolve(override) : path.join(os.homedir(), '.webharness');
}

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getHomeDir(env), 'config.json');
}

export function parseUserConfig(raw: string): UserConfig {
  const parsed: unknown = JSON5.parse(raw);
  return userConfigSchema.parse(parsed ?? {});
}

export async function loadUserConfig(env: NodeJS.ProcessEnv = process.env): Promise<LoadConfigResult> {
  const file = configPath(env);
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return { config: {}, path: file, loaded: false };
    }
    return { config: {}, path: file, loaded: false, error: `Failed to read ${file}: ${describe(error)}` };
  }
  try {
    return { config: parseUserConfig(raw), path: file, loaded: true };
  } catch (error) {
    return { config: {}, path: file, loaded: false, error: `Ignoring invalid config ${file}: ${describe(error)}` };
  }
}

function isMissingFile(error: unknown): boolean {
  return Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT');
}

function describe(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}
