import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { createJiti } from 'jiti';
import { z } from 'zod';
import { ConfigError, defineConfig, type LookformConfig } from '@lookform/core';

// jiti handles the .ts config at runtime without a build step
const jiti = createJiti(import.meta.url);

export const CONFIG_FILE = 'lookform.config.ts';

// ── Config shape ────────────────────────────────────────────────────

const timeframeListSchema = z.array(z.string());

const configSchema = z.object({
  naming: z
    .object({
      useTableName: z.boolean().optional(),
      includeIsoFields: z.boolean().optional(),
      timeframes: z
        .object({
          date: timeframeListSchema.optional(),
          time: timeframeListSchema.optional(),
        })
        .optional(),
    })
    .optional(),
  generator: z
    .object({
      targetDir: z.string().optional(),
      outputDir: z.string().optional(),
      select: z.string().optional(),
      tag: z.string().optional(),
      includeModels: z.array(z.string()).optional(),
      excludeModels: z.array(z.string()).optional(),
      continueOnError: z.boolean().optional(),
      logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    })
    .optional(),
});

// ── Config loading ──────────────────────────────────────────────────

/**
 * Load the project config from lookform.config.ts.
 * Returns null if no config file exists.
 */
export async function loadConfig(projectDir: string): Promise<LookformConfig | null> {
  const configPath = join(projectDir, CONFIG_FILE);

  if (!existsSync(configPath)) {
    return null;
  }

  const mod = await jiti.import(resolve(configPath), { default: true });
  const parsed = configSchema.safeParse(mod);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`${CONFIG_FILE} failed validation: ${issues}`);
  }

  return defineConfig(parsed.data);
}
