/**
 * Runtime configuration, read from the environment and validated with zod.
 *
 *   SENTIENCE_SNAPSHOT_PATH         default file for .save/.load (ctx.json)
 *   SENTIENCE_INDENT                narration indent unit (two spaces)
 *   SENTIENCE_SIMILARITY_THRESHOLD  cosine cut-off for similarTo (0.75)
 *   SENTIENCE_CONDITIONS            loss-only | loss-and-context
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_SIMILARITY_THRESHOLD } from './memory';

export const configSchema = z.object({
  snapshotPath: z.string().min(1).default('ctx.json'),
  indentUnit: z.string().default('  '),
  similarityThreshold: z.coerce.number().min(0).max(1).default(DEFAULT_SIMILARITY_THRESHOLD),
  conditions: z.enum(['loss-only', 'loss-and-context']).default('loss-only'),
});

export type SentienceConfig = z.infer<typeof configSchema>;

const ENV_KEYS: Record<keyof SentienceConfig, string> = {
  snapshotPath: 'SENTIENCE_SNAPSHOT_PATH',
  indentUnit: 'SENTIENCE_INDENT',
  similarityThreshold: 'SENTIENCE_SIMILARITY_THRESHOLD',
  conditions: 'SENTIENCE_CONDITIONS',
};

/**
 * Build the configuration from environment variables; unset or empty
 * variables fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SentienceConfig {
  const input: Record<string, string> = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') input[field] = value;
  }

  const result = configSchema.safeParse(input);
  if (!result.success) {
    const first = result.error.issues[0];
    const field = String(first.path[0] ?? 'config');
    throw new ConfigError(isConfigField(field) ? ENV_KEYS[field] : field, first.message);
  }
  return result.data;
}

function isConfigField(name: string): name is keyof SentienceConfig {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, name);
}

export const DEFAULT_CONFIG: SentienceConfig = configSchema.parse({});
