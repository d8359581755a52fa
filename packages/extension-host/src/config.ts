/**
 * Host and per-extension configuration.
 *
 * Host settings come from `MORPHIR_EXT_*` environment variables. Extension
 * entries arrive as an `{ [id]: config }` map produced by whatever config
 * file format the embedding application uses; each entry is validated on
 * its own so one bad entry does not hide the rest.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

import { DEFAULT_MAX_MEMORY_BYTES, ResourceLimitsSchema } from './extension/types.js';

// ---------------------------------------------------------------------------
// Extension config
// ---------------------------------------------------------------------------

export const ExtensionSourceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('path'), path: z.string().min(1) }),
  z.object({ type: z.literal('url'), url: z.string().url() }),
  z.object({
    type: z.literal('github'),
    repo: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/name'),
    tag: z.string().min(1).optional(),
    asset: z.string().min(1),
  }),
]);

export type ExtensionSource = z.infer<typeof ExtensionSourceSchema>;

export const ExtensionConfigSchema = z.object({
  id: z.string().min(1),
  source: ExtensionSourceSchema,
  enabled: z.boolean().default(true),
  config: z.record(z.unknown()).default({}),
  limits: ResourceLimitsSchema.optional(),
});

export type ExtensionConfig = z.infer<typeof ExtensionConfigSchema>;
export type ExtensionConfigInput = z.input<typeof ExtensionConfigSchema>;

export type ConfigOutcome =
  | { id: string; ok: true; config: ExtensionConfig }
  | { id: string; ok: false; error: string };

/**
 * Validate a `{ [id]: config }` map. The map key supplies the id when an
 * entry omits it; an entry whose own id disagrees with its key is rejected.
 */
export function parseExtensionsConfig(raw: unknown): ConfigOutcome[] {
  const map = z.record(z.unknown()).safeParse(raw);
  if (!map.success) {
    throw new Error(`Extensions config must be an object keyed by extension id`);
  }

  const outcomes: ConfigOutcome[] = [];
  for (const [id, entry] of Object.entries(map.data)) {
    const withId = typeof entry === 'object' && entry !== null && !('id' in entry)
      ? { ...entry, id }
      : entry;
    const parsed = ExtensionConfigSchema.safeParse(withId);
    if (!parsed.success) {
      outcomes.push({ id, ok: false, error: parsed.error.issues.map(formatIssue).join('; ') });
    } else if (parsed.data.id !== id) {
      outcomes.push({ id, ok: false, error: `id "${parsed.data.id}" does not match key "${id}"` });
    } else {
      outcomes.push({ id, ok: true, config: parsed.data });
    }
  }
  return outcomes;
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

// ---------------------------------------------------------------------------
// Host config
// ---------------------------------------------------------------------------

export interface HostConfig {
  logLevel: string;
  cacheDir: string;
  maxMemoryBytes: number;
  timeoutMs: number | undefined;
  maxFuel: number | undefined;
  hardKill: boolean;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function positiveInt(env: Record<string, string | undefined>, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function defaultCacheDir(env: Record<string, string | undefined>): string {
  const base = env.XDG_CACHE_HOME || join(homedir(), '.cache');
  return join(base, 'morphir', 'extensions');
}

export function loadHostConfig(env: Record<string, string | undefined> = process.env): HostConfig {
  const logLevel = env.MORPHIR_EXT_LOG_LEVEL || 'info';
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new Error(`MORPHIR_EXT_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  const hardKill = env.MORPHIR_EXT_HARD_KILL;
  if (hardKill !== undefined && hardKill !== '' && hardKill !== 'true' && hardKill !== 'false'
    && hardKill !== '1' && hardKill !== '0') {
    throw new Error(`MORPHIR_EXT_HARD_KILL must be true or false, got "${hardKill}"`);
  }

  return {
    logLevel,
    cacheDir: env.MORPHIR_EXT_CACHE_DIR || defaultCacheDir(env),
    maxMemoryBytes: positiveInt(env, 'MORPHIR_EXT_MAX_MEMORY_BYTES') ?? DEFAULT_MAX_MEMORY_BYTES,
    timeoutMs: positiveInt(env, 'MORPHIR_EXT_TIMEOUT_MS'),
    maxFuel: positiveInt(env, 'MORPHIR_EXT_MAX_FUEL'),
    hardKill: hardKill === 'true' || hardKill === '1',
  };
}
