/**
 * Server configuration from environment variables
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { VaultNotConfiguredError } from './core/shared/errors.js';

const VAULT_MARKERS = ['.obsidian'];

export const DEFAULT_CONTEXT_TAG = 'assistant';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform(v => v === 'true' || v === '1');

const EnvSchema = z.object({
  MDVAULT_PATH: z.string().trim().min(1).optional(),
  VAULT_PATH: z.string().trim().min(1).optional(),
  MDVAULT_ALLOW_NEW_TAGS: booleanFlag.optional(),
  MDVAULT_CONTEXT_TAG: z.string().trim().min(1).optional(),
  MDVAULT_INJECT_CONTEXT: booleanFlag.optional(),
});

export interface ServerConfig {
  vaultPath: string;
  allowNewTags: boolean;
  contextTag: string;
  injectContext: boolean;
}

function isVaultDir(dir: string): boolean {
  return VAULT_MARKERS.some(marker => {
    const candidate = path.join(dir, marker);
    return fs.existsSync(candidate) && fs.statSync(candidate).isDirectory();
  });
}

/**
 * Nearest directory at or above `from` holding a vault marker; `from` itself
 * when no ancestor has one.
 */
export function findVaultRoot(from: string = process.cwd()): string {
  const start = path.resolve(from);

  for (let dir = start; ; dir = path.dirname(dir)) {
    if (isVaultDir(dir)) return dir;
    if (path.dirname(dir) === dir) return start;
  }
}

/**
 * Parse and validate configuration. Bad values fail here, before the server
 * starts, with every offending variable named.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new VaultNotConfiguredError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const explicit = vars.MDVAULT_PATH ?? vars.VAULT_PATH;

  return {
    vaultPath: explicit ? path.resolve(cwd, explicit) : findVaultRoot(cwd),
    allowNewTags: vars.MDVAULT_ALLOW_NEW_TAGS ?? false,
    contextTag: vars.MDVAULT_CONTEXT_TAG ?? DEFAULT_CONTEXT_TAG,
    injectContext: vars.MDVAULT_INJECT_CONTEXT ?? true,
  };
}
