import { applyFileBackedEnv } from './config/env';

/**
 * Resolve `*_FILE` secrets into the environment before any module reads it.
 * Returns the names that were filled from files.
 */
export function ensureBootstrapEnv(env: Record<string, string | undefined> = process.env): string[] {
  return applyFileBackedEnv(env);
}
