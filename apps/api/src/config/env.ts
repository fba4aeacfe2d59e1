import { readFileSync } from 'node:fs';

export type EnvLike = Record<string, string | undefined>;

const FILE_SUFFIX = '_FILE';

function stripTrailingNewline(raw: string): string {
  return raw.replace(/\r\n/g, '\n').replace(/\n$/, '');
}

/**
 * Fill `NAME` from the file named by `NAME_FILE` (Docker/Kubernetes secrets).
 * A non-empty `NAME` always wins over the file.
 */
export function applyFileBackedEnv(env: EnvLike = process.env): string[] {
  const applied: string[] = [];
  for (const [key, value] of Object.entries(env)) {
    if (!key.endsWith(FILE_SUFFIX)) continue;
    const target = key.slice(0, -FILE_SUFFIX.length);
    if (!target) continue;
    if ((env[target] ?? '').trim()) continue;

    const filePath = (value ?? '').trim();
    if (!filePath) continue;

    try {
      env[target] = stripTrailingNewline(readFileSync(filePath, 'utf8'));
      applied.push(target);
    } catch {
      // Unreadable secret files leave the variable unset; consumers report it.
    }
  }
  return applied;
}

export function readString(env: EnvLike, key: string): string | null {
  const v = env[key]?.trim();
  return v ? v : null;
}

export function readBoolean(env: EnvLike, key: string, fallback: boolean): boolean {
  const v = env[key]?.trim().toLowerCase();
  if (!v) return fallback;
  if (v === 'true' || v === '1' || v === 'yes' || v === 'on') return true;
  if (v === 'false' || v === '0' || v === 'no' || v === 'off') return false;
  return fallback;
}

export function readClampedInt(
  env: EnvLike,
  key: string,
  bounds: { min: number; max: number; fallback: number },
): number {
  const raw = env[key]?.trim();
  if (!raw) return bounds.fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n)) return bounds.fallback;
  return Math.max(bounds.min, Math.min(bounds.max, n));
}

export function readList(env: EnvLike, key: string): string[] {
  return (env[key] ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}
