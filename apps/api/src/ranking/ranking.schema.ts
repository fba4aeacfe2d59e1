import { z } from 'zod';
import { errorMessage } from '../lib/errors';
import { DEFAULT_ITEM_REASONING } from '../recommendations/recommendations.constants';
import type { Reasoning } from '../recommendations/recommendations.types';

export const rankingResponseSchema = z.object({
  movie_ids: z.array(z.string()),
  reasoning: z.union([z.string(), z.record(z.string())]),
});

export type RankingResponse = z.infer<typeof rankingResponseSchema>;

export function stripMarkdownFences(text: string): string {
  let t = text.trim();
  if (!t.startsWith('```')) return t;
  t = t.replace(/^```[a-zA-Z0-9_-]*\s*/, '').trim();
  t = t.replace(/\s*```$/, '').trim();
  return t;
}

export type ParsedRanking =
  | { ok: true; value: RankingResponse }
  | { ok: false; error: string };

/** Model output is untrusted: anything off-schema is rejected whole. */
export function parseRankingResponse(text: string): ParsedRanking {
  const body = stripMarkdownFences(text);
  if (!body) return { ok: false, error: 'empty response' };

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${errorMessage(err)}` };
  }

  const parsed = rankingResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    return { ok: false, error: `schema violation at ${where}: ${issue?.message ?? 'invalid'}` };
  }
  return { ok: true, value: parsed.data };
}

export function toReasoning(raw: RankingResponse['reasoning']): Reasoning {
  if (typeof raw === 'string') {
    return { kind: 'uniform', text: raw.trim() || DEFAULT_ITEM_REASONING };
  }
  // fromEntries defines own properties, so a `__proto__` key stays data.
  const byId: Record<string, string> = Object.fromEntries(
    Object.entries(raw).map(([id, text]): [string, string] => [id.trim(), text.trim()]),
  );
  return { kind: 'per_item', byId };
}
