import type { Candidate } from './recommendations.types';

function titleKey(title: string): string {
  return title.trim().toLowerCase();
}

export function filterCandidates(params: {
  candidates: Candidate[];
  selectedIds: string[];
  selectedTitles: string[];
  contextSize: number;
}): Candidate[] {
  const limit = Math.max(0, Math.trunc(params.contextSize));
  const excludedIds = new Set(params.selectedIds);
  const excludedTitles = new Set(
    params.selectedTitles.map(titleKey).filter(Boolean),
  );

  const keptIds = new Set<string>();
  const keptTitles = new Set<string>();
  const out: Candidate[] = [];

  for (const c of params.candidates) {
    if (out.length >= limit) break;
    if (excludedIds.has(c.id) || keptIds.has(c.id)) continue;

    const key = titleKey(c.title);
    if (key && (excludedTitles.has(key) || keptTitles.has(key))) continue;

    keptIds.add(c.id);
    if (key) keptTitles.add(key);
    out.push(c);
  }

  return out;
}
