import type { Candidate } from '../recommendations/recommendations.types';

const OVERVIEW_MAX_CHARS = 500;

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').replace(/\|/g, '/').trim();
}

export function renderCandidateLine(c: Candidate): string {
  const overview = oneLine(c.overview);
  const clipped =
    overview.length > OVERVIEW_MAX_CHARS
      ? `${overview.slice(0, OVERVIEW_MAX_CHARS)}…`
      : overview;
  return `${c.id} | ${oneLine(c.title) || '(untitled)'} | ${clipped || '(no overview)'}`;
}

export function buildRankingPrompt(params: {
  query: string;
  likedTitles: string[];
  candidates: Candidate[];
  limit: number;
}): string {
  const liked = params.likedTitles.map(oneLine).filter(Boolean);

  return [
    `You are a movie recommendation engine.`,
    ``,
    `User query: ${JSON.stringify(params.query)}`,
    `User likes: ${liked.length ? liked.join(', ') : '(none)'}`,
    ``,
    `Candidates (id | title | overview):`,
    ...params.candidates.map(renderCandidateLine),
    ``,
    `Pick up to ${params.limit} candidates that best fit the user.`,
    ``,
    `Return STRICT JSON only (no markdown, no prose) with this schema:`,
    `{`,
    `  "movie_ids": ["id1", "id2"],`,
    `  "reasoning": { "id1": "why it fits", "id2": "why it fits" }`,
    `}`,
    ``,
    `Rules:`,
    `- movie_ids must be ids copied from the candidate list, as strings.`,
    `- reasoning may instead be one short string explaining the whole selection.`,
    `- Keep each explanation to one sentence.`,
  ].join('\n');
}
