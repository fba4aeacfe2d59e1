import type { Candidate } from './recommendations.types';

export function makeCandidate(
  id: string,
  overrides: Partial<Candidate> = {},
): Candidate {
  return {
    id,
    title: `Movie ${id}`,
    overview: `Overview ${id}`,
    rawPosterReference: `/poster-${id}.jpg`,
    similarityScore: 0.9,
    metadata: {},
    ...overrides,
  };
}
