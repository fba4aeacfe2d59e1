import { pickPosterReference, resolvePosterUrl } from '../posters/poster-url';
import {
  DEFAULT_ITEM_REASONING,
  PER_ITEM_SUMMARY,
} from './recommendations.constants';
import {
  EMPTY_ENRICHMENT,
  type Candidate,
  type EnrichedFields,
  type MovieResult,
  type Reasoning,
} from './recommendations.types';

export function reasoningFor(reasoning: Reasoning, id: string): string {
  if (reasoning.kind === 'uniform') return reasoning.text;
  // Ids are opaque; `constructor` or `toString` must not hit the prototype.
  if (!Object.prototype.hasOwnProperty.call(reasoning.byId, id)) {
    return DEFAULT_ITEM_REASONING;
  }
  const text = reasoning.byId[id];
  return typeof text === 'string' && text.trim() ? text.trim() : DEFAULT_ITEM_REASONING;
}

export function aiReasoningOf(reasoning: Reasoning): string {
  return reasoning.kind === 'uniform' ? reasoning.text : PER_ITEM_SUMMARY;
}

/**
 * Candidates in vector-search order, restricted to the selected ids. Whatever
 * order the ranking step listed its ids in is ignored.
 */
export function selectInIndexOrder(
  candidates: Candidate[],
  selectedIds: string[],
): Candidate[] {
  const wanted = new Set(selectedIds);
  return candidates.filter((c) => wanted.has(c.id));
}

export function assembleMovies(params: {
  candidates: Candidate[];
  selectedIds: string[];
  enrichment: ReadonlyMap<string, EnrichedFields>;
  reasoning: Reasoning;
  imageBaseUrl: string;
}): MovieResult[] {
  return selectInIndexOrder(params.candidates, params.selectedIds).map((c) => {
    const extra = params.enrichment.get(c.id) ?? EMPTY_ENRICHMENT;
    const posterRef = pickPosterReference(extra.posterUrl, c.rawPosterReference);

    return {
      id: c.id,
      title: c.title,
      overview: c.overview,
      poster_url: resolvePosterUrl(posterRef, params.imageBaseUrl),
      score: c.similarityScore,
      year: extra.year,
      imdb_rating: extra.rating,
      reasoning: reasoningFor(params.reasoning, c.id),
    };
  });
}
