export type RecommendationRequest = {
  query: string;
  /** Ordered set of catalog ids the user already picked. */
  selectedIds: string[];
};

export type Candidate = {
  id: string;
  title: string;
  overview: string;
  rawPosterReference: string | null;
  similarityScore: number;
  metadata: Record<string, string>;
};

export type EnrichedFields = {
  posterUrl: string | null;
  year: string | null;
  rating: string | null;
};

export const EMPTY_ENRICHMENT: EnrichedFields = Object.freeze({
  posterUrl: null,
  year: null,
  rating: null,
});

export type Reasoning =
  | { kind: 'uniform'; text: string }
  | { kind: 'per_item'; byId: Record<string, string> };

export type RankingSource = 'oracle' | 'default_selection' | 'fallback';

export type RankingDecision = {
  /** Chosen subset. Display order always comes from the vector index. */
  selectedIds: string[];
  reasoning: Reasoning;
  source: RankingSource;
};

export type MovieResult = {
  id: string;
  title: string;
  overview: string;
  poster_url: string | null;
  score: number;
  year: string | null;
  imdb_rating: string | null;
  reasoning: string;
};

export type RecommendSuccessResponse = {
  ai_reasoning: string | null;
  movies: MovieResult[];
};

export type RecommendErrorResponse = {
  error: string;
  movies: [];
};

export type RecommendResponse = RecommendSuccessResponse | RecommendErrorResponse;
