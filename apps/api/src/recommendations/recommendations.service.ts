import { Inject, Injectable, Logger } from '@nestjs/common';
import { CatalogService } from '../catalog/catalog.service';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { GeminiService } from '../gemini/gemini.service';
import { errorStack } from '../lib/errors';
import { PineconeService } from '../pinecone/pinecone.service';
import { RankingService } from '../ranking/ranking.service';
import { filterCandidates } from './candidate-filter';
import { MetadataEnricherService } from './metadata-enricher.service';
import { buildAugmentedQuery } from './query-augmenter';
import { NO_MATCHES_MESSAGE } from './recommendations.constants';
import {
  EmbeddingError,
  SearchError,
  classifyFailure,
} from './recommendations.errors';
import type {
  Candidate,
  RecommendationRequest,
  RecommendResponse,
} from './recommendations.types';
import {
  aiReasoningOf,
  assembleMovies,
  selectInIndexOrder,
} from './response-assembler';

@Injectable()
export class RecommendationsService {
  private readonly logger = new Logger(RecommendationsService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly catalog: CatalogService,
    private readonly gemini: GeminiService,
    private readonly pinecone: PineconeService,
    private readonly ranking: RankingService,
    private readonly enricher: MetadataEnricherService,
  ) {}

  /**
   * Run the whole pipeline for one request. Only embedding and vector search
   * can abort it; their failures (and anything unexpected) come back as an
   * `error` payload rather than a rejection.
   */
  async recommend(
    req: RecommendationRequest,
    opts: { signal?: AbortSignal } = {},
  ): Promise<RecommendResponse> {
    try {
      return await this.run(req, opts.signal);
    } catch (err) {
      const failure = classifyFailure(err);
      if (failure.kind === 'unexpected') {
        this.logger.error(failure.message, errorStack(err));
      } else {
        this.logger.warn(failure.message);
      }
      return { error: failure.message, movies: [] };
    }
  }

  private async run(
    req: RecommendationRequest,
    signal: AbortSignal | undefined,
  ): Promise<RecommendResponse> {
    const { topK, contextSize, resultCount, imageBaseUrl } =
      this.config.recommendations;

    const likedTitles = this.catalog.getTitlesByIds(req.selectedIds);
    const searchText = buildAugmentedQuery(req.query, likedTitles);
    this.logger.log(
      `Recommend: selected=${req.selectedIds.length} liked=${likedTitles.length} query=${JSON.stringify(searchText.slice(0, 80))}`,
    );

    const vector = await this.embed(searchText);
    const matches = await this.search(vector, topK);
    if (!matches.length) {
      this.logger.log('Recommend: index returned no matches');
      return { ai_reasoning: NO_MATCHES_MESSAGE, movies: [] };
    }

    const candidates = filterCandidates({
      candidates: matches,
      selectedIds: req.selectedIds,
      selectedTitles: likedTitles,
      contextSize,
    });

    const decision = await this.ranking.rank({
      query: req.query,
      likedTitles,
      candidates,
      limit: resultCount,
    });

    const survivors = selectInIndexOrder(candidates, decision.selectedIds);
    const enrichment = await this.enricher.enrichAll(survivors, { signal });

    const movies = assembleMovies({
      candidates,
      selectedIds: decision.selectedIds,
      enrichment,
      reasoning: decision.reasoning,
      imageBaseUrl,
    });

    this.logger.log(
      `Recommend: matches=${matches.length} candidates=${candidates.length} returned=${movies.length} ranking=${decision.source}`,
    );
    return { ai_reasoning: aiReasoningOf(decision.reasoning), movies };
  }

  private async embed(text: string): Promise<number[]> {
    try {
      return await this.gemini.embedQuery(text);
    } catch (err) {
      throw new EmbeddingError(err);
    }
  }

  private async search(vector: number[], topK: number): Promise<Candidate[]> {
    try {
      return await this.pinecone.query(vector, topK);
    } catch (err) {
      throw new SearchError(err);
    }
  }
}
