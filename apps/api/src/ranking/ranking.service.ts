import { Injectable, Logger } from '@nestjs/common';
import { GeminiService } from '../gemini/gemini.service';
import { errorMessage } from '../lib/errors';
import { FALLBACK_REASONING } from '../recommendations/recommendations.constants';
import type {
  Candidate,
  RankingDecision,
} from '../recommendations/recommendations.types';
import { buildRankingPrompt } from './ranking.prompt';
import { parseRankingResponse, toReasoning } from './ranking.schema';

function firstIds(candidates: Candidate[], limit: number): string[] {
  return candidates.slice(0, limit).map((c) => c.id);
}

export function fallbackDecision(candidates: Candidate[], limit: number): RankingDecision {
  return {
    selectedIds: firstIds(candidates, limit),
    reasoning: { kind: 'uniform', text: FALLBACK_REASONING },
    source: 'fallback',
  };
}

@Injectable()
export class RankingService {
  private readonly logger = new Logger(RankingService.name);

  constructor(private readonly gemini: GeminiService) {}

  /**
   * Ask the model to curate `candidates`. Never rejects: call errors, timeouts
   * and off-schema output all resolve to the first `limit` candidates in
   * similarity order with the generic explanation.
   */
  async rank(params: {
    query: string;
    likedTitles: string[];
    candidates: Candidate[];
    limit: number;
  }): Promise<RankingDecision> {
    const { candidates } = params;
    const limit = Math.max(1, Math.trunc(params.limit));

    if (!candidates.length) {
      return fallbackDecision(candidates, limit);
    }
    if (!this.gemini.isConfigured()) {
      this.logger.warn('Ranking skipped (Gemini not configured); using fallback');
      return fallbackDecision(candidates, limit);
    }

    const prompt = buildRankingPrompt({
      query: params.query,
      likedTitles: params.likedTitles,
      candidates,
      limit,
    });

    let text: string;
    try {
      text = await this.gemini.generateJson(prompt);
    } catch (err) {
      this.logger.warn(`Ranking call failed; using fallback: ${errorMessage(err)}`);
      return fallbackDecision(candidates, limit);
    }

    const parsed = parseRankingResponse(text);
    if (!parsed.ok) {
      this.logger.warn(`Ranking output rejected; using fallback: ${parsed.error}`);
      return fallbackDecision(candidates, limit);
    }

    const known = new Set(candidates.map((c) => c.id));
    const selectedIds: string[] = [];
    let unknown = 0;
    for (const raw of parsed.value.movie_ids) {
      const id = known.has(raw) ? raw : raw.trim();
      if (!known.has(id)) {
        unknown += 1;
        continue;
      }
      if (!selectedIds.includes(id)) selectedIds.push(id);
    }
    if (unknown) {
      this.logger.warn(`Ranking returned ${unknown} id(s) outside the candidate set`);
    }

    const reasoning = toReasoning(parsed.value.reasoning);
    if (!selectedIds.length) {
      this.logger.log('Ranking selected nothing usable; taking the top candidates');
      return {
        selectedIds: firstIds(candidates, limit),
        reasoning,
        source: 'default_selection',
      };
    }

    // The model's order carries no weight; keep the index order when capping.
    const chosen = new Set(selectedIds);
    return {
      selectedIds: candidates
        .filter((c) => chosen.has(c.id))
        .slice(0, limit)
        .map((c) => c.id),
      reasoning,
      source: 'oracle',
    };
  }
}
