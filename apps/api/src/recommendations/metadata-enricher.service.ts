import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../lib/errors';
import { OmdbService } from '../omdb/omdb.service';
import {
  EMPTY_ENRICHMENT,
  type Candidate,
  type EnrichedFields,
} from './recommendations.types';

@Injectable()
export class MetadataEnricherService {
  private readonly logger = new Logger(MetadataEnricherService.name);

  constructor(private readonly omdb: OmdbService) {}

  /**
   * One lookup per candidate, all in flight at once. A failed lookup only
   * blanks its own candidate; the returned map always has every id.
   */
  async enrichAll(
    candidates: Candidate[],
    opts: { signal?: AbortSignal } = {},
  ): Promise<Map<string, EnrichedFields>> {
    const out = new Map<string, EnrichedFields>();
    if (!candidates.length) return out;

    if (!this.omdb.isConfigured()) {
      this.logger.debug('OMDb not configured; skipping enrichment');
      for (const c of candidates) out.set(c.id, EMPTY_ENRICHMENT);
      return out;
    }

    const settled = await Promise.all(
      candidates.map(async (c) => ({
        id: c.id,
        fields: await this.enrichOne(c, opts.signal),
      })),
    );
    for (const { id, fields } of settled) out.set(id, fields);

    const hits = settled.filter((s) => s.fields !== EMPTY_ENRICHMENT).length;
    this.logger.log(`Enrichment: ${hits}/${candidates.length} enriched`);
    return out;
  }

  private async enrichOne(
    candidate: Candidate,
    signal: AbortSignal | undefined,
  ): Promise<EnrichedFields> {
    try {
      const found = await this.omdb.getMovieByTitle(candidate.title, { signal });
      return found ?? EMPTY_ENRICHMENT;
    } catch (err) {
      this.logger.warn(
        `Enrichment failed for id=${candidate.id} title=${JSON.stringify(candidate.title)}: ${errorMessage(err)}`,
      );
      return EMPTY_ENRICHMENT;
    }
  }
}
