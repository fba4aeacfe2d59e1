import {
  BadGatewayException,
  Inject,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { errorMessage } from '../lib/errors';
import { isRecord } from '../lib/records';
import type { EnrichedFields } from '../recommendations/recommendations.types';

const OMDB_BASE_URL = 'https://www.omdbapi.com/';

/** OMDb fills unknown fields with "N/A". */
function omdbField(payload: Record<string, unknown>, key: string): string | null {
  const v = payload[key];
  if (typeof v !== 'string') return null;
  const t = v.trim();
  if (!t || t.toUpperCase() === 'N/A') return null;
  return t;
}

@Injectable()
export class OmdbService {
  private readonly logger = new Logger(OmdbService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  isConfigured(): boolean {
    return Boolean(this.config.omdb.apiKey);
  }

  /**
   * Look a movie up by exact title. Resolves to null when OMDb has no match;
   * transport failures, timeouts and aborts reject.
   */
  async getMovieByTitle(
    title: string,
    opts: { signal?: AbortSignal } = {},
  ): Promise<EnrichedFields | null> {
    const apiKey = this.config.omdb.apiKey;
    if (!apiKey) throw new ServiceUnavailableException('OMDB_API_KEY is not configured');

    const t = title.trim();
    if (!t) return null;

    const url = new URL(OMDB_BASE_URL);
    url.searchParams.set('t', t);
    url.searchParams.set('apikey', apiKey);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.omdb.timeoutMs);
    const onAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        throw new BadGatewayException(`OMDb lookup failed: HTTP ${res.status}`);
      }

      const payload: unknown = await res.json();
      if (!isRecord(payload)) {
        throw new BadGatewayException('OMDb lookup failed: malformed payload');
      }
      if (payload['Response'] !== 'True') {
        this.logger.debug(
          `OMDb has no match for ${JSON.stringify(t)}: ${omdbField(payload, 'Error') ?? 'unknown'}`,
        );
        return null;
      }

      return {
        posterUrl: omdbField(payload, 'Poster'),
        year: omdbField(payload, 'Year'),
        rating: omdbField(payload, 'imdbRating'),
      };
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(`OMDb lookup failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timeout);
      opts.signal?.removeEventListener('abort', onAbort);
    }
  }
}
