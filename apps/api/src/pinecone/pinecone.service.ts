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
import type { Candidate } from '../recommendations/recommendations.types';

const PINECONE_API_VERSION = '2024-07';

function stringifyMetadata(raw: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(raw)) return out;
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) continue;
    if (Array.isArray(value)) {
      out[key] = value.map((v) => String(v)).join(', ');
    } else if (typeof value === 'object') {
      out[key] = JSON.stringify(value);
    } else {
      out[key] = String(value);
    }
  }
  return out;
}

export function toCandidate(match: unknown): Candidate | null {
  if (!isRecord(match)) return null;
  const id = match['id'];
  const score = match['score'];
  if (typeof id !== 'string' || !id.trim()) return null;
  if (typeof score !== 'number' || !Number.isFinite(score)) return null;

  const metadata = stringifyMetadata(match['metadata']);
  return {
    id,
    title: metadata['title'] ?? '',
    overview: metadata['overview'] ?? '',
    rawPosterReference: metadata['poster_path'] ?? metadata['poster_url'] ?? null,
    similarityScore: score,
    metadata,
  };
}

@Injectable()
export class PineconeService {
  private readonly logger = new Logger(PineconeService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  isConfigured(): boolean {
    const { apiKey, indexHost } = this.config.pinecone;
    return Boolean(apiKey && indexHost);
  }

  /**
   * Nearest neighbours of `vector`, best first, exactly as the index ranks them.
   */
  async query(vector: number[], topK: number): Promise<Candidate[]> {
    const { apiKey, indexHost, namespace, timeoutMs } = this.config.pinecone;
    if (!apiKey || !indexHost) {
      throw new ServiceUnavailableException(
        'PINECONE_KEY and PINECONE_INDEX_HOST are required',
      );
    }

    const url = this.buildQueryUrl(indexHost);
    const k = Math.max(1, Math.trunc(topK));
    this.logger.debug(`Pinecone query: topK=${k} dims=${vector.length}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          'Api-Key': apiKey,
          'X-Pinecone-API-Version': PINECONE_API_VERSION,
        },
        body: JSON.stringify({
          vector,
          topK: k,
          includeMetadata: true,
          includeValues: false,
          ...(namespace ? { namespace } : {}),
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new BadGatewayException(
          `Pinecone query failed: HTTP ${res.status} ${body.slice(0, 300)}`.trim(),
        );
      }

      const data: unknown = await res.json();
      const matches = isRecord(data) ? data['matches'] : undefined;
      if (!Array.isArray(matches)) {
        throw new BadGatewayException('Pinecone query failed: response has no matches array');
      }

      const candidates: Candidate[] = [];
      let skipped = 0;
      for (const match of matches) {
        const c = toCandidate(match);
        if (c) candidates.push(c);
        else skipped += 1;
      }
      if (skipped) {
        this.logger.warn(`Pinecone query: skipped ${skipped} malformed match(es)`);
      }
      return candidates;
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(`Pinecone query failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildQueryUrl(indexHost: string): string {
    const host = indexHost.replace(/\/+$/, '');
    const base = /^https?:\/\//i.test(host) ? host : `https://${host}`;
    return `${base}/query`;
  }
}
