import { Injectable } from '@nestjs/common';
import type { HealthResponseDto } from './app.dto';
import { CatalogService } from './catalog/catalog.service';
import { GeminiService } from './gemini/gemini.service';
import { errorMessage } from './lib/errors';
import { OmdbService } from './omdb/omdb.service';
import { PineconeService } from './pinecone/pinecone.service';

export type ReadinessCheck = { ok: true } | { ok: false; error: string };

export type ReadinessResponse = {
  status: 'ready' | 'not_ready';
  time: string;
  checks: {
    catalog: ReadinessCheck;
    gemini: ReadinessCheck;
    vectorIndex: ReadinessCheck;
  };
  /** Optional integrations; their absence never blocks readiness. */
  optional: {
    omdb: ReadinessCheck;
  };
};

function configured(ok: boolean, missing: string): ReadinessCheck {
  return ok ? { ok: true } : { ok: false, error: `${missing} is not set` };
}

@Injectable()
export class AppService {
  constructor(
    private readonly catalog: CatalogService,
    private readonly gemini: GeminiService,
    private readonly pinecone: PineconeService,
    private readonly omdb: OmdbService,
  ) {}

  getHealth(): HealthResponseDto {
    return {
      status: 'ok' as const,
      time: new Date().toISOString(),
    };
  }

  getReadiness(): ReadinessResponse {
    let catalog: ReadinessCheck;
    try {
      this.catalog.ping();
      catalog = { ok: true };
    } catch (err) {
      catalog = { ok: false, error: errorMessage(err) };
    }

    const checks: ReadinessResponse['checks'] = {
      catalog,
      gemini: configured(this.gemini.isConfigured(), 'GEMINI_KEY'),
      vectorIndex: configured(
        this.pinecone.isConfigured(),
        'PINECONE_KEY/PINECONE_INDEX_HOST',
      ),
    };
    const ready = Object.values(checks).every((c) => c.ok);

    return {
      status: ready ? 'ready' : 'not_ready',
      time: new Date().toISOString(),
      checks,
      optional: { omdb: configured(this.omdb.isConfigured(), 'OMDB_API_KEY') },
    };
  }
}
