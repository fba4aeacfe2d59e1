import { join } from 'node:path';
import {
  type EnvLike,
  readBoolean,
  readClampedInt,
  readList,
  readString,
} from './env';

export const APP_CONFIG = Symbol('APP_CONFIG');

export const DEFAULT_IMAGE_BASE_URL = 'https://image.tmdb.org/t/p/w500';

export type AppConfig = {
  http: {
    host: string;
    port: number;
    corsOrigins: string[];
    swaggerEnabled: boolean;
    requestLogging: boolean;
  };
  gemini: {
    apiKey: string | null;
    embeddingModel: string;
    chatModel: string;
    embeddingDimension: number;
    embeddingTimeoutMs: number;
    rankingTimeoutMs: number;
  };
  pinecone: {
    apiKey: string | null;
    indexHost: string | null;
    namespace: string | null;
    timeoutMs: number;
  };
  omdb: {
    apiKey: string | null;
    timeoutMs: number;
  };
  catalog: {
    dbPath: string;
  };
  recommendations: {
    /** K: how many neighbours the vector index is asked for. */
    topK: number;
    /** C: how many filtered candidates the ranking prompt sees. */
    contextSize: number;
    /** R: how many movies end up in the response. */
    resultCount: number;
    imageBaseUrl: string;
    cancelEnrichmentOnDisconnect: boolean;
  };
};

export function loadAppConfig(env: EnvLike = process.env): AppConfig {
  const production = env.NODE_ENV === 'production';

  return {
    http: {
      host: readString(env, 'HOST') ?? '0.0.0.0',
      port: readClampedInt(env, 'PORT', { min: 1, max: 65535, fallback: 8000 }),
      corsOrigins: readList(env, 'CORS_ORIGINS'),
      swaggerEnabled: readBoolean(env, 'SWAGGER_ENABLED', !production),
      requestLogging: readBoolean(env, 'HTTP_LOGGING', !production),
    },
    gemini: {
      apiKey: readString(env, 'GEMINI_KEY'),
      embeddingModel:
        readString(env, 'GEMINI_EMBEDDING_MODEL') ?? 'text-embedding-004',
      chatModel: readString(env, 'GEMINI_CHAT_MODEL') ?? 'gemini-1.5-flash',
      embeddingDimension: readClampedInt(env, 'EMBEDDING_DIMENSION', {
        min: 1,
        max: 8192,
        fallback: 768,
      }),
      embeddingTimeoutMs: readClampedInt(env, 'EMBEDDING_TIMEOUT_MS', {
        min: 100,
        max: 120_000,
        fallback: 15_000,
      }),
      rankingTimeoutMs: readClampedInt(env, 'RANKING_TIMEOUT_MS', {
        min: 100,
        max: 120_000,
        fallback: 30_000,
      }),
    },
    pinecone: {
      apiKey: readString(env, 'PINECONE_KEY'),
      indexHost: readString(env, 'PINECONE_INDEX_HOST'),
      namespace: readString(env, 'PINECONE_NAMESPACE'),
      timeoutMs: readClampedInt(env, 'SEARCH_TIMEOUT_MS', {
        min: 100,
        max: 120_000,
        fallback: 15_000,
      }),
    },
    omdb: {
      apiKey: readString(env, 'OMDB_API_KEY'),
      timeoutMs: readClampedInt(env, 'ENRICHMENT_TIMEOUT_MS', {
        min: 100,
        max: 60_000,
        fallback: 5_000,
      }),
    },
    catalog: {
      dbPath: readString(env, 'CATALOG_DB_PATH') ?? join(process.cwd(), 'movies.db'),
    },
    recommendations: {
      topK: readClampedInt(env, 'RECS_TOP_K', { min: 1, max: 200, fallback: 50 }),
      contextSize: readClampedInt(env, 'RECS_CONTEXT_SIZE', {
        min: 1,
        max: 200,
        fallback: 50,
      }),
      resultCount: readClampedInt(env, 'RECS_RESULT_COUNT', {
        min: 1,
        max: 50,
        fallback: 15,
      }),
      imageBaseUrl: readString(env, 'IMAGE_BASE_URL') ?? DEFAULT_IMAGE_BASE_URL,
      cancelEnrichmentOnDisconnect: readBoolean(
        env,
        'CANCEL_ENRICHMENT_ON_DISCONNECT',
        false,
      ),
    },
  };
}
