import { DEFAULT_IMAGE_BASE_URL, loadAppConfig } from './app-config';

describe('loadAppConfig', () => {
  it('defaults to the largest result variant and a 5s enrichment timeout', () => {
    const config = loadAppConfig({});

    expect(config.recommendations).toEqual({
      topK: 50,
      contextSize: 50,
      resultCount: 15,
      imageBaseUrl: DEFAULT_IMAGE_BASE_URL,
      cancelEnrichmentOnDisconnect: false,
    });
    expect(config.omdb).toEqual({ apiKey: null, timeoutMs: 5000 });
    expect(config.http.port).toBe(8000);
    expect(config.gemini.apiKey).toBeNull();
    expect(config.gemini.embeddingDimension).toBe(768);
  });

  it('clamps tunables into their allowed ranges', () => {
    const config = loadAppConfig({
      RECS_TOP_K: '1000',
      RECS_CONTEXT_SIZE: '0',
      RECS_RESULT_COUNT: '5',
      ENRICHMENT_TIMEOUT_MS: '10',
    });

    expect(config.recommendations.topK).toBe(200);
    expect(config.recommendations.contextSize).toBe(1);
    expect(config.recommendations.resultCount).toBe(5);
    expect(config.omdb.timeoutMs).toBe(100);
  });

  it('reads credentials and the disconnect policy', () => {
    const config = loadAppConfig({
      GEMINI_KEY: 'test-secret',
      PINECONE_KEY: 'test-secret',
      PINECONE_INDEX_HOST: 'movies.example.test',
      CANCEL_ENRICHMENT_ON_DISCONNECT: 'true',
      CORS_ORIGINS: 'http://localhost:3000,http://localhost:5173',
    });

    expect(config.gemini.apiKey).toBe('test-secret');
    expect(config.pinecone.indexHost).toBe('movies.example.test');
    expect(config.pinecone.namespace).toBeNull();
    expect(config.recommendations.cancelEnrichmentOnDisconnect).toBe(true);
    expect(config.http.corsOrigins).toEqual([
      'http://localhost:3000',
      'http://localhost:5173',
    ]);
  });

  it('turns swagger and request logging off in production unless asked', () => {
    expect(loadAppConfig({ NODE_ENV: 'production' }).http).toMatchObject({
      swaggerEnabled: false,
      requestLogging: false,
    });
    expect(
      loadAppConfig({ NODE_ENV: 'production', SWAGGER_ENABLED: 'true' }).http
        .swaggerEnabled,
    ).toBe(true);
  });
});
