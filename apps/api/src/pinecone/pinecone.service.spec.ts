import { BadGatewayException, ServiceUnavailableException } from '@nestjs/common';
import { loadAppConfig } from '../config/app-config';
import { PineconeService, toCandidate } from './pinecone.service';

type MockResponseInput = {
  status: number;
  text?: string;
  json?: unknown;
};

function mockResponse(input: MockResponseInput): Response {
  const { status } = input;
  return {
    ok: status >= 200 && status < 300,
    status,
    text: jest.fn().mockResolvedValue(input.text ?? ''),
    json: jest.fn().mockResolvedValue(input.json ?? {}),
  } as unknown as Response;
}

describe('toCandidate', () => {
  it('stringifies metadata and picks the poster reference', () => {
    expect(
      toCandidate({
        id: '603',
        score: 0.87,
        metadata: {
          title: 'The Matrix',
          overview: 'A hacker learns the truth.',
          poster_path: '/matrix.jpg',
          genres: ['Action', 'Science Fiction'],
          vote_average: 8.2,
          extra: null,
        },
      }),
    ).toEqual({
      id: '603',
      title: 'The Matrix',
      overview: 'A hacker learns the truth.',
      rawPosterReference: '/matrix.jpg',
      similarityScore: 0.87,
      metadata: {
        title: 'The Matrix',
        overview: 'A hacker learns the truth.',
        poster_path: '/matrix.jpg',
        genres: 'Action, Science Fiction',
        vote_average: '8.2',
      },
    });
  });

  it('defaults missing text fields', () => {
    expect(toCandidate({ id: '1', score: 0.5 })).toEqual({
      id: '1',
      title: '',
      overview: '',
      rawPosterReference: null,
      similarityScore: 0.5,
      metadata: {},
    });
  });

  it.each([[null], [{ id: '', score: 1 }], [{ id: '1' }], [{ id: 2, score: 1 }]])(
    'rejects malformed match %j',
    (match) => {
      expect(toCandidate(match)).toBeNull();
    },
  );
});

describe('PineconeService', () => {
  const fetchMock = jest.fn();
  let service: PineconeService;

  beforeEach(() => {
    fetchMock.mockReset();
    (global as { fetch: typeof fetch }).fetch = fetchMock as never;
    service = new PineconeService(
      loadAppConfig({
        PINECONE_KEY: 'test-secret',
        PINECONE_INDEX_HOST: 'movies-abc.svc.example.test/',
        PINECONE_NAMESPACE: 'films',
      }),
    );
  });

  it('sends the query and keeps index order', async () => {
    fetchMock.mockResolvedValueOnce(
      mockResponse({
        status: 200,
        json: {
          matches: [
            { id: 'b', score: 0.9, metadata: { title: 'B' } },
            { id: 'a', score: 0.8, metadata: { title: 'A' } },
          ],
        },
      }),
    );

    const out = await service.query([0.1, 0.2], 50);

    expect(out.map((c) => c.id)).toEqual(['b', 'a']);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://movies-abc.svc.example.test/query');
    const init = fetchMock.mock.calls[0]?.[1] as RequestInit;
    expect(init.method).toBe('POST');
    expect(init.headers).toMatchObject({ 'Api-Key': 'test-secret' });
    expect(JSON.parse(String(init.body))).toEqual({
      vector: [0.1, 0.2],
      topK: 50,
      includeMetadata: true,
      includeValues: false,
      namespace: 'films',
    });
  });

  it('skips malformed matches', async () => {
    fetchMock.mockResolvedValueOnce(
      mockResponse({
        status: 200,
        json: { matches: [{ id: 'a', score: 0.8 }, { score: 0.7 }] },
      }),
    );

    await expect(service.query([0.1], 5)).resolves.toHaveLength(1);
  });

  it('returns an empty list for an empty index', async () => {
    fetchMock.mockResolvedValueOnce(mockResponse({ status: 200, json: { matches: [] } }));

    await expect(service.query([0.1], 5)).resolves.toEqual([]);
  });

  it('reports HTTP failures with the body', async () => {
    fetchMock.mockResolvedValueOnce(mockResponse({ status: 403, text: 'forbidden' }));

    await expect(service.query([0.1], 5)).rejects.toThrow(
      new BadGatewayException('Pinecone query failed: HTTP 403 forbidden'),
    );
  });

  it('rejects a response without matches', async () => {
    fetchMock.mockResolvedValueOnce(mockResponse({ status: 200, json: { results: [] } }));

    await expect(service.query([0.1], 5)).rejects.toThrow(
      'Pinecone query failed: response has no matches array',
    );
  });

  it('requires credentials', async () => {
    const unconfigured = new PineconeService(loadAppConfig({ PINECONE_KEY: 'test-secret' }));
    expect(unconfigured.isConfigured()).toBe(false);
    await expect(unconfigured.query([0.1], 5)).rejects.toBeInstanceOf(
      ServiceUnavailableException,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
