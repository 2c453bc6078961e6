import {
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  BadRequestError,
  InternalServerError,
  RateLimitError
} from 'openai';
import { EmbeddingsClient, OpenAIEmbeddingProvider, isRetryableError } from '../../src/rag/embeddings';

describe('isRetryableError', () => {
  it('retries connection failures and timeouts from the client', () => {
    expect(isRetryableError(new APIConnectionTimeoutError())).toBe(true);
    expect(isRetryableError(new APIConnectionError({ cause: new Error('socket hang up') }))).toBe(true);
  });

  it('retries rate limits and server errors', () => {
    expect(isRetryableError(new RateLimitError(429, undefined, 'Rate limit reached', new Headers()))).toBe(true);
    expect(isRetryableError(new InternalServerError(503, undefined, 'Service unavailable', new Headers()))).toBe(true);
  });

  it('does not retry client errors', () => {
    expect(isRetryableError(new AuthenticationError(401, undefined, 'Incorrect API key provided', new Headers()))).toBe(false);
    expect(isRetryableError(new BadRequestError(400, undefined, 'Invalid input', new Headers()))).toBe(false);
    expect(isRetryableError('timeout')).toBe(false);
  });

  it('retries low-level network errors', () => {
    expect(isRetryableError(new Error('read ECONNRESET'))).toBe(true);
    expect(isRetryableError(new Error('getaddrinfo ENOTFOUND api.openai.com'))).toBe(true);
  });
});

describe('OpenAIEmbeddingProvider', () => {
  const config = {
    provider: 'openai' as const,
    model: 'text-embedding-3-small',
    maxRetries: 3,
    retryDelayMs: 1
  };
  let create: jest.Mock;
  let client: EmbeddingsClient;

  beforeEach(() => {
    create = jest.fn();
    client = { embeddings: { create } };
  });

  it('retries a timed out request and returns embeddings in input order', async () => {
    create
      .mockRejectedValueOnce(new APIConnectionTimeoutError())
      .mockResolvedValueOnce({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] }
        ]
      });
    const provider = new OpenAIEmbeddingProvider(config, client);

    expect(await provider.embedDocuments(['refunds', 'shipping'])).toEqual([[1, 0], [0, 1]]);
    expect(create).toHaveBeenCalledTimes(2);
    expect(create).toHaveBeenLastCalledWith({ model: 'text-embedding-3-small', input: ['refunds', 'shipping'] });
  });

  it('gives up after the configured attempts', async () => {
    create.mockRejectedValue(new APIConnectionError({ cause: new Error('socket hang up') }));
    const provider = new OpenAIEmbeddingProvider({ ...config, maxRetries: 2 }, client);

    await expect(provider.embedQuery('refunds')).rejects.toBeInstanceOf(APIConnectionError);
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('does not retry authentication failures', async () => {
    create.mockRejectedValue(new AuthenticationError(401, undefined, 'Incorrect API key provided', new Headers()));
    const provider = new OpenAIEmbeddingProvider(config, client);

    await expect(provider.embedQuery('refunds')).rejects.toBeInstanceOf(AuthenticationError);
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('sends documents in batches', async () => {
    create.mockImplementation(async ({ input }: { input: string[] }) => ({
      data: input.map((_text, index) => ({ index, embedding: [index] }))
    }));
    const provider = new OpenAIEmbeddingProvider({ ...config, batchSize: 2 }, client);

    expect(await provider.embedDocuments(['a', 'b', 'c'])).toEqual([[0], [1], [0]]);
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('requires an API key for the openai provider', () => {
    expect(() => new OpenAIEmbeddingProvider({ provider: 'openai', model: 'text-embedding-3-small' }))
      .toThrow('OpenAI API key is required for the openai embedding provider');
  });

  it('requires an endpoint and key for the azure provider', () => {
    expect(() => new OpenAIEmbeddingProvider({
      provider: 'azure',
      model: 'text-embedding-3-small',
      azureApiKey: 'test-secret'
    })).toThrow('Azure OpenAI endpoint and API key are required for the azure embedding provider');
  });
});
