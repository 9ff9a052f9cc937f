import { AiSdkEmbeddingProvider, resolveApiKey } from '../../embedding/AiSdkEmbeddingProvider.js';
import { createEmbeddingProviderFromConfig } from '../../embedding/factory.js';
import { HashEmbeddingProvider } from '../../embedding/HashEmbeddingProvider.js';
import { EmbeddingConfigSchema, type Logger } from '../../types/index.js';
import { ConfigurationError } from '../../utils/errors.js';

const { embedMock, googleModelMock, openaiModelMock } = vi.hoisted(() => ({
  embedMock: vi.fn(),
  googleModelMock: vi.fn((modelId: string) => ({ provider: 'google', modelId })),
  openaiModelMock: vi.fn((modelId: string) => ({ provider: 'openai', modelId }))
}));

vi.mock('ai', () => ({ embed: embedMock }));
vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: vi.fn(() => ({ textEmbeddingModel: googleModelMock }))
}));
vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: vi.fn(() => ({ textEmbeddingModel: openaiModelMock }))
}));

describe('AiSdkEmbeddingProvider', () => {
  const logger: Logger = {
    trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn()
  };

  function google(dimension = 4) {
    return new AiSdkEmbeddingProvider({
      provider: 'google',
      model: 'text-embedding-004',
      dimension,
      apiKey: 'test-secret',
      logger
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv('GOOGLE_GENERATIVE_AI_API_KEY', '');
    vi.stubEnv('GOOGLE_API_KEY', '');
    vi.stubEnv('OPENAI_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('resolves API keys from the provider environment variables in order', () => {
    expect(resolveApiKey('google', { GOOGLE_API_KEY: 'test-secret' })).toBe('test-secret');
    expect(resolveApiKey('google', { GOOGLE_GENERATIVE_AI_API_KEY: 'first', GOOGLE_API_KEY: 'second' })).toBe('first');
    expect(resolveApiKey('openai', { GOOGLE_API_KEY: 'test-secret' })).toBeUndefined();
  });

  it('fails fast without an API key', () => {
    expect(() => new AiSdkEmbeddingProvider({ provider: 'google', model: 'text-embedding-004', dimension: 4, logger }))
      .toThrow(ConfigurationError);
  });

  it('embeds documents with the retrieval document task type', async () => {
    embedMock.mockResolvedValue({ embedding: [0.1, 0.2, 0.3, 0.4] });

    const result = await google().embed('  python developer  ');

    expect(result).toEqual({ ok: true, vector: [0.1, 0.2, 0.3, 0.4] });
    expect(googleModelMock).toHaveBeenCalledWith('text-embedding-004');
    expect(embedMock).toHaveBeenCalledWith(expect.objectContaining({
      model: { provider: 'google', modelId: 'text-embedding-004' },
      value: 'python developer',
      providerOptions: { google: { outputDimensionality: 4, taskType: 'RETRIEVAL_DOCUMENT' } },
      maxRetries: 2,
      abortSignal: expect.any(AbortSignal)
    }));
  });

  it('uses the retrieval query task type for queries', async () => {
    embedMock.mockResolvedValue({ embedding: [1, 0, 0, 0] });

    await google().embed('backend role', { purpose: 'query' });

    expect(embedMock).toHaveBeenCalledWith(expect.objectContaining({
      providerOptions: { google: { outputDimensionality: 4, taskType: 'RETRIEVAL_QUERY' } }
    }));
  });

  it('forwards dimensions to openai', async () => {
    embedMock.mockResolvedValue({ embedding: [0, 1, 0] });
    const provider = new AiSdkEmbeddingProvider({
      provider: 'openai',
      model: 'text-embedding-3-small',
      dimension: 3,
      apiKey: 'test-secret',
      logger
    });

    await expect(provider.embed('hello')).resolves.toEqual({ ok: true, vector: [0, 1, 0] });
    expect(provider.name).toBe('openai:text-embedding-3-small');
    expect(embedMock).toHaveBeenCalledWith(expect.objectContaining({
      providerOptions: { openai: { dimensions: 3 } }
    }));
  });

  it('maps provider failures to failure results', async () => {
    embedMock.mockRejectedValueOnce(new Error('quota exceeded'));
    await expect(google().embed('text')).resolves.toEqual({ ok: false, reason: 'provider_error', message: 'quota exceeded' });

    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    embedMock.mockRejectedValueOnce(abort);
    await expect(google().embed('text')).resolves.toMatchObject({ ok: false, reason: 'timeout' });
  });

  it('rejects vectors of the wrong size or all zeros', async () => {
    embedMock.mockResolvedValueOnce({ embedding: [0.1, 0.2] });
    await expect(google().embed('text')).resolves.toEqual({
      ok: false,
      reason: 'dimension_mismatch',
      message: 'Expected 4 dimensions, provider returned 2'
    });

    embedMock.mockResolvedValueOnce({ embedding: [0, 0, 0, 0] });
    await expect(google().embed('text')).resolves.toMatchObject({ ok: false, reason: 'zero_vector' });
  });

  it('never calls the provider for empty text', async () => {
    await expect(google().embed('')).resolves.toMatchObject({ ok: false, reason: 'empty_input' });
    expect(embedMock).not.toHaveBeenCalled();
  });
});

describe('createEmbeddingProviderFromConfig', () => {
  const logger: Logger = {
    trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn()
  };

  it('builds the offline hash provider', () => {
    const provider = createEmbeddingProviderFromConfig(EmbeddingConfigSchema.parse({ provider: 'hash', dimension: 32 }), { logger });
    expect(provider).toBeInstanceOf(HashEmbeddingProvider);
    expect(provider.dimension).toBe(32);
  });

  it('builds an AI SDK provider with an explicit key', () => {
    const provider = createEmbeddingProviderFromConfig(EmbeddingConfigSchema.parse({}), { logger, apiKey: 'test-secret' });
    expect(provider).toBeInstanceOf(AiSdkEmbeddingProvider);
    expect(provider.name).toBe('google:text-embedding-004');
  });
});
