import { HashEmbeddingProvider, hashEmbed, tokenize } from '../../embedding/HashEmbeddingProvider.js';
import { cosineSimilarity } from '../../vector/types.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { Logger } from '../../types/index.js';

describe('HashEmbeddingProvider', () => {
  const logger: Logger = {
    trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn()
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('tokenizes on non-word characters and keeps + and #', () => {
    expect(tokenize('Senior C++/C# dev, Python!')).toEqual(['senior', 'c++', 'c#', 'dev', 'python']);
  });

  it('produces deterministic unit vectors of the configured dimension', async () => {
    const provider = new HashEmbeddingProvider({ dimension: 64, logger });

    const a = await provider.embed('python backend engineer');
    const b = await provider.embed('python backend engineer');

    expect(a.ok && b.ok).toBe(true);
    if (!a.ok || !b.ok) return;
    expect(a.vector).toHaveLength(64);
    expect(a.vector).toEqual(b.vector);
    const norm = Math.sqrt(a.vector.reduce((sum, v) => sum + v * v, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('ranks shared vocabulary above unrelated text', () => {
    const query = hashEmbed('python backend engineer', 256);
    const related = hashEmbed('backend engineer writing python services', 256);
    const unrelated = hashEmbed('pastry chef with bakery experience', 256);

    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('reports empty input without computing', async () => {
    const provider = new HashEmbeddingProvider({ dimension: 16, logger });

    await expect(provider.embed('   ')).resolves.toEqual({
      ok: false,
      reason: 'empty_input',
      message: 'Cannot embed empty text'
    });
    expect(logger.debug).toHaveBeenCalledWith('Embedding generation failed', expect.objectContaining({ reason: 'empty_input' }));
  });

  it('reports text without word tokens as a zero vector', async () => {
    const provider = new HashEmbeddingProvider({ dimension: 16, logger });

    const result = await provider.embed('... --- !!!');
    expect(result).toEqual({ ok: false, reason: 'zero_vector', message: 'Provider returned an all-zero vector' });
    expect(logger.warn).toHaveBeenCalledWith('Embedding generation failed', expect.objectContaining({ provider: 'hash', reason: 'zero_vector' }));
  });

  it('rejects a non-positive dimension at construction', () => {
    expect(() => new HashEmbeddingProvider({ dimension: 0, logger })).toThrow(ConfigurationError);
  });
});
