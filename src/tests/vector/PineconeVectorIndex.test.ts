import { PineconeVectorIndex, toPineconeFilter } from '../../vector/PineconeVectorIndex.js';
import { createVectorIndexFromConfig } from '../../vector/factory.js';
import { InMemoryVectorIndex } from '../../vector/InMemoryVectorIndex.js';
import type { VectorIndex } from '../../vector/types.js';
import { ConfigurationError, TimeoutError, VectorIndexError } from '../../utils/errors.js';
import { VectorIndexConfigSchema, type Logger } from '../../types/index.js';

const mocks = vi.hoisted(() => ({
  ctor: vi.fn(),
  listIndexes: vi.fn(),
  createIndex: vi.fn(),
  index: vi.fn(),
  namespace: vi.fn(),
  upsert: vi.fn(),
  query: vi.fn(),
  deleteMany: vi.fn()
}));

vi.mock('@pinecone-database/pinecone', () => ({
  Pinecone: class {
    listIndexes = mocks.listIndexes;
    createIndex = mocks.createIndex;

    constructor(opts: unknown) {
      mocks.ctor(opts);
    }

    index(name: string) {
      mocks.index(name);
      return {
        namespace: (ns: string) => {
          mocks.namespace(ns);
          return { upsert: mocks.upsert, query: mocks.query, deleteMany: mocks.deleteMany };
        }
      };
    }
  }
}));

describe('PineconeVectorIndex', () => {
  const logger: Logger = {
    trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn()
  };

  function create(overrides: Partial<ConstructorParameters<typeof PineconeVectorIndex>[0]> = {}) {
    return new PineconeVectorIndex({
      apiKey: 'test-secret',
      indexName: 'resume-index',
      dimension: 8,
      namespace: 'tenant-a',
      logger,
      ...overrides
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv('PINECONE_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('requires an API key', () => {
    expect(() => create({ apiKey: undefined })).toThrow(ConfigurationError);
  });

  it('falls back to PINECONE_API_KEY and scopes to the namespace', () => {
    vi.stubEnv('PINECONE_API_KEY', 'test-secret');
    create({ apiKey: undefined });

    expect(mocks.ctor).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(mocks.index).toHaveBeenCalledWith('resume-index');
    expect(mocks.namespace).toHaveBeenCalledWith('tenant-a');
  });

  it('creates a serverless cosine index when absent', async () => {
    mocks.listIndexes.mockResolvedValue({ indexes: [{ name: 'other', dimension: 768 }] });
    mocks.createIndex.mockResolvedValue(undefined);

    await create({ region: 'us-west-2' }).ensureIndex();

    expect(mocks.createIndex).toHaveBeenCalledWith({
      name: 'resume-index',
      dimension: 8,
      metric: 'cosine',
      spec: { serverless: { cloud: 'aws', region: 'us-west-2' } },
      waitUntilReady: true,
      suppressConflicts: true
    });
  });

  it('reuses an existing index of the right dimension', async () => {
    mocks.listIndexes.mockResolvedValue({ indexes: [{ name: 'resume-index', dimension: 8 }] });

    await create().ensureIndex();

    expect(mocks.createIndex).not.toHaveBeenCalled();
  });

  it('refuses an existing index with a different dimension', async () => {
    mocks.listIndexes.mockResolvedValue({ indexes: [{ name: 'resume-index', dimension: 1536 }] });

    await expect(create().ensureIndex()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('translates filters and normalizes matches', async () => {
    mocks.query.mockResolvedValue({
      matches: [
        { id: 'resume_1_2', score: 0.91, metadata: { type: 'resume', owner_id: 1 } },
        { id: 'resume_1_3' }
      ]
    });

    const vector = [1, 0, 0, 0, 0, 0, 0, 0];
    const matches = await create().query(vector, { topK: 5, filter: { type: 'resume', owner_id: 1 } });

    expect(mocks.query).toHaveBeenCalledWith({
      vector,
      topK: 5,
      filter: { type: { $eq: 'resume' }, owner_id: { $eq: 1 } },
      includeMetadata: true
    });
    expect(matches).toEqual([
      { id: 'resume_1_2', score: 0.91, metadata: { type: 'resume', owner_id: 1 } },
      { id: 'resume_1_3', score: 0, metadata: {} }
    ]);
  });

  it('upserts one record with its metadata', async () => {
    mocks.upsert.mockResolvedValue(undefined);
    const record = { id: 'job_4_9', values: [0, 1, 0, 0, 0, 0, 0, 0], metadata: { type: 'job', owner_id: 4 } };

    await create().upsert(record);

    expect(mocks.upsert).toHaveBeenCalledWith([record]);
  });

  it('wraps client failures in VectorIndexError', async () => {
    const cause = new Error('503 Service Unavailable');
    mocks.upsert.mockRejectedValue(cause);

    const error = await create().upsert({ id: 'a', values: [], metadata: {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VectorIndexError);
    expect(error).toMatchObject({ operation: 'upsert', retryable: true, cause });
  });

  it('bounds calls by the timeout', async () => {
    mocks.query.mockReturnValue(new Promise(() => undefined));

    const error = await create({ timeoutMs: 20 }).query([0, 0, 0, 0, 0, 0, 0, 1], { topK: 1 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VectorIndexError);
    expect(error).toMatchObject({ operation: 'query' });
    expect(error instanceof VectorIndexError && error.cause).toBeInstanceOf(TimeoutError);
  });

  it('skips the client for an empty delete', async () => {
    mocks.deleteMany.mockResolvedValue(undefined);
    const index = create();

    await index.delete([]);
    expect(mocks.deleteMany).not.toHaveBeenCalled();

    await index.delete(['resume_1_2']);
    expect(mocks.deleteMany).toHaveBeenCalledWith(['resume_1_2']);
  });

  it('has no exact count', () => {
    const index: VectorIndex = create();
    expect(index.count).toBeUndefined();
  });
});

describe('toPineconeFilter', () => {
  it('maps each key to an $eq predicate', () => {
    expect(toPineconeFilter({ type: 'job', archived: false })).toEqual({ type: { $eq: 'job' }, archived: { $eq: false } });
  });

  it('returns undefined for an empty filter', () => {
    expect(toPineconeFilter({})).toBeUndefined();
    expect(toPineconeFilter()).toBeUndefined();
  });
});

describe('createVectorIndexFromConfig', () => {
  const logger: Logger = {
    trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn()
  };

  it('builds the in-memory index', () => {
    const index = createVectorIndexFromConfig(VectorIndexConfigSchema.parse({ provider: 'memory' }), { dimension: 16, logger });
    expect(index).toBeInstanceOf(InMemoryVectorIndex);
    expect(index.dimension).toBe(16);
  });

  it('builds the Pinecone index with the configured name', () => {
    const index = createVectorIndexFromConfig(
      VectorIndexConfigSchema.parse({ indexName: 'resumes-test' }),
      { dimension: 16, logger, apiKey: 'test-secret' }
    );
    expect(index).toBeInstanceOf(PineconeVectorIndex);
    expect(mocks.index).toHaveBeenCalledWith('resumes-test');
  });
});
