import { InMemoryVectorIndex } from '../../vector/InMemoryVectorIndex.js';
import { cosineSimilarity, matchesFilter } from '../../vector/types.js';
import { VectorIndexError } from '../../utils/errors.js';

describe('InMemoryVectorIndex', () => {
  let index: InMemoryVectorIndex;

  beforeEach(async () => {
    index = new InMemoryVectorIndex({ dimension: 3 });
    await index.ensureIndex();
  });

  it('returns matches by descending cosine similarity', async () => {
    await index.upsert({ id: 'a', values: [1, 0, 0], metadata: { type: 'resume' } });
    await index.upsert({ id: 'b', values: [0.7, 0.7, 0], metadata: { type: 'resume' } });
    await index.upsert({ id: 'c', values: [0, 0, 1], metadata: { type: 'job' } });

    const matches = await index.query([1, 0, 0], { topK: 2 });

    expect(matches.map((m) => m.id)).toEqual(['a', 'b']);
    expect(matches[0]?.score).toBeCloseTo(1, 10);
    expect(matches[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('breaks score ties by ascending id', async () => {
    await index.upsert({ id: 'z', values: [1, 1, 0], metadata: {} });
    await index.upsert({ id: 'm', values: [1, 1, 0], metadata: {} });

    const matches = await index.query([1, 1, 0], { topK: 5 });
    expect(matches.map((m) => m.id)).toEqual(['m', 'z']);
  });

  it('applies equality filters as a conjunction', async () => {
    await index.upsert({ id: 'resume_1_1', values: [1, 0, 0], metadata: { type: 'resume', owner_id: 1 } });
    await index.upsert({ id: 'resume_2_1', values: [1, 0, 0], metadata: { type: 'resume', owner_id: 2 } });
    await index.upsert({ id: 'job_1_1', values: [1, 0, 0], metadata: { type: 'job', owner_id: 1 } });

    const matches = await index.query([1, 0, 0], { topK: 10, filter: { type: 'resume', owner_id: 1 } });
    expect(matches.map((m) => m.id)).toEqual(['resume_1_1']);
    expect(await index.count({ owner_id: 1 })).toBe(2);
  });

  it('overwrites on upsert with the same id', async () => {
    await index.upsert({ id: 'a', values: [1, 0, 0], metadata: { v: 1 } });
    await index.upsert({ id: 'a', values: [0, 1, 0], metadata: { v: 2 } });

    expect(index.size()).toBe(1);
    const [match] = await index.query([0, 1, 0], { topK: 1 });
    expect(match).toEqual({ id: 'a', score: 1, metadata: { v: 2 } });
  });

  it('ignores unknown ids on delete', async () => {
    await index.upsert({ id: 'a', values: [1, 0, 0], metadata: {} });
    await index.delete(['missing', 'a']);

    expect(index.size()).toBe(0);
  });

  it('does not share stored records with callers', async () => {
    const values = [1, 0, 0];
    const metadata = { type: 'resume' };
    await index.upsert({ id: 'a', values, metadata });
    values[0] = 0;
    metadata.type = 'job';

    const [match] = await index.query([1, 0, 0], { topK: 1 });
    expect(match?.metadata).toEqual({ type: 'resume' });
    expect(match?.score).toBe(1);
  });

  it('isolates namespaces over shared storage', async () => {
    const other = index.withNamespace('staging');
    await index.upsert({ id: 'a', values: [1, 0, 0], metadata: {} });
    await other.upsert({ id: 'b', values: [1, 0, 0], metadata: {} });

    expect((await index.query([1, 0, 0], { topK: 5 })).map((m) => m.id)).toEqual(['a']);
    expect((await other.query([1, 0, 0], { topK: 5 })).map((m) => m.id)).toEqual(['b']);
    expect((await index.withNamespace('staging').query([1, 0, 0], { topK: 5 })).map((m) => m.id)).toEqual(['b']);
  });

  it('rejects vectors of the wrong dimension', async () => {
    await expect(index.upsert({ id: 'a', values: [1, 0], metadata: {} })).rejects.toBeInstanceOf(VectorIndexError);
    await expect(index.query([1, 0, 0, 0], { topK: 1 })).rejects.toMatchObject({ operation: 'query', retryable: false });
  });

  it('scores every record zero for a zero query vector', async () => {
    await index.upsert({ id: 'a', values: [1, 0, 0], metadata: {} });
    await index.upsert({ id: 'b', values: [0, 1, 0], metadata: {} });

    const matches = await index.query([0, 0, 0], { topK: 10 });
    expect(matches).toEqual([
      { id: 'a', score: 0, metadata: {} },
      { id: 'b', score: 0, metadata: {} }
    ]);
  });
});

describe('vector helpers', () => {
  it('matchesFilter treats a missing filter as match-all', () => {
    expect(matchesFilter({ type: 'job' })).toBe(true);
    expect(matchesFilter({ type: 'job' }, { type: 'resume' })).toBe(false);
  });

  it('cosineSimilarity is zero for zero vectors', () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });
});
