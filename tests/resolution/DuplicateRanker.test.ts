import { describe, expect, it, vi } from 'vitest';
import { defineResolutionConfig } from '../../src/config/resolution.js';
import { AIDuplicateReranker, DuplicateRanker } from '../../src/services/resolution/DuplicateRanker.js';
import { InMemoryEntityStore } from '../../src/services/store/InMemoryEntityStore.js';
import type { Candidate } from '../../src/types/index.js';
import { ScriptedCompleter } from '../helpers/fixtures.js';

function productStore(): InMemoryEntityStore {
  return new InMemoryEntityStore('product', {
    writableFields: ['name'],
    records: [{ fields: { name: 'MacBook Pro M4' } }, { fields: { name: 'Macbook' } }, { fields: { name: 'iPad' } }],
  });
}

function candidate(id: number, similarityScore: number): Candidate {
  return { id, fields: { name: `item ${id}` }, similarityScore, matchedField: 'name' };
}

describe('DuplicateRanker', () => {
  const config = defineResolutionConfig({ model: 'product', checkDuplicates: true });

  it('builds wide-net terms from the identifier and its longer words', () => {
    expect(DuplicateRanker.wideNetTerms('Macbook Pro M4')).toEqual(['Macbook Pro M4', 'macbook', 'pro']);
    expect(DuplicateRanker.wideNetTerms('  ')).toEqual([]);
  });

  it('ranks heuristically and drops weak candidates', async () => {
    const ranker = new DuplicateRanker();

    const candidates = await ranker.findSimilar(productStore(), 'Macbook Pro', config);

    expect(candidates.map(({ id, similarityScore, matchedField }) => ({ id, similarityScore, matchedField }))).toEqual([
      { id: 1, similarityScore: 85, matchedField: 'name' },
      { id: 2, similarityScore: 77, matchedField: 'name' },
    ]);
  });

  it('clamps, filters, sorts and truncates any ordering', () => {
    const ranked = DuplicateRanker.enforceContract([
      candidate(1, 29.9),
      candidate(2, 120),
      candidate(3, 55.5),
      candidate(4, -5),
      candidate(5, 60),
      candidate(6, 31),
      candidate(7, 40),
      candidate(8, 45),
    ]);

    expect(ranked.map((c) => [c.id, c.similarityScore])).toEqual([
      [2, 100],
      [5, 60],
      [3, 55],
      [8, 45],
      [7, 40],
    ]);
  });

  it('applies a re-ranker and ignores ids it invents', async () => {
    const completer = new ScriptedCompleter([
      '{"rankings":[{"id":2,"score":92},{"id":99,"score":80},{"id":1,"score":40}]}',
    ]);
    const ranker = new DuplicateRanker(new AIDuplicateReranker(completer));

    const candidates = await ranker.findSimilar(productStore(), 'Macbook Pro', config);

    expect(candidates.map((c) => [c.id, c.similarityScore])).toEqual([
      [2, 92],
      [1, 40],
    ]);
    expect(completer.prompts).toHaveLength(1);
  });

  it('scores each record once when a re-ranker is set', async () => {
    const completer = new ScriptedCompleter(['{"rankings":[{"id":1,"score":90}]}']);
    const ranker = new DuplicateRanker(new AIDuplicateReranker(completer));
    const score = vi.spyOn(ranker, 'scoreRecord');

    await ranker.findSimilar(productStore(), 'Macbook Pro', config);

    const scoredIds = score.mock.calls.map(([, record]) => record.id);
    expect(scoredIds.length).toBeGreaterThan(0);
    expect(new Set(scoredIds).size).toBe(scoredIds.length);
  });

  it('keeps the heuristic order when re-ranking fails', async () => {
    const ranker = new DuplicateRanker(new AIDuplicateReranker(new ScriptedCompleter(['no idea'])));

    const candidates = await ranker.findSimilar(productStore(), 'Macbook Pro', config);

    expect(candidates.map((c) => c.id)).toEqual([1, 2]);
  });

  it('does not consult the re-ranker when nothing matched', async () => {
    const completer = new ScriptedCompleter([]);
    const ranker = new DuplicateRanker(new AIDuplicateReranker(completer));

    expect(await ranker.findSimilar(productStore(), 'Standing Desk', config)).toEqual([]);
    expect(completer.prompts).toHaveLength(0);
  });
});
