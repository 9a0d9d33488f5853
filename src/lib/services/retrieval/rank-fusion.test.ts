import { describe, it, expect } from 'vitest';
import { fuseWithScores, reciprocalRankFusion } from './rank-fusion';
import { deduplicateItems } from './deduplicate';
import { identityKey } from './identity';
import { excerpt, summary } from '@/test-utils/fixtures';

describe('identityKey', () => {
  it('uses source id and page for document excerpts', () => {
    expect(identityKey(excerpt('a', { sourceId: 'doc1', location: { page: 3 } }))).toBe('excerpt:doc1:3:');
  });

  it('uses source id and start time for media excerpts', () => {
    expect(identityKey(excerpt('a', { sourceId: 'vid1', location: { startSec: 90, endSec: 120 } }))).toBe(
      'excerpt:vid1::90'
    );
  });

  it('uses the source id for summaries', () => {
    expect(identityKey(summary('s', { sourceId: 'doc1' }))).toBe('summary:doc1');
  });

  it('falls back to the object id without a source id or location', () => {
    expect(identityKey(excerpt('obj-7'))).toBe('id:obj-7');
    expect(identityKey(excerpt('obj-8', { sourceId: 'doc1' }))).toBe('id:obj-8');
  });
});

describe('deduplicateItems', () => {
  const items = [
    excerpt('a', { sourceId: 'doc1', location: { page: 1 }, content: 'first' }),
    excerpt('b', { sourceId: 'doc1', location: { page: 2 } }),
    excerpt('c', { sourceId: 'doc1', location: { page: 1 }, content: 'second' }),
  ];

  it('keeps the first occurrence per key in order', () => {
    const out = deduplicateItems(items);
    expect(out.map((i) => i.id)).toEqual(['a', 'b']);
    expect(out[0].content).toBe('first');
  });

  it('is idempotent', () => {
    const once = deduplicateItems(items);
    expect(deduplicateItems(once)).toEqual(once);
  });
});

describe('reciprocalRankFusion', () => {
  it('sums 1/(rank+k) across lists', () => {
    const x = excerpt('x', { sourceId: 'X', location: { page: 1 } });
    const y = excerpt('y', { sourceId: 'Y', location: { page: 1 } });

    const fused = fuseWithScores([
      [x, y],
      [x, y],
    ]);

    expect(fused.map((f) => f.item.id)).toEqual(['x', 'y']);
    expect(fused[0].score).toBeCloseTo(2 / 61, 12);
    expect(fused[1].score).toBeCloseTo(2 / 62, 12);
  });

  it('ranks an item found by both variants above one found by a single variant', () => {
    const x = excerpt('x', { sourceId: 'X', location: { page: 4 } });
    const y = excerpt('y', { sourceId: 'Y', location: { page: 9 } });

    // X is rank 2 in both lists, Y is rank 1 in one list only
    const fused = fuseWithScores([[y, x], [excerpt('z', { sourceId: 'Z', location: { page: 1 } }), x]]);

    const byKey = new Map(fused.map((f) => [f.item.id, f.score]));
    expect(byKey.get('x')).toBeCloseTo(2 / 62, 12);
    expect(byKey.get('y')).toBeCloseTo(1 / 61, 12);
    expect(fused[0].item.id).toBe('x');
  });

  it('keeps the first payload seen for a key', () => {
    const first = excerpt('first', { sourceId: 'doc1', location: { page: 2 }, content: 'from variant 1' });
    const second = excerpt('second', { sourceId: 'doc1', location: { page: 2 }, content: 'from variant 2' });

    const fused = reciprocalRankFusion([[first], [second]]);

    expect(fused).toHaveLength(1);
    expect(fused[0].content).toBe('from variant 1');
  });

  it('breaks ties by first-seen order', () => {
    const a = summary('a', { sourceId: 'A' });
    const b = summary('b', { sourceId: 'B' });

    expect(reciprocalRankFusion([[a], [b]]).map((i) => i.id)).toEqual(['a', 'b']);
    expect(reciprocalRankFusion([[b], [a]]).map((i) => i.id)).toEqual(['b', 'a']);
  });

  it('honours a custom k', () => {
    const a = summary('a', { sourceId: 'A' });
    expect(fuseWithScores([[a]], 0)[0].score).toBe(1);
  });

  it('returns an empty list for no input', () => {
    expect(reciprocalRankFusion([])).toEqual([]);
  });
});
