import { describe, it, expect } from 'vitest';
import { citationQualityScore, extractCitations, replacePlaceholderLabels, stripCitationsBlock } from './citations';

const labels = { documents: ['AML Handbook', 'FATF Guidance'], chunks: ['PEP Circular'] };

describe('replacePlaceholderLabels', () => {
  it('rewrites document and chunk labels to titles', () => {
    expect(replacePlaceholderLabels('See [Document 1, Page 3] and [Chunk 1].', labels)).toBe(
      'See [AML Handbook, Page 3] and [PEP Circular].'
    );
  });

  it('leaves out-of-range labels untouched', () => {
    expect(replacePlaceholderLabels('[Document 3] [Chunk 0] [Chunk 2]', labels)).toBe('[Document 3] [Chunk 0] [Chunk 2]');
  });

  it('does not touch words that only start like a label', () => {
    expect(replacePlaceholderLabels('Documents 1 and Chunky 1', labels)).toBe('Documents 1 and Chunky 1');
  });
});

describe('extractCitations', () => {
  it('collects unique bracketed references in order', () => {
    const text = 'AML is X [AML Handbook, Page 3]. Also [FATF Guidance] and [AML Handbook, Page 3] again.';
    expect(extractCitations(text)).toEqual(['[AML Handbook, Page 3]', '[FATF Guidance]']);
  });

  it('skips empty and over-long brackets', () => {
    const long = `[${'a'.repeat(200)}]`;
    const justUnder = `[${'b'.repeat(199)}]`;
    expect(extractCitations(`[] [  ] ${long} ${justUnder}`)).toEqual([justUnder]);
  });

  it('ignores nested bracket openers', () => {
    expect(extractCitations('[[Inner] tail]')).toEqual(['[Inner]']);
  });

  it('returns nothing for text without brackets', () => {
    expect(extractCitations('No references here.')).toEqual([]);
  });
});

describe('stripCitationsBlock', () => {
  it('drops everything from the marker on', () => {
    expect(stripCitationsBlock('Answer [A].\n\n---CITATIONS---\nCITED: [A]')).toBe('Answer [A].');
  });

  it('returns the trimmed text when there is no marker', () => {
    expect(stripCitationsBlock('  Answer.  ')).toBe('Answer.');
  });
});

describe('citationQualityScore', () => {
  it('is zero without citations', () => {
    expect(citationQualityScore([], 3)).toBe(0);
  });

  it('reaches 1 when the minimum is met from distinct sources', () => {
    const citations = ['[AML Handbook, Page 3]', '[AML Handbook, Page 5]', '[FATF Guidance]'];
    expect(citationQualityScore(citations, 3)).toBe(1);
  });

  it('weighs a short count and a single source down', () => {
    // count 2/5 * 0.5 = 0.2; one title against 1.2 → 0.8333 * 0.5
    const citations = ['[AML Handbook, Page 3]', '[AML Handbook (2021), Page 4]'];
    expect(citationQualityScore(citations, 5)).toBeCloseTo(0.6167, 4);
  });

  it('caps the count half at the minimum', () => {
    expect(citationQualityScore(['[FATF Guidance]'], 2)).toBe(0.75);
  });
});
