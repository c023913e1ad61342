import { describe, it, expect } from 'vitest';
import {
  chunkText,
  createSegmenter,
  detectHeadings,
  findBoundary,
  sectionTitleAt,
  segmentSpans
} from '../src/utils/chunking.js';
import { InvalidConfigurationError } from '../src/errors.js';

const THREE_SENTENCES = 'Sentence one. Sentence two. Sentence three.';

describe('chunkText', () => {
  it('cuts after sentence ends and repeats the overlap', () => {
    expect(chunkText(THREE_SENTENCES, 20, 5)).toEqual([
      'Sentence one.',
      'one. Sentence two.',
      'two.',
      'Sentence three.'
    ]);
  });

  it('returns the whole text as one chunk when it fits', () => {
    expect(chunkText('  Short note.  ', 100, 10)).toEqual(['Short note.']);
  });

  it('returns no chunks for empty or blank text', () => {
    expect(chunkText('', 100, 10)).toEqual([]);
    expect(chunkText(' \n\t ', 100, 10)).toEqual([]);
  });

  it('cuts at chunk size when there is no boundary in the window', () => {
    expect(chunkText('abcdefghij', 4, 0, 2)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('adds no trailing chunk when the length is an exact multiple of the chunk size', () => {
    expect(chunkText('abcdefgh', 4, 0, 2)).toEqual(['abcd', 'efgh']);
    expect(chunkText('abcdefghijkl', 4, 2, 1)).toEqual(['abcd', 'cdef', 'efgh', 'ghij', 'ijkl']);
    expect(segmentSpans('abcdefgh', { chunkSize: 4, overlap: 0, lookback: 2 }).map((s) => [s.start, s.end])).toEqual([
      [0, 4],
      [4, 8]
    ]);
  });

  it('rejects invalid sizing', () => {
    expect(() => chunkText('text', 0, 0)).toThrow(InvalidConfigurationError);
    expect(() => chunkText('text', 10, 10)).toThrow(/must be smaller than chunk size/);
    expect(() => chunkText('text', 10, -1)).toThrow(InvalidConfigurationError);
    expect(() => chunkText('text', 10, 2, -5)).toThrow(/lookback/);
  });
});

describe('segmentSpans', () => {
  const text = Array.from({ length: 80 }, (_, i) => `Line ${i} has a few words.`).join(
    '\n'
  );

  it('keeps every span within the chunk size', () => {
    const spans = segmentSpans(text, { chunkSize: 120, overlap: 30, lookback: 40 });
    expect(spans.length).toBeGreaterThan(10);
    for (const span of spans) {
      expect(span.end - span.start).toBeLessThanOrEqual(120);
      expect(span.text).toBe(text.slice(span.start, span.end).trim());
    }
  });

  it('reconstructs the source once overlaps are removed', () => {
    const spans = segmentSpans(text, { chunkSize: 120, overlap: 30, lookback: 40 });
    let rebuilt = '';
    let covered = 0;
    for (const span of spans) {
      rebuilt += text.slice(Math.max(covered, span.start), span.end);
      covered = span.end;
    }
    expect(rebuilt.trim()).toBe(text.trim());
  });

  it('always moves forward even when overlap would step back past the start', () => {
    const spans = segmentSpans('aaaa. bbbb. cccc.', { chunkSize: 8, overlap: 7, lookback: 8 });
    const starts = spans.map((s) => s.start);
    expect(starts).toEqual([...starts].sort((a, b) => a - b));
    expect(new Set(starts).size).toBe(starts.length);
  });
});

describe('findBoundary', () => {
  // a0 b1 .2 _3 c4 d5 \n6 e7 f8 _9 g10 h11
  const text = 'ab. cd\nef gh';

  it('prefers a period anywhere in the window', () => {
    expect(findBoundary(text, 0, 12, 100)).toBe(3);
  });

  it('prefers a newline over a closer space', () => {
    expect(findBoundary(text, 0, 12, 6)).toBe(7);
  });

  it('falls back to whitespace, then to the hard end', () => {
    expect(findBoundary(text, 0, 12, 3)).toBe(10);
    expect(findBoundary('abcdefgh', 0, 8, 3)).toBe(8);
  });

  it('never looks before the chunk start', () => {
    expect(findBoundary(text, 4, 8, 100)).toBe(7);
  });
});

describe('detectHeadings', () => {
  const text = ['INTRODUCTION SECTION', 'Some body text here.', '', 'Details:', 'More text follows.'].join('\n');

  it('finds ALL CAPS and colon-terminated headings with their offsets', () => {
    expect(detectHeadings(text)).toEqual([
      { offset: 0, title: 'INTRODUCTION SECTION' },
      { offset: 43, title: 'Details' }
    ]);
  });

  it('ignores colon lines without a blank line before them', () => {
    expect(detectHeadings('Intro text\nNote:\nbody')).toEqual([]);
  });

  it('ignores single-word capitals', () => {
    expect(detectHeadings('WARNING\nbody text')).toEqual([]);
  });

  it('maps an offset to the nearest preceding heading', () => {
    const headings = detectHeadings(text);
    expect(sectionTitleAt(headings, 10)).toBe('INTRODUCTION SECTION');
    expect(sectionTitleAt(headings, 43)).toBe('Details');
    expect(sectionTitleAt([], 5)).toBeNull();
  });
});

describe('createSegmenter', () => {
  it('builds chunks with ids, offsets and shared metadata', () => {
    const segmenter = createSegmenter({ chunkSize: 20, overlap: 5, lookback: 100 });
    const chunks = segmenter.segment(THREE_SENTENCES, {
      documentId: 'doc_abc',
      filename: 'notes.txt',
      fileType: 'txt',
      collection: 'default',
      ingestedAt: '2024-01-01T00:00:00.000Z'
    });

    expect(chunks.map((c) => c.id)).toEqual(['doc_abc_chunk_0', 'doc_abc_chunk_1', 'doc_abc_chunk_2', 'doc_abc_chunk_3']);
    expect(chunks.map((c) => [c.metadata.char_start, c.metadata.char_end])).toEqual([
      [0, 13],
      [8, 27],
      [22, 27],
      [27, 43]
    ]);
    expect(chunks[1].token_count).toBe(3);
    expect(chunks.every((c) => c.metadata.total_chunks === 4)).toBe(true);
    expect(chunks[3].metadata).toMatchObject({ filename: 'notes.txt', file_type: 'txt', section_title: null });
  });

  it('validates its configuration once, at construction', () => {
    expect(() => createSegmenter({ chunkSize: 100, overlap: 150, lookback: 10 })).toThrow(InvalidConfigurationError);
  });
});
