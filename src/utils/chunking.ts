import { ChunkingConfig, validateChunkingConfig } from '../config.js';
import { Chunk, FileType } from '../types.js';

export function simpleTokenCount(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

export interface TextSpan {
  /** Stripped text of the span. */
  text: string;
  /** Unstripped span is `source.slice(start, end)`. */
  start: number;
  end: number;
}

/** Boundary classes, highest priority first. */
const BOUNDARY_CLASSES: Array<(ch: string) => boolean> = [
  (ch) => ch === '.',
  (ch) => ch === '\n',
  (ch) => /\s/.test(ch)
];

/**
 * Scans backward from `end` over at most `lookback` characters (never before
 * `start`) and returns the cut position just after the preferred boundary.
 * A period anywhere in the window beats a closer newline or space.
 */
export function findBoundary(text: string, start: number, end: number, lookback: number): number {
  const windowStart = Math.max(end - lookback, start);
  const found = BOUNDARY_CLASSES.map(() => -1);

  for (let i = end - 1; i >= windowStart; i--) {
    const ch = text[i];
    for (let p = 0; p < BOUNDARY_CLASSES.length; p++) {
      if (BOUNDARY_CLASSES[p](ch)) {
        if (found[p] === -1) found[p] = i;
        break;
      }
    }
    if (found[0] !== -1) break;
  }

  for (const pos of found) {
    if (pos !== -1) return pos + 1;
  }
  return end;
}

export function segmentSpans(text: string, config: ChunkingConfig): TextSpan[] {
  const { chunkSize, overlap, lookback } = config;
  const spans: TextSpan[] = [];
  const length = text.length;
  if (length === 0) return spans;

  let start = 0;
  for (;;) {
    let end = Math.min(start + chunkSize, length);
    if (end < length) {
      end = findBoundary(text, start, end, lookback);
    }

    const piece = text.slice(start, end).trim();
    if (piece) spans.push({ text: piece, start, end });

    if (end >= length) break;

    const next = end - overlap;
    start = next > start ? next : end;
  }

  return spans;
}

/* ------------------------------------------------------------------ */
/*  Section headings                                                   */
/* ------------------------------------------------------------------ */

export interface Heading {
  offset: number;
  title: string;
}

function isAllCapsHeading(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed) return false;
  const words = trimmed.split(/\s+/);
  if (words.length < 2 || trimmed.length > 120) return false;
  return /[A-Z]/.test(trimmed) && !/[a-z]/.test(trimmed);
}

function isColonHeading(line: string, prevLine: string): boolean {
  const trimmed = line.trim();
  if (!trimmed || trimmed.length > 120) return false;
  if (!trimmed.endsWith(':')) return false;
  if (trimmed.split(/\s+/).length > 10) return false;
  return prevLine.trim() === '';
}

/**
 * Plain-text headings: ALL CAPS lines of two or more words, or short
 * colon-terminated lines preceded by a blank line.
 */
export function detectHeadings(text: string): Heading[] {
  const headings: Heading[] = [];
  const lines = text.split('\n');
  let offset = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const prevLine = i > 0 ? lines[i - 1] : '';
    // the first line has no blank line before it, so only ALL CAPS counts there
    if (isAllCapsHeading(line) || (i > 0 && isColonHeading(line, prevLine))) {
      headings.push({ offset, title: line.trim().replace(/:$/, '') });
    }
    offset += line.length + 1;
  }

  return headings;
}

export function sectionTitleAt(headings: Heading[], offset: number): string | null {
  let title: string | null = null;
  for (const heading of headings) {
    if (heading.offset > offset) break;
    title = heading.title;
  }
  return title;
}

/* ------------------------------------------------------------------ */
/*  Segmenter                                                          */
/* ------------------------------------------------------------------ */

export interface SegmentSource {
  documentId: string;
  filename: string;
  fileType: FileType;
  collection: string;
  ingestedAt: string;
}

export interface Segmenter {
  readonly config: ChunkingConfig;
  segment(text: string, source: SegmentSource): Chunk[];
}

export function createSegmenter(config: ChunkingConfig): Segmenter {
  const validated = validateChunkingConfig({ ...config });

  return {
    config: validated,
    segment(text, source) {
      const spans = segmentSpans(text, validated);
      const headings = detectHeadings(text);

      return spans.map((span, index) => ({
        id: `${source.documentId}_chunk_${index}`,
        document_id: source.documentId,
        chunk_index: index,
        text: span.text,
        token_count: simpleTokenCount(span.text),
        metadata: {
          filename: source.filename,
          file_type: source.fileType,
          collection: source.collection,
          char_start: span.start,
          char_end: span.end,
          total_chunks: spans.length,
          ingested_at: source.ingestedAt,
          section_title: sectionTitleAt(headings, span.start)
        }
      }));
    }
  };
}

/** One-off segmentation with explicit sizes; validates like `createSegmenter`. */
export function chunkText(text: string, chunkSize: number, overlap: number, lookback = 100): string[] {
  const config = validateChunkingConfig({ chunkSize, overlap, lookback });
  return segmentSpans(text, config).map((span) => span.text);
}
