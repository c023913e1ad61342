/* ------------------------------------------------------------------ */
/*  Noise patterns                                                    */
/* ------------------------------------------------------------------ */

const NOISE_LINE_PATTERNS: RegExp[] = [
  /^\[page \d+\]$/i,
  /^(table of contents|contents|index)$/i,
  /^(copyright|©|all rights reserved)/i,
  /^\s*[|•·–—]\s*$/,
  /^(.)\1{4,}$/,                       // repeated chars: ===== or -----
  /^([-*_])\1{2,}$/,                    // markdown rules: --- *** ___
  /^\s*\d+\s*$/,                       // bare numbers (page numbers)
  /^page \d+( of \d+)?$/i
];

const MAX_BULLET_LEN = 200;
const MAX_BULLETS = 6;

export const NO_CONTEXT_REPLY = 'No relevant information was found in the provided documents.';

/* ------------------------------------------------------------------ */
/*  Text cleaning                                                      */
/* ------------------------------------------------------------------ */

export function cleanLine(line: string): string {
  return line.replace(/\s+/g, ' ').trim();
}

function isNoiseLine(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed.length < 3) return true;
  // Long lines are content even if they start with a noise prefix
  if (trimmed.length > 80) return false;
  return NOISE_LINE_PATTERNS.some((p) => p.test(trimmed));
}

export function cleanChunkText(text: string): string {
  return text
    .split('\n')
    .map(cleanLine)
    .filter((l) => !isNoiseLine(l))
    .join(' ')
    .replace(/\s{2,}/g, ' ')
    .trim();
}

/* ------------------------------------------------------------------ */
/*  Sentence splitting                                                 */
/* ------------------------------------------------------------------ */

const ABBREV = /(?:Mr|Mrs|Ms|Dr|Jr|Sr|Inc|Ltd|Co|vs|etc|e\.g|i\.e|approx|dept|est|govt|Fig|No)\.$/i;

export function splitSentences(text: string): string[] {
  const raw = text.split(/(?<=[.!?])\s+/);
  const merged: string[] = [];

  for (const seg of raw) {
    const trimmed = seg.trim();
    if (!trimmed) continue;
    if (merged.length > 0 && ABBREV.test(merged[merged.length - 1])) {
      merged[merged.length - 1] += ' ' + trimmed;
    } else {
      merged.push(trimmed);
    }
  }
  return merged.filter((s) => s.length >= 10);
}

/* ------------------------------------------------------------------ */
/*  Deduplication                                                      */
/* ------------------------------------------------------------------ */

function normalizeForDedup(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/** Drops spans equal to, or contained in, an earlier span (chunk overlap repeats text). */
export function deduplicateSpans(spans: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const span of spans) {
    const key = normalizeForDedup(span);
    let isDup = seen.has(key);
    if (!isDup) {
      for (const prev of seen) {
        if (prev.includes(key) || key.includes(prev)) {
          isDup = true;
          break;
        }
      }
    }
    if (!isDup) {
      seen.add(key);
      result.push(span);
    }
  }
  return result;
}

/* ------------------------------------------------------------------ */
/*  Span extraction                                                    */
/* ------------------------------------------------------------------ */

export interface ScoredSpan {
  text: string;
  passageIndex: number;
  relevance: number;
  score: number;
}

const STOP_WORDS = new Set([
  'what', 'is', 'the', 'a', 'an', 'of', 'and', 'or', 'for', 'to', 'in', 'on', 'how', 'do', 'does',
  'are', 'was', 'were', 'be', 'it', 'its', 'this', 'that', 'with', 'about', 'which', 'who', 'why',
  'when', 'where', 'can', 'you', 'me', 'tell', 'document', 'file'
]);

export function queryTerms(question: string): string[] {
  return question
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .split(/\s+/)
    .filter((w) => w.length > 2 && !STOP_WORDS.has(w));
}

function spanRelevance(span: string, terms: string[]): number {
  const lower = span.toLowerCase();
  let hits = 0;
  for (const t of terms) {
    if (lower.includes(t)) hits++;
  }
  return terms.length > 0 ? hits / terms.length : 0;
}

/**
 * Ranks sentences by query-term coverage, weighted toward higher-ranked
 * passages and earlier sentences.
 */
export function extractKeySpans(passages: string[], question: string, maxSpans: number = MAX_BULLETS): ScoredSpan[] {
  const terms = queryTerms(question);
  const allSpans: ScoredSpan[] = [];

  passages.forEach((passage, passageIndex) => {
    const rankWeight = 1 - (passageIndex / Math.max(passages.length, 1)) * 0.5;
    const sentences = splitSentences(cleanChunkText(passage));

    for (let i = 0; i < sentences.length; i++) {
      const s = sentences[i];
      const relevance = spanRelevance(s, terms);
      const positionBoost = 1 - (i / Math.max(sentences.length, 1)) * 0.3;
      const lengthPenalty = s.length > MAX_BULLET_LEN ? 0.8 : 1;

      allSpans.push({
        text: s,
        passageIndex,
        relevance,
        score: (rankWeight * 0.5 + relevance * 0.5) * positionBoost * lengthPenalty
      });
    }
  });

  allSpans.sort((a, b) => b.score - a.score);

  const texts = deduplicateSpans(allSpans.map((s) => s.text));
  const result: ScoredSpan[] = [];
  for (const text of texts) {
    if (result.length >= maxSpans) break;
    const original = allSpans.find((s) => s.text === text);
    if (original) result.push(original);
  }

  return result;
}

/* ------------------------------------------------------------------ */
/*  Bullet formatting                                                  */
/* ------------------------------------------------------------------ */

export function truncateBullet(text: string, maxLen: number = MAX_BULLET_LEN): string {
  if (text.length <= maxLen) return text;
  const cut = text.slice(0, maxLen);
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > maxLen * 0.5 ? cut.slice(0, lastSpace) : cut) + '...';
}

/* ------------------------------------------------------------------ */
/*  Main synthesis entry point                                         */
/* ------------------------------------------------------------------ */

export interface SynthesisResult {
  answerLines: string[];
  lowConfidence: boolean;
}

export function synthesize(question: string, passages: string[]): SynthesisResult {
  const trimmed = passages.map((p) => p.trim());
  if (!trimmed.some(Boolean)) {
    return { answerLines: [NO_CONTEXT_REPLY], lowConfidence: true };
  }

  const spans = extractKeySpans(trimmed, question, MAX_BULLETS);
  if (spans.length === 0) {
    return {
      answerLines: ['- Retrieved text is too fragmented for a confident answer. Try a more specific question.'],
      lowConfidence: true
    };
  }

  // source references are 1-based positions in `passages`
  const bullets = spans.map((s) => `- ${truncateBullet(s.text)} [${s.passageIndex + 1}]`);
  const lowConfidence = spans.every((s) => s.relevance === 0);

  return { answerLines: bullets, lowConfidence };
}
