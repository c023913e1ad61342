import { EmptyContextPolicy } from '../config.js';
import { EmptyContextError } from '../errors.js';
import { RetrievedMatch } from '../types.js';

export interface ContextOptions {
  maxChars: number;
  delimiter: string;
  emptyContextPolicy: EmptyContextPolicy;
}

export interface AssembledContext {
  context: string;
  /** Matches whose text made it into `context`, in the given order. */
  used: RetrievedMatch[];
  dropped: number;
}

/**
 * Joins chunk texts in caller order. When the budget is exceeded the
 * lowest-ranked matches are dropped whole; the top match is always kept.
 */
export function assembleContext(matches: RetrievedMatch[], options: ContextOptions): AssembledContext {
  if (matches.length === 0) {
    if (options.emptyContextPolicy === 'answer_directly') {
      throw new EmptyContextError();
    }
    return { context: '', used: [], dropped: 0 };
  }

  const used: RetrievedMatch[] = [];
  let length = 0;

  for (const match of matches) {
    const added = (used.length > 0 ? options.delimiter.length : 0) + match.chunk.text.length;
    if (used.length > 0 && length + added > options.maxChars) break;
    used.push(match);
    length += added;
  }

  return {
    context: used.map((m) => m.chunk.text).join(options.delimiter),
    used,
    dropped: matches.length - used.length
  };
}
