import { RetrievalError } from "../errors";
import type { Passage, RequestOptions } from "../types";

export interface SearchOptions extends RequestOptions {
  limit?: number;
}

/** Passage-level search over the rules corpus. */
export interface CorpusSearch {
  search(question: string, options?: SearchOptions): Promise<Passage[]>;
}

export interface RankedPassage extends Passage {
  score: number;
}

const STOP_WORDS = new Set([
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "by",
  "can",
  "do",
  "does",
  "for",
  "from",
  "how",
  "i",
  "in",
  "is",
  "it",
  "of",
  "on",
  "or",
  "the",
  "to",
  "what",
  "when",
  "which",
  "who",
  "with"
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .map((token) => token.trim())
    .filter((token) => token.length > 0 && !STOP_WORDS.has(token));
}

function overlapScore(queryTokens: string[], candidateTokens: Set<string>): number {
  if (queryTokens.length === 0 || candidateTokens.size === 0) return 0;
  let hits = 0;
  for (const token of queryTokens) {
    if (candidateTokens.has(token)) hits += 1;
  }
  return hits / queryTokens.length;
}

/**
 * Deterministic lexical ranking: the share of distinct question terms found
 * in a passage (content and source label). Ties keep corpus order; passages
 * sharing no term with the question are dropped.
 */
export class KeywordCorpusIndex implements CorpusSearch {
  private readonly entries: Array<{ passage: Passage; tokens: Set<string> }>;

  constructor(passages: Passage[], private readonly defaultLimit = 4) {
    this.entries = passages.map((passage) => ({
      passage,
      tokens: new Set(tokenize(`${passage.source} ${passage.content}`))
    }));
  }

  get size(): number {
    return this.entries.length;
  }

  rank(question: string): RankedPassage[] {
    const queryTokens = Array.from(new Set(tokenize(question)));
    return this.entries
      .map((entry, index) => ({ ...entry.passage, score: overlapScore(queryTokens, entry.tokens), index }))
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .map(({ index: _index, ...ranked }) => ranked);
  }

  async search(question: string, options: SearchOptions = {}): Promise<Passage[]> {
    if (this.entries.length === 0) {
      throw new RetrievalError("Rules corpus is empty");
    }
    const limit = options.limit ?? this.defaultLimit;
    return this.rank(question)
      .slice(0, limit)
      .map(({ id, content, source }) => ({ id, content, source }));
  }
}
