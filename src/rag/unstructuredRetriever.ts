import type { CorpusSearch } from "../corpus/keywordIndex";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import { consoleLogger } from "../logger";
import type { RequestOptions, RetrievalStrategy, UnstructuredOutcome } from "../types";
import { withTimeout } from "../utils";

export interface UnstructuredRetrieverOptions {
  topK?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/** Single-shot passage retrieval; a failing backend is reported, not retried. */
export class UnstructuredRetriever implements RetrievalStrategy<UnstructuredOutcome> {
  readonly kind = "unstructured";

  private readonly topK: number;

  private readonly timeoutMs?: number;

  private readonly logger: Logger;

  constructor(private readonly corpus: CorpusSearch, options: UnstructuredRetrieverOptions = {}) {
    this.topK = options.topK ?? 4;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? consoleLogger;
  }

  async retrieve(question: string, options: RequestOptions = {}): Promise<UnstructuredOutcome> {
    try {
      const passages = await withTimeout(
        (signal) => this.corpus.search(question, { limit: this.topK, signal }),
        { timeoutMs: this.timeoutMs, signal: options.signal, label: "Corpus search" }
      );
      return {
        kind: "unstructured",
        succeeded: true,
        evidence: passages,
        diagnostic: `Retrieved ${passages.length} passage(s)`,
        attemptsUsed: 1
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`Corpus retrieval failed: ${message}`);
      return {
        kind: "unstructured",
        succeeded: false,
        evidence: [],
        diagnostic: message,
        attemptsUsed: 1
      };
    }
  }
}
