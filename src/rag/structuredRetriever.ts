import { errorMessage, QueryExecutionError } from "../errors";
import { describeMonsterSchema, FactTable } from "../facts/monsterTable";
import type { LanguageModel } from "../llm/client";
import { buildSqlPrompt, PreviousAttempt } from "../llm/prompt";
import type { Logger } from "../logger";
import { consoleLogger } from "../logger";
import type { RequestOptions, RetrievalStrategy, StructuredOutcome } from "../types";
import { stripCodeFence, withTimeout } from "../utils";

export const DEFAULT_SQL_RETRIES = 2;

export interface StructuredRetrieverOptions {
  /** Retries after the first attempt; the loop makes at most `maxRetries + 1` attempts. */
  maxRetries?: number;
  modelTimeoutMs?: number;
  queryTimeoutMs?: number;
  schemaDescription?: string;
  logger?: Logger;
}

/**
 * Text-to-SQL retrieval with self-correction. Each attempt regenerates the
 * query; from the second attempt on the prompt carries the previous query and
 * its error. The loop ends at the first query that executes.
 */
export class StructuredRetriever implements RetrievalStrategy<StructuredOutcome> {
  readonly kind = "structured";

  readonly maxAttempts: number;

  private readonly schemaDescription: string;

  private readonly modelTimeoutMs?: number;

  private readonly queryTimeoutMs?: number;

  private readonly logger: Logger;

  constructor(
    private readonly model: LanguageModel,
    private readonly factTable: FactTable,
    options: StructuredRetrieverOptions = {}
  ) {
    const maxRetries = Math.max(0, Math.floor(options.maxRetries ?? DEFAULT_SQL_RETRIES));
    this.maxAttempts = maxRetries + 1;
    this.schemaDescription = options.schemaDescription ?? describeMonsterSchema(factTable.tableName);
    this.modelTimeoutMs = options.modelTimeoutMs;
    this.queryTimeoutMs = options.queryTimeoutMs;
    this.logger = options.logger ?? consoleLogger;
  }

  get sourceLabel(): string {
    return this.factTable.label;
  }

  async retrieve(question: string, options: RequestOptions = {}): Promise<StructuredOutcome> {
    if (options.signal?.aborted) {
      // Counted as the first attempt; attemptsUsed stays within [1, maxAttempts].
      return this.failure("Cancelled before the first attempt", 1);
    }

    let previous: PreviousAttempt | undefined;
    let lastQuery: string | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      let query: string | undefined;
      try {
        query = await this.generateQuery(question, previous, options);
        if (!query) {
          throw new QueryExecutionError("Model returned an empty query");
        }
        lastQuery = query;

        const sql = query;
        const evidence = await withTimeout((signal) => this.factTable.execute(sql, { signal }), {
          timeoutMs: this.queryTimeoutMs,
          signal: options.signal,
          label: "Fact table query"
        });

        return {
          kind: "structured",
          succeeded: true,
          evidence,
          diagnostic: sql,
          attemptsUsed: attempt,
          query: sql
        };
      } catch (error) {
        const message = errorMessage(error);
        previous = { query, error: message };
        this.logger.warn(`SQL attempt ${attempt}/${this.maxAttempts} failed: ${message}`);

        if (options.signal?.aborted) {
          return this.failure(`Cancelled after ${attempt} attempt(s): ${message}`, attempt, lastQuery);
        }
        if (attempt === this.maxAttempts) {
          return this.failure(`Error after ${this.maxAttempts} attempts: ${message}`, attempt, lastQuery);
        }
      }
    }

    return this.failure(`Error after ${this.maxAttempts} attempts`, this.maxAttempts, lastQuery);
  }

  private async generateQuery(
    question: string,
    previous: PreviousAttempt | undefined,
    options: RequestOptions
  ): Promise<string> {
    const prompt = await buildSqlPrompt({
      question,
      schema: this.schemaDescription,
      table: this.factTable.tableName,
      previous
    });
    const raw = await withTimeout((signal) => this.model.generate(prompt, { signal }), {
      timeoutMs: this.modelTimeoutMs,
      signal: options.signal,
      label: "Query generation"
    });
    return stripCodeFence(raw);
  }

  private failure(diagnostic: string, attemptsUsed: number, query?: string): StructuredOutcome {
    return {
      kind: "structured",
      succeeded: false,
      evidence: null,
      diagnostic,
      attemptsUsed,
      query
    };
  }
}
