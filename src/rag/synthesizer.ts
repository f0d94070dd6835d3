import { errorMessage, LanguageModelError } from "../errors";
import type { LanguageModel } from "../llm/client";
import { buildStructuredAnswerPrompt, buildUnstructuredAnswerPrompt, NO_RELEVANT_INFORMATION } from "../llm/prompt";
import type { Logger } from "../logger";
import { consoleLogger } from "../logger";
import type { Passage, RequestOptions, RetrievalOutcome, TabularEvidence } from "../types";
import { withTimeout } from "../utils";

export interface AnswerSynthesizerOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export function formatTabularEvidence(evidence: TabularEvidence): string {
  if (evidence.rowCount === 0) {
    return "The query returned no rows.";
  }
  const header = `${evidence.rowCount} row(s); columns: ${evidence.columns.join(", ")}`;
  const rows = evidence.rows.map((row) => JSON.stringify(row));
  const footer = evidence.truncated ? [`(more rows matched; only the first ${evidence.rows.length} are shown)`] : [];
  return [header, ...rows, ...footer].join("\n");
}

export function formatPassages(passages: Passage[]): string {
  return passages.map((passage) => `Source: ${passage.source}\nContent: ${passage.content}`).join("\n\n");
}

export function retrievalFailureMessage(outcome: RetrievalOutcome): string {
  return outcome.kind === "structured"
    ? `Database error: ${outcome.diagnostic}`
    : `Knowledge base error: ${outcome.diagnostic}`;
}

/**
 * Turns retrieved evidence into the final answer text. Failed retrievals get a
 * fixed message without a model call; model failures become an error message.
 * `compose` never rejects and never resolves to an empty string.
 */
export class AnswerSynthesizer {
  private readonly timeoutMs?: number;

  private readonly logger: Logger;

  constructor(private readonly model: LanguageModel, options: AnswerSynthesizerOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? consoleLogger;
  }

  async compose(question: string, outcome: RetrievalOutcome, options: RequestOptions = {}): Promise<string> {
    if (!outcome.succeeded) {
      return retrievalFailureMessage(outcome);
    }

    try {
      const prompt =
        outcome.kind === "structured"
          ? await buildStructuredAnswerPrompt(question, formatTabularEvidence(outcome.evidence))
          : await buildUnstructuredAnswerPrompt(question, formatPassages(outcome.evidence) || NO_RELEVANT_INFORMATION);

      const text = await withTimeout((signal) => this.model.generate(prompt, { signal }), {
        timeoutMs: this.timeoutMs,
        signal: options.signal,
        label: "Answer synthesis"
      });

      const answer = text.trim();
      if (!answer) {
        throw new LanguageModelError("empty_response", "Model returned empty response");
      }
      return answer;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`Answer synthesis failed: ${message}`);
      return `Error generating response: ${message}`;
    }
  }
}
