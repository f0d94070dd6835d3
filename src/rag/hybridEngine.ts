import { errorMessage, InvalidRequestError, LanguageModelError } from "../errors";
import type { LanguageModel } from "../llm/client";
import { buildNarrationPrompt } from "../llm/prompt";
import type { Logger } from "../logger";
import { consoleLogger } from "../logger";
import { parseNarrativeStyle } from "../parsers/request-schema";
import type {
  AnswerMetadata,
  AnswerOptions,
  AnswerResult,
  NarrationResult,
  RequestOptions,
  RetrievalOutcome
} from "../types";
import { uniqueInOrder, withTimeout } from "../utils";
import { AnswerGraphComponents, runAnswerGraph } from "./graph";

export const DEFAULT_PASSAGE_SOURCE = "D&D SRD";

export interface HybridEngineDeps extends AnswerGraphComponents {
  narrator: LanguageModel;
  factTableLabel: string;
  timeoutMs?: number;
  logger?: Logger;
}

export function collectSources(outcome: RetrievalOutcome, factTableLabel: string): string[] {
  if (!outcome.succeeded) {
    return [];
  }
  if (outcome.kind === "structured") {
    return [factTableLabel];
  }
  return uniqueInOrder(outcome.evidence.map((passage) => passage.source || DEFAULT_PASSAGE_SOURCE));
}

function outcomeMetadata(outcome: RetrievalOutcome): AnswerMetadata {
  const metadata: AnswerMetadata = {
    attemptsUsed: outcome.attemptsUsed,
    diagnostic: outcome.diagnostic
  };
  if (outcome.kind === "structured" && outcome.query) {
    metadata.query = outcome.query;
  }
  return metadata;
}

/**
 * Router -> strategy -> synthesizer in one request/response cycle, plus the
 * routing-free narration operation. Only caller-input problems are thrown
 * (`InvalidRequestError`); every other failure is encoded in the result.
 */
export class HybridEngine {
  private readonly logger: Logger;

  constructor(private readonly deps: HybridEngineDeps) {
    this.logger = deps.logger ?? consoleLogger;
  }

  async answer(question: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const trimmed = typeof question === "string" ? question.trim() : "";
    if (!trimmed) {
      throw new InvalidRequestError("Question must be a non-empty string");
    }

    const sessionId = options.sessionId ?? null;
    const requestOptions: RequestOptions = { signal: options.signal };

    if (options.signal?.aborted) {
      return this.errorResult("Request was cancelled", sessionId);
    }

    try {
      const state = await runAnswerGraph(this.deps, trimmed, requestOptions);
      if (options.signal?.aborted) {
        return this.errorResult("Request was cancelled", sessionId);
      }
      this.logger.info(`Query routed to: ${state.decision}`);
      return {
        answerText: state.answerText,
        route: state.decision,
        sources: collectSources(state.outcome, this.deps.factTableLabel),
        retrievalSucceeded: state.outcome.succeeded,
        sessionId,
        metadata: outcomeMetadata(state.outcome)
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error("Error in hybrid RAG query", error);
      return this.errorResult(message, sessionId);
    }
  }

  async narrate(prompt: string, style: string = "descriptive", options: RequestOptions = {}): Promise<NarrationResult> {
    const narrativeStyle = parseNarrativeStyle(style);
    const trimmed = typeof prompt === "string" ? prompt.trim() : "";
    if (!trimmed) {
      throw new InvalidRequestError("Narration prompt must be a non-empty string");
    }

    try {
      const rendered = await buildNarrationPrompt(trimmed, narrativeStyle);
      const text = await withTimeout((signal) => this.deps.narrator.generate(rendered, { signal }), {
        timeoutMs: this.deps.timeoutMs,
        signal: options.signal,
        label: "Narration"
      });
      const narrative = text.trim();
      if (!narrative) {
        throw new LanguageModelError("empty_response", "Model returned empty response");
      }
      return { text: narrative, style: narrativeStyle, succeeded: true };
    } catch (error) {
      const detail = errorMessage(error);
      this.logger.warn(`Narration failed: ${detail}`);
      return {
        text: `Error creating narrative: ${detail}`,
        style: narrativeStyle,
        succeeded: false,
        errorDetail: detail
      };
    }
  }

  private errorResult(message: string, sessionId: string | null): AnswerResult {
    return {
      answerText: `I encountered an error: ${message}. Please try rephrasing your question.`,
      route: "error",
      sources: [],
      retrievalSucceeded: false,
      sessionId,
      metadata: { attemptsUsed: 0, error: message }
    };
  }
}
