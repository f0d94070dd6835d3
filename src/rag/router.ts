import { errorMessage } from "../errors";
import type { LanguageModel } from "../llm/client";
import { buildRoutingPrompt } from "../llm/prompt";
import type { Logger } from "../logger";
import { consoleLogger } from "../logger";
import type { RequestOptions, RouteDecision } from "../types";
import { ROUTE_DECISIONS } from "../types";
import { withTimeout } from "../utils";
import type { RouteFallbackReason, RoutingObserver } from "./metrics";

export const DEFAULT_ROUTE: RouteDecision = "unstructured";

export interface QueryRouterOptions {
  timeoutMs?: number;
  observer?: RoutingObserver;
  logger?: Logger;
}

/** Exact match on one of the two route tokens after trimming and lower-casing. */
export function parseRouteDecision(raw: string): RouteDecision | null {
  const normalized = raw.trim().toLowerCase();
  return ROUTE_DECISIONS.find((decision) => decision === normalized) ?? null;
}

export class QueryRouter {
  private readonly timeoutMs?: number;

  private readonly observer?: RoutingObserver;

  private readonly logger: Logger;

  constructor(private readonly model: LanguageModel, options: QueryRouterOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.observer = options.observer;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Never rejects: unreadable or failed classifications resolve to the default
   * route. A cancelled request also resolves to it but is not reported as a fallback.
   */
  async classify(question: string, options: RequestOptions = {}): Promise<RouteDecision> {
    let raw: string;
    try {
      const prompt = await buildRoutingPrompt(question);
      raw = await withTimeout((signal) => this.model.generate(prompt, { signal }), {
        timeoutMs: this.timeoutMs,
        signal: options.signal,
        label: "Route classification"
      });
    } catch (error) {
      if (options.signal?.aborted) {
        this.logger.info(`Query routing stopped: ${errorMessage(error)}`);
        return DEFAULT_ROUTE;
      }
      return this.fallback("model_error", errorMessage(error));
    }

    const decision = parseRouteDecision(raw);
    if (!decision) {
      return this.fallback("unrecognized_response", `Unclear classification '${raw.trim()}'`);
    }

    this.observer?.onRoute(decision);
    return decision;
  }

  private fallback(reason: RouteFallbackReason, detail: string): RouteDecision {
    this.logger.warn(`Query routing fell back to '${DEFAULT_ROUTE}' (${reason}): ${detail}`);
    this.observer?.onFallback(reason, detail);
    this.observer?.onRoute(DEFAULT_ROUTE);
    return DEFAULT_ROUTE;
  }
}
