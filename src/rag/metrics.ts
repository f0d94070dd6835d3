import type { RouteDecision } from "../types";

export type RouteFallbackReason = "unrecognized_response" | "model_error";

/** Receives every routing decision, including the ones that fell back. */
export interface RoutingObserver {
  onRoute(decision: RouteDecision): void;
  onFallback(reason: RouteFallbackReason, detail: string): void;
}

export interface RoutingMetricsSnapshot {
  decisions: Record<RouteDecision, number>;
  fallbacks: Record<RouteFallbackReason, number>;
}

export class RoutingMetrics implements RoutingObserver {
  private readonly decisions: Record<RouteDecision, number> = { structured: 0, unstructured: 0 };

  private readonly fallbacks: Record<RouteFallbackReason, number> = { unrecognized_response: 0, model_error: 0 };

  onRoute(decision: RouteDecision): void {
    this.decisions[decision] += 1;
  }

  onFallback(reason: RouteFallbackReason): void {
    this.fallbacks[reason] += 1;
  }

  snapshot(): RoutingMetricsSnapshot {
    return {
      decisions: { ...this.decisions },
      fallbacks: { ...this.fallbacks }
    };
  }
}
