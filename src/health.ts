import { errorMessage } from "./errors";
import type { RoutingMetrics, RoutingMetricsSnapshot } from "./rag/metrics";
import { withTimeout } from "./utils";

export interface ComponentHealth {
  status: "healthy" | "unhealthy";
  detail?: string;
}

export interface HealthReport {
  status: "healthy" | "degraded";
  timestamp: string;
  version: string;
  uptime: number;
  components: {
    factTable: ComponentHealth;
    corpus: ComponentHealth;
    languageModel: ComponentHealth;
  };
  routing: RoutingMetricsSnapshot;
}

export interface HealthDeps {
  version: string;
  factTable: { ping(): Promise<void> };
  corpusSize: () => number;
  languageModelConfigured: boolean;
  metrics: Pick<RoutingMetrics, "snapshot">;
  timeoutMs?: number;
}

async function checkFactTable(deps: HealthDeps): Promise<ComponentHealth> {
  try {
    await withTimeout(() => deps.factTable.ping(), { timeoutMs: deps.timeoutMs ?? 2_000, label: "Fact table ping" });
    return { status: "healthy" };
  } catch (error) {
    return { status: "unhealthy", detail: errorMessage(error) };
  }
}

export async function checkHealth(deps: HealthDeps, now: Date = new Date()): Promise<HealthReport> {
  const passages = deps.corpusSize();
  const components = {
    factTable: await checkFactTable(deps),
    corpus: passages > 0 ? { status: "healthy" as const, detail: `${passages} passages` } : { status: "unhealthy" as const, detail: "corpus is empty" },
    languageModel: deps.languageModelConfigured
      ? { status: "healthy" as const }
      : { status: "unhealthy" as const, detail: "OPENAI_API_KEY is not configured" }
  };

  const healthy = Object.values(components).every((component) => component.status === "healthy");

  return {
    status: healthy ? "healthy" : "degraded",
    timestamp: now.toISOString(),
    version: deps.version,
    uptime: process.uptime(),
    components,
    routing: deps.metrics.snapshot()
  };
}
