import type { Pool } from "pg";
import type { AppConfig } from "./config/env";
import { createPool } from "./config/db";
import { KeywordCorpusIndex } from "./corpus/keywordIndex";
import { loadCorpus } from "./corpus/loader";
import { PostgresFactTable } from "./facts/monsterTable";
import { checkHealth, HealthReport } from "./health";
import { OpenAiLanguageModel } from "./llm/client";
import type { Logger } from "./logger";
import { consoleLogger } from "./logger";
import { HybridEngine } from "./rag/hybridEngine";
import { RoutingMetrics } from "./rag/metrics";
import { QueryRouter } from "./rag/router";
import { StructuredRetriever } from "./rag/structuredRetriever";
import { AnswerSynthesizer } from "./rag/synthesizer";
import { UnstructuredRetriever } from "./rag/unstructuredRetriever";

export interface Oracle {
  engine: HybridEngine;
  metrics: RoutingMetrics;
  health: () => Promise<HealthReport>;
  close: () => Promise<void>;
}

/** Wires the engine from configuration fixed at start-up. */
export async function createOracle(config: Readonly<AppConfig>, logger: Logger = consoleLogger): Promise<Oracle> {
  const pool: Pool = createPool(config.factTable.database, config.factTable.queryTimeoutMs, logger);
  const factTable = new PostgresFactTable(pool, {
    tableName: config.factTable.tableName,
    maxRows: config.factTable.maxRows
  });

  const passages = await loadCorpus({ path: config.corpus.path, url: config.corpus.url });
  const corpus = new KeywordCorpusIndex(passages, config.corpus.topK);
  logger.info(`Loaded ${corpus.size} corpus passages`);

  const queryModel = new OpenAiLanguageModel({
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    temperature: 0.1,
    maxConcurrency: config.llm.maxConcurrency
  });
  const responseModel = new OpenAiLanguageModel({
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    temperature: 0.7,
    maxConcurrency: config.llm.maxConcurrency
  });

  const metrics = new RoutingMetrics();
  const timeoutMs = config.llm.timeoutMs;

  const engine = new HybridEngine({
    router: new QueryRouter(queryModel, { timeoutMs, observer: metrics, logger }),
    structured: new StructuredRetriever(queryModel, factTable, {
      maxRetries: config.factTable.maxRetries,
      modelTimeoutMs: timeoutMs,
      queryTimeoutMs: config.factTable.queryTimeoutMs,
      logger
    }),
    unstructured: new UnstructuredRetriever(corpus, { topK: config.corpus.topK, timeoutMs, logger }),
    synthesizer: new AnswerSynthesizer(responseModel, { timeoutMs, logger }),
    narrator: responseModel,
    factTableLabel: factTable.label,
    timeoutMs,
    logger
  });

  return {
    engine,
    metrics,
    health: () =>
      checkHealth({
        version: config.version,
        factTable,
        corpusSize: () => corpus.size,
        languageModelConfigured: queryModel.configured,
        metrics
      }),
    close: () => pool.end()
  };
}
