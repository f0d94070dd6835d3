import { describe, expect, it } from "vitest";
import { QueryExecutionError } from "../../errors";
import { StructuredRetriever } from "../../rag/structuredRetriever";
import { evidence, FakeFactTable, HANG, ScriptedModel, silentLogger } from "../helpers/fakes";

const BEHOLDER_SQL = "SELECT armor_class FROM monsters WHERE name = 'Beholder'";

describe("StructuredRetriever", () => {
  it("succeeds on the first attempt", async () => {
    const table = new FakeFactTable(evidence([{ armor_class: 18 }]));
    const retriever = new StructuredRetriever(new ScriptedModel(BEHOLDER_SQL), table, { logger: silentLogger });

    const outcome = await retriever.retrieve("What is a Beholder's armor class?");

    expect(outcome).toEqual({
      kind: "structured",
      succeeded: true,
      evidence: evidence([{ armor_class: 18 }]),
      diagnostic: BEHOLDER_SQL,
      attemptsUsed: 1,
      query: BEHOLDER_SQL
    });
    expect(table.queries).toEqual([BEHOLDER_SQL]);
    expect(retriever.sourceLabel).toBe("D&D Monster Database");
  });

  it("strips a markdown fence around the generated query", async () => {
    const table = new FakeFactTable(evidence([{ armor_class: 18 }]));
    const model = new ScriptedModel("```sql\nSELECT armor_class FROM monsters\n```");
    const retriever = new StructuredRetriever(model, table, { logger: silentLogger });

    await retriever.retrieve("AC of everything?");

    expect(table.queries).toEqual(["SELECT armor_class FROM monsters"]);
  });

  it("strips a one-line fence with a language tag without spending a retry", async () => {
    const table = new FakeFactTable(evidence([{ armor_class: 18 }]));
    const model = new ScriptedModel("```sql SELECT armor_class FROM monsters```");
    const retriever = new StructuredRetriever(model, table, { logger: silentLogger });

    const outcome = await retriever.retrieve("AC of everything?");

    expect(table.queries).toEqual(["SELECT armor_class FROM monsters"]);
    expect(outcome.attemptsUsed).toBe(1);
  });

  it("feeds the failed query and its error into the next attempt", async () => {
    const table = new FakeFactTable(
      new QueryExecutionError('column "ac" does not exist'),
      evidence([{ armor_class: 18 }])
    );
    const model = new ScriptedModel("SELECT ac FROM monsters", BEHOLDER_SQL);
    const retriever = new StructuredRetriever(model, table, { logger: silentLogger });

    const outcome = await retriever.retrieve("What is a Beholder's armor class?");

    expect(outcome.succeeded).toBe(true);
    expect(outcome.attemptsUsed).toBe(2);
    expect(model.prompts[0]).not.toContain("Previous query:");
    expect(model.prompts[1]).toContain("Previous query: SELECT ac FROM monsters");
    expect(model.prompts[1]).toContain('Database error: column "ac" does not exist');
  });

  it("gives up after maxRetries + 1 attempts", async () => {
    const table = new FakeFactTable(new Error('column "bad" does not exist'));
    const model = new ScriptedModel("SELECT bad FROM monsters", "SELECT bad FROM monsters", "SELECT worse FROM monsters");
    const retriever = new StructuredRetriever(model, table, { maxRetries: 2, logger: silentLogger });

    const outcome = await retriever.retrieve("Which monster is the worst?");

    expect(outcome).toEqual({
      kind: "structured",
      succeeded: false,
      evidence: null,
      diagnostic: 'Error after 3 attempts: column "bad" does not exist',
      attemptsUsed: 3,
      query: "SELECT worse FROM monsters"
    });
    expect(model.prompts).toHaveLength(3);
    expect(retriever.maxAttempts).toBe(3);
  });

  it("treats an empty generated query as a failed attempt", async () => {
    const table = new FakeFactTable(evidence([]));
    const retriever = new StructuredRetriever(new ScriptedModel("   "), table, { maxRetries: 0, logger: silentLogger });

    const outcome = await retriever.retrieve("Anything?");

    expect(outcome.succeeded).toBe(false);
    expect(outcome.diagnostic).toBe("Error after 1 attempts: Model returned an empty query");
    expect(outcome.query).toBeUndefined();
    expect(table.queries).toEqual([]);
  });

  it("records feedback without a query when generation failed", async () => {
    const table = new FakeFactTable(evidence([{ name: "Goblin" }]));
    const model = new ScriptedModel(new Error("rate limited"), "SELECT name FROM monsters");
    const retriever = new StructuredRetriever(model, table, { logger: silentLogger });

    const outcome = await retriever.retrieve("Name a monster");

    expect(outcome.attemptsUsed).toBe(2);
    expect(model.prompts[1]).toContain("Previous query: (no query was produced)");
    expect(model.prompts[1]).toContain("Database error: rate limited");
  });

  it("counts a generation timeout as a failed attempt", async () => {
    const table = new FakeFactTable(evidence([]));
    const retriever = new StructuredRetriever(new ScriptedModel(HANG), table, {
      maxRetries: 0,
      modelTimeoutMs: 20,
      logger: silentLogger
    });

    const outcome = await retriever.retrieve("Slow question");

    expect(outcome.diagnostic).toBe("Error after 1 attempts: Query generation timed out after 20ms");
    expect(outcome.attemptsUsed).toBe(1);
  });

  it("calls no model when the request is already cancelled and still reports one attempt", async () => {
    const model = new ScriptedModel(BEHOLDER_SQL);
    const controller = new AbortController();
    controller.abort();
    const retriever = new StructuredRetriever(model, new FakeFactTable(evidence([])), { logger: silentLogger });

    const outcome = await retriever.retrieve("What is a Beholder's armor class?", { signal: controller.signal });

    expect(outcome.succeeded).toBe(false);
    expect(outcome.attemptsUsed).toBe(1);
    expect(outcome.diagnostic).toBe("Cancelled before the first attempt");
    expect(model.prompts).toEqual([]);
  });

  it("stops retrying once the request is cancelled mid-attempt", async () => {
    const controller = new AbortController();
    const table = new FakeFactTable(() => {
      controller.abort();
      throw new Error("connection reset");
    });
    const model = new ScriptedModel("SELECT name FROM monsters", "SELECT name FROM monsters");
    const retriever = new StructuredRetriever(model, table, { logger: silentLogger });

    const outcome = await retriever.retrieve("Name a monster", { signal: controller.signal });

    expect(outcome.succeeded).toBe(false);
    expect(outcome.attemptsUsed).toBe(1);
    expect(outcome.diagnostic).toMatch(/^Cancelled after 1 attempt\(s\): /);
    expect(model.prompts).toHaveLength(1);
  });
});
