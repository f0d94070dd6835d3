import { describe, expect, it, vi } from "vitest";
import { InvalidRequestError } from "../../errors";
import { OracleEngine, respondToNarrate, respondToQuery } from "../../routes";
import type { AnswerResult, NarrationResult } from "../../types";

const ANSWER: AnswerResult = {
  answerText: "A Beholder has an armor class of 18.",
  route: "structured",
  sources: ["D&D Monster Database"],
  retrievalSucceeded: true,
  sessionId: "abc",
  metadata: { attemptsUsed: 1, diagnostic: "SELECT 1", query: "SELECT 1" }
};

function fakeEngine(answer: () => Promise<AnswerResult>, narrate?: () => Promise<NarrationResult>) {
  const answerMock = vi.fn(answer);
  const narrateMock = vi.fn(
    narrate ?? (async (): Promise<NarrationResult> => ({ text: "Fog rolls in.", style: "descriptive", succeeded: true }))
  );
  const engine: OracleEngine = { answer: answerMock, narrate: narrateMock };
  return { engine, answerMock, narrateMock };
}

function clock(...ticks: number[]): () => number {
  return () => ticks.shift() ?? 0;
}

describe("respondToQuery", () => {
  it("maps the answer to the response body and adds latency", async () => {
    const { engine, answerMock } = fakeEngine(async () => ANSWER);

    const reply = await respondToQuery(engine, { query: "  What is a Beholder's AC?  ", session_id: "abc" }, undefined, clock(100, 142));

    expect(answerMock).toHaveBeenCalledWith("What is a Beholder's AC?", { sessionId: "abc", signal: undefined });
    expect(reply).toEqual({
      status: 200,
      body: {
        answer: "A Beholder has an armor class of 18.",
        route: "structured",
        sources: ["D&D Monster Database"],
        retrieval_success: true,
        session_id: "abc",
        metadata: { attemptsUsed: 1, diagnostic: "SELECT 1", query: "SELECT 1", latencyMs: 42 }
      }
    });
  });

  it("passes a null session id when none is given", async () => {
    const { engine, answerMock } = fakeEngine(async () => ({ ...ANSWER, sessionId: null }));

    await respondToQuery(engine, { query: "Goblin HP?", session_id: null });

    expect(answerMock).toHaveBeenCalledWith("Goblin HP?", { sessionId: null, signal: undefined });
  });

  it("rejects a missing or blank query with 400", async () => {
    const { engine, answerMock } = fakeEngine(async () => ANSWER);

    await expect(respondToQuery(engine, {})).resolves.toEqual({
      status: 400,
      body: { message: "Invalid request body", issues: ["query: Required"] }
    });
    await expect(respondToQuery(engine, { query: "   " })).resolves.toEqual({
      status: 400,
      body: { message: "Invalid request body", issues: ["query: query must be a non-empty string"] }
    });
    await expect(respondToQuery(engine, undefined)).resolves.toMatchObject({ status: 400 });
    expect(answerMock).not.toHaveBeenCalled();
  });

  it("turns an engine input error into 400", async () => {
    const { engine } = fakeEngine(async () => {
      throw new InvalidRequestError("Question must be a non-empty string");
    });

    await expect(respondToQuery(engine, { query: "x" })).resolves.toEqual({
      status: 400,
      body: { message: "Question must be a non-empty string" }
    });
  });

  it("lets unexpected errors propagate", async () => {
    const { engine } = fakeEngine(async () => {
      throw new Error("pool exhausted");
    });

    await expect(respondToQuery(engine, { query: "x" })).rejects.toThrow("pool exhausted");
  });
});

describe("respondToNarrate", () => {
  it("narrates in the default style", async () => {
    const { engine, narrateMock } = fakeEngine(async () => ANSWER);

    const reply = await respondToNarrate(engine, { prompt: " A misty harbor " });

    expect(narrateMock).toHaveBeenCalledWith("A misty harbor", "descriptive", { signal: undefined });
    expect(reply).toEqual({ status: 200, body: { text: "Fog rolls in.", style: "descriptive", success: true } });
  });

  it("includes the error detail of a failed narration", async () => {
    const { engine } = fakeEngine(
      async () => ANSWER,
      async () => ({
        text: "Error creating narrative: quota exceeded",
        style: "dramatic",
        succeeded: false,
        errorDetail: "quota exceeded"
      })
    );

    await expect(respondToNarrate(engine, { prompt: "A duel", style: "dramatic" })).resolves.toEqual({
      status: 200,
      body: {
        text: "Error creating narrative: quota exceeded",
        style: "dramatic",
        success: false,
        error: "quota exceeded"
      }
    });
  });

  it("rejects an unknown style with 400", async () => {
    const { engine, narrateMock } = fakeEngine(async () => ANSWER);

    const reply = await respondToNarrate(engine, { prompt: "A castle", style: "whimsical" });

    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({ message: "Invalid request body" });
    expect(narrateMock).not.toHaveBeenCalled();
  });
});
