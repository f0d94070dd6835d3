import type { CorpusSearch, SearchOptions } from "../../corpus/keywordIndex";
import type { FactTable } from "../../facts/monsterTable";
import type { LanguageModel } from "../../llm/client";
import type { Logger } from "../../logger";
import type { Passage, RequestOptions, TabularEvidence } from "../../types";

/** A scripted reply: text, a rejection, or a call that only settles on abort. */
export type ScriptedReply = string | Error | { hang: true };

export const HANG: ScriptedReply = { hang: true };

function waitForAbort<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

export class ScriptedModel implements LanguageModel {
  readonly prompts: string[] = [];

  private readonly replies: ScriptedReply[];

  constructor(...replies: ScriptedReply[]) {
    this.replies = replies;
  }

  async generate(prompt: string, options: RequestOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("No scripted reply left");
    }
    if (typeof reply === "string") {
      return reply;
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return waitForAbort<string>(options.signal);
  }
}

export type TableReply = TabularEvidence | Error | ((options: RequestOptions) => never);

export class FakeFactTable implements FactTable {
  readonly label = "D&D Monster Database";

  readonly tableName = "monsters";

  readonly queries: string[] = [];

  private readonly replies: TableReply[];

  constructor(...replies: TableReply[]) {
    this.replies = replies;
  }

  async execute(queryText: string, options: RequestOptions = {}): Promise<TabularEvidence> {
    this.queries.push(queryText);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) {
      throw new Error("No scripted table reply left");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === "function") {
      return reply(options);
    }
    return reply;
  }
}

export function evidence(rows: Array<Record<string, unknown>>): TabularEvidence {
  return {
    columns: rows.length > 0 ? Object.keys(rows[0]) : [],
    rows,
    rowCount: rows.length,
    truncated: false
  };
}

export class FailingCorpus implements CorpusSearch {
  constructor(private readonly error: Error) {}

  async search(_question: string, _options?: SearchOptions): Promise<Passage[]> {
    throw this.error;
  }
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
