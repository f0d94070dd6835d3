import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { RetrievalError } from "../errors";
import type { Passage } from "../types";
import { fetchJson } from "../utils";

const PassageSchema = z.object({
  id: z.string().min(1),
  content: z.string().min(1),
  source: z.string().min(1).default("D&D SRD")
});

const CorpusSchema = z.union([z.array(PassageSchema), z.object({ passages: z.array(PassageSchema) })]);

export interface CorpusLocation {
  path?: string;
  url?: string;
}

export function parseCorpus(raw: unknown, origin: string): Passage[] {
  const parsed = CorpusSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new RetrievalError(`Invalid corpus at ${origin}: ${issues.join("; ")}`);
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.passages;
}

/** Loads passages from `url` when set, otherwise from the local `path`. */
export async function loadCorpus(location: CorpusLocation): Promise<Passage[]> {
  if (location.url) {
    const payload = await fetchJson(location.url, { timeout: 15_000 }, { retries: 2, initialDelayMs: 500 });
    return parseCorpus(payload, location.url);
  }

  if (!location.path) {
    throw new RetrievalError("No corpus location configured");
  }

  const filePath = path.resolve(process.cwd(), location.path);
  const raw: unknown = JSON.parse(await readFile(filePath, "utf-8"));
  return parseCorpus(raw, filePath);
}
