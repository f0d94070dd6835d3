import { z } from "zod";
import { InvalidRequestError } from "../errors";
import { NARRATIVE_STYLES, NarrativeStyle } from "../types";

export const NarrativeStyleSchema = z.enum(NARRATIVE_STYLES);

export const QueryRequestSchema = z.object({
  query: z.string().trim().min(1, "query must be a non-empty string"),
  session_id: z.string().trim().min(1).max(200).nullish()
});

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export const NarrateRequestSchema = z.object({
  prompt: z.string().trim().min(1, "prompt must be a non-empty string"),
  style: NarrativeStyleSchema.default("descriptive")
});

export type NarrateRequest = z.infer<typeof NarrateRequestSchema>;

export function parseNarrativeStyle(value: unknown): NarrativeStyle {
  const result = NarrativeStyleSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidRequestError(`Unknown narrative style '${String(value)}'`, [
      `style must be one of: ${NARRATIVE_STYLES.join(", ")}`
    ]);
  }
  return result.data;
}

export function parseRequestBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
    throw new InvalidRequestError("Invalid request body", issues);
  }
  return result.data;
}
