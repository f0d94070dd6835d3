export const ROUTE_DECISIONS = ["structured", "unstructured"] as const;

export type RouteDecision = (typeof ROUTE_DECISIONS)[number];

export type AnswerRoute = RouteDecision | "error";

export const NARRATIVE_STYLES = ["descriptive", "action", "mysterious", "dramatic"] as const;

export type NarrativeStyle = (typeof NARRATIVE_STYLES)[number];

export interface Passage {
  id: string;
  content: string;
  source: string;
}

export interface TabularEvidence {
  columns: string[];
  rows: Array<Record<string, unknown>>;
  rowCount: number;
  truncated: boolean;
}

export type StructuredOutcome =
  | {
      kind: "structured";
      succeeded: true;
      evidence: TabularEvidence;
      diagnostic: string;
      attemptsUsed: number;
      query: string;
    }
  | {
      kind: "structured";
      succeeded: false;
      evidence: null;
      diagnostic: string;
      attemptsUsed: number;
      query?: string;
    };

export type UnstructuredOutcome =
  | {
      kind: "unstructured";
      succeeded: true;
      evidence: Passage[];
      diagnostic: string;
      attemptsUsed: number;
    }
  | {
      kind: "unstructured";
      succeeded: false;
      evidence: [];
      diagnostic: string;
      attemptsUsed: number;
    };

export type RetrievalOutcome = StructuredOutcome | UnstructuredOutcome;

export interface AnswerMetadata {
  attemptsUsed: number;
  diagnostic?: string;
  query?: string;
  error?: string;
  latencyMs?: number;
}

export interface AnswerResult {
  answerText: string;
  route: AnswerRoute;
  sources: string[];
  retrievalSucceeded: boolean;
  sessionId: string | null;
  metadata: AnswerMetadata;
}

export interface NarrationResult {
  text: string;
  style: NarrativeStyle;
  succeeded: boolean;
  errorDetail?: string;
}

/**
 * Per-request options threaded through every external call.
 * `signal` aborts the request; once aborted no further model or database
 * calls are issued.
 */
export interface RequestOptions {
  signal?: AbortSignal;
}

export interface AnswerOptions extends RequestOptions {
  sessionId?: string | null;
}

export interface RetrievalStrategy<TOutcome extends RetrievalOutcome = RetrievalOutcome> {
  readonly kind: TOutcome["kind"];
  retrieve(question: string, options?: RequestOptions): Promise<TOutcome>;
}
