import { Router, Request, Response, NextFunction } from "express";
import { InvalidRequestError } from "./errors";
import type { HealthReport } from "./health";
import { NarrateRequestSchema, parseRequestBody, QueryRequestSchema } from "./parsers/request-schema";
import type { HybridEngine } from "./rag/hybridEngine";
import type { AnswerMetadata, AnswerRoute, NarrativeStyle } from "./types";

export interface QueryResponseBody {
  answer: string;
  route: AnswerRoute;
  sources: string[];
  retrieval_success: boolean;
  session_id: string | null;
  metadata: AnswerMetadata;
}

export interface NarrateResponseBody {
  text: string;
  style: NarrativeStyle;
  success: boolean;
  error?: string;
}

export interface ErrorResponseBody {
  message: string;
  issues?: string[];
}

export interface HttpReply<T> {
  status: number;
  body: T | ErrorResponseBody;
}

export type OracleEngine = Pick<HybridEngine, "answer" | "narrate">;

function badRequest(error: InvalidRequestError): HttpReply<never> {
  return {
    status: 400,
    body: error.issues.length > 0 ? { message: error.message, issues: error.issues } : { message: error.message }
  };
}

export async function respondToQuery(
  engine: OracleEngine,
  body: unknown,
  signal?: AbortSignal,
  clock: () => number = Date.now
): Promise<HttpReply<QueryResponseBody>> {
  const startedAt = clock();
  try {
    const request = parseRequestBody(QueryRequestSchema, body);
    const result = await engine.answer(request.query, { sessionId: request.session_id ?? null, signal });
    return {
      status: 200,
      body: {
        answer: result.answerText,
        route: result.route,
        sources: result.sources,
        retrieval_success: result.retrievalSucceeded,
        session_id: result.sessionId,
        metadata: { ...result.metadata, latencyMs: clock() - startedAt }
      }
    };
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      return badRequest(error);
    }
    throw error;
  }
}

export async function respondToNarrate(
  engine: OracleEngine,
  body: unknown,
  signal?: AbortSignal
): Promise<HttpReply<NarrateResponseBody>> {
  try {
    const request = parseRequestBody(NarrateRequestSchema, body);
    const result = await engine.narrate(request.prompt, request.style, { signal });
    const payload: NarrateResponseBody = {
      text: result.text,
      style: result.style,
      success: result.succeeded
    };
    if (result.errorDetail) {
      payload.error = result.errorDetail;
    }
    return { status: 200, body: payload };
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      return badRequest(error);
    }
    throw error;
  }
}

/** Aborts once the client goes away before the response is written. */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

export interface RouterDeps {
  engine: OracleEngine;
  health: () => Promise<HealthReport>;
  version: string;
}

export function createRouter({ engine, health, version }: RouterDeps): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({
      name: "Dungeon Master's Oracle",
      version,
      status: "operational",
      endpoints: {
        query: "POST /query",
        narrate: "POST /narrate",
        health: "GET /health",
        docs: "GET /docs"
      }
    });
  });

  router.get("/health", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await health();
      res.status(report.status === "healthy" ? 200 : 503).json(report);
    } catch (error) {
      next(error);
    }
  });

  router.post("/query", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const reply = await respondToQuery(engine, req.body, abortOnDisconnect(res));
      res.status(reply.status).json(reply.body);
    } catch (error) {
      next(error);
    }
  });

  router.post("/narrate", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const reply = await respondToNarrate(engine, req.body, abortOnDisconnect(res));
      res.status(reply.status).json(reply.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
