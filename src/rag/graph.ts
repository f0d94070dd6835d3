import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { RequestOptions, RetrievalOutcome, RetrievalStrategy, RouteDecision, StructuredOutcome, UnstructuredOutcome } from "../types";
import type { QueryRouter } from "./router";
import type { AnswerSynthesizer } from "./synthesizer";

export const AnswerGraphState = Annotation.Root({
  question: Annotation<string>,
  decision: Annotation<RouteDecision>,
  outcome: Annotation<RetrievalOutcome>,
  answerText: Annotation<string>
});

export type AnswerGraphValues = typeof AnswerGraphState.State;

export interface AnswerGraphComponents {
  router: Pick<QueryRouter, "classify">;
  structured: RetrievalStrategy<StructuredOutcome>;
  unstructured: RetrievalStrategy<UnstructuredOutcome>;
  synthesizer: Pick<AnswerSynthesizer, "compose">;
}

/**
 * classify -> (structured | unstructured) retrieval -> synthesis.
 * Built per request so the request's abort signal reaches every node.
 */
export function buildAnswerGraph(components: AnswerGraphComponents, options: RequestOptions = {}) {
  return new StateGraph(AnswerGraphState)
    .addNode("route", async (state) => ({
      decision: await components.router.classify(state.question, options)
    }))
    .addNode("structured_retrieval", async (state) => ({
      outcome: await components.structured.retrieve(state.question, options)
    }))
    .addNode("unstructured_retrieval", async (state) => ({
      outcome: await components.unstructured.retrieve(state.question, options)
    }))
    .addNode("synthesis", async (state) => ({
      answerText: await components.synthesizer.compose(state.question, state.outcome, options)
    }))
    .addEdge(START, "route")
    .addConditionalEdges("route", (state) => state.decision, {
      structured: "structured_retrieval",
      unstructured: "unstructured_retrieval"
    })
    .addEdge("structured_retrieval", "synthesis")
    .addEdge("unstructured_retrieval", "synthesis")
    .addEdge("synthesis", END)
    .compile();
}

export async function runAnswerGraph(
  components: AnswerGraphComponents,
  question: string,
  options: RequestOptions = {}
): Promise<AnswerGraphValues> {
  const graph = buildAnswerGraph(components, options);
  return graph.invoke({ question });
}
