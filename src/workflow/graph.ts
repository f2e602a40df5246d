import { END, START, StateGraph } from "@langchain/langgraph";
import { createTurnNodes, type TurnDeps } from "./nodes.js";
import { TurnStateAnnotation, type TurnState } from "./state.js";

const routeAfterLoad = (state: TurnState): "plan" | "record_trace" => (state.response !== null ? "record_trace" : "plan");

const routeAfterPlan = (state: TurnState): "validate" | "record_trace" => (state.response !== null ? "record_trace" : "validate");

const routeAfterValidate = (state: TurnState): "execute" | "reject" => (state.validation?.valid ? "execute" : "reject");

export type TurnGraph = (initialState: TurnState) => Promise<TurnState>;

// load_context → plan → validate → execute | reject → record_trace
export const createTurnGraph = (deps: TurnDeps): TurnGraph => {
  const nodes = createTurnNodes(deps);
  const compiled = new StateGraph(TurnStateAnnotation)
    .addNode("load_context", nodes.load_context)
    .addNode("plan", nodes.plan)
    .addNode("validate", nodes.validate)
    .addNode("execute", nodes.execute)
    .addNode("reject", nodes.reject)
    .addNode("record_trace", nodes.record_trace)
    .addEdge(START, "load_context")
    .addConditionalEdges("load_context", routeAfterLoad)
    .addConditionalEdges("plan", routeAfterPlan)
    .addConditionalEdges("validate", routeAfterValidate)
    .addEdge("execute", "record_trace")
    .addEdge("reject", "record_trace")
    .addEdge("record_trace", END)
    .compile();

  return async (initialState) => {
    const result = await compiled.invoke(initialState);
    return result;
  };
};
