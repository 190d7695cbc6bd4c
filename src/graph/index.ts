/**
 * LangGraph 编排：callModel ⇄ dispatchTools → respond
 */

import { StateGraph, END, START } from "@langchain/langgraph";
import { TurnStateAnnotation } from "./state.js";
import {
  createCallModelNode,
  createDispatchToolsNode,
  respondNode,
  routeAfterModel,
  type NodeDeps,
} from "./nodes.js";

/** 依赖在构建时注入，编译后的图可在并发轮次间复用 */
export function createTurnGraph(deps: NodeDeps) {
  const graph = new StateGraph(TurnStateAnnotation)
    .addNode("callModel", createCallModelNode(deps))
    .addNode("dispatchTools", createDispatchToolsNode(deps))
    .addNode("respond", respondNode)
    .addEdge(START, "callModel")
    .addConditionalEdges("callModel", routeAfterModel, ["dispatchTools", "respond"])
    .addEdge("dispatchTools", "callModel")
    .addEdge("respond", END);

  return graph.compile();
}

export type TurnGraph = ReturnType<typeof createTurnGraph>;
export type { NodeDeps };
export { TurnStateAnnotation, type TurnState, type TurnUpdate } from "./state.js";
export { contentToText, pendingToolCalls } from "./nodes.js";
