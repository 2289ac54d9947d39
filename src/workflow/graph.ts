import { END, START, StateGraph } from "@langchain/langgraph";
import { createRepairNodes, type RepairDeps } from "./nodes.js";
import { RepairStateAnnotation, type RepairState } from "./state.js";

const routeAfterBuild = (state: RepairState): "consult_oracle" | typeof END =>
  state.terminal ? END : "consult_oracle";

const routeAfterOracle = (state: RepairState): "apply_patch" | typeof END => (state.terminal ? END : "apply_patch");

const routeAfterApply = (state: RepairState): "run_build" | typeof END => (state.terminal ? END : "run_build");

export const createRepairGraph = (deps: RepairDeps) => {
  const nodes = createRepairNodes(deps);
  return new StateGraph(RepairStateAnnotation)
    .addNode("run_build", nodes.run_build)
    .addNode("consult_oracle", nodes.consult_oracle)
    .addNode("apply_patch", nodes.apply_patch)
    .addEdge(START, "run_build")
    .addConditionalEdges("run_build", routeAfterBuild)
    .addConditionalEdges("consult_oracle", routeAfterOracle)
    .addConditionalEdges("apply_patch", routeAfterApply)
    .compile();
};

// Three node steps per attempt plus the final build, with headroom.
export const recursionLimitFor = (maxAttempts: number): number => maxAttempts * 3 + 5;

export const invokeRepairGraph = async (deps: RepairDeps, initialState: RepairState): Promise<RepairState> => {
  const graph = createRepairGraph(deps);
  const result = await graph.invoke(initialState, { recursionLimit: recursionLimitFor(initialState.maxAttempts) });
  return result;
};
