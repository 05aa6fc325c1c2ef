import { StateGraph } from '@langchain/langgraph';
import { FormalConversionState } from './state.js';
import { createSpecializedGenerateNode, skipSpecializedNode } from './nodes/specialized-generate.js';
import { createRefineNode, type RefineNodeDeps } from './nodes/refine.js';
import type { SpecializedInferenceClient } from './inference-client.js';
import type { FormalConversionStateType } from './state.js';

export interface FormalConversionGraphDeps extends RefineNodeDeps {
  client: SpecializedInferenceClient;
}

export const createFormalConversionGraph = ({ client, llm, prompts }: FormalConversionGraphDeps) => {
  const graph = new StateGraph(FormalConversionState)
    .addNode('specialized_generate', createSpecializedGenerateNode(client))
    .addNode('skip_specialized', skipSpecializedNode)
    .addNode('refine', createRefineNode({ llm, prompts }))
    // Reachability was probed once at startup and rides in on the state
    .addConditionalEdges('__start__', (state: FormalConversionStateType) =>
      state.reachable ? 'specialized_generate' : 'skip_specialized',
    )
    .addEdge('specialized_generate', 'refine')
    .addEdge('skip_specialized', 'refine')
    .addEdge('refine', '__end__');

  return graph.compile();
};

export type FormalConversionGraph = ReturnType<typeof createFormalConversionGraph>;
