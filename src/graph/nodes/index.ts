import type { NodeRegistry } from './types';
import { intentNode } from './intent';
import { classifierNode } from './classifier';
import { orchestratorNode } from './orchestrator';
import { retrieverNode } from './retriever';
import { plannerNode } from './planner';
import { executorNode } from './executor';
import { criticNode } from './critic';
import { correctionNode, reflectionNode } from './corrector';
import {
  analysisResponderNode,
  directResponderNode,
  puntResponderNode,
  unavailabilityNode,
} from './responder';
import { summarizerNode } from './summarizer';

export const NODE_REGISTRY: NodeRegistry = {
  intent_comprehension: intentNode,
  request_classification: classifierNode,
  analysis_orchestration: orchestratorNode,
  data_retrieval: retrieverNode,
  data_unavailability: unavailabilityNode,
  computation_planning: plannerNode,
  sandbox_environment: executorNode,
  observation: criticNode,
  self_correction: correctionNode,
  self_reflection: reflectionNode,
  analysis_response: analysisResponderNode,
  direct_response: directResponderNode,
  punt_response: puntResponderNode,
  summarization: summarizerNode,
};

export type { GraphNode, NodeDependencies, NodeRegistry, NodeResult } from './types';
