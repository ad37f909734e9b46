import type { z } from 'zod';
import type { ModelError } from '../core/errors';
import type { ExecutionState } from '../graph/state';
import type { NodeId, SandboxLimits } from './graph';
import type {
  CollectionInfo,
  ComputationPlan,
  DataQuery,
  DataResult,
  Dataset,
  ExecutionResult,
  SessionSnapshot,
} from '.';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type PromptName = Exclude<NodeId, 'data_retrieval' | 'sandbox_environment'>;

export interface PromptTemplate {
  name: PromptName;
  system: string;
  model?: string;
  temperature?: number;
}

export interface PromptSection {
  title: string;
  body: string;
}

export interface PromptContext {
  sections: PromptSection[];
  conversation: LLMMessage[];
}

export type ModelResult<T> = { ok: true; value: T } | { ok: false; error: ModelError };

export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ModelGateway {
  invoke<T>(template: PromptTemplate, schema: OutputSchema<T>, context: PromptContext): Promise<ModelResult<T>>;
}

export interface DataSource {
  query(query: DataQuery): Promise<DataResult>;
  describe(): Promise<CollectionInfo[]>;
}

export interface MemoryStore {
  loadSummary(sessionId: string): Promise<SessionSnapshot | null>;
  persist(sessionId: string, state: ExecutionState): Promise<void>;
}

export interface Sandbox {
  run(plan: ComputationPlan, dataset: Dataset | null, limits: SandboxLimits): Promise<ExecutionResult>;
}

export interface Collaborators {
  model: ModelGateway;
  data: DataSource;
  memory: MemoryStore;
  sandbox: Sandbox;
}
