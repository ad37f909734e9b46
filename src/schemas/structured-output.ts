/**
 * Structured outputs the language model must conform to, one per node that
 * consumes a model decision. Anything that fails these schemas is surfaced as
 * a ModelError by the gateway, never as a partially populated object.
 */
import { z } from 'zod';

export const IntentComprehensionSchema = z.object({
  question: z.string().min(1).describe('The current request restated as a standalone question'),
  relevantTurns: z
    .array(z.number().int().min(1))
    .describe('Turn numbers from the conversation summary that matter for this request'),
  rationale: z.string().describe('Why these turns were selected'),
});

export const RequestClassificationSchema = z.object({
  route: z.enum(['analytical', 'conversational', 'out_of_domain']),
  rationale: z.string(),
});

export const DataQuerySchema = z.object({
  collection: z.string().min(1),
  filter: z.record(z.unknown()).default({}),
  fields: z.array(z.string()).optional(),
  limit: z.number().int().positive().optional(),
});

export const AnalysisOrchestrationSchema = z.object({
  decision: z.enum(['data_sufficient', 'need_retrieval', 'ready_to_compute', 'data_unavailable']),
  query: DataQuerySchema.nullable().default(null),
  rationale: z.string(),
});

export const PlanStepSchema = z.object({
  number: z.number().int().min(1),
  description: z.string().min(1),
  input: z.string().nullable(),
  output: z.string().regex(/^[A-Za-z_$][\w$]*$/, 'output must be a valid variable name'),
  code: z.string().min(1),
  rationale: z.string(),
});

export const ComputationPlanningSchema = z.object({
  analysisType: z.enum(['descriptive', 'diagnostic', 'predictive', 'inferential']),
  steps: z.array(PlanStepSchema).min(1),
  rationale: z.string(),
});

export const ObservationSchema = z.object({
  status: z.enum(['sufficient', 'insufficient']),
  rationale: z.string(),
});

export const NarrativeSchema = z.object({
  message: z.string().min(1),
});

export const SummarySchema = z.object({
  summary: z.string().min(1),
});

export type IntentComprehension = z.infer<typeof IntentComprehensionSchema>;
export type RequestClassification = z.infer<typeof RequestClassificationSchema>;
export type AnalysisOrchestration = z.infer<typeof AnalysisOrchestrationSchema>;
export type ComputationPlanning = z.infer<typeof ComputationPlanningSchema>;
export type Observation = z.infer<typeof ObservationSchema>;
export type Narrative = z.infer<typeof NarrativeSchema>;
