import { config } from '../core/config';
import type { PromptName, PromptTemplate } from '../types/collaborators';

export const SANDBOX_HELPERS = [
  'dataset: array of row objects from the working dataset',
  'sum(values, key?) / mean(values, key?) / min(values, key?) / max(values, key?)',
  'count(values, predicate?)',
  'groupBy(rows, key) -> { [value]: rows }',
  'sortBy(rows, key, "asc" | "desc")',
  'pick(rows, keys)',
  'round(value, digits = 2)',
  'divide(a, b) -> throws RangeError when b is 0',
  'console.log(...) is captured',
];

const JSON_ONLY = 'Respond with a single JSON object and nothing else.';

const SYSTEM_PROMPTS: Record<PromptName, string> = {
  intent_comprehension: `You are the intent stage of a business analytics assistant.
Restate the user's latest message as a standalone question and pick the turn numbers from the
conversation summary that are needed to understand it.
Output: {"question": string, "relevantTurns": number[], "rationale": string}. ${JSON_ONLY}`,

  request_classification: `Classify the request.
- "analytical": needs figures computed from business data.
- "conversational": greetings, clarifications, questions about earlier answers; no computation needed.
- "out_of_domain": unrelated to business analytics.
Output: {"route": "analytical" | "conversational" | "out_of_domain", "rationale": string}. ${JSON_ONLY}`,

  analysis_orchestration: `Decide how to obtain the data for an analytical request.
- "data_sufficient": the working dataset already holds everything needed.
- "ready_to_compute": the working dataset is the right source and computation can start now.
- "need_retrieval": a new query against the external store is needed; supply "query".
- "data_unavailable": the store does not hold data that could answer the request.
A query is {"collection": string, "filter": object, "fields"?: string[], "limit"?: number}.
Output: {"decision": string, "query": object | null, "rationale": string}. ${JSON_ONLY}`,

  data_unavailability: `Explain to the user, briefly and politely, why the request cannot be answered with the
available data. Suggest what data or rephrasing would help.
Output: {"message": string}. ${JSON_ONLY}`,

  computation_planning: `Write a JavaScript computation plan over the working dataset.
Each step assigns exactly one new variable named by "output" and may read earlier outputs.
The last step's output is the answer. Available in scope:
${SANDBOX_HELPERS.map(h => `- ${h}`).join('\n')}
Output: {"analysisType": "descriptive" | "diagnostic" | "predictive" | "inferential",
"steps": [{"number": 1, "description": string, "input": string | null, "output": string, "code": string, "rationale": string}],
"rationale": string}. ${JSON_ONLY}`,

  observation: `Judge whether the execution result answers the user's question completely and plausibly.
Output: {"status": "sufficient" | "insufficient", "rationale": string}. ${JSON_ONLY}`,

  self_correction: `The previous computation plan failed in the sandbox. Rewrite the WHOLE plan so it runs
without the reported error. Same output format as the original plan. ${JSON_ONLY}`,

  self_reflection: `The previous computation plan ran but its result does not answer the question well.
Rewrite the WHOLE plan to address the observation. Same output format as the original plan. ${JSON_ONLY}`,

  analysis_response: `Answer the user's question using the computed result. Quote the figures exactly as computed.
Output: {"message": string}. ${JSON_ONLY}`,

  direct_response: `Reply to the user's conversational message using the conversation summary where relevant.
Output: {"message": string}. ${JSON_ONLY}`,

  punt_response: `Politely tell the user the request is outside what this business analytics assistant can help
with, and say what it can help with. Output: {"message": string}. ${JSON_ONLY}`,

  summarization: `Summarize this turn in one or two sentences: what was asked, what data was used and what was
answered. Output: {"summary": string}. ${JSON_ONLY}`,
};

const PLANNING_PROMPTS = new Set<PromptName>(['computation_planning', 'self_correction', 'self_reflection']);
const RESPONDING_PROMPTS = new Set<PromptName>([
  'data_unavailability',
  'analysis_response',
  'direct_response',
  'punt_response',
]);

function modelFor(name: PromptName): string {
  if (PLANNING_PROMPTS.has(name)) return config.models.planner;
  if (RESPONDING_PROMPTS.has(name)) return config.models.responder;
  return config.models.reasoning;
}

export function promptFor(name: PromptName): PromptTemplate {
  return {
    name,
    system: SYSTEM_PROMPTS[name],
    model: modelFor(name),
    temperature: RESPONDING_PROMPTS.has(name) ? 0.3 : 0,
  };
}
