import type { JsonValue } from '../types';
import type { UnavailableReason } from '../types/graph';

/**
 * Responses used when the model cannot be reached. The user always gets an
 * explanation, never a raw failure.
 */
export const RESPONSE_TEMPLATES = {
    UNAVAILABLE: (reason: UnavailableReason, detail?: string) => {
      const lead: Record<UnavailableReason, string> = {
        no_source_data: 'The data needed to answer this question is not available in the connected database.',
        retrieval_empty: 'The query for this question returned no matching records.',
        retrieval_failed: 'The database could not be reached to fetch the data for this question.',
        planning_failed: 'I could not work out how to compute an answer from the available data.',
        correction_exhausted: 'The analysis kept failing while running, even after several corrections.',
        reflection_exhausted: 'The analysis ran, but after several refinements the result still did not answer the question reliably.',
        hop_limit: 'The analysis took too many steps and was stopped before it could finish.',
      };

      return `## Unable to Complete Request

${lead[reason]}${detail ? `\n\n${detail}` : ''}

Try narrowing the question, naming the metric and period explicitly, or asking what data is available.`;
    },

    ANALYSIS_RESULT: (question: string, value: JsonValue) => {
      return `**${question}**\n\nResult: ${formatValue(value)}`;
    },

    DIRECT: () =>
      'I can help with questions about your business data, such as revenue, orders or customers. What would you like to know?',

    PUNT: () =>
      'That is outside what I can help with. I answer questions about your business data, for example "What was total revenue last quarter?"',

    INTERNAL_ERROR: () =>
      'Something went wrong while working on your question. Please try again in a moment.',
  };

export function formatValue(value: JsonValue): string {
  if (value === null) return 'no value';
  if (typeof value === 'number') return Number.isInteger(value) ? String(value) : value.toFixed(2);
  if (typeof value === 'string' || typeof value === 'boolean') return String(value);
  return '`' + JSON.stringify(value) + '`';
}
