import type { ExecutionState } from '../graph/state';
import type { CollectionInfo, ComputationPlan, Dataset, Scalar } from '../types';
import type { LLMMessage, PromptContext, PromptSection } from '../types/collaborators';

const SAMPLE_VALUES = 5;

export class DynamicPromptBuilder {
  intent(state: ExecutionState): PromptContext {
    return {
      sections: [this.historySection(state)],
      conversation: this.conversation(state),
    };
  }

  classification(state: ExecutionState): PromptContext {
    return {
      sections: [this.intentSection(state), ...this.relevantTurnsSection(state)],
      conversation: this.conversation(state),
    };
  }

  orchestration(state: ExecutionState, collections: CollectionInfo[]): PromptContext {
    const sections: PromptSection[] = [this.intentSection(state), ...this.relevantTurnsSection(state)];

    sections.push({
      title: 'External database collections',
      body: collections.length > 0
        ? collections.map(c => `- ${c.name}: ${c.fields.join(', ')}`).join('\n')
        : 'No collection information is available.',
    });

    sections.push(
      state.workingDataset
        ? { title: 'Working dataset', body: this.describeDataset(state.workingDataset) }
        : { title: 'Working dataset', body: 'There is no working dataset yet.' }
    );

    return { sections, conversation: this.conversation(state) };
  }

  planning(state: ExecutionState): PromptContext {
    const sections: PromptSection[] = [this.intentSection(state)];
    if (state.workingDataset) {
      sections.push({ title: 'Working dataset', body: this.describeDataset(state.workingDataset) });
    }
    return { sections, conversation: this.conversation(state) };
  }

  correction(state: ExecutionState): PromptContext {
    const sections = this.planning(state).sections;
    if (state.computationPlan) {
      sections.push({ title: 'The original computation plan', body: this.describePlan(state.computationPlan, true) });
    }
    if (state.executionResult?.status === 'error') {
      const { kind, message, stepIndex } = state.executionResult.error;
      sections.push({
        title: 'The sandbox error',
        body: `${kind}: ${message}${stepIndex !== null ? ` (step ${stepIndex})` : ''}`,
      });
    }
    return { sections, conversation: [] };
  }

  reflection(state: ExecutionState): PromptContext {
    const sections = this.planning(state).sections;
    if (state.computationPlan) {
      sections.push({ title: 'The original computation plan', body: this.describePlan(state.computationPlan, true) });
    }
    sections.push(...this.resultSection(state));
    if (state.observationVerdict) {
      sections.push({ title: 'The observation', body: state.observationVerdict.rationale });
    }
    return { sections, conversation: [] };
  }

  observation(state: ExecutionState): PromptContext {
    const sections = this.planning(state).sections;
    if (state.computationPlan) {
      sections.push({ title: 'The computation plan', body: this.describePlan(state.computationPlan, false) });
    }
    sections.push(...this.resultSection(state));
    return { sections, conversation: this.conversation(state) };
  }

  analysisResponse(state: ExecutionState): PromptContext {
    const sections: PromptSection[] = [this.intentSection(state)];
    if (state.computationPlan) {
      sections.push({ title: 'The final computation plan', body: this.describePlan(state.computationPlan, false) });
    }
    sections.push(...this.resultSection(state));
    return { sections, conversation: this.conversation(state) };
  }

  directResponse(state: ExecutionState): PromptContext {
    return {
      sections: [this.historySection(state), ...this.relevantTurnsSection(state)],
      conversation: this.conversation(state),
    };
  }

  punt(state: ExecutionState): PromptContext {
    return { sections: [], conversation: this.conversation(state) };
  }

  unavailability(state: ExecutionState): PromptContext {
    const sections: PromptSection[] = [this.intentSection(state)];
    sections.push({ title: 'Reason', body: state.unavailableReason ?? 'no_source_data' });
    if (state.executionResult?.status === 'error') {
      sections.push({ title: 'Last sandbox error', body: state.executionResult.error.message });
    }
    return { sections, conversation: this.conversation(state) };
  }

  summarization(state: ExecutionState): PromptContext {
    const sections: PromptSection[] = [];
    if (state.dataQuery) {
      sections.push({ title: 'Data query', body: JSON.stringify(state.dataQuery) });
    }
    return { sections, conversation: this.conversation(state) };
  }

  describeDataset(dataset: Dataset): string {
    const lines = [`${dataset.rows.length} rows, columns:`];

    for (const column of dataset.columns) {
      const samples: Scalar[] = [];
      for (const row of dataset.rows) {
        const value = row[column] ?? null;
        if (!samples.includes(value)) samples.push(value);
        if (samples.length >= SAMPLE_VALUES) break;
      }
      lines.push(`- ${column} (${this.columnType(samples)}): ${samples.map(s => JSON.stringify(s)).join(', ')}`);
    }

    if (dataset.query) {
      lines.push(`Extracted with query: ${JSON.stringify(dataset.query)}`);
    }
    return lines.join('\n');
  }

  describePlan(plan: ComputationPlan, withCode: boolean): string {
    return plan.steps
      .map(step => withCode
        ? `${step.number}. ${step.description}\n   ${step.output} <- ${step.code}`
        : `${step.number}. ${step.description}`)
      .join('\n');
  }

  private columnType(samples: Scalar[]): string {
    const types = new Set(samples.filter(s => s !== null).map(s => typeof s));
    if (types.size === 0) return 'empty';
    return types.size === 1 ? [...types][0] : 'mixed';
  }

  private historySection(state: ExecutionState): PromptSection {
    if (state.summaries.length === 0) {
      return { title: 'Conversation history', body: 'There is no conversation history.' };
    }
    return {
      title: 'Conversation history summarized by turn number',
      body: state.summaries.map(s => `${s.turn}. ${s.summary}`).join('\n'),
    };
  }

  private relevantTurnsSection(state: ExecutionState): PromptSection[] {
    const wanted = new Set(state.intent?.relevantTurns ?? []);
    const relevant = state.summaries.filter(s => wanted.has(s.turn));
    if (relevant.length === 0) return [];
    return [{
      title: 'Relevant earlier turns',
      body: relevant.map(s => `${s.turn}. ${s.summary}`).join('\n'),
    }];
  }

  private intentSection(state: ExecutionState): PromptSection {
    return {
      title: 'Question',
      body: state.intent?.question ?? state.turnHistory[state.turnHistory.length - 1]?.content ?? '',
    };
  }

  private resultSection(state: ExecutionState): PromptSection[] {
    if (state.executionResult?.status !== 'success') return [];
    const { value, outputs, logs } = state.executionResult.output;
    const sections: PromptSection[] = [
      { title: 'Execution result', body: JSON.stringify(value) },
      { title: 'Step outputs', body: JSON.stringify(outputs) },
    ];
    if (logs.length > 0) {
      sections.push({ title: 'Execution logs', body: logs.join('\n') });
    }
    return sections;
  }

  private conversation(state: ExecutionState): LLMMessage[] {
    return state.turnHistory.map(turn => ({ role: turn.role, content: turn.content }));
  }
}

export const dynamicPromptBuilder = new DynamicPromptBuilder();
