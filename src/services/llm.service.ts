import axios, { AxiosInstance } from 'axios';
import { jsonrepair } from 'jsonrepair';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { ModelError, TimeoutError, errorMessage } from '../core/errors';
import { withTimeout } from '../utils/timeout';
import type {
  LLMMessage,
  ModelGateway,
  ModelResult,
  OutputSchema,
  PromptContext,
  PromptTemplate,
} from '../types/collaborators';

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface LLMOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

interface ChatCompletionResponse {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export type ChatClient = Pick<AxiosInstance, 'post'>;

export interface LLMServiceOptions {
  client?: ChatClient;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

class RateLimiter {
  private queue: Array<() => Promise<void>> = [];
  private processing = false;
  private minDelay: number;
  private lastRequestTime = 0;

  constructor(requestsPerMinute: number = 50) {
    this.minDelay = 60000 / requestsPerMinute;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise((resolve, reject) => {
      this.queue.push(async () => {
        try {
          const result = await fn();
          resolve(result);
        } catch (error) {
          reject(error);
        }
      });

      if (!this.processing) {
        this.processQueue().catch(error => {
          logger.error('Rate limiter queue failed', { error: errorMessage(error) });
        });
      }
    });
  }

  private async processQueue() {
    this.processing = true;

    while (this.queue.length > 0) {
      const now = Date.now();
      const timeSinceLastRequest = now - this.lastRequestTime;

      if (timeSinceLastRequest < this.minDelay) {
        await new Promise(resolve =>
          setTimeout(resolve, this.minDelay - timeSinceLastRequest)
        );
      }

      const task = this.queue.shift();
      if (task) {
        this.lastRequestTime = Date.now();
        await task();
      }
    }

    this.processing = false;
  }
}

/**
 * Model invocation against an OpenRouter-compatible chat completions API.
 * `invoke` never throws: transport failures, timeouts and responses that do
 * not match the requested schema come back as a ModelError value.
 */
export class LLMService implements ModelGateway {
  private client: ChatClient;
  private rateLimiter: RateLimiter;
  private timeoutMs: number;

  constructor(options: LLMServiceOptions = {}) {
    this.client = options.client ?? axios.create({
      baseURL: config.openrouter.baseUrl,
      headers: {
        'Authorization': `Bearer ${config.openrouter.apiKey}`,
        'X-Title': 'Insight Graph',
        'Content-Type': 'application/json',
      },
      timeout: 120000,
    });

    this.rateLimiter = new RateLimiter(options.requestsPerMinute ?? config.openrouter.requestsPerMinute);
    this.timeoutMs = options.timeoutMs ?? config.execution.llmTimeout;
  }

  async invoke<T>(
    template: PromptTemplate,
    schema: OutputSchema<T>,
    context: PromptContext
  ): Promise<ModelResult<T>> {
    const messages = this.renderMessages(template, context);

    let content: string;
    try {
      const response = await this.chat(messages, {
        model: template.model,
        temperature: template.temperature,
      });
      content = response.content;
    } catch (error) {
      const modelError = error instanceof ModelError
        ? error
        : new ModelError('transport', errorMessage(error));
      return { ok: false, error: modelError };
    }

    let parsed: unknown;
    try {
      parsed = this.parseJSON(content);
    } catch (error) {
      logger.warn('Model returned unparseable output', {
        prompt: template.name,
        preview: content.substring(0, 200),
      });
      return {
        ok: false,
        error: new ModelError('invalid_output', `Unparseable output for ${template.name}: ${errorMessage(error)}`),
      };
    }

    const validated = schema.safeParse(parsed);
    if (!validated.success) {
      const issues = validated.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      logger.warn('Model output failed schema validation', { prompt: template.name, issues });
      return {
        ok: false,
        error: new ModelError('invalid_output', `Output for ${template.name} does not match schema`, { issues }),
      };
    }

    return { ok: true, value: validated.data };
  }

  async chat(
    messages: LLMMessage[],
    options: LLMOptions = {}
  ): Promise<LLMResponse> {
    const model = options.model || config.models.reasoning;

    if (!Array.isArray(messages) || messages.length === 0) {
      throw new ModelError('transport', 'LLMService: Invalid messages format. Expected a non-empty array.');
    }

    return this.rateLimiter.execute(async () => {
      try {
        logger.debug('LLM Request', { model, messageCount: messages.length });
        const payload = {
          model,
          messages,
          temperature: options.temperature ?? 0,
          max_tokens: options.maxTokens ?? 4000,
          response_format: { type: 'json_object' },
        };

        const response = await withTimeout(
          this.client.post<ChatCompletionResponse>('/chat/completions', payload),
          this.timeoutMs,
          `LLM request timeout for ${model}`
        );
        const content = response.data.choices?.[0]?.message?.content || '';
        const usage = response.data.usage;

        logger.debug('LLM Response', {
          model,
          contentLength: content.length,
          tokens: usage?.total_tokens,
        });

        return {
          content,
          model: response.data.model || model,
          usage: usage ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          } : undefined,
        };
      } catch (error) {
        logger.error('LLM Error', { model, error: errorMessage(error) });

        if (error instanceof TimeoutError) {
          throw new ModelError('timeout', error.message);
        }
        if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
          throw new ModelError('timeout', `LLM request timed out: ${error.message}`);
        }
        throw new ModelError('transport', `LLM request failed: ${errorMessage(error)}`);
      }
    });
  }

  /**
   * Parses a JSON object out of model text: plain JSON first, then the span
   * between the first "{" and the last "}", repaired with jsonrepair.
   */
  parseJSON(content: string): unknown {
    try {
      return JSON.parse(content);
    } catch {
      const firstBracket = content.indexOf('{');
      const lastBracket = content.lastIndexOf('}');

      if (firstBracket === -1 || lastBracket === -1 || firstBracket >= lastBracket) {
        throw new Error('No valid JSON structure found');
      }

      return JSON.parse(jsonrepair(content.substring(firstBracket, lastBracket + 1)));
    }
  }

  private renderMessages(template: PromptTemplate, context: PromptContext): LLMMessage[] {
    let systemPrompt = template.system;

    if (context.sections.length > 0) {
      systemPrompt += '\n\nContext information is provided below.';
      for (const section of context.sections) {
        systemPrompt += `\n\n### ${section.title}\n${section.body}`;
      }
    }

    const conversation = context.conversation.length > 0
      ? context.conversation
      : [{ role: 'user' as const, content: 'Respond with valid JSON only.' }];

    return [{ role: 'system', content: systemPrompt }, ...conversation];
  }
}
