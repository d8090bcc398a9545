import OpenAI from 'openai';
import { logger } from '../utils/logger';
import { retry, withTimeout } from '../utils/async';
import { ErrorContext, GenerationError, RagError, errorMessage } from '../types/api';
import { RetryConfig } from '../types';
import { GenerationPrompt, renderUserMessage } from './prompt';

/**
 * An external text-generation service
 */
export interface GenerationProvider {
  readonly model: string;
  generate(prompt: GenerationPrompt, signal: AbortSignal): Promise<string>;
}

export interface OpenAIGenerationOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  temperature: number;
}

export class OpenAIGenerationProvider implements GenerationProvider {
  public readonly model: string;
  private readonly temperature: number;
  private client: OpenAI;

  constructor(options: OpenAIGenerationOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    // Retries and timeouts are handled by the Generator
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  async generate(prompt: GenerationPrompt, signal: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: renderUserMessage(prompt) }
        ]
      },
      { signal }
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Generation service returned an empty completion');
    }
    return content;
  }
}

export interface GeneratorOptions {
  timeoutMs: number;
  retry: RetryConfig;
}

/**
 * Times out and retries calls to a GenerationProvider; exhausted attempts
 * surface as a GenerationError.
 */
export class Generator {
  constructor(
    private readonly provider: GenerationProvider,
    private readonly options: GeneratorOptions
  ) {}

  get model(): string {
    return this.provider.model;
  }

  async generate(prompt: GenerationPrompt, context: ErrorContext = {}): Promise<string> {
    const startTime = Date.now();

    try {
      const answer = await retry(
        () => withTimeout('generation request', this.options.timeoutMs, signal => this.provider.generate(prompt, signal)),
        {
          maxAttempts: this.options.retry.maxAttempts,
          baseDelayMs: this.options.retry.baseDelayMs,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(`Generation attempt ${attempt} failed, retrying in ${delayMs}ms`, {
              error: errorMessage(error),
              ...context
            });
          }
        }
      );

      logger.performance('Answer generation', Date.now() - startTime, {
        model: this.model,
        passages: prompt.context.length,
        historyTurns: prompt.history.length
      });

      return answer;
    } catch (error) {
      logger.error('Answer generation failed', error, { ...context });
      const reason = error instanceof RagError ? error.message : errorMessage(error);
      throw new GenerationError(`Failed to generate answer: ${reason}`, context, error);
    }
  }
}
