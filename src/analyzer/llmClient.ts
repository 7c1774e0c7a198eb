import Anthropic, { APIConnectionTimeoutError, APIError } from '@anthropic-ai/sdk';
import { GenerationError, errorMessage } from '../errors.js';
import { logger } from '../log/logger.js';

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  system?: string;
}

/** Text-completion seam; everything that talks to the model goes through this. */
export interface LlmClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

type Fetch = NonNullable<NonNullable<ConstructorParameters<typeof Anthropic>[0]>['fetch']>;

export interface AnthropicLlmOptions {
  baseURL: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  /** Replaces the global fetch the SDK sends requests through. */
  fetch?: Fetch;
}

/**
 * Talks to a local model server through the Anthropic Messages API (Ollama
 * serves it under the same paths). The SDK's own retries are off: a failed
 * call fails the stage that made it.
 */
export class AnthropicLlmClient implements LlmClient {
  private readonly client: Anthropic;

  constructor(private readonly options: AnthropicLlmOptions) {
    this.client = new Anthropic({
      baseURL: options.baseURL,
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.options.model,
      max_tokens: options.maxTokens ?? this.options.maxTokens,
      messages: [{ role: 'user', content: prompt }],
      ...(options.system ? { system: options.system } : {}),
      ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
    };

    const started = Date.now();
    let message: Anthropic.Message;
    try {
      message = await this.client.messages.create(params);
    } catch (err) {
      throw toGenerationError(err, this.options);
    }

    const text = message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
    logger.debug(
      { model: this.options.model, ms: Date.now() - started, chars: text.length, stop: message.stop_reason },
      'LLM completion',
    );
    return text;
  }
}

function toGenerationError(err: unknown, options: AnthropicLlmOptions): GenerationError {
  if (err instanceof APIConnectionTimeoutError) {
    return new GenerationError(`LLM request timed out after ${options.timeoutMs}ms`, { cause: err });
  }
  if (err instanceof APIError && err.status !== undefined) {
    return new GenerationError(`LLM server answered ${err.status}: ${err.message}`, { cause: err });
  }
  if (err instanceof APIError) {
    return new GenerationError(`LLM server unreachable at ${options.baseURL}`, { cause: err });
  }
  return new GenerationError(`LLM request failed: ${errorMessage(err)}`, { cause: err });
}
