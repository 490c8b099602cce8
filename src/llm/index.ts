/**
 * LLM Module
 *
 * Prompt-in / text-out access to Claude. Callers recover any structure from
 * the returned text themselves; no structured output mode is used.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { ConfigurationError, DEFAULT_ANTHROPIC_MODEL, requireCredential, type AppConfig } from '../config/index.js';
import { failureFromStatus, isJsonObject, providerFailure, providerSuccess } from '../http/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics } from '../logging/index.js';
import type { ProviderFailure, ProviderResult } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface TextGenerationOptions {
  system?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface GeneratedText {
  text: string;
  model: string;
  usage: { inputTokens: number; outputTokens: number } | null;
}

export interface TextGenerator {
  readonly model: string;
  generate(prompt: string, options?: TextGenerationOptions): Promise<ProviderResult<GeneratedText>>;
}

/**
 * The subset of a Messages API reply this module reads
 */
export interface GeneratedMessage {
  content: Array<{ type: string; text?: string }>;
  model: string;
  stop_reason?: string | null;
  usage?: { input_tokens: number; output_tokens: number };
}

/**
 * The part of the Anthropic client used here; an `Anthropic` instance satisfies it
 */
export interface MessagesClient {
  messages: {
    create(body: MessageCreateParamsNonStreaming): Promise<GeneratedMessage>;
  };
}

export interface AnthropicGeneratorConfig {
  apiKey?: string;
  /** Pre-built client; takes precedence over apiKey */
  client?: MessagesClient;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeout?: number;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MODEL = DEFAULT_ANTHROPIC_MODEL;
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TIMEOUT = 120000;
const PROVIDER = 'anthropic';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Concatenate the text blocks of a reply
 */
export function extractText(message: GeneratedMessage): string | null {
  const parts = message.content
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => block.text ?? '');
  return parts.length > 0 ? parts.join('') : null;
}

/**
 * Map an SDK error onto a failure. SDK errors carry the HTTP status and
 * headers; connection errors carry neither.
 */
export function classifyGenerationError(error: unknown): ProviderFailure {
  const message = error instanceof Error ? error.message : String(error);
  if (isJsonObject(error) && typeof error['status'] === 'number') {
    const headers = error['headers'];
    const retryAfter = isJsonObject(headers) ? headers['retry-after'] : undefined;
    return failureFromStatus(error['status'], message, retryAfter);
  }
  return { kind: 'network', message };
}

// ============================================================================
// Generator
// ============================================================================

export class AnthropicTextGenerator implements TextGenerator {
  readonly model: string;
  private readonly client: MessagesClient;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(config: AnthropicGeneratorConfig) {
    if (!config.client && !config.apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY is not set', 'ANTHROPIC_API_KEY');
    }
    this.client =
      config.client ??
      new Anthropic({
        apiKey: config.apiKey,
        timeout: config.timeout ?? DEFAULT_TIMEOUT,
        // Failures are reported to the caller, not retried here
        maxRetries: 0,
      });
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.logger = config.logger ?? createLogger('llm');
    this.metrics = config.metrics ?? noopMetrics;
  }

  async generate(prompt: string, options: TextGenerationOptions = {}): Promise<ProviderResult<GeneratedText>> {
    const startedAt = Date.now();
    this.metrics.increment(`${PROVIDER}.requests`);
    this.logger.debug('Calling model', { model: this.model, promptLength: prompt.length });

    try {
      const message = await this.client.messages.create({
        model: this.model,
        max_tokens: options.maxTokens ?? this.maxTokens,
        temperature: options.temperature ?? this.temperature,
        ...(options.system ? { system: options.system } : {}),
        messages: [{ role: 'user', content: prompt }],
      });
      this.metrics.timing(`${PROVIDER}.latency_ms`, Date.now() - startedAt);

      const text = extractText(message);
      if (text === null) {
        this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: 'malformed_response' });
        this.logger.error('Model reply contained no text block', { stopReason: message.stop_reason ?? null });
        return providerFailure(PROVIDER, startedAt, {
          kind: 'malformed_response',
          message: 'No text content in model response',
        });
      }

      if (message.usage) {
        this.metrics.increment(`${PROVIDER}.tokens.input`, message.usage.input_tokens);
        this.metrics.increment(`${PROVIDER}.tokens.output`, message.usage.output_tokens);
      }

      return providerSuccess(PROVIDER, startedAt, {
        text,
        model: message.model,
        usage: message.usage
          ? { inputTokens: message.usage.input_tokens, outputTokens: message.usage.output_tokens }
          : null,
      });
    } catch (error) {
      const failure = classifyGenerationError(error);
      this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: failure.kind });
      this.logger.error('Model call failed', { model: this.model, kind: failure.kind, error: failure.message });
      return providerFailure(PROVIDER, startedAt, failure);
    }
  }
}

/**
 * @throws ConfigurationError when ANTHROPIC_API_KEY is absent
 */
export function createTextGenerator(
  config: AppConfig,
  options: Omit<AnthropicGeneratorConfig, 'apiKey' | 'model'> = {}
): AnthropicTextGenerator {
  return new AnthropicTextGenerator({
    ...options,
    apiKey: requireCredential(config, 'anthropic'),
    model: config.models.anthropic,
  });
}
