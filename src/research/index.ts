/**
 * Research Module
 *
 * Web-research client for the Perplexity chat-completions API and the
 * normalizer that flattens its reply into {url, snippet} hits.
 *
 * Usage:
 * ```typescript
 * const client = createResearchClient(config);
 * const result = await client.search('pain points in note-taking apps');
 * if (result.success) {
 *   store.saveResearchRecords(sessionId, result.data.records, result.data.rawResponse);
 * }
 * ```
 */

import type { AxiosAdapter, AxiosInstance } from 'axios';
import { requireCredential, type AppConfig } from '../config/index.js';
import {
  createHttpClient,
  failureFromError,
  failureFromStatus,
  isJsonObject,
  providerFailure,
  providerSuccess,
} from '../http/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics } from '../logging/index.js';
import type { ProviderResult, ResearchHit } from '../types/index.js';

// ============================================================================
// Normalizer
// ============================================================================

/**
 * URL recorded when the provider answers in prose without discrete sources
 */
export const RESEARCH_PLACEHOLDER_URL = 'https://perplexity.ai/search';

/**
 * One way of reading hits out of a payload. Returns undefined when the
 * payload does not have the shape this strategy understands.
 */
export type ResearchExtractionStrategy = (payload: Record<string, unknown>) => ResearchHit[] | undefined;

const fromSearchResults: ResearchExtractionStrategy = (payload) => {
  const results = payload['search_results'];
  if (!Array.isArray(results) || results.length === 0) {
    return undefined;
  }

  const hits: ResearchHit[] = [];
  for (const entry of results) {
    if (!isJsonObject(entry)) continue;
    const url = entry['url'];
    if (typeof url !== 'string' || url.trim() === '') continue;
    const title = entry['title'];
    hits.push({ url, snippet: typeof title === 'string' ? title : '' });
  }
  return hits;
};

const fromChatContent: ResearchExtractionStrategy = (payload) => {
  const choices = payload['choices'];
  if (!Array.isArray(choices)) return undefined;
  const first: unknown = choices[0];
  if (!isJsonObject(first)) return undefined;
  const message = first['message'];
  if (!isJsonObject(message)) return undefined;
  const content = message['content'];
  if (typeof content !== 'string' || content.trim() === '') return undefined;

  return [{ url: RESEARCH_PLACEHOLDER_URL, snippet: content }];
};

/**
 * Applied in order; the first strategy that recognizes the payload wins
 */
export const RESEARCH_STRATEGIES: readonly ResearchExtractionStrategy[] = [fromSearchResults, fromChatContent];

/**
 * Convert a research-provider payload into hits.
 *
 * A non-empty `search_results` list produces one hit per entry with a URL,
 * using the entry title as snippet. Otherwise the chat content becomes a single
 * hit under the placeholder URL. Anything else yields an empty list.
 */
export function normalizeResearchResponse(payload: unknown): ResearchHit[] {
  if (!isJsonObject(payload)) {
    return [];
  }
  for (const strategy of RESEARCH_STRATEGIES) {
    const hits = strategy(payload);
    if (hits !== undefined) {
      return hits;
    }
  }
  return [];
}

// ============================================================================
// Client
// ============================================================================

export interface ResearchSearchOutput {
  records: ResearchHit[];
  /** Provider payload serialized for storage */
  rawResponse: string;
}

export interface ResearchClient {
  search(topic: string): Promise<ProviderResult<ResearchSearchOutput>>;
}

export interface PerplexityClientConfig {
  apiKey: string;
  apiUrl?: string;
  model?: string;
  timeout?: number;
  systemPrompt?: string;
  adapter?: AxiosAdapter;
  logger?: Logger;
  metrics?: Metrics;
}

const PROVIDER = 'perplexity';

export const DEFAULT_RESEARCH_SYSTEM_PROMPT =
  'You are an AI assistant that researches topics and provides concise, factual information, including sources when available. ' +
  "Focus on finding recent and relevant articles, blog posts, forum discussions, and social media threads related to the user's query.";

const DEFAULT_CONFIG = {
  apiUrl: 'https://api.perplexity.ai',
  model: 'sonar-pro',
  timeout: 120000,
};

export class PerplexityResearchClient implements ResearchClient {
  private readonly http: AxiosInstance;
  private readonly model: string;
  private readonly systemPrompt: string;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(config: PerplexityClientConfig) {
    this.model = config.model ?? DEFAULT_CONFIG.model;
    this.systemPrompt = config.systemPrompt ?? DEFAULT_RESEARCH_SYSTEM_PROMPT;
    this.logger = config.logger ?? createLogger('research');
    this.metrics = config.metrics ?? noopMetrics;
    this.http = createHttpClient({
      baseURL: config.apiUrl ?? DEFAULT_CONFIG.apiUrl,
      timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
      headers: { Authorization: `Bearer ${config.apiKey}` },
      adapter: config.adapter,
    });
  }

  /**
   * Run one research query for a topic
   */
  async search(topic: string): Promise<ProviderResult<ResearchSearchOutput>> {
    const startedAt = Date.now();
    this.metrics.increment(`${PROVIDER}.requests`);
    this.logger.info('Searching topic', { topic, model: this.model });

    try {
      const response = await this.http.post<unknown>('/chat/completions', {
        model: this.model,
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: topic },
        ],
      });
      this.metrics.timing(`${PROVIDER}.latency_ms`, Date.now() - startedAt);

      if (response.status < 200 || response.status >= 300) {
        const failure = failureFromStatus(response.status, response.data, response.headers['retry-after']);
        this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: failure.kind });
        this.logger.error('Research request failed', { topic, kind: failure.kind, status: response.status });
        return providerFailure(PROVIDER, startedAt, failure);
      }

      if (!isJsonObject(response.data)) {
        this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: 'malformed_response' });
        this.logger.error('Research response is not a JSON object', { topic });
        return providerFailure(PROVIDER, startedAt, {
          kind: 'malformed_response',
          message: 'Research response is not a JSON object',
          details: typeof response.data === 'string' ? response.data.slice(0, 500) : undefined,
        });
      }

      const records = normalizeResearchResponse(response.data);
      if (records.length === 0) {
        this.logger.warn('Research response contained no results', { topic });
      } else {
        this.logger.info('Research results normalized', { topic, count: records.length });
      }

      return providerSuccess(PROVIDER, startedAt, {
        records,
        rawResponse: JSON.stringify(response.data),
      });
    } catch (error) {
      const failure = failureFromError(error);
      this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: failure.kind });
      this.logger.error('Research request failed', { topic, kind: failure.kind, error: failure.message });
      return providerFailure(PROVIDER, startedAt, failure);
    }
  }
}

/**
 * Build the research client from configuration.
 *
 * @throws ConfigurationError when PERPLEXITY_API_KEY is absent
 */
export function createResearchClient(
  config: AppConfig,
  options: Omit<PerplexityClientConfig, 'apiKey' | 'model'> = {}
): PerplexityResearchClient {
  return new PerplexityResearchClient({
    ...options,
    apiKey: requireCredential(config, 'perplexity'),
    model: config.models.perplexity,
  });
}
