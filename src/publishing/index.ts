/**
 * Publishing Module
 *
 * Typefully client for creating and listing drafts, draft preparation helpers
 * (content analysis, thread splitting) and batch publishing of composed posts.
 *
 * Request discipline:
 * - a fixed minimum interval is enforced before every outbound call
 * - 429 / 500 / 502 / 503 / 504 are retried with exponential backoff
 * - a 429 that survives the retries is returned as a `rate_limited` failure
 *   with the Retry-After hint; nothing above this client retries it
 */

import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { requireCredential, type AppConfig } from '../config/index.js';
import { isErrorSentinel } from '../composer/index.js';
import {
  MinIntervalThrottle,
  createHttpClient,
  failureFromError,
  failureFromStatus,
  isJsonObject,
  parseRetryAfter,
  providerFailure,
  providerSuccess,
  sleep,
} from '../http/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics } from '../logging/index.js';
import type { ComposedPostDraft, ProviderFailure, ProviderResult } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type ContentFilter = 'threads' | 'tweets';

export interface CreateDraftRequest {
  content: string;
  /** Let the service split long content into a thread */
  threadify?: boolean;
  share?: boolean;
  /** ISO timestamp, or 'next-free-slot' */
  scheduleDate?: string;
  autoRetweetEnabled?: boolean;
  autoPlugEnabled?: boolean;
}

export interface Draft {
  id: string;
  status: string | null;
  shareUrl: string | null;
  text: string | null;
  scheduledDate: string | null;
  publishedOn: string | null;
}

export interface PublishingClient {
  createDraft(request: CreateDraftRequest): Promise<ProviderResult<Draft>>;
  getRecentlyScheduledDrafts(filter?: ContentFilter): Promise<ProviderResult<Draft[]>>;
  getRecentlyPublishedDrafts(filter?: ContentFilter): Promise<ProviderResult<Draft[]>>;
}

export interface TypefullyClientConfig {
  apiKey: string;
  apiUrl?: string;
  timeout?: number;
  minRequestIntervalMs?: number;
  maxRetries?: number;
  backoffFactorMs?: number;
  adapter?: AxiosAdapter;
  /** Delay used for throttling and backoff */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Response schemas
// ============================================================================

const DraftSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((id) => String(id)),
  status: z.string().nullish(),
  share_url: z.string().nullish(),
  text: z.string().nullish(),
  text_first_tweet: z.string().nullish(),
  scheduled_date: z.string().nullish(),
  published_on: z.string().nullish(),
});

function toDraft(raw: z.infer<typeof DraftSchema>): Draft {
  return {
    id: raw.id,
    status: raw.status ?? null,
    shareUrl: raw.share_url ?? null,
    text: raw.text ?? raw.text_first_tweet ?? null,
    scheduledDate: raw.scheduled_date ?? null,
    publishedOn: raw.published_on ?? null,
  };
}

// ============================================================================
// Client
// ============================================================================

const PROVIDER = 'typefully';

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const DEFAULT_CONFIG = {
  apiUrl: 'https://api.typefully.com/v1',
  timeout: 30000,
  minRequestIntervalMs: 1000,
  maxRetries: 3,
  backoffFactorMs: 1000,
};

interface RequestOptions {
  method: 'GET' | 'POST';
  path: string;
  params?: Record<string, string>;
  data?: Record<string, unknown>;
}

export class TypefullyPublishingClient implements PublishingClient {
  private readonly http: AxiosInstance;
  private readonly throttle: MinIntervalThrottle;
  private readonly maxRetries: number;
  private readonly backoffFactorMs: number;
  private readonly delay: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(config: TypefullyClientConfig) {
    this.delay = config.sleep ?? sleep;
    this.maxRetries = config.maxRetries ?? DEFAULT_CONFIG.maxRetries;
    this.backoffFactorMs = config.backoffFactorMs ?? DEFAULT_CONFIG.backoffFactorMs;
    this.throttle = new MinIntervalThrottle(config.minRequestIntervalMs ?? DEFAULT_CONFIG.minRequestIntervalMs, this.delay);
    this.logger = config.logger ?? createLogger('publishing');
    this.metrics = config.metrics ?? noopMetrics;
    this.http = createHttpClient({
      baseURL: config.apiUrl ?? DEFAULT_CONFIG.apiUrl,
      timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
      headers: { 'X-API-KEY': `Bearer ${config.apiKey}` },
      adapter: config.adapter,
    });
  }

  /**
   * Send one request with throttling and status retries
   */
  private async request(options: RequestOptions): Promise<ProviderResult<unknown>> {
    const startedAt = Date.now();
    const context = `${options.method} ${options.path}`;
    this.metrics.increment(`${PROVIDER}.requests`);

    for (let attempt = 0; ; attempt++) {
      await this.throttle.wait();

      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.request<unknown>({
          method: options.method,
          url: options.path,
          params: options.params,
          data: options.data,
        });
      } catch (error) {
        const failure = failureFromError(error);
        this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: failure.kind });
        this.logger.error(`${context} failed`, { kind: failure.kind, error: failure.message });
        return providerFailure(PROVIDER, startedAt, failure);
      }

      if (response.status >= 200 && response.status < 300) {
        this.metrics.timing(`${PROVIDER}.latency_ms`, Date.now() - startedAt);
        return providerSuccess(PROVIDER, startedAt, response.data);
      }

      const retryAfter: unknown = response.headers['retry-after'];
      if (RETRYABLE_STATUSES.has(response.status) && attempt < this.maxRetries) {
        const delayMs =
          response.status === 429 && retryAfter !== undefined
            ? parseRetryAfter(retryAfter) * 1000
            : this.backoffFactorMs * 2 ** attempt;
        this.logger.warn(`${context} returned ${response.status}, retrying`, {
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delayMs,
        });
        await this.delay(delayMs);
        continue;
      }

      const failure = failureFromStatus(response.status, response.data, retryAfter);
      this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: failure.kind });
      if (failure.kind === 'rate_limited') {
        this.logger.warn(`${context} rate limited`, { retryAfterSeconds: failure.retryAfterSeconds });
      } else {
        this.logger.error(`${context} failed`, { kind: failure.kind, status: response.status });
      }
      return providerFailure(PROVIDER, startedAt, failure);
    }
  }

  /**
   * Create a draft, optionally scheduled
   */
  async createDraft(request: CreateDraftRequest): Promise<ProviderResult<Draft>> {
    const startedAt = Date.now();
    if (request.content.trim() === '') {
      return providerFailure(PROVIDER, startedAt, { kind: 'validation', message: 'Draft content cannot be empty' });
    }

    const result = await this.request({
      method: 'POST',
      path: '/drafts/',
      data: {
        content: request.content,
        threadify: request.threadify ?? false,
        share: request.share ?? false,
        auto_retweet_enabled: request.autoRetweetEnabled ?? false,
        auto_plug_enabled: request.autoPlugEnabled ?? false,
        ...(request.scheduleDate ? { 'schedule-date': request.scheduleDate } : {}),
      },
    });
    if (!result.success) return result;

    const parsed = DraftSchema.safeParse(result.data);
    if (!parsed.success) {
      return providerFailure(PROVIDER, startedAt, {
        kind: 'malformed_response',
        message: 'Draft response is missing an id',
        details: result.data,
      });
    }
    const draft = toDraft(parsed.data);
    this.logger.info('Draft created', { draftId: draft.id, scheduledDate: request.scheduleDate ?? null });
    return providerSuccess(PROVIDER, startedAt, draft);
  }

  async getRecentlyScheduledDrafts(filter?: ContentFilter): Promise<ProviderResult<Draft[]>> {
    return this.listDrafts('/drafts/recently-scheduled/', filter);
  }

  async getRecentlyPublishedDrafts(filter?: ContentFilter): Promise<ProviderResult<Draft[]>> {
    return this.listDrafts('/drafts/recently-published/', filter);
  }

  /**
   * Notifications for the account; used as a credential check
   */
  async getNotifications(kind?: 'inbox' | 'activity'): Promise<ProviderResult<Record<string, unknown>>> {
    const startedAt = Date.now();
    const result = await this.request({
      method: 'GET',
      path: '/notifications/',
      ...(kind ? { params: { kind } } : {}),
    });
    if (!result.success) return result;
    if (!isJsonObject(result.data)) {
      return providerFailure(PROVIDER, startedAt, {
        kind: 'malformed_response',
        message: 'Notifications response is not a JSON object',
      });
    }
    return providerSuccess(PROVIDER, startedAt, result.data);
  }

  async checkHealth(): Promise<boolean> {
    const result = await this.getNotifications();
    if (!result.success) {
      this.logger.warn('Publishing health check failed', { kind: result.error.kind, error: result.error.message });
    }
    return result.success;
  }

  private async listDrafts(path: string, filter?: ContentFilter): Promise<ProviderResult<Draft[]>> {
    const startedAt = Date.now();
    const result = await this.request({
      method: 'GET',
      path,
      ...(filter ? { params: { content_filter: filter } } : {}),
    });
    if (!result.success) return result;

    const items = Array.isArray(result.data)
      ? result.data
      : isJsonObject(result.data) && Array.isArray(result.data['drafts'])
        ? result.data['drafts']
        : null;
    if (items === null) {
      return providerFailure(PROVIDER, startedAt, {
        kind: 'malformed_response',
        message: 'Draft list response is neither a list nor {drafts: [...]}',
      });
    }

    const drafts: Draft[] = [];
    for (const item of items) {
      const parsed = DraftSchema.safeParse(item);
      if (parsed.success) {
        drafts.push(toDraft(parsed.data));
      } else {
        this.logger.debug('Skipping unrecognized draft entry', { path });
      }
    }
    return providerSuccess(PROVIDER, startedAt, drafts);
  }
}

/**
 * @throws ConfigurationError when TYPEFULLY_API_KEY is absent
 */
export function createPublishingClient(
  config: AppConfig,
  options: Omit<TypefullyClientConfig, 'apiKey'> = {}
): TypefullyPublishingClient {
  return new TypefullyPublishingClient({ ...options, apiKey: requireCredential(config, 'typefully') });
}

// ============================================================================
// Draft preparation
// ============================================================================

export const MAX_POST_LENGTH = 280;
export const THREAD_SEPARATOR = '\n\n\n\n';
const LONG_FORM_THRESHOLD = MAX_POST_LENGTH * 5;
// Room for the "n/N " prefix or the trailing thread marker
const NUMBERING_RESERVE = 6;
const THREAD_MARKER = '🧵';

export type ContentType = 'single' | 'thread' | 'long_form';

export interface ContentMetrics {
  characterCount: number;
  wordCount: number;
  hashtagCount: number;
  mentionCount: number;
  urlCount: number;
}

export function analyzeContent(content: string): ContentMetrics {
  return {
    characterCount: content.length,
    wordCount: content.split(/\s+/).filter((word) => word !== '').length,
    hashtagCount: (content.match(/#\w+/g) ?? []).length,
    mentionCount: (content.match(/@\w+/g) ?? []).length,
    urlCount: (content.match(/https?:\/\/\S+/g) ?? []).length,
  };
}

export function detectContentType(content: string): ContentType {
  if (content.length <= MAX_POST_LENGTH) return 'single';
  if (content.includes(THREAD_SEPARATOR) || content.length <= LONG_FORM_THRESHOLD) return 'thread';
  return 'long_form';
}

function sliceWord(word: string, maxLength: number): string[] {
  const slices: string[] = [];
  for (let start = 0; start < word.length; start += maxLength) {
    slices.push(word.slice(start, start + maxLength));
  }
  return slices;
}

function splitByWords(text: string, maxLength: number): string[] {
  const parts: string[] = [];
  let current = '';
  const words = text
    .split(/\s+/)
    .filter((w) => w !== '')
    .flatMap((w) => (w.length > maxLength ? sliceWord(w, maxLength) : [w]));
  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length <= maxLength) {
      current = candidate;
    } else {
      if (current) parts.push(current);
      current = word;
    }
  }
  if (current) parts.push(current);
  return parts;
}

/**
 * Split content into posts of at most `maxLength` characters, preferring
 * sentence boundaries and falling back to word boundaries. A result with more
 * than one post is numbered: the first ends with a thread marker, the rest
 * start with "n/N".
 */
export function splitContentSmart(content: string, maxLength: number = MAX_POST_LENGTH): string[] {
  const text = content.trim();
  if (text.length <= maxLength) return [text];

  const limit = maxLength - NUMBERING_RESERVE;
  const parts: string[] = [];
  let current = '';

  for (const sentence of text.split(/(?<=[.!?])\s+/)) {
    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }
    if (current) parts.push(current.trim());
    if (sentence.length > limit) {
      const words = splitByWords(sentence, limit);
      parts.push(...words.slice(0, -1));
      current = words[words.length - 1] ?? '';
    } else {
      current = sentence;
    }
  }
  if (current) parts.push(current.trim());

  if (parts.length <= 1) return parts;
  return parts.map((part, i) => (i === 0 ? `${part} ${THREAD_MARKER}` : `${i + 1}/${parts.length} ${part}`));
}

export function formatThread(posts: readonly string[]): string {
  return posts.join(THREAD_SEPARATOR);
}

export interface DraftValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
  metrics: ContentMetrics;
  detectedType: ContentType;
}

export function validateDraftContent(content: string): DraftValidation {
  const metrics = analyzeContent(content);
  const detectedType = detectContentType(content);
  const errors: string[] = [];
  const warnings: string[] = [];

  if (content.trim() === '') {
    errors.push('Content cannot be empty');
  }
  if (metrics.hashtagCount > 3) {
    warnings.push(`Many hashtags detected (${metrics.hashtagCount})`);
  }
  if (metrics.urlCount > 2) {
    warnings.push('Multiple URLs detected');
  }
  if (detectedType !== 'single') {
    warnings.push(`Content exceeds a single post (${metrics.characterCount} characters); it will be published as a thread`);
  }

  return { valid: errors.length === 0, errors, warnings, metrics, detectedType };
}

/**
 * Content as it should be sent: short posts unchanged, longer ones split into
 * a thread
 */
export function prepareDraftContent(content: string): string {
  const trimmed = content.trim();
  return detectContentType(trimmed) === 'single' ? trimmed : formatThread(splitContentSmart(trimmed));
}

// ============================================================================
// Batch publishing
// ============================================================================

export type PublishStatus = 'created' | 'skipped' | 'failed' | 'deferred';

export interface PublishReport {
  topic: string;
  status: PublishStatus;
  draft?: Draft;
  scheduledFor?: string;
  failure?: ProviderFailure;
  reason?: string;
  /** Content warnings raised before the draft was sent */
  warnings?: string[];
}

export interface PublishOptions {
  /** Minutes between scheduled posts; 0 leaves posts unscheduled */
  scheduleIntervalMinutes?: number;
  share?: boolean;
  autoRetweetEnabled?: boolean;
  autoPlugEnabled?: boolean;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Schedule slot for the n-th published post: the next full hour plus n intervals
 */
export function scheduleSlot(now: Date, index: number, intervalMinutes: number): string {
  const base = new Date(now.getTime());
  base.setUTCMinutes(0, 0, 0);
  base.setUTCHours(base.getUTCHours() + 1);
  return new Date(base.getTime() + index * intervalMinutes * 60_000).toISOString();
}

/**
 * Create one draft per composed post. Error-sentinel posts are skipped. A
 * rate-limit failure stops the batch; the remaining posts are reported as
 * deferred with the provider's retry-after hint.
 */
export async function publishComposedPosts(
  posts: readonly ComposedPostDraft[],
  client: PublishingClient,
  options: PublishOptions = {}
): Promise<PublishReport[]> {
  const logger = options.logger ?? createLogger('publishing');
  const interval = options.scheduleIntervalMinutes ?? 60;
  const now = (options.now ?? (() => new Date()))();
  const reports: PublishReport[] = [];
  let slot = 0;
  let rateLimit: ProviderFailure | null = null;

  for (const post of posts) {
    if (rateLimit) {
      reports.push({
        topic: post.topic,
        status: 'deferred',
        failure: rateLimit,
        reason: `Rate limited; retry after ${rateLimit.retryAfterSeconds ?? 'unknown'}s`,
      });
      continue;
    }
    if (isErrorSentinel(post.postBody) || post.postBody.trim() === '') {
      reports.push({ topic: post.topic, status: 'skipped', reason: 'Post body is an error sentinel or empty' });
      continue;
    }

    const validation = validateDraftContent(post.postBody);
    if (validation.warnings.length > 0) {
      logger.warn('Draft content warnings', { topic: post.topic, warnings: validation.warnings });
    }

    const scheduledFor = interval > 0 ? scheduleSlot(now, slot, interval) : undefined;
    const result = await client.createDraft({
      content: prepareDraftContent(post.postBody),
      share: options.share ?? true,
      autoRetweetEnabled: options.autoRetweetEnabled ?? false,
      autoPlugEnabled: options.autoPlugEnabled ?? false,
      ...(scheduledFor ? { scheduleDate: scheduledFor } : {}),
    });

    if (result.success) {
      slot++;
      reports.push({
        topic: post.topic,
        status: 'created',
        draft: result.data,
        ...(scheduledFor ? { scheduledFor } : {}),
        ...(validation.warnings.length > 0 ? { warnings: validation.warnings } : {}),
      });
      continue;
    }

    reports.push({ topic: post.topic, status: 'failed', failure: result.error });
    if (result.error.kind === 'rate_limited') {
      rateLimit = result.error;
      logger.warn('Publishing paused by rate limit', { retryAfterSeconds: result.error.retryAfterSeconds });
    }
  }

  const created = reports.filter((r) => r.status === 'created').length;
  logger.info('Publishing complete', { created, total: posts.length });
  return reports;
}

export interface DraftStats {
  scheduled: Draft[];
  published: Draft[];
  recentlyScheduled: number;
  recentlyPublished: number;
  totalRecent: number;
}

/**
 * Recently scheduled and published drafts with their counts
 */
export async function getDraftStats(
  client: PublishingClient,
  filter?: ContentFilter
): Promise<ProviderResult<DraftStats>> {
  const startedAt = Date.now();
  const scheduled = await client.getRecentlyScheduledDrafts(filter);
  if (!scheduled.success) return scheduled;
  const published = await client.getRecentlyPublishedDrafts(filter);
  if (!published.success) return published;

  return providerSuccess(PROVIDER, startedAt, {
    scheduled: scheduled.data,
    published: published.data,
    recentlyScheduled: scheduled.data.length,
    recentlyPublished: published.data.length,
    totalRecent: scheduled.data.length + published.data.length,
  });
}
