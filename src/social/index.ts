/**
 * Social Module
 *
 * Post search over the RapidAPI Twitter endpoint and the normalizer that turns
 * its timeline payloads into flat SocialHit records.
 *
 * The endpoint returns different shapes depending on the query type: an
 * instruction tree of timeline entries, module items nested inside those
 * entries, or a flat `globalObjects` map. Each layer is read through an
 * ordered list of extraction strategies; a candidate that no strategy
 * understands is skipped, never fatal.
 */

import type { AxiosAdapter, AxiosInstance } from 'axios';
import { requireCredential, type AppConfig, type SocialSearchType } from '../config/index.js';
import {
  createHttpClient,
  failureFromError,
  failureFromStatus,
  isJsonObject,
  providerFailure,
  providerSuccess,
} from '../http/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics } from '../logging/index.js';
import type { ProviderResult, SocialHit } from '../types/index.js';

type JsonObject = Record<string, unknown>;

export const DEFAULT_PLATFORM_HOST = 'twitter.com';

// ============================================================================
// Path helpers
// ============================================================================

function valueAt(root: unknown, path: readonly string[]): unknown {
  let current: unknown = root;
  for (const key of path) {
    if (!isJsonObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

function objectAt(root: unknown, path: readonly string[]): JsonObject | undefined {
  const value = valueAt(root, path);
  return isJsonObject(value) ? value : undefined;
}

function stringAt(root: unknown, path: readonly string[]): string | undefined {
  const value = valueAt(root, path);
  if (typeof value === 'string' && value.trim() !== '') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function toCount(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.max(0, Math.trunc(value));
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return 0;
}

// ============================================================================
// Candidate collection
// ============================================================================

/**
 * Locations where the instruction list has been observed
 */
const INSTRUCTION_PATHS: readonly (readonly string[])[] = [
  ['result', 'timeline', 'instructions'],
  ['data', 'search_by_raw_query', 'search_timeline', 'timeline', 'instructions'],
];

function moduleItems(items: unknown): JsonObject[] {
  if (!Array.isArray(items)) return [];
  const collected: JsonObject[] = [];
  for (const entry of items) {
    const item = objectAt(entry, ['item']);
    if (item && isJsonObject(item['itemContent'])) {
      collected.push(item);
    }
  }
  return collected;
}

/**
 * Flatten timeline instructions into post candidates: entries of
 * "add entries" instructions, plus items of module instructions and of
 * module-typed entries.
 */
export function collectTimelineCandidates(payload: JsonObject): JsonObject[] {
  for (const path of INSTRUCTION_PATHS) {
    const instructions = valueAt(payload, path);
    if (!Array.isArray(instructions)) continue;

    const candidates: JsonObject[] = [];
    for (const instruction of instructions) {
      if (!isJsonObject(instruction)) continue;

      switch (instruction['type']) {
        case 'TimelineAddEntries': {
          const entries = instruction['entries'];
          if (!Array.isArray(entries)) break;
          for (const entry of entries) {
            if (!isJsonObject(entry)) continue;
            const nested = moduleItems(valueAt(entry, ['content', 'items']));
            if (nested.length > 0) {
              candidates.push(...nested);
            } else {
              candidates.push(entry);
            }
          }
          break;
        }
        case 'TimelineModule':
          candidates.push(...moduleItems(instruction['items']));
          break;
        default:
          break;
      }
    }
    return candidates;
  }
  return [];
}

// ============================================================================
// Post and author extraction
// ============================================================================

export type PostLocator = (candidate: JsonObject) => JsonObject | undefined;

interface Author {
  screenName: string;
  followersCount: number;
}

export type AuthorLocator = (post: JsonObject) => Author | undefined;

/**
 * A typed post result, unwrapping visibility wrappers
 */
function recognizePost(value: unknown): JsonObject | undefined {
  if (!isJsonObject(value)) return undefined;
  if (value['__typename'] === 'Tweet') return value;
  if (value['__typename'] === 'TweetWithVisibilityResults') return recognizePost(value['tweet']);
  return undefined;
}

const postAt =
  (path: readonly string[]): PostLocator =>
  (candidate) =>
    recognizePost(valueAt(candidate, path));

export const POST_LOCATORS: readonly PostLocator[] = [
  postAt(['itemContent', 'tweet_results', 'result']),
  postAt(['content', 'itemContent', 'tweet_results', 'result']),
  postAt(['content', 'tweet_results', 'result']),
  postAt(['content', 'tweet', 'tweet_results', 'result']),
];

function authorFrom(user: JsonObject | undefined): Author | undefined {
  if (!user) return undefined;
  const screenName =
    stringAt(user, ['legacy', 'screen_name']) ?? stringAt(user, ['core', 'screen_name']) ?? stringAt(user, ['screen_name']);
  if (!screenName) return undefined;
  const followers =
    valueAt(user, ['legacy', 'followers_count']) ?? valueAt(user, ['followers_count']);
  return { screenName: screenName.replace(/^@/, ''), followersCount: toCount(followers) };
}

export const AUTHOR_LOCATORS: readonly AuthorLocator[] = [
  (post) => authorFrom(objectAt(post, ['core', 'user_results', 'result'])),
  (post) => authorFrom(objectAt(post, ['user', 'result'])),
];

function firstMatch<T, R>(strategies: readonly ((input: T) => R | undefined)[], input: T): R | undefined {
  for (const strategy of strategies) {
    const match = strategy(input);
    if (match !== undefined) return match;
  }
  return undefined;
}

const HANDLE_PATTERN = /^[A-Za-z0-9_]{1,50}$/;
const ID_PATTERN = /^\d+$/;

/**
 * Build a hit from post fields. Returns undefined unless both a real handle
 * and a numeric id are available.
 */
function buildHit(
  id: string | undefined,
  fields: JsonObject,
  author: Author | undefined,
  host: string,
  text?: string
): SocialHit | undefined {
  if (!id || !ID_PATTERN.test(id)) return undefined;
  if (!author || !HANDLE_PATTERN.test(author.screenName)) return undefined;

  return {
    url: `https://${host}/${author.screenName}/status/${id}`,
    snippet: text ?? stringAt(fields, ['full_text']) ?? stringAt(fields, ['text']) ?? '',
    screenName: author.screenName,
    followersCount: author.followersCount,
    favoriteCount: toCount(fields['favorite_count']),
    retweetCount: toCount(fields['retweet_count']),
    replyCount: toCount(fields['reply_count']),
    quoteCount: toCount(fields['quote_count']),
    postedAt: stringAt(fields, ['created_at']) ?? null,
  };
}

function hitFromCandidate(candidate: JsonObject, host: string): SocialHit | undefined {
  const post = firstMatch(POST_LOCATORS, candidate);
  if (!post) return undefined;

  const legacy = objectAt(post, ['legacy']) ?? {};
  const id = stringAt(legacy, ['id_str']) ?? stringAt(post, ['rest_id']);
  // Long posts carry their full text outside legacy
  const noteText = stringAt(post, ['note_tweet', 'note_tweet_results', 'result', 'text']);
  return buildHit(id, legacy, firstMatch(AUTHOR_LOCATORS, post), host, noteText);
}

function hitsFromGlobalObjects(payload: JsonObject, host: string): SocialHit[] {
  const tweets = objectAt(payload, ['globalObjects', 'tweets']);
  if (!tweets) return [];
  const users = objectAt(payload, ['globalObjects', 'users']) ?? {};

  const hits: SocialHit[] = [];
  for (const [key, tweet] of Object.entries(tweets)) {
    if (!isJsonObject(tweet)) continue;
    const userId = stringAt(tweet, ['user_id_str']);
    const author = userId ? authorFrom(objectAt(users, [userId])) : undefined;
    const hit = buildHit(stringAt(tweet, ['id_str']) ?? key, tweet, author, host);
    if (hit) hits.push(hit);
  }
  return hits;
}

// ============================================================================
// Normalizer
// ============================================================================

export interface SocialNormalizeOptions {
  /** Host used in permalinks */
  platformHost?: string;
  logger?: Logger;
}

/**
 * Convert a social-search payload into hits, in timeline order.
 *
 * Timeline instructions are read first; the `globalObjects` map is only
 * consulted when the instructions yield no candidates. An empty result is
 * logged with an excerpt of the payload.
 */
export function normalizeSocialResponse(payload: unknown, options: SocialNormalizeOptions = {}): SocialHit[] {
  const host = options.platformHost ?? DEFAULT_PLATFORM_HOST;
  const logger = options.logger ?? createLogger('social');

  let hits: SocialHit[] = [];
  let candidateCount = 0;
  if (isJsonObject(payload)) {
    const candidates = collectTimelineCandidates(payload);
    candidateCount = candidates.length;
    if (candidates.length > 0) {
      for (const candidate of candidates) {
        const hit = hitFromCandidate(candidate, host);
        if (hit) hits.push(hit);
      }
    } else {
      hits = hitsFromGlobalObjects(payload, host);
    }
  }

  if (hits.length === 0) {
    let excerpt: string;
    try {
      excerpt = JSON.stringify(payload)?.slice(0, 500) ?? String(payload);
    } catch {
      excerpt = String(payload);
    }
    logger.debug('No posts extracted from social response', { candidates: candidateCount, excerpt });
  }

  return hits;
}

// ============================================================================
// Client
// ============================================================================

export interface SocialSearchOutput {
  records: SocialHit[];
  rawResponse: string;
}

export interface SocialSearchOptions {
  count?: number;
  type?: SocialSearchType;
}

export interface SocialSearchClient {
  search(query: string, options?: SocialSearchOptions): Promise<ProviderResult<SocialSearchOutput>>;
}

export interface RapidApiClientConfig {
  apiKey: string;
  apiHost?: string;
  count?: number;
  searchType?: SocialSearchType;
  platformHost?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
  logger?: Logger;
  metrics?: Metrics;
}

const PROVIDER = 'rapidapi_twitter';

const DEFAULT_CONFIG = {
  apiHost: 'twitter241.p.rapidapi.com',
  count: 20,
  searchType: 'Top' as const,
  timeout: 30000,
};

export class RapidApiSocialSearchClient implements SocialSearchClient {
  private readonly http: AxiosInstance;
  private readonly count: number;
  private readonly searchType: SocialSearchType;
  private readonly platformHost: string;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(config: RapidApiClientConfig) {
    const apiHost = config.apiHost ?? DEFAULT_CONFIG.apiHost;
    this.count = config.count ?? DEFAULT_CONFIG.count;
    this.searchType = config.searchType ?? DEFAULT_CONFIG.searchType;
    this.platformHost = config.platformHost ?? DEFAULT_PLATFORM_HOST;
    this.logger = config.logger ?? createLogger('social');
    this.metrics = config.metrics ?? noopMetrics;
    this.http = createHttpClient({
      baseURL: `https://${apiHost}`,
      timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
      headers: {
        'x-rapidapi-key': config.apiKey,
        'x-rapidapi-host': apiHost,
      },
      adapter: config.adapter,
    });
  }

  /**
   * Search posts for a query
   */
  async search(query: string, options: SocialSearchOptions = {}): Promise<ProviderResult<SocialSearchOutput>> {
    const startedAt = Date.now();
    const params = {
      type: options.type ?? this.searchType,
      count: String(options.count ?? this.count),
      query,
    };
    this.metrics.increment(`${PROVIDER}.requests`);
    this.logger.info('Searching posts', params);

    try {
      const response = await this.http.get<unknown>('/search-v2', { params });
      this.metrics.timing(`${PROVIDER}.latency_ms`, Date.now() - startedAt);

      if (response.status < 200 || response.status >= 300) {
        const failure = failureFromStatus(response.status, response.data, response.headers['retry-after']);
        this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: failure.kind });
        this.logger.error('Social search failed', { query, kind: failure.kind, status: response.status });
        return providerFailure(PROVIDER, startedAt, failure);
      }

      if (!isJsonObject(response.data)) {
        this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: 'malformed_response' });
        this.logger.error('Social search response is not a JSON object', { query });
        return providerFailure(PROVIDER, startedAt, {
          kind: 'malformed_response',
          message: 'Social search response is not a JSON object',
        });
      }

      const records = normalizeSocialResponse(response.data, {
        platformHost: this.platformHost,
        logger: this.logger,
      });
      this.logger.info('Social results normalized', { query, count: records.length });

      return providerSuccess(PROVIDER, startedAt, {
        records,
        rawResponse: JSON.stringify(response.data),
      });
    } catch (error) {
      const failure = failureFromError(error);
      this.metrics.increment(`${PROVIDER}.failures`, 1, { kind: failure.kind });
      this.logger.error('Social search failed', { query, kind: failure.kind, error: failure.message });
      return providerFailure(PROVIDER, startedAt, failure);
    }
  }
}

/**
 * @throws ConfigurationError when RAPIDAPI_API_KEY is absent
 */
export function createSocialSearchClient(
  config: AppConfig,
  options: Omit<RapidApiClientConfig, 'apiKey' | 'count' | 'searchType'> = {}
): RapidApiSocialSearchClient {
  return new RapidApiSocialSearchClient({
    ...options,
    apiKey: requireCredential(config, 'rapidApi'),
    count: config.socialSearch.count,
    searchType: config.socialSearch.type,
  });
}
