/**
 * Pipeline Module - Orchestrator
 *
 * Sequences one run: session → research → social search → distillation →
 * composition → (optional) publishing.
 *
 * Each fetch stage is gated by the cache's existence checks: if the session
 * already holds rows of that kind they are reused, otherwise the provider is
 * called and its records appended. Listing a stage in `refresh` skips the
 * check, so the stage runs again and its rows accumulate next to the old ones.
 *
 * The run stops early when a stage leaves nothing for the next one. Nothing is
 * rolled back: rows written by earlier stages stay in the cache.
 */

import { z } from 'zod';
import { composeSessionPosts } from '../composer/index.js';
import { ConfigurationError } from '../config/index.js';
import { distillRecords } from '../distiller/index.js';
import type { TextGenerator } from '../llm/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics } from '../logging/index.js';
import { publishComposedPosts, type PublishOptions, type PublishReport, type PublishingClient } from '../publishing/index.js';
import type { ResearchClient } from '../research/index.js';
import type { SocialSearchClient } from '../social/index.js';
import type { SqliteCacheStore } from '../storage/index.js';
import type {
  ComposedPost,
  DistilledContent,
  PipelineStage,
  PipelineStatus,
  ProductContext,
  ResearchHit,
  Session,
  SocialHit,
  SourceRecord,
  StageReport,
} from '../types/index.js';

// ============================================================================
// Input
// ============================================================================

const STAGES = ['research', 'social', 'distillation', 'composition'] as const;

export const PipelineInputSchema = z.object({
  topic: z.string().trim().min(1, 'topic is required'),
  /** Query for the social search; defaults to the topic */
  socialQuery: z.string().trim().min(1).optional(),
  product: z.object({
    name: z.string().trim().min(1, 'product name is required'),
    description: z.string().trim().min(1, 'product description is required'),
    features: z.string().optional(),
  }),
  /** Replay an existing session */
  sessionId: z.number().int().positive().optional(),
  forceNewSession: z.boolean().default(false),
  reuseLatestSession: z.boolean().default(true),
  runResearch: z.boolean().default(true),
  runSocialSearch: z.boolean().default(true),
  /** Stages to run even when the session already holds their rows */
  refresh: z.array(z.enum(STAGES)).default([]),
  publish: z.boolean().default(false),
});

export type PipelineInput = z.input<typeof PipelineInputSchema>;
type ResolvedInput = z.output<typeof PipelineInputSchema>;

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: number) {
    super(`Session ${sessionId} does not exist`);
    this.name = 'SessionNotFoundError';
  }
}

export interface PipelineDependencies {
  store: SqliteCacheStore;
  generator: TextGenerator;
  researchClient?: ResearchClient;
  socialClient?: SocialSearchClient;
  publishingClient?: PublishingClient;
  publishOptions?: Omit<PublishOptions, 'logger'>;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

export interface PipelineOutcome {
  session: Session;
  reusedSession: boolean;
  status: PipelineStatus;
  stages: StageReport[];
  distillation: DistilledContent | null;
  posts: ComposedPost[];
  publishReports: PublishReport[];
}

// ============================================================================
// Helpers
// ============================================================================

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * "Content Generation - YYYY-MM-DD HH:MM:SS" in local time
 */
export function defaultSessionName(now: Date): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  return `Content Generation - ${date} ${time}`;
}

function resolveSession(
  input: ResolvedInput,
  store: SqliteCacheStore,
  now: Date,
  logger: Logger
): { session: Session; reused: boolean } {
  const create = (): Session =>
    store.createSession({
      sessionName: defaultSessionName(now),
      topic: input.topic,
      productName: input.product.name,
      productDescription: input.product.description,
    });

  if (input.sessionId !== undefined) {
    const session = store.getSession(input.sessionId);
    if (!session) throw new SessionNotFoundError(input.sessionId);
    logger.info('Replaying selected session', { sessionId: session.id, sessionName: session.sessionName });
    return { session, reused: true };
  }

  if (input.forceNewSession || !input.reuseLatestSession) {
    return { session: create(), reused: false };
  }

  const latestId = store.getLatestSessionId();
  const latest = latestId === null ? undefined : store.getSession(latestId);
  if (latest) {
    logger.info('Reusing latest session', {
      sessionId: latest.id,
      sessionName: latest.sessionName,
      originalTopic: latest.topic,
    });
    return { session: latest, reused: true };
  }

  logger.info('No existing sessions, creating one');
  return { session: create(), reused: false };
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Run the pipeline once.
 *
 * @throws ZodError for invalid input
 * @throws ConfigurationError when an enabled stage has no client
 * @throws SessionNotFoundError when `sessionId` names no session
 */
export async function runPipeline(rawInput: PipelineInput, deps: PipelineDependencies): Promise<PipelineOutcome> {
  const input = PipelineInputSchema.parse(rawInput);
  const logger = deps.logger ?? createLogger('pipeline');
  const metrics = deps.metrics ?? noopMetrics;
  const { store } = deps;
  const startedAt = Date.now();
  const refresh = new Set<PipelineStage>(input.refresh);

  if (input.runResearch && !deps.researchClient) {
    throw new ConfigurationError('Research is enabled but no research client is configured', 'PERPLEXITY_API_KEY');
  }
  if (input.runSocialSearch && !deps.socialClient) {
    throw new ConfigurationError('Social search is enabled but no social client is configured', 'RAPIDAPI_API_KEY');
  }
  if (input.publish && !deps.publishingClient) {
    throw new ConfigurationError('Publishing was requested but no publishing client is configured', 'TYPEFULLY_API_KEY');
  }

  const { session, reused } = resolveSession(input, store, (deps.now ?? (() => new Date()))(), logger);
  const product: ProductContext = input.product;
  const stages: StageReport[] = [];

  const finish = (
    status: PipelineStatus,
    extra: Partial<Pick<PipelineOutcome, 'distillation' | 'posts' | 'publishReports'>> = {}
  ): PipelineOutcome => {
    metrics.increment('pipeline.runs', 1, { status });
    metrics.timing('pipeline.duration_ms', Date.now() - startedAt);
    logger.info('Pipeline finished', { sessionId: session.id, status });
    return {
      session,
      reusedSession: reused,
      status,
      stages,
      distillation: extra.distillation ?? null,
      posts: extra.posts ?? [],
      publishReports: extra.publishReports ?? [],
    };
  };

  // --- Research -------------------------------------------------------------
  let researchRecords: ResearchHit[] = [];
  if (!input.runResearch || !deps.researchClient) {
    stages.push({ stage: 'research', skipped: true, fromCache: false, count: 0 });
  } else if (!refresh.has('research') && store.hasResearchRecords(session.id)) {
    researchRecords = store.getResearchRecords(session.id);
    logger.info('Using cached research results', { sessionId: session.id, count: researchRecords.length });
    stages.push({ stage: 'research', skipped: false, fromCache: true, count: researchRecords.length });
  } else {
    const result = await deps.researchClient.search(input.topic);
    if (result.success) {
      researchRecords = result.data.records;
      store.saveResearchRecords(session.id, researchRecords, result.data.rawResponse);
    } else {
      logger.warn('Research stage produced no results', { kind: result.error.kind, error: result.error.message });
    }
    stages.push({ stage: 'research', skipped: false, fromCache: false, count: researchRecords.length });
  }

  // --- Social search --------------------------------------------------------
  let socialRecords: SocialHit[] = [];
  const socialQuery = input.socialQuery ?? input.topic;
  if (!input.runSocialSearch || !deps.socialClient) {
    stages.push({ stage: 'social', skipped: true, fromCache: false, count: 0 });
  } else if (!refresh.has('social') && store.hasSocialRecords(session.id)) {
    socialRecords = store.getSocialRecords(session.id);
    logger.info('Using cached social results', { sessionId: session.id, count: socialRecords.length });
    stages.push({ stage: 'social', skipped: false, fromCache: true, count: socialRecords.length });
  } else {
    const result = await deps.socialClient.search(socialQuery);
    if (result.success) {
      socialRecords = result.data.records;
      store.saveSocialRecords(session.id, socialRecords, result.data.rawResponse);
    } else {
      logger.warn('Social stage produced no results', { kind: result.error.kind, error: result.error.message });
    }
    stages.push({ stage: 'social', skipped: false, fromCache: false, count: socialRecords.length });
  }

  const combined: SourceRecord[] = [...researchRecords, ...socialRecords];
  logger.info('Combined source records', {
    research: researchRecords.length,
    social: socialRecords.length,
  });
  if (combined.length === 0) {
    logger.warn('No records gathered from any provider; stopping');
    return finish('no_results');
  }

  // --- Distillation ---------------------------------------------------------
  let distillation: DistilledContent;
  const cachedDistillation = refresh.has('distillation') ? undefined : store.getLatestDistillation(session.id);
  if (cachedDistillation) {
    distillation = {
      distilled_topics: cachedDistillation.distilledTopics,
      talking_points: cachedDistillation.talkingPoints,
    };
    logger.info('Using cached distillation', { sessionId: session.id, distillationId: cachedDistillation.id });
    stages.push({ stage: 'distillation', skipped: false, fromCache: true, count: distillation.distilled_topics.length });
  } else {
    const outcome = await distillRecords({
      sessionId: session.id,
      records: combined,
      product,
      generator: deps.generator,
      store,
      logger,
    });
    distillation = outcome.content;
    stages.push({ stage: 'distillation', skipped: false, fromCache: false, count: distillation.distilled_topics.length });
  }

  if (distillation.distilled_topics.length === 0) {
    logger.warn('Distillation produced no topics; stopping');
    return finish('no_topics', { distillation });
  }

  // --- Composition ----------------------------------------------------------
  let posts: ComposedPost[];
  if (!refresh.has('composition') && store.hasComposedPosts(session.id)) {
    posts = store.getComposedPosts(session.id);
    logger.info('Using cached posts', { sessionId: session.id, count: posts.length });
    stages.push({ stage: 'composition', skipped: false, fromCache: true, count: posts.length });
  } else {
    posts = await composeSessionPosts(session.id, {
      topics: distillation.distilled_topics,
      talkingPoints: distillation.talking_points,
      product,
      generator: deps.generator,
      store,
      logger,
    });
    stages.push({ stage: 'composition', skipped: false, fromCache: false, count: posts.length });
  }

  if (posts.length === 0) {
    return finish('no_posts', { distillation });
  }

  // --- Publishing -----------------------------------------------------------
  let publishReports: PublishReport[] = [];
  if (input.publish && deps.publishingClient) {
    publishReports = await publishComposedPosts(posts, deps.publishingClient, { ...deps.publishOptions, logger });
  }

  return finish('completed', { distillation, posts, publishReports });
}
