/**
 * Content Pipeline - Main Entry Point
 *
 * Research a topic, distill the findings into topics and talking points,
 * compose one post per topic and optionally push the posts as drafts.
 *
 * Architecture:
 * - Provider clients return ProviderResult values instead of throwing
 * - Every stage's output is cached per session in SQLite
 * - runPipeline() sequences the stages; the CLI wraps it for operators
 */

// Core Types
export type * from './types/index.js';

// Logging
export { createLogger, noopMetrics, type Logger, type LogLevel, type Metrics } from './logging/index.js';

// Configuration
export {
  loadConfig,
  requireCredential,
  ConfigurationError,
  CREDENTIAL_ENV_KEYS,
  type AppConfig,
  type CredentialName,
  type FeatureFlags,
  type SocialSearchType,
} from './config/index.js';

// Storage Module - Session cache
export {
  SqliteCacheStore,
  createCacheStore,
  MEMORY_DATABASE,
  type CacheStoreOptions,
  type SessionRecordCounts,
  type CacheTotals,
  type DatabaseInfo,
} from './storage/index.js';

// Research Module - Web research
export {
  PerplexityResearchClient,
  createResearchClient,
  normalizeResearchResponse,
  RESEARCH_PLACEHOLDER_URL,
  type ResearchClient,
  type ResearchSearchOutput,
  type PerplexityClientConfig,
} from './research/index.js';

// Social Module - Post search
export {
  RapidApiSocialSearchClient,
  createSocialSearchClient,
  normalizeSocialResponse,
  type SocialSearchClient,
  type SocialSearchOutput,
  type SocialSearchOptions,
  type RapidApiClientConfig,
} from './social/index.js';

// LLM Module - Text generation
export {
  AnthropicTextGenerator,
  createTextGenerator,
  type TextGenerator,
  type TextGenerationOptions,
  type GeneratedText,
  type MessagesClient,
} from './llm/index.js';

// Distiller Module - Topics and talking points
export {
  distillRecords,
  parseDistillation,
  extractJsonObject,
  buildDistillationPrompt,
  type DistillInput,
  type DistillOutcome,
} from './distiller/index.js';

// Composer Module - Post writing
export {
  composePost,
  composePosts,
  composeSessionPosts,
  extractPostText,
  isErrorSentinel,
  ERROR_SENTINEL_PREFIX,
  type ComposeInput,
} from './composer/index.js';

// Publishing Module - Drafts
export {
  TypefullyPublishingClient,
  createPublishingClient,
  publishComposedPosts,
  splitContentSmart,
  prepareDraftContent,
  validateDraftContent,
  getDraftStats,
  type DraftStats,
  type PublishingClient,
  type CreateDraftRequest,
  type Draft,
  type PublishReport,
  type PublishOptions,
} from './publishing/index.js';

// Pipeline - Orchestration
export {
  runPipeline,
  PipelineInputSchema,
  SessionNotFoundError,
  type PipelineInput,
  type PipelineDependencies,
  type PipelineOutcome,
} from './pipeline/index.js';

// Renderers - Session views
export {
  summarizeSession,
  renderSessionMarkdown,
  renderSessionList,
  exportSession,
  exportAllSessions,
  exportSessionCsv,
  analyzeEngagement,
  analyzePostLengths,
  summarizeAllSessions,
  renderAnalytics,
  renderOverview,
  type SessionSummary,
  type SessionExport,
  type AllSessionsExport,
  type EngagementAnalysis,
  type PostLengthDistribution,
  type CacheOverview,
} from './renderers/index.js';
