/**
 * Core type definitions for the content pipeline
 *
 * This module exports all shared types used across the system.
 */

/**
 * Identifier of a pipeline session. Generated by the cache store on create;
 * callers treat it as opaque.
 */
export type SessionId = number;

// ============================================================================
// Persisted entities
// ============================================================================

/**
 * One logical run of the pipeline, the unit of cache partitioning
 */
export interface Session {
  id: SessionId;
  sessionName: string;
  createdAt: string;
  topic: string;
  productName: string;
  productDescription: string;
}

export interface NewSession {
  sessionName: string;
  topic: string;
  productName: string;
  productDescription: string;
}

/**
 * Normalized hit from the web-research provider
 */
export interface ResearchHit {
  url: string;
  snippet: string;
}

export interface ResearchRecord extends ResearchHit {
  id: number;
  sessionId: SessionId;
  createdAt: string;
  /** Provider payload as received. Kept for inspection only. */
  rawResponse: string | null;
}

/**
 * Normalized post from the social-search provider
 */
export interface SocialHit {
  url: string;
  snippet: string;
  screenName: string;
  followersCount: number;
  favoriteCount: number;
  retweetCount: number;
  replyCount: number;
  quoteCount: number;
  /** Provider's own timestamp string, stored as received */
  postedAt: string | null;
}

export interface SocialRecord extends SocialHit {
  id: number;
  sessionId: SessionId;
  createdAt: string;
  rawResponse: string | null;
}

/**
 * Topics and talking points distilled from research records.
 * Keys mirror the JSON object the model is asked to produce.
 */
export interface DistilledContent {
  distilled_topics: string[];
  talking_points: string[];
}

export interface DistillationResult {
  id: number;
  sessionId: SessionId;
  distilledTopics: string[];
  talkingPoints: string[];
  rawResponse: string | null;
  createdAt: string;
}

export interface ComposedPostDraft {
  topic: string;
  postBody: string;
  rawResponse: string | null;
}

export interface ComposedPost extends ComposedPostDraft {
  id: number;
  sessionId: SessionId;
  createdAt: string;
}

/**
 * What is being promoted. Features is free text, usually loaded from a file.
 */
export interface ProductContext {
  name: string;
  description: string;
  features?: string;
}

/**
 * Anything a distiller can read: research and social records share url + snippet
 */
export type SourceRecord = ResearchHit | SocialHit;

// ============================================================================
// Provider results
// ============================================================================

/**
 * Why a provider call failed
 *
 * - network: no response was received
 * - malformed_response: a response arrived but could not be interpreted
 * - rate_limited: HTTP 429; see retryAfterSeconds
 * - auth: HTTP 401 / 403
 * - upstream: any other non-2xx status
 * - validation: rejected locally before any request was sent
 */
export type FailureKind =
  | 'network'
  | 'malformed_response'
  | 'rate_limited'
  | 'auth'
  | 'upstream'
  | 'validation';

export interface ProviderFailure {
  kind: FailureKind;
  message: string;
  status?: number;
  retryAfterSeconds?: number;
  details?: unknown;
}

export interface ResultMetadata {
  provider: string;
  timestamp: string;
  duration: number;
}

/**
 * Outcome of one provider call. Clients return this instead of throwing.
 */
export type ProviderResult<T> =
  | { success: true; data: T; metadata: ResultMetadata }
  | { success: false; error: ProviderFailure; metadata: ResultMetadata };

// ============================================================================
// Pipeline
// ============================================================================

export type PipelineStage = 'research' | 'social' | 'distillation' | 'composition';

export type PipelineStatus = 'completed' | 'no_results' | 'no_topics' | 'no_posts';

export interface StageReport {
  stage: PipelineStage;
  skipped: boolean;
  fromCache: boolean;
  count: number;
}
