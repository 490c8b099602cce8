/**
 * Renderers Module
 *
 * Read-only views over cached sessions for the operator: summaries and a
 * markdown report, analytics over social engagement and post lengths,
 * and JSON or CSV exports.
 */

import { isErrorSentinel } from '../composer/index.js';
import type { CacheTotals, SessionRecordCounts, SqliteCacheStore } from '../storage/index.js';
import type {
  ComposedPost,
  DistillationResult,
  ResearchRecord,
  Session,
  SessionId,
  SocialRecord,
} from '../types/index.js';

export interface SessionSummary {
  session: Session;
  counts: SessionRecordCounts;
  latestDistillation: DistillationResult | null;
  posts: ComposedPost[];
  failedPosts: number;
}

export interface SessionExport {
  exportedAt: string;
  session: Session;
  research: ResearchRecord[];
  social: SocialRecord[];
  distillation: DistillationResult | null;
  posts: ComposedPost[];
}

export interface ExportOptions {
  /** Keep provider payloads and model replies (default true) */
  includeRawResponses?: boolean;
  now?: () => Date;
}

type ReadableStore = Pick<
  SqliteCacheStore,
  | 'getSession'
  | 'getSessions'
  | 'countRecords'
  | 'countAllRecords'
  | 'getLatestDistillation'
  | 'getComposedPosts'
  | 'getResearchRecords'
  | 'getSocialRecords'
>;

export function summarizeSession(store: ReadableStore, sessionId: SessionId): SessionSummary | null {
  const session = store.getSession(sessionId);
  if (!session) return null;

  const posts = store.getComposedPosts(sessionId);
  return {
    session,
    counts: store.countRecords(sessionId),
    latestDistillation: store.getLatestDistillation(sessionId) ?? null,
    posts,
    failedPosts: posts.filter((post) => isErrorSentinel(post.postBody)).length,
  };
}

export function renderSessionMarkdown(summary: SessionSummary): string {
  const { session, counts, latestDistillation, posts } = summary;
  const lines: string[] = [
    `# ${session.sessionName}`,
    '',
    `- Session ID: ${session.id}`,
    `- Created: ${session.createdAt}`,
    `- Topic: ${session.topic}`,
    `- Product: ${session.productName}: ${session.productDescription}`,
    '',
    '## Records',
    '',
    `- Research results: ${counts.research}`,
    `- Social results: ${counts.social}`,
    `- Distillations: ${counts.distillations}`,
    `- Posts: ${counts.posts} (${summary.failedPosts} failed)`,
  ];

  if (latestDistillation) {
    lines.push('', '## Topics', '');
    latestDistillation.distilledTopics.forEach((topic, i) => lines.push(`${i + 1}. ${topic}`));
    if (latestDistillation.talkingPoints.length > 0) {
      lines.push('', '## Talking points', '');
      latestDistillation.talkingPoints.forEach((point) => lines.push(`- ${point}`));
    }
  }

  if (posts.length > 0) {
    lines.push('', '## Posts');
    posts.forEach((post, i) => {
      lines.push('', `### ${i + 1}. ${post.topic}`, '', post.postBody);
    });
  }

  return lines.join('\n') + '\n';
}

/**
 * One line per session: id, creation time, name and topic
 */
export function renderSessionList(sessions: readonly Session[]): string {
  if (sessions.length === 0) return 'No sessions found.\n';
  return sessions.map((s) => `${s.id}\t${s.createdAt}\t${s.sessionName}\t${s.topic}`).join('\n') + '\n';
}

export function exportSession(
  store: ReadableStore,
  sessionId: SessionId,
  options: ExportOptions = {}
): SessionExport | null {
  const session = store.getSession(sessionId);
  if (!session) return null;

  const keepRaw = options.includeRawResponses ?? true;
  const strip = <T extends { rawResponse: string | null }>(row: T): T => (keepRaw ? row : { ...row, rawResponse: null });
  const distillation = store.getLatestDistillation(sessionId) ?? null;

  return {
    exportedAt: (options.now ?? (() => new Date()))().toISOString(),
    session,
    research: store.getResearchRecords(sessionId).map(strip),
    social: store.getSocialRecords(sessionId).map(strip),
    distillation: distillation ? strip(distillation) : null,
    posts: store.getComposedPosts(sessionId).map(strip),
  };
}

export interface AllSessionsExport {
  exportedAt: string;
  sessions: SessionExport[];
}

/**
 * Export every session, newest first
 */
export function exportAllSessions(store: ReadableStore, options: ExportOptions = {}): AllSessionsExport {
  const exportedAt = (options.now ?? (() => new Date()))().toISOString();
  const sessions: SessionExport[] = [];
  for (const session of store.getSessions()) {
    const data = exportSession(store, session.id, { ...options, now: () => new Date(exportedAt) });
    if (data) sessions.push(data);
  }
  return { exportedAt, sessions };
}

// ============================================================================
// CSV
// ============================================================================

export type CsvCollection = 'research' | 'social' | 'distillations' | 'posts';

type CsvValue = string | number | null;

function csvCell(value: CsvValue): string {
  const str = value === null ? '' : String(value);
  return /[",\r\n]/.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
}

function toCsv(headers: readonly string[], rows: readonly CsvValue[][]): string {
  const table: (readonly CsvValue[])[] = [headers, ...rows];
  return table.map((row) => row.map(csvCell).join(',')).join('\n') + '\n';
}

/**
 * One CSV document per non-empty collection of a session. The distillation
 * document holds the latest row, with list fields joined by " | ".
 */
export function exportSessionCsv(
  store: ReadableStore,
  sessionId: SessionId,
  options: Pick<ExportOptions, 'includeRawResponses'> = {}
): Partial<Record<CsvCollection, string>> | null {
  if (!store.getSession(sessionId)) return null;
  const keepRaw = options.includeRawResponses ?? true;
  const raw = (value: string | null): string | null => (keepRaw ? value : null);
  const documents: Partial<Record<CsvCollection, string>> = {};

  const research = store.getResearchRecords(sessionId);
  if (research.length > 0) {
    documents.research = toCsv(
      ['id', 'session_id', 'url', 'snippet', 'created_at', 'raw_response'],
      research.map((r) => [r.id, r.sessionId, r.url, r.snippet, r.createdAt, raw(r.rawResponse)])
    );
  }

  const social = store.getSocialRecords(sessionId);
  if (social.length > 0) {
    documents.social = toCsv(
      [
        'id',
        'session_id',
        'url',
        'snippet',
        'screen_name',
        'followers_count',
        'favorite_count',
        'retweet_count',
        'reply_count',
        'quote_count',
        'posted_at',
        'created_at',
        'raw_response',
      ],
      social.map((r) => [
        r.id,
        r.sessionId,
        r.url,
        r.snippet,
        r.screenName,
        r.followersCount,
        r.favoriteCount,
        r.retweetCount,
        r.replyCount,
        r.quoteCount,
        r.postedAt,
        r.createdAt,
        raw(r.rawResponse),
      ])
    );
  }

  const distillation = store.getLatestDistillation(sessionId);
  if (distillation) {
    documents.distillations = toCsv(
      ['id', 'session_id', 'distilled_topics', 'talking_points', 'created_at', 'raw_response'],
      [
        [
          distillation.id,
          distillation.sessionId,
          distillation.distilledTopics.join(' | '),
          distillation.talkingPoints.join(' | '),
          distillation.createdAt,
          raw(distillation.rawResponse),
        ],
      ]
    );
  }

  const posts = store.getComposedPosts(sessionId);
  if (posts.length > 0) {
    documents.posts = toCsv(
      ['id', 'session_id', 'topic', 'post_body', 'created_at', 'raw_response'],
      posts.map((p) => [p.id, p.sessionId, p.topic, p.postBody, p.createdAt, raw(p.rawResponse)])
    );
  }

  return documents;
}

// ============================================================================
// Analytics
// ============================================================================

export interface EngagedPost {
  url: string;
  screenName: string;
  followersCount: number;
  /** likes + reposts + replies */
  engagement: number;
}

export interface EngagementAnalysis {
  postCount: number;
  totalEngagement: number;
  averageEngagement: number;
  /** Up to five posts, most engaged first */
  topPosts: EngagedPost[];
  /** Every post in stored order, for engagement against follower count */
  points: EngagedPost[];
}

export const TOP_ENGAGED_LIMIT = 5;

export function analyzeEngagement(store: ReadableStore, sessionId: SessionId): EngagementAnalysis | null {
  if (!store.getSession(sessionId)) return null;

  const points = store.getSocialRecords(sessionId).map(
    (record): EngagedPost => ({
      url: record.url,
      screenName: record.screenName,
      followersCount: record.followersCount,
      engagement: record.favoriteCount + record.retweetCount + record.replyCount,
    })
  );
  const totalEngagement = points.reduce((sum, point) => sum + point.engagement, 0);

  return {
    postCount: points.length,
    totalEngagement,
    averageEngagement: points.length > 0 ? totalEngagement / points.length : 0,
    topPosts: [...points].sort((a, b) => b.engagement - a.engagement).slice(0, TOP_ENGAGED_LIMIT),
    points,
  };
}

export interface LengthBucket {
  /** Inclusive lower bound */
  from: number;
  /** Inclusive upper bound */
  to: number;
  count: number;
}

export interface PostLengthDistribution {
  lengths: number[];
  min: number;
  max: number;
  average: number;
  /** Non-empty buckets, ascending */
  buckets: LengthBucket[];
  /** Error sentinels, left out of the figures above */
  failed: number;
}

export function analyzePostLengths(
  store: ReadableStore,
  sessionId: SessionId,
  bucketSize = 100
): PostLengthDistribution | null {
  if (!store.getSession(sessionId)) return null;

  const posts = store.getComposedPosts(sessionId);
  const lengths = posts.filter((post) => !isErrorSentinel(post.postBody)).map((post) => post.postBody.length);

  const counts = new Map<number, number>();
  for (const length of lengths) {
    const start = Math.floor(length / bucketSize) * bucketSize;
    counts.set(start, (counts.get(start) ?? 0) + 1);
  }

  return {
    lengths,
    min: lengths.length > 0 ? Math.min(...lengths) : 0,
    max: lengths.length > 0 ? Math.max(...lengths) : 0,
    average: lengths.length > 0 ? lengths.reduce((sum, n) => sum + n, 0) / lengths.length : 0,
    buckets: [...counts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([from, count]) => ({ from, to: from + bucketSize - 1, count })),
    failed: posts.length - lengths.length,
  };
}

export interface CacheOverview {
  totals: CacheTotals;
  /** Sessions created per UTC day, ascending */
  sessionsPerDay: { date: string; count: number }[];
  perSession: { session: Session; counts: SessionRecordCounts }[];
}

export function summarizeAllSessions(store: ReadableStore): CacheOverview {
  const sessions = store.getSessions();
  const perDay = new Map<string, number>();
  for (const session of sessions) {
    const date = session.createdAt.slice(0, 10);
    perDay.set(date, (perDay.get(date) ?? 0) + 1);
  }

  return {
    totals: store.countAllRecords(),
    sessionsPerDay: [...perDay.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, count]) => ({ date, count })),
    perSession: sessions.map((session) => ({ session, counts: store.countRecords(session.id) })),
  };
}

const formatAverage = (value: number): string => (Number.isInteger(value) ? String(value) : value.toFixed(1));

export function renderAnalytics(
  engagement: EngagementAnalysis,
  lengths: PostLengthDistribution
): string {
  const lines: string[] = [
    '## Social engagement',
    '',
    `- Posts: ${engagement.postCount}`,
    `- Total engagement: ${engagement.totalEngagement}`,
    `- Average engagement: ${formatAverage(engagement.averageEngagement)}`,
  ];
  if (engagement.topPosts.length > 0) {
    lines.push('', '### Most engaged', '');
    engagement.topPosts.forEach((post, i) =>
      lines.push(`${i + 1}. @${post.screenName}: ${post.engagement} (${post.followersCount} followers) ${post.url}`)
    );
  }

  lines.push(
    '',
    '## Post lengths',
    '',
    `- Posts: ${lengths.lengths.length} (${lengths.failed} failed)`,
    `- Min: ${lengths.min}`,
    `- Max: ${lengths.max}`,
    `- Average: ${formatAverage(lengths.average)}`
  );
  if (lengths.buckets.length > 0) {
    lines.push('');
    lengths.buckets.forEach((bucket) => lines.push(`- ${bucket.from}-${bucket.to}: ${bucket.count}`));
  }
  return lines.join('\n') + '\n';
}

export function renderOverview(overview: CacheOverview): string {
  const { totals } = overview;
  const lines: string[] = [
    '# Cache overview',
    '',
    `- Sessions: ${totals.sessions}`,
    `- Research results: ${totals.research}`,
    `- Social results: ${totals.social}`,
    `- Distillations: ${totals.distillations}`,
    `- Posts: ${totals.posts}`,
  ];
  if (overview.sessionsPerDay.length > 0) {
    lines.push('', '## Sessions per day', '');
    overview.sessionsPerDay.forEach(({ date, count }) => lines.push(`- ${date}: ${count}`));
  }
  return lines.join('\n') + '\n';
}
