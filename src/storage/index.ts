/**
 * Storage Module - Session Cache
 *
 * SQLite-backed cache for pipeline sessions and their four record collections:
 * research results, social results, distillations and composed posts.
 *
 * Semantics:
 * - Writes always insert. Re-running a stage against a session appends rows.
 * - has*() methods are existence checks: any row for the session counts.
 * - Distillation reads return the newest row; older rows stay in the table.
 * - Omitting the session id targets the most recently created session.
 *
 * A file-backed store opens and closes a connection per call. `:memory:`
 * keeps a single connection for the lifetime of the store, since each new
 * connection would see an empty database.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { asc, count, desc, eq } from 'drizzle-orm';
import { readFileSync } from 'fs';
import { join } from 'path';
import { createLogger, type Logger } from '../logging/index.js';
import * as schema from './schema.js';
import type {
  ComposedPost,
  ComposedPostDraft,
  DistillationResult,
  DistilledContent,
  NewSession,
  ResearchHit,
  ResearchRecord,
  Session,
  SessionId,
  SocialHit,
  SocialRecord,
} from '../types/index.js';

const { sessions, researchResults, socialResults, distillationResults, composedPosts } = schema;

type CacheDatabase = BetterSQLite3Database<typeof schema>;

export const MEMORY_DATABASE = ':memory:';

const SCHEMA_PATH = join(__dirname, '..', '..', 'sql', 'schema.sql');

export interface CacheStoreOptions {
  /** File path, or ':memory:' */
  path: string;
  logger?: Logger;
}

export interface SessionRecordCounts {
  research: number;
  social: number;
  distillations: number;
  posts: number;
}

export interface CacheTotals extends SessionRecordCounts {
  sessions: number;
}

export interface DatabaseInfo {
  path: string;
  /** page_count × page_size */
  sizeBytes: number;
  sessions: number;
}

export class SqliteCacheStore {
  private readonly path: string;
  private readonly logger: Logger;
  private sharedConnection: Database.Database | null = null;

  constructor(options: CacheStoreOptions) {
    this.path = options.path;
    this.logger = options.logger ?? createLogger('storage');

    if (this.path === MEMORY_DATABASE) {
      this.sharedConnection = this.open();
    }
    this.initialize();
  }

  // ==========================================================================
  // Connection handling
  // ==========================================================================

  private open(): Database.Database {
    const connection = new Database(this.path);
    connection.pragma('foreign_keys = ON');
    return connection;
  }

  private withConnection<T>(fn: (connection: Database.Database) => T): T {
    if (this.sharedConnection) {
      return fn(this.sharedConnection);
    }
    const connection = this.open();
    try {
      return fn(connection);
    } finally {
      connection.close();
    }
  }

  private withDatabase<T>(fn: (db: CacheDatabase) => T): T {
    return this.withConnection((connection) => fn(drizzle(connection, { schema })));
  }

  private initialize(): void {
    const ddl = readFileSync(SCHEMA_PATH, 'utf-8');
    this.withConnection((connection) => connection.exec(ddl));
    this.logger.debug('Cache store initialized', { path: this.path });
  }

  /**
   * Release the shared in-memory connection. No-op for file-backed stores.
   */
  close(): void {
    this.sharedConnection?.close();
    this.sharedConnection = null;
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  createSession(input: NewSession): Session {
    const session = this.withDatabase((db) => db.insert(sessions).values(input).returning().get());
    this.logger.info('Session created', { sessionId: session.id, sessionName: session.sessionName });
    return session;
  }

  /**
   * All sessions, newest first
   */
  getSessions(): Session[] {
    return this.withDatabase((db) =>
      db.select().from(sessions).orderBy(desc(sessions.createdAt), desc(sessions.id)).all()
    );
  }

  getSession(sessionId: SessionId): Session | undefined {
    return this.withDatabase((db) => db.select().from(sessions).where(eq(sessions.id, sessionId)).get());
  }

  getLatestSessionId(): SessionId | null {
    const row = this.withDatabase((db) =>
      db
        .select({ id: sessions.id })
        .from(sessions)
        .orderBy(desc(sessions.createdAt), desc(sessions.id))
        .limit(1)
        .get()
    );
    return row?.id ?? null;
  }

  /**
   * Delete a session and, through the foreign keys, every record it owns.
   *
   * @returns true if a session was removed
   */
  deleteSession(sessionId: SessionId): boolean {
    const result = this.withDatabase((db) => db.delete(sessions).where(eq(sessions.id, sessionId)).run());
    if (result.changes > 0) {
      this.logger.info('Session deleted', { sessionId });
      return true;
    }
    return false;
  }

  private resolveSessionId(sessionId: SessionId | undefined): SessionId | null {
    return sessionId ?? this.getLatestSessionId();
  }

  // ==========================================================================
  // Research results
  // ==========================================================================

  /**
   * Append research hits. Each row carries the same raw payload.
   *
   * @returns number of rows inserted
   */
  saveResearchRecords(sessionId: SessionId, hits: ResearchHit[], rawResponse: string | null): number {
    if (hits.length === 0) return 0;
    this.withDatabase((db) =>
      db
        .insert(researchResults)
        .values(hits.map((hit) => ({ sessionId, url: hit.url, snippet: hit.snippet, rawResponse })))
        .run()
    );
    this.logger.info('Research results saved', { sessionId, count: hits.length });
    return hits.length;
  }

  getResearchRecords(sessionId?: SessionId): ResearchRecord[] {
    const id = this.resolveSessionId(sessionId);
    if (id === null) return [];
    return this.withDatabase((db) =>
      db
        .select()
        .from(researchResults)
        .where(eq(researchResults.sessionId, id))
        .orderBy(asc(researchResults.createdAt), asc(researchResults.id))
        .all()
    );
  }

  hasResearchRecords(sessionId?: SessionId): boolean {
    const id = this.resolveSessionId(sessionId);
    if (id === null) return false;
    const row = this.withDatabase((db) =>
      db.select({ value: count() }).from(researchResults).where(eq(researchResults.sessionId, id)).get()
    );
    return (row?.value ?? 0) > 0;
  }

  // ==========================================================================
  // Social results
  // ==========================================================================

  saveSocialRecords(sessionId: SessionId, hits: SocialHit[], rawResponse: string | null): number {
    if (hits.length === 0) return 0;
    this.withDatabase((db) =>
      db
        .insert(socialResults)
        .values(hits.map((hit) => ({ ...hit, sessionId, rawResponse })))
        .run()
    );
    this.logger.info('Social results saved', { sessionId, count: hits.length });
    return hits.length;
  }

  getSocialRecords(sessionId?: SessionId): SocialRecord[] {
    const id = this.resolveSessionId(sessionId);
    if (id === null) return [];
    return this.withDatabase((db) =>
      db
        .select()
        .from(socialResults)
        .where(eq(socialResults.sessionId, id))
        .orderBy(asc(socialResults.createdAt), asc(socialResults.id))
        .all()
    );
  }

  hasSocialRecords(sessionId?: SessionId): boolean {
    const id = this.resolveSessionId(sessionId);
    if (id === null) return false;
    const row = this.withDatabase((db) =>
      db.select({ value: count() }).from(socialResults).where(eq(socialResults.sessionId, id)).get()
    );
    return (row?.value ?? 0) > 0;
  }

  // ==========================================================================
  // Distillations
  // ==========================================================================

  saveDistillation(sessionId: SessionId, content: DistilledContent, rawResponse: string | null): DistillationResult {
    const saved = this.withDatabase((db) =>
      db
        .insert(distillationResults)
        .values({
          sessionId,
          distilledTopics: content.distilled_topics,
          talkingPoints: content.talking_points,
          rawResponse,
        })
        .returning()
        .get()
    );
    this.logger.info('Distillation saved', {
      sessionId,
      topics: content.distilled_topics.length,
      talkingPoints: content.talking_points.length,
    });
    return saved;
  }

  /**
   * Newest distillation for the session, if any
   */
  getLatestDistillation(sessionId?: SessionId): DistillationResult | undefined {
    const id = this.resolveSessionId(sessionId);
    if (id === null) return undefined;
    return this.withDatabase((db) =>
      db
        .select()
        .from(distillationResults)
        .where(eq(distillationResults.sessionId, id))
        .orderBy(desc(distillationResults.createdAt), desc(distillationResults.id))
        .limit(1)
        .get()
    );
  }

  hasDistillation(sessionId?: SessionId): boolean {
    const id = this.resolveSessionId(sessionId);
    if (id === null) return false;
    const row = this.withDatabase((db) =>
      db.select({ value: count() }).from(distillationResults).where(eq(distillationResults.sessionId, id)).get()
    );
    return (row?.value ?? 0) > 0;
  }

  // ==========================================================================
  // Composed posts
  // ==========================================================================

  saveComposedPosts(sessionId: SessionId, posts: ComposedPostDraft[]): ComposedPost[] {
    if (posts.length === 0) return [];
    const saved = this.withDatabase((db) =>
      db
        .insert(composedPosts)
        .values(posts.map((post) => ({ ...post, sessionId })))
        .returning()
        .all()
    );
    this.logger.info('Composed posts saved', { sessionId, count: saved.length });
    return saved;
  }

  getComposedPosts(sessionId?: SessionId): ComposedPost[] {
    const id = this.resolveSessionId(sessionId);
    if (id === null) return [];
    return this.withDatabase((db) =>
      db
        .select()
        .from(composedPosts)
        .where(eq(composedPosts.sessionId, id))
        .orderBy(asc(composedPosts.createdAt), asc(composedPosts.id))
        .all()
    );
  }

  hasComposedPosts(sessionId?: SessionId): boolean {
    const id = this.resolveSessionId(sessionId);
    if (id === null) return false;
    const row = this.withDatabase((db) =>
      db.select({ value: count() }).from(composedPosts).where(eq(composedPosts.sessionId, id)).get()
    );
    return (row?.value ?? 0) > 0;
  }

  // ==========================================================================
  // Summaries
  // ==========================================================================

  countRecords(sessionId: SessionId): SessionRecordCounts {
    return this.withDatabase((db) => {
      const tally = (row: { value: number } | undefined): number => row?.value ?? 0;
      return {
        research: tally(
          db.select({ value: count() }).from(researchResults).where(eq(researchResults.sessionId, sessionId)).get()
        ),
        social: tally(
          db.select({ value: count() }).from(socialResults).where(eq(socialResults.sessionId, sessionId)).get()
        ),
        distillations: tally(
          db
            .select({ value: count() })
            .from(distillationResults)
            .where(eq(distillationResults.sessionId, sessionId))
            .get()
        ),
        posts: tally(
          db.select({ value: count() }).from(composedPosts).where(eq(composedPosts.sessionId, sessionId)).get()
        ),
      };
    });
  }

  /**
   * Row counts across every session
   */
  countAllRecords(): CacheTotals {
    return this.withDatabase((db) => {
      const tally = (row: { value: number } | undefined): number => row?.value ?? 0;
      return {
        sessions: tally(db.select({ value: count() }).from(sessions).get()),
        research: tally(db.select({ value: count() }).from(researchResults).get()),
        social: tally(db.select({ value: count() }).from(socialResults).get()),
        distillations: tally(db.select({ value: count() }).from(distillationResults).get()),
        posts: tally(db.select({ value: count() }).from(composedPosts).get()),
      };
    });
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  getDatabaseInfo(): DatabaseInfo {
    const sizeBytes = this.withConnection((connection) => {
      const pages: unknown = connection.pragma('page_count', { simple: true });
      const pageSize: unknown = connection.pragma('page_size', { simple: true });
      return typeof pages === 'number' && typeof pageSize === 'number' ? pages * pageSize : 0;
    });
    return { path: this.path, sizeBytes, sessions: this.countAllRecords().sessions };
  }

  /**
   * Rebuild the database file, reclaiming space left by deleted rows
   */
  vacuum(): void {
    this.withConnection((connection) => connection.exec('VACUUM'));
    this.logger.info('Database vacuumed', { path: this.path });
  }

  /**
   * Refresh the query planner statistics
   */
  analyze(): void {
    this.withConnection((connection) => connection.exec('ANALYZE'));
    this.logger.info('Database analyzed', { path: this.path });
  }
}

/**
 * Create a store for the configured database path
 */
export function createCacheStore(path: string, logger?: Logger): SqliteCacheStore {
  return new SqliteCacheStore({ path, logger });
}
