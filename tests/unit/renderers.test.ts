/**
 * Unit Tests for Renderers Module
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  analyzeEngagement,
  analyzePostLengths,
  exportAllSessions,
  exportSession,
  exportSessionCsv,
  renderAnalytics,
  renderOverview,
  renderSessionList,
  renderSessionMarkdown,
  summarizeAllSessions,
  summarizeSession,
} from '../../src/renderers/index.js';
import { MEMORY_DATABASE, SqliteCacheStore } from '../../src/storage/index.js';
import type { Session, SocialHit } from '../../src/types/index.js';
import { createMockLogger } from '../helpers.js';

const socialHit = (id: number, handle: string, likes: number, reposts: number, replies: number, followers: number): SocialHit => ({
  url: `https://twitter.com/${handle}/status/${id}`,
  snippet: `Post by ${handle}`,
  screenName: handle,
  followersCount: followers,
  favoriteCount: likes,
  retweetCount: reposts,
  replyCount: replies,
  quoteCount: 9,
  postedAt: null,
});

describe('renderers', () => {
  let store: SqliteCacheStore;
  let session: Session;

  beforeEach(() => {
    store = new SqliteCacheStore({ path: MEMORY_DATABASE, logger: createMockLogger() });
    session = store.createSession({
      sessionName: 'Launch week',
      topic: 'meeting notes',
      productName: 'NoteFlow',
      productDescription: 'A note-taking app',
    });
    store.saveResearchRecords(session.id, [{ url: 'http://a', snippet: 'T1' }], '{"search_results":[]}');
    store.saveDistillation(
      session.id,
      { distilled_topics: ['Topic A', 'Topic B'], talking_points: ['Point'] },
      'raw distillation'
    );
    store.saveComposedPosts(session.id, [
      { topic: 'Topic A', postBody: 'Post A', rawResponse: 'raw A' },
      { topic: 'Topic B', postBody: '#Error: boom', rawResponse: null },
    ]);
  });

  afterEach(() => {
    store.close();
  });

  describe('summarizeSession', () => {
    it('collects counts, the latest distillation and posts', () => {
      const summary = summarizeSession(store, session.id);

      expect(summary?.counts).toEqual({ research: 1, social: 0, distillations: 1, posts: 2 });
      expect(summary?.latestDistillation?.distilledTopics).toEqual(['Topic A', 'Topic B']);
      expect(summary?.failedPosts).toBe(1);
    });

    it('returns null for an unknown session', () => {
      expect(summarizeSession(store, 999)).toBeNull();
    });
  });

  describe('renderSessionMarkdown', () => {
    it('renders the full report', () => {
      const summary = summarizeSession(store, session.id);
      if (!summary) throw new Error('expected a summary');

      expect(renderSessionMarkdown(summary)).toBe(
        [
          '# Launch week',
          '',
          `- Session ID: ${session.id}`,
          `- Created: ${session.createdAt}`,
          '- Topic: meeting notes',
          '- Product: NoteFlow: A note-taking app',
          '',
          '## Records',
          '',
          '- Research results: 1',
          '- Social results: 0',
          '- Distillations: 1',
          '- Posts: 2 (1 failed)',
          '',
          '## Topics',
          '',
          '1. Topic A',
          '2. Topic B',
          '',
          '## Talking points',
          '',
          '- Point',
          '',
          '## Posts',
          '',
          '### 1. Topic A',
          '',
          'Post A',
          '',
          '### 2. Topic B',
          '',
          '#Error: boom',
        ].join('\n') + '\n'
      );
    });

    it('omits empty sections', () => {
      const bare = store.createSession({
        sessionName: 'Empty',
        topic: 't',
        productName: 'p',
        productDescription: 'd',
      });
      const summary = summarizeSession(store, bare.id);
      if (!summary) throw new Error('expected a summary');

      const markdown = renderSessionMarkdown(summary);
      expect(markdown.endsWith('- Posts: 0 (0 failed)\n')).toBe(true);
    });
  });

  describe('renderSessionList', () => {
    it('prints one tab-separated line per session', () => {
      expect(renderSessionList([session])).toBe(`${session.id}\t${session.createdAt}\tLaunch week\tmeeting notes\n`);
    });

    it('reports an empty store', () => {
      expect(renderSessionList([])).toBe('No sessions found.\n');
    });
  });

  describe('exportSession', () => {
    const now = () => new Date('2025-03-01T12:00:00.000Z');

    it('exports every collection with raw responses', () => {
      const data = exportSession(store, session.id, { now });

      expect(data?.exportedAt).toBe('2025-03-01T12:00:00.000Z');
      expect(data?.session).toEqual(session);
      expect(data?.research.map((r) => r.rawResponse)).toEqual(['{"search_results":[]}']);
      expect(data?.social).toEqual([]);
      expect(data?.distillation?.rawResponse).toBe('raw distillation');
      expect(data?.posts.map((p) => p.rawResponse)).toEqual(['raw A', null]);
    });

    it('drops raw responses on request', () => {
      const data = exportSession(store, session.id, { includeRawResponses: false, now });

      expect(data?.research[0]?.rawResponse).toBeNull();
      expect(data?.distillation?.rawResponse).toBeNull();
      expect(data?.distillation?.distilledTopics).toEqual(['Topic A', 'Topic B']);
      expect(data?.posts.map((p) => p.rawResponse)).toEqual([null, null]);
    });

    it('returns null for an unknown session', () => {
      expect(exportSession(store, 999)).toBeNull();
    });
  });

  describe('exportAllSessions', () => {
    it('exports every session newest first with one timestamp', () => {
      const second = store.createSession({
        sessionName: 'Second',
        topic: 'standups',
        productName: 'NoteFlow',
        productDescription: 'A note-taking app',
      });

      const data = exportAllSessions(store, { now: () => new Date('2025-03-01T12:00:00.000Z') });

      expect(data.exportedAt).toBe('2025-03-01T12:00:00.000Z');
      expect(data.sessions.map((s) => s.session.id)).toEqual([second.id, session.id]);
      expect(data.sessions.map((s) => s.exportedAt)).toEqual(['2025-03-01T12:00:00.000Z', '2025-03-01T12:00:00.000Z']);
      expect(data.sessions[1]?.posts).toHaveLength(2);
    });
  });

  describe('exportSessionCsv', () => {
    it('writes one document per non-empty collection', () => {
      const [research] = store.getResearchRecords(session.id);
      const posts = store.getComposedPosts(session.id);
      const distillation = store.getLatestDistillation(session.id);
      if (!research || !distillation || posts.length !== 2) throw new Error('expected seeded rows');

      const documents = exportSessionCsv(store, session.id);

      expect(Object.keys(documents ?? {}).sort()).toEqual(['distillations', 'posts', 'research']);
      expect(documents?.research).toBe(
        'id,session_id,url,snippet,created_at,raw_response\n' +
          `${research.id},${session.id},http://a,T1,${research.createdAt},"{""search_results"":[]}"\n`
      );
      expect(documents?.distillations).toBe(
        'id,session_id,distilled_topics,talking_points,created_at,raw_response\n' +
          `${distillation.id},${session.id},Topic A | Topic B,Point,${distillation.createdAt},raw distillation\n`
      );
      expect(documents?.posts).toBe(
        'id,session_id,topic,post_body,created_at,raw_response\n' +
          `${posts[0]?.id},${session.id},Topic A,Post A,${posts[0]?.createdAt},raw A\n` +
          `${posts[1]?.id},${session.id},Topic B,#Error: boom,${posts[1]?.createdAt},\n`
      );
    });

    it('quotes cells holding commas, quotes or line breaks', () => {
      const other = store.createSession({ sessionName: 'CSV', topic: 't', productName: 'p', productDescription: 'd' });
      const [post] = store.saveComposedPosts(other.id, [
        { topic: 'Notes, fast', postBody: 'Line one\nSay "hi"', rawResponse: null },
      ]);
      if (!post) throw new Error('expected a saved post');

      expect(exportSessionCsv(store, other.id)).toEqual({
        posts:
          'id,session_id,topic,post_body,created_at,raw_response\n' +
          `${post.id},${other.id},"Notes, fast","Line one\nSay ""hi""",${post.createdAt},\n`,
      });
    });

    it('leaves the raw column empty on request', () => {
      const documents = exportSessionCsv(store, session.id, { includeRawResponses: false });

      expect(documents?.posts?.split('\n')[1]?.endsWith(',')).toBe(true);
      expect(documents?.research?.includes('search_results')).toBe(false);
    });

    it('returns null for an unknown session', () => {
      expect(exportSessionCsv(store, 999)).toBeNull();
    });
  });

  describe('analytics', () => {
    beforeEach(() => {
      store.saveSocialRecords(
        session.id,
        [
          socialHit(1, 'alice', 3, 1, 2, 1200),
          socialHit(2, 'bob', 10, 0, 0, 50),
          socialHit(3, 'carol', 0, 0, 0, 5),
          socialHit(4, 'dave', 1, 1, 1, 7),
          socialHit(5, 'erin', 4, 0, 0, 9),
          socialHit(6, 'frank', 0, 2, 0, 11),
        ],
        null
      );
      store.saveComposedPosts(session.id, [{ topic: 'Topic C', postBody: 'x'.repeat(150), rawResponse: null }]);
    });

    it('sums likes, reposts and replies and ranks the top five', () => {
      const analysis = analyzeEngagement(store, session.id);

      expect(analysis?.postCount).toBe(6);
      expect(analysis?.totalEngagement).toBe(25);
      expect(analysis?.averageEngagement).toBeCloseTo(25 / 6);
      expect(analysis?.topPosts.map((p) => [p.screenName, p.engagement])).toEqual([
        ['bob', 10],
        ['alice', 6],
        ['erin', 4],
        ['dave', 3],
        ['frank', 2],
      ]);
      expect(analysis?.points[0]).toEqual({
        url: 'https://twitter.com/alice/status/1',
        screenName: 'alice',
        followersCount: 1200,
        engagement: 6,
      });
    });

    it('buckets post lengths and leaves out failed posts', () => {
      expect(analyzePostLengths(store, session.id)).toEqual({
        lengths: [6, 150],
        min: 6,
        max: 150,
        average: 78,
        buckets: [
          { from: 0, to: 99, count: 1 },
          { from: 100, to: 199, count: 1 },
        ],
        failed: 1,
      });
    });

    it('renders both analyses', () => {
      const engagement = analyzeEngagement(store, session.id);
      const lengths = analyzePostLengths(store, session.id);
      if (!engagement || !lengths) throw new Error('expected analyses');

      expect(renderAnalytics(engagement, lengths)).toBe(
        [
          '## Social engagement',
          '',
          '- Posts: 6',
          '- Total engagement: 25',
          '- Average engagement: 4.2',
          '',
          '### Most engaged',
          '',
          '1. @bob: 10 (50 followers) https://twitter.com/bob/status/2',
          '2. @alice: 6 (1200 followers) https://twitter.com/alice/status/1',
          '3. @erin: 4 (9 followers) https://twitter.com/erin/status/5',
          '4. @dave: 3 (7 followers) https://twitter.com/dave/status/4',
          '5. @frank: 2 (11 followers) https://twitter.com/frank/status/6',
          '',
          '## Post lengths',
          '',
          '- Posts: 2 (1 failed)',
          '- Min: 6',
          '- Max: 150',
          '- Average: 78',
          '',
          '- 0-99: 1',
          '- 100-199: 1',
        ].join('\n') + '\n'
      );
    });

    it('returns null for an unknown session', () => {
      expect(analyzeEngagement(store, 999)).toBeNull();
      expect(analyzePostLengths(store, 999)).toBeNull();
    });
  });

  describe('summarizeAllSessions', () => {
    it('totals every collection across sessions', () => {
      const second = store.createSession({ sessionName: 'Second', topic: 't', productName: 'p', productDescription: 'd' });

      const overview = summarizeAllSessions(store);

      expect(overview.totals).toEqual({ sessions: 2, research: 1, social: 0, distillations: 1, posts: 2 });
      expect(overview.perSession.map((entry) => [entry.session.id, entry.counts.posts])).toEqual([
        [second.id, 0],
        [session.id, 2],
      ]);
      expect(overview.sessionsPerDay.reduce((sum, day) => sum + day.count, 0)).toBe(2);
    });

    it('renders the overview', () => {
      expect(
        renderOverview({
          totals: { sessions: 3, research: 4, social: 5, distillations: 2, posts: 6 },
          sessionsPerDay: [
            { date: '2025-02-28', count: 1 },
            { date: '2025-03-01', count: 2 },
          ],
          perSession: [],
        })
      ).toBe(
        [
          '# Cache overview',
          '',
          '- Sessions: 3',
          '- Research results: 4',
          '- Social results: 5',
          '- Distillations: 2',
          '- Posts: 6',
          '',
          '## Sessions per day',
          '',
          '- 2025-02-28: 1',
          '- 2025-03-01: 2',
        ].join('\n') + '\n'
      );
    });
  });
});
