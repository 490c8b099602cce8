/**
 * Unit Tests for the pipeline orchestrator
 *
 * Providers are in-process fakes; the cache is an in-memory SQLite store.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ZodError } from 'zod';
import { SessionNotFoundError, defaultSessionName, runPipeline, type PipelineInput } from '../../src/pipeline/index.js';
import { ConfigurationError } from '../../src/config/index.js';
import { providerFailure, providerSuccess } from '../../src/http/index.js';
import type { ResearchSearchOutput } from '../../src/research/index.js';
import type { SocialSearchOutput } from '../../src/social/index.js';
import type { CreateDraftRequest, Draft, PublishingClient } from '../../src/publishing/index.js';
import { MEMORY_DATABASE, SqliteCacheStore } from '../../src/storage/index.js';
import type { ProviderFailure, ProviderResult, ResearchHit, SocialHit } from '../../src/types/index.js';
import { ScriptedGenerator, createMockLogger, createMockMetrics } from '../helpers.js';

// ============================================================================
// Fakes
// ============================================================================

const researchHit: ResearchHit = { url: 'http://a', snippet: 'T1' };

const socialHit: SocialHit = {
  url: 'https://twitter.com/alice/status/101',
  snippet: 'Meeting notes always get lost',
  screenName: 'alice',
  followersCount: 1200,
  favoriteCount: 3,
  retweetCount: 1,
  replyCount: 0,
  quoteCount: 0,
  postedAt: null,
};

function fakeResearch(outcome: ResearchHit[] | ProviderFailure) {
  const search = jest.fn(async (_topic: string): Promise<ProviderResult<ResearchSearchOutput>> =>
    Array.isArray(outcome)
      ? providerSuccess('perplexity', Date.now(), { records: outcome, rawResponse: '{"search_results":[]}' })
      : providerFailure('perplexity', Date.now(), outcome)
  );
  return { client: { search }, search };
}

function fakeSocial(outcome: SocialHit[] | ProviderFailure) {
  const search = jest.fn(async (_query: string): Promise<ProviderResult<SocialSearchOutput>> =>
    Array.isArray(outcome)
      ? providerSuccess('rapidapi_twitter', Date.now(), { records: outcome, rawResponse: '{}' })
      : providerFailure('rapidapi_twitter', Date.now(), outcome)
  );
  return { client: { search }, search };
}

const DISTILL_REPLY = '```json\n{"distilled_topics":["Topic A","Topic B"],"talking_points":["Point"]}\n```';

/**
 * Answers distillation prompts with DISTILL_REPLY and composition prompts with
 * a post naming the topic
 */
function scriptedModel(): ScriptedGenerator {
  return new ScriptedGenerator((prompt) => {
    if (prompt.startsWith('You are an expert content reviewer')) return DISTILL_REPLY;
    const topic = /following topic: "([^"]+)"/.exec(prompt)?.[1] ?? 'unknown';
    return `**LinkedIn Post:**\nPost about ${topic} #notes`;
  });
}

const baseInput: PipelineInput = {
  topic: 'meeting notes',
  product: { name: 'NoteFlow', description: 'A note-taking app for teams' },
};

// ============================================================================
// Tests
// ============================================================================

describe('defaultSessionName', () => {
  it('formats the local time', () => {
    expect(defaultSessionName(new Date(2025, 2, 1, 9, 5, 7))).toBe('Content Generation - 2025-03-01 09:05:07');
  });
});

describe('runPipeline', () => {
  let store: SqliteCacheStore;

  beforeEach(() => {
    store = new SqliteCacheStore({ path: MEMORY_DATABASE, logger: createMockLogger() });
  });

  afterEach(() => {
    store.close();
  });

  const deps = (overrides: Partial<Parameters<typeof runPipeline>[1]> = {}): Parameters<typeof runPipeline>[1] => ({
    store,
    generator: scriptedModel(),
    researchClient: fakeResearch([researchHit]).client,
    socialClient: fakeSocial([socialHit]).client,
    logger: createMockLogger(),
    ...overrides,
  });

  it('runs every stage on a fresh store', async () => {
    const generator = scriptedModel();
    const metrics = createMockMetrics();

    const outcome = await runPipeline(baseInput, deps({ generator, metrics }));

    expect(outcome.status).toBe('completed');
    expect(outcome.reusedSession).toBe(false);
    expect(outcome.session.topic).toBe('meeting notes');
    expect(outcome.stages).toEqual([
      { stage: 'research', skipped: false, fromCache: false, count: 1 },
      { stage: 'social', skipped: false, fromCache: false, count: 1 },
      { stage: 'distillation', skipped: false, fromCache: false, count: 2 },
      { stage: 'composition', skipped: false, fromCache: false, count: 2 },
    ]);
    expect(outcome.distillation).toEqual({ distilled_topics: ['Topic A', 'Topic B'], talking_points: ['Point'] });
    expect(outcome.posts.map((p) => p.postBody)).toEqual(['Post about Topic A #notes', 'Post about Topic B #notes']);
    expect(generator.prompts).toHaveLength(3);
    expect(generator.prompts[0]).toContain('Result 1: URL: http://a, Snippet: T1');
    expect(store.countRecords(outcome.session.id)).toEqual({ research: 1, social: 1, distillations: 1, posts: 2 });
    expect(metrics.calls.increment).toContainEqual(['pipeline.runs', 1, { status: 'completed' }]);
  });

  it('serves a second run entirely from the cache', async () => {
    const first = await runPipeline(baseInput, deps());

    const research = fakeResearch([researchHit]);
    const social = fakeSocial([socialHit]);
    const generator = new ScriptedGenerator([]);
    const second = await runPipeline(
      baseInput,
      deps({ generator, researchClient: research.client, socialClient: social.client })
    );

    expect(second.session.id).toBe(first.session.id);
    expect(second.reusedSession).toBe(true);
    expect(second.status).toBe('completed');
    expect(second.stages.every((s) => s.fromCache)).toBe(true);
    expect(research.search).not.toHaveBeenCalled();
    expect(social.search).not.toHaveBeenCalled();
    expect(generator.prompts).toEqual([]);
    expect(second.posts.map((p) => p.id)).toEqual(first.posts.map((p) => p.id));
  });

  it('appends duplicate rows when a stage is refreshed', async () => {
    const first = await runPipeline(baseInput, deps());
    const research = fakeResearch([researchHit]);

    const second = await runPipeline({ ...baseInput, refresh: ['research'] }, deps({ researchClient: research.client }));

    expect(research.search).toHaveBeenCalledTimes(1);
    expect(second.stages[0]).toEqual({ stage: 'research', skipped: false, fromCache: false, count: 1 });
    expect(second.stages[1]?.fromCache).toBe(true);
    expect(store.countRecords(first.session.id).research).toBe(2);
    expect(store.getResearchRecords(first.session.id).map((r) => r.url)).toEqual(['http://a', 'http://a']);
  });

  it('uses the newest distillation after a refresh while keeping cached posts', async () => {
    const first = await runPipeline(baseInput, deps());
    const generator = new ScriptedGenerator(['{"distilled_topics":["Topic C"],"talking_points":[]}']);

    const second = await runPipeline({ ...baseInput, refresh: ['distillation'] }, deps({ generator }));

    expect(second.distillation?.distilled_topics).toEqual(['Topic C']);
    expect(store.getLatestDistillation(first.session.id)?.distilledTopics).toEqual(['Topic C']);
    expect(store.countRecords(first.session.id).distillations).toBe(2);
    expect(second.stages[3]).toEqual({ stage: 'composition', skipped: false, fromCache: true, count: 2 });
  });

  it('recomposes posts when composition is refreshed', async () => {
    const first = await runPipeline(baseInput, deps());

    const second = await runPipeline({ ...baseInput, refresh: ['composition'] }, deps());

    expect(second.posts).toHaveLength(2);
    expect(store.countRecords(first.session.id).posts).toBe(4);
  });

  it('stops with no_results when no provider returns records', async () => {
    const generator = new ScriptedGenerator([]);

    const outcome = await runPipeline(
      baseInput,
      deps({
        generator,
        researchClient: fakeResearch([]).client,
        socialClient: fakeSocial({ kind: 'network', message: 'Connection error.' }).client,
      })
    );

    expect(outcome.status).toBe('no_results');
    expect(outcome.posts).toEqual([]);
    expect(generator.prompts).toEqual([]);
    expect(store.hasResearchRecords(outcome.session.id)).toBe(false);
  });

  it('stops with no_topics and keeps reporting it until distillation is refreshed', async () => {
    const first = await runPipeline(baseInput, deps({ generator: new ScriptedGenerator(['Nothing to report.']) }));

    expect(first.status).toBe('no_topics');
    expect(store.getLatestDistillation(first.session.id)?.rawResponse).toBe('Nothing to report.');

    const again = await runPipeline(baseInput, deps({ generator: new ScriptedGenerator([]) }));
    expect(again.status).toBe('no_topics');
    expect(again.stages[2]?.fromCache).toBe(true);

    const refreshed = await runPipeline({ ...baseInput, refresh: ['distillation'] }, deps());
    expect(refreshed.status).toBe('completed');
  });

  it('stops with no_topics when the distillation call throws', async () => {
    const outcome = await runPipeline(baseInput, deps({ generator: new ScriptedGenerator([new Error('socket hang up')]) }));

    expect(outcome.status).toBe('no_topics');
    expect(outcome.posts).toEqual([]);
    expect(store.hasDistillation(outcome.session.id)).toBe(false);
  });

  it('keeps composing after a topic fails', async () => {
    let composeCalls = 0;
    const generator = new ScriptedGenerator((prompt) => {
      if (prompt.startsWith('You are an expert content reviewer')) return DISTILL_REPLY;
      composeCalls++;
      return composeCalls === 1 ? new Error('Upstream exploded') : '**LinkedIn Post:**\nRecovered post';
    });

    const outcome = await runPipeline(baseInput, deps({ generator }));

    expect(outcome.status).toBe('completed');
    expect(outcome.posts.map((p) => p.postBody)).toEqual(['#Error: Upstream exploded', 'Recovered post']);
  });

  it('skips disabled fetch stages', async () => {
    const social = fakeSocial([socialHit]);

    const outcome = await runPipeline(
      { ...baseInput, runResearch: false, socialQuery: 'lost meeting notes' },
      deps({ researchClient: undefined, socialClient: social.client })
    );

    expect(outcome.stages[0]).toEqual({ stage: 'research', skipped: true, fromCache: false, count: 0 });
    expect(social.search).toHaveBeenCalledWith('lost meeting notes');
    expect(outcome.status).toBe('completed');
  });

  it('searches social posts for the topic when no query is given', async () => {
    const social = fakeSocial([socialHit]);

    await runPipeline(baseInput, deps({ socialClient: social.client }));

    expect(social.search).toHaveBeenCalledWith('meeting notes');
  });

  it('requires a client for every enabled stage', async () => {
    await expect(runPipeline(baseInput, deps({ researchClient: undefined }))).rejects.toThrow(ConfigurationError);
    await expect(runPipeline({ ...baseInput, publish: true }, deps())).rejects.toThrow(/TYPEFULLY|Publishing/);
  });

  it('validates the input', async () => {
    await expect(runPipeline({ ...baseInput, topic: '  ' }, deps())).rejects.toThrow(ZodError);
  });

  describe('session selection', () => {
    it('replays an explicit session', async () => {
      const older = await runPipeline(baseInput, deps());
      await runPipeline({ ...baseInput, forceNewSession: true }, deps());

      const replay = await runPipeline({ ...baseInput, sessionId: older.session.id }, deps());

      expect(replay.session.id).toBe(older.session.id);
      expect(replay.stages.every((s) => s.fromCache)).toBe(true);
    });

    it('rejects an unknown session id', async () => {
      await expect(runPipeline({ ...baseInput, sessionId: 999 }, deps())).rejects.toThrow(SessionNotFoundError);
    });

    it('creates a new session when forced or when reuse is off', async () => {
      const first = await runPipeline(baseInput, deps());
      const forced = await runPipeline({ ...baseInput, forceNewSession: true }, deps());
      const noReuse = await runPipeline({ ...baseInput, reuseLatestSession: false }, deps());

      expect(new Set([first.session.id, forced.session.id, noReuse.session.id]).size).toBe(3);
      expect(forced.reusedSession).toBe(false);
      expect(store.getSessions()).toHaveLength(3);
    });

    it('names new sessions after the run time', async () => {
      const outcome = await runPipeline(baseInput, deps({ now: () => new Date(2025, 0, 2, 3, 4, 5) }));
      expect(outcome.session.sessionName).toBe('Content Generation - 2025-01-02 03:04:05');
    });
  });

  describe('publishing', () => {
    it('creates a draft per post when requested', async () => {
      const createDraft = jest.fn(
        async (request: CreateDraftRequest): Promise<ProviderResult<Draft>> =>
          providerSuccess('typefully', Date.now(), {
            id: `d-${request.content.length}`,
            status: 'draft',
            shareUrl: null,
            text: request.content,
            scheduledDate: request.scheduleDate ?? null,
            publishedOn: null,
          })
      );
      const publishingClient: PublishingClient = {
        createDraft,
        getRecentlyScheduledDrafts: async () => providerSuccess('typefully', Date.now(), []),
        getRecentlyPublishedDrafts: async () => providerSuccess('typefully', Date.now(), []),
      };

      const outcome = await runPipeline(
        { ...baseInput, publish: true },
        deps({ publishingClient, publishOptions: { scheduleIntervalMinutes: 0 } })
      );

      expect(outcome.publishReports.map((r) => r.status)).toEqual(['created', 'created']);
      expect(createDraft.mock.calls.map(([request]) => request.content)).toEqual([
        'Post about Topic A #notes',
        'Post about Topic B #notes',
      ]);
    });
  });
});
