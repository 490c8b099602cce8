/**
 * Unit Tests for Distiller Module
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  buildDistillationPrompt,
  distillRecords,
  extractJsonObject,
  formatRecordsForPrompt,
  parseDistillation,
  stripCodeFence,
} from '../../src/distiller/index.js';
import { MEMORY_DATABASE, SqliteCacheStore } from '../../src/storage/index.js';
import type { ProductContext, SourceRecord } from '../../src/types/index.js';
import { ScriptedGenerator, createMockLogger } from '../helpers.js';

const product: ProductContext = { name: 'NoteFlow', description: 'A note-taking app for teams' };

const records: SourceRecord[] = [
  { url: 'http://a', snippet: 'T1' },
  {
    url: 'https://twitter.com/alice/status/101',
    snippet: 'Meeting notes get lost',
    screenName: 'alice',
    followersCount: 10,
    favoriteCount: 0,
    retweetCount: 0,
    replyCount: 0,
    quoteCount: 0,
    postedAt: null,
  },
];

describe('stripCodeFence', () => {
  it('removes a json fence', () => {
    expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('leaves unfenced text alone', () => {
    expect(stripCodeFence('  {"a":1}  ')).toBe('{"a":1}');
  });
});

describe('extractJsonObject', () => {
  it('recovers the object from a fenced reply', () => {
    const reply = '```json\n{"distilled_topics":["x"],"talking_points":["y"]}\n```';
    expect(extractJsonObject(reply)).toEqual({ distilled_topics: ['x'], talking_points: ['y'] });
  });

  it('ignores commentary around the object', () => {
    const reply = 'Here is the analysis:\n{"distilled_topics":["a"],"talking_points":[]}\nLet me know if you need more.';
    expect(extractJsonObject(reply)).toEqual({ distilled_topics: ['a'], talking_points: [] });
  });

  it('stops at the first balanced object', () => {
    expect(extractJsonObject('{"a":{"b":1}} trailing {"c":2}')).toEqual({ a: { b: 1 } });
  });

  it('does not count braces inside strings', () => {
    expect(extractJsonObject('{"distilled_topics":["use {curly} braces"],"talking_points":[]}')).toEqual({
      distilled_topics: ['use {curly} braces'],
      talking_points: [],
    });
  });

  it('returns null without a balanced valid object', () => {
    expect(extractJsonObject('no json here')).toBeNull();
    expect(extractJsonObject('{"distilled_topics": ["x"]')).toBeNull();
    expect(extractJsonObject("{distilled_topics: ['x']}")).toBeNull();
  });
});

describe('parseDistillation', () => {
  it('defaults missing lists to empty', () => {
    expect(parseDistillation('{"distilled_topics":["only topics"]}', createMockLogger())).toEqual({
      distilled_topics: ['only topics'],
      talking_points: [],
    });
  });

  it('logs the raw reply and returns the empty result when parsing fails', () => {
    const logger = createMockLogger();

    expect(parseDistillation('Sorry, I cannot help with that.', logger)).toEqual({
      distilled_topics: [],
      talking_points: [],
    });
    expect(logger.calls.warn[0]).toEqual([
      'No JSON object found in distillation reply',
      { raw: 'Sorry, I cannot help with that.' },
    ]);
  });

  it('rejects lists of the wrong type', () => {
    expect(parseDistillation('{"distilled_topics":"not a list"}', createMockLogger())).toEqual({
      distilled_topics: [],
      talking_points: [],
    });
  });
});

describe('prompt construction', () => {
  it('numbers the records', () => {
    expect(formatRecordsForPrompt(records)).toBe(
      'Result 1: URL: http://a, Snippet: T1\n' +
        'Result 2: URL: https://twitter.com/alice/status/101, Snippet: Meeting notes get lost'
    );
  });

  it('fills the template with records and product context', async () => {
    const prompt = await buildDistillationPrompt(records, { ...product, features: 'Offline sync\n' });

    expect(prompt).toContain('Result 1: URL: http://a, Snippet: T1');
    expect(prompt).toContain('"NoteFlow" is described as: "A note-taking app for teams".');
    expect(prompt).toContain('Key product features:\nOffline sync');
    expect(prompt).not.toContain('{{');
  });
});

describe('distillRecords', () => {
  let store: SqliteCacheStore;
  let sessionId: number;

  beforeEach(() => {
    store = new SqliteCacheStore({ path: MEMORY_DATABASE, logger: createMockLogger() });
    sessionId = store.createSession({
      sessionName: 'test',
      topic: 'notes',
      productName: product.name,
      productDescription: product.description,
    }).id;
  });

  afterEach(() => {
    store.close();
  });

  it('persists the parsed content with the raw reply', async () => {
    const reply = '```json\n{"distilled_topics":["x"],"talking_points":["y"]}\n```';
    const generator = new ScriptedGenerator([reply]);

    const outcome = await distillRecords({ sessionId, records, product, generator, store, logger: createMockLogger() });

    expect(outcome.content).toEqual({ distilled_topics: ['x'], talking_points: ['y'] });
    expect(outcome.saved?.rawResponse).toBe(reply);
    expect(store.getLatestDistillation(sessionId)?.distilledTopics).toEqual(['x']);
    expect(generator.prompts[0]).toContain('Result 2: URL: https://twitter.com/alice/status/101');
  });

  it('persists an empty result for an unparseable reply', async () => {
    const generator = new ScriptedGenerator(['I could not find anything useful.']);

    const outcome = await distillRecords({ sessionId, records, product, generator, store, logger: createMockLogger() });

    expect(outcome.content).toEqual({ distilled_topics: [], talking_points: [] });
    expect(store.getLatestDistillation(sessionId)?.rawResponse).toBe('I could not find anything useful.');
  });

  it('stores nothing when the model call fails', async () => {
    const generator = new ScriptedGenerator([{ kind: 'network', message: 'Connection error.' }]);

    const outcome = await distillRecords({ sessionId, records, product, generator, store, logger: createMockLogger() });

    expect(outcome.saved).toBeNull();
    expect(outcome.failure?.kind).toBe('network');
    expect(store.hasDistillation(sessionId)).toBe(false);
  });

  it('resolves with a failure when the generator throws', async () => {
    const generator = new ScriptedGenerator([new Error('socket hang up')]);

    const outcome = await distillRecords({ sessionId, records, product, generator, store, logger: createMockLogger() });

    expect(outcome).toEqual({
      content: { distilled_topics: [], talking_points: [] },
      saved: null,
      failure: { kind: 'network', message: 'socket hang up' },
    });
    expect(store.hasDistillation(sessionId)).toBe(false);
  });

  it('resolves with a failure when the result cannot be stored', async () => {
    const generator = new ScriptedGenerator(['{"distilled_topics":["x"]}']);
    const failingStore = {
      saveDistillation: () => {
        throw new Error('database is locked');
      },
    };

    const outcome = await distillRecords({
      sessionId,
      records,
      product,
      generator,
      store: failingStore,
      logger: createMockLogger(),
    });

    expect(outcome.saved).toBeNull();
    expect(outcome.failure).toEqual({ kind: 'network', message: 'database is locked' });
  });

  it('returns the empty result when the template cannot be read', async () => {
    const generator = new ScriptedGenerator(['{}']);

    const outcome = await distillRecords({
      sessionId,
      records,
      product,
      generator,
      store,
      logger: createMockLogger(),
      templatePath: '/nonexistent/template.md',
    });

    expect(outcome.content.distilled_topics).toEqual([]);
    expect(generator.prompts).toEqual([]);
  });
});
