/**
 * Shared test doubles: recording logger/metrics, a scripted text generator and
 * an in-process axios adapter.
 */

import { AxiosError, AxiosHeaders, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import type { GeneratedText, TextGenerator } from '../src/llm/index.js';
import type { Logger, Metrics } from '../src/logging/index.js';
import type { ProviderFailure, ProviderResult } from '../src/types/index.js';

// ============================================================================
// Logger / metrics
// ============================================================================

type LogCall = [string, Record<string, unknown> | undefined];
type LogCalls = Record<'info' | 'warn' | 'error' | 'debug', LogCall[]>;

export function createMockLogger(): Logger & { calls: LogCalls } {
  const calls: LogCalls = { info: [], warn: [], error: [], debug: [] };
  return {
    calls,
    info: (message, meta) => { calls.info.push([message, meta]); },
    warn: (message, meta) => { calls.warn.push([message, meta]); },
    error: (message, meta) => { calls.error.push([message, meta]); },
    debug: (message, meta) => { calls.debug.push([message, meta]); },
  };
}

type MetricCall = [string, number | undefined, Record<string, string> | undefined];

export function createMockMetrics(): Metrics & { calls: Record<'increment' | 'gauge' | 'timing', MetricCall[]> } {
  const calls: Record<'increment' | 'gauge' | 'timing', MetricCall[]> = { increment: [], gauge: [], timing: [] };
  return {
    calls,
    increment: (metric, value, tags) => { calls.increment.push([metric, value, tags]); },
    gauge: (metric, value, tags) => { calls.gauge.push([metric, value, tags]); },
    timing: (metric, value, tags) => { calls.timing.push([metric, value, tags]); },
  };
}

// ============================================================================
// Text generator
// ============================================================================

/** A reply text, a failure to return, or an error to throw */
export type ScriptedReply = string | ProviderFailure | Error;

const TEST_METADATA = { provider: 'test', timestamp: '2025-01-01T00:00:00.000Z', duration: 0 };

export class ScriptedGenerator implements TextGenerator {
  readonly model = 'test-model';
  readonly prompts: string[] = [];
  private readonly queue: ScriptedReply[];
  private readonly responder: ((prompt: string) => ScriptedReply) | null;

  constructor(replies: ScriptedReply[] | ((prompt: string) => ScriptedReply)) {
    this.queue = Array.isArray(replies) ? [...replies] : [];
    this.responder = Array.isArray(replies) ? null : replies;
  }

  async generate(prompt: string): Promise<ProviderResult<GeneratedText>> {
    this.prompts.push(prompt);
    const reply = this.responder ? this.responder(prompt) : this.queue.shift();
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === 'string') {
      return { success: true, data: { text: reply, model: this.model, usage: null }, metadata: TEST_METADATA };
    }
    return { success: false, error: reply, metadata: TEST_METADATA };
  }
}

// ============================================================================
// HTTP
// ============================================================================

export interface StubResponse {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
  /** Reject as a transport failure instead of answering */
  networkError?: string;
}

export type StubAdapter = AxiosAdapter & { requests: InternalAxiosRequestConfig[] };

/**
 * Serve requests from a list of canned responses, in order. The last
 * response is repeated once the list runs out.
 */
export function stubAdapter(responses: StubResponse[]): StubAdapter {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    requests.push(config);
    const stub = responses[Math.min(requests.length, responses.length) - 1];
    if (!stub) {
      throw new Error('stubAdapter needs at least one response');
    }
    if (stub.networkError) {
      throw new AxiosError(stub.networkError, 'ECONNREFUSED', config);
    }
    return {
      data: stub.data,
      status: stub.status,
      statusText: String(stub.status),
      headers: new AxiosHeaders(stub.headers ?? {}),
      config,
    };
  };
  return Object.assign(adapter, { requests });
}

/**
 * Parsed JSON body of a captured request
 */
export function requestBody(config: InternalAxiosRequestConfig | undefined): unknown {
  const data: unknown = config?.data;
  return typeof data === 'string' ? JSON.parse(data) : data;
}
