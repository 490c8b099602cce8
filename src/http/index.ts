/**
 * HTTP plumbing shared by the provider clients
 *
 * Every client talks to its provider through an axios instance that never
 * throws on status codes; statuses and transport errors are mapped onto
 * ProviderFailure kinds here so callers branch on `kind`.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { ProviderFailure, ProviderResult } from '../types/index.js';

export const DEFAULT_RETRY_AFTER_SECONDS = 60;

export interface HttpClientOptions {
  baseURL: string;
  timeout: number;
  headers: Record<string, string>;
  /** Replaces the transport; used to serve requests in-process */
  adapter?: AxiosAdapter;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout,
    headers: {
      'Content-Type': 'application/json',
      ...options.headers,
    },
    validateStatus: () => true,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Seconds to wait from a Retry-After header (delta-seconds or HTTP date)
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
    return value;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}

function describeBody(body: unknown): string {
  if (typeof body === 'string') return body.slice(0, 200);
  if (isJsonObject(body)) {
    const detail = body['detail'] ?? body['message'] ?? body['error'];
    if (typeof detail === 'string') return detail;
    return JSON.stringify(body).slice(0, 200);
  }
  return '';
}

/**
 * Map a non-2xx response onto a failure
 */
export function failureFromStatus(
  status: number,
  body: unknown,
  retryAfterHeader?: unknown
): ProviderFailure {
  const detail = describeBody(body);
  const message = detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`;

  if (status === 401 || status === 403) {
    return { kind: 'auth', message, status };
  }
  if (status === 429) {
    return { kind: 'rate_limited', message, status, retryAfterSeconds: parseRetryAfter(retryAfterHeader) };
  }
  return { kind: 'upstream', message, status, details: body };
}

/**
 * Map a thrown error (transport failure, timeout) onto a failure
 */
export function failureFromError(error: unknown): ProviderFailure {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return failureFromStatus(error.response.status, error.response.data, error.response.headers['retry-after']);
    }
    return { kind: 'network', message: error.message, details: { code: error.code } };
  }
  return { kind: 'network', message: error instanceof Error ? error.message : String(error) };
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Result builders
// ============================================================================

export function providerSuccess<T>(provider: string, startedAt: number, data: T): ProviderResult<T> {
  return {
    success: true,
    data,
    metadata: { provider, timestamp: new Date().toISOString(), duration: Date.now() - startedAt },
  };
}

export function providerFailure<T>(provider: string, startedAt: number, error: ProviderFailure): ProviderResult<T> {
  return {
    success: false,
    error,
    metadata: { provider, timestamp: new Date().toISOString(), duration: Date.now() - startedAt },
  };
}

// ============================================================================
// Throttle
// ============================================================================

/**
 * Enforces a fixed minimum gap between consecutive calls to wait()
 */
export class MinIntervalThrottle {
  private lastCallAt: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly delay: (ms: number) => Promise<void> = sleep,
    private readonly clock: () => number = Date.now
  ) {}

  async wait(): Promise<void> {
    if (this.lastCallAt !== null) {
      const elapsed = this.clock() - this.lastCallAt;
      if (elapsed < this.intervalMs) {
        await this.delay(this.intervalMs - elapsed);
      }
    }
    this.lastCallAt = this.clock();
  }
}
