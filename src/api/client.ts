import { systemClock, type Clock } from '../clock.js';
import { readKeyOrder } from './key-order.js';
import { describeApiError, isRecord } from './types.js';
import type { ApiError, ApiPayload, ApiResult, TornSection } from './types.js';

export const TORN_API_BASE = 'https://api.torn.com';

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface TornApiClientOptions {
  apiKey: string;
  minIntervalMs: number;
  baseUrl?: string;
  clock?: Clock;
  fetchImpl?: FetchLike;
}

/**
 * Read-only Torn API access behind one global throttle.
 *
 * Every request from every caller goes through the same queue, so the gap
 * between two sent requests is never shorter than `minIntervalMs`, no matter
 * which section they hit or how many callers are waiting.
 */
export class TornApiClient {
  private readonly apiKey: string;
  private readonly minIntervalMs: number;
  private readonly baseUrl: string;
  private readonly clock: Clock;
  private readonly fetchImpl: FetchLike;

  private lastRequestAt: number | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: TornApiClientOptions) {
    this.apiKey = options.apiKey;
    this.minIntervalMs = options.minIntervalMs;
    this.baseUrl = options.baseUrl ?? TORN_API_BASE;
    this.clock = options.clock ?? systemClock;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /** Timestamp of the last request that was actually sent, or null before the first. */
  get lastRequestTime(): number | null {
    return this.lastRequestAt;
  }

  fetch(
    section: TornSection,
    fields: Iterable<string>,
    entityId?: string | number,
    signal?: AbortSignal
  ): Promise<ApiResult<ApiPayload>> {
    const run = this.queue.then(() => this.send(section, fields, entityId, signal));
    this.queue = run.catch(() => undefined);
    return run;
  }

  user(fields: Iterable<string>, userId?: string | number, signal?: AbortSignal): Promise<ApiResult<ApiPayload>> {
    return this.fetch('user', fields, userId, signal);
  }

  torn(fields: Iterable<string>, signal?: AbortSignal): Promise<ApiResult<ApiPayload>> {
    return this.fetch('torn', fields, undefined, signal);
  }

  buildUrl(section: TornSection, fields: Iterable<string>, entityId?: string | number): string {
    const selections = [...new Set(fields)].sort().map(encodeURIComponent).join(',');
    const target = entityId === undefined || entityId === '' ? section : `${section}/${encodeURIComponent(String(entityId))}`;
    return `${this.baseUrl}/${target}?key=${encodeURIComponent(this.apiKey)}&selections=${selections}`;
  }

  private async send(
    section: TornSection,
    fields: Iterable<string>,
    entityId: string | number | undefined,
    signal: AbortSignal | undefined
  ): Promise<ApiResult<ApiPayload>> {
    if (this.lastRequestAt !== null) {
      const wait = this.minIntervalMs - (this.clock.now() - this.lastRequestAt);
      if (wait > 0) {
        console.log(`[TornAPI] Rate limiting: sleeping for ${(wait / 1000).toFixed(2)}s`);
        await this.clock.sleep(wait, signal);
      }
    }

    if (signal?.aborted) {
      return this.fail({ kind: 'transport', detail: 'request aborted' });
    }

    const url = this.buildUrl(section, fields, entityId);
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal });
    } catch (error) {
      this.lastRequestAt = this.clock.now();
      const detail = error instanceof Error ? error.message : String(error);
      return this.fail({ kind: 'transport', detail });
    }
    this.lastRequestAt = this.clock.now();

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return this.fail({ kind: 'transport', detail: `unreadable response body: ${detail}` });
    }

    if (!response.ok) {
      return this.fail({ kind: 'http', code: response.status, body });
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      return this.fail({ kind: 'transport', detail: 'response was not valid JSON' });
    }
    if (!isRecord(data)) {
      return this.fail({ kind: 'transport', detail: 'response was not a JSON object' });
    }

    if (isRecord(data.error)) {
      const code = typeof data.error.code === 'number' ? data.error.code : -1;
      const message = typeof data.error.error === 'string' ? data.error.error : 'unknown error';
      return this.fail({ kind: 'api_rejected', code, message });
    }

    return { ok: true, data, keyOrder: readKeyOrder(body) };
  }

  private fail(error: ApiError): ApiResult<ApiPayload> {
    console.warn(`[TornAPI] ${describeApiError(error)}`);
    return { ok: false, error };
  }
}
