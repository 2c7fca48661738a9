import type { KeyOrder } from './key-order.js';

// --- Torn API access types ---

export type TornSection = 'user' | 'property' | 'faction' | 'company' | 'market' | 'torn';

export type ApiError =
  | { kind: 'transport'; detail: string }
  | { kind: 'http'; code: number; body: string }
  | { kind: 'api_rejected'; code: number; message: string };

export type ApiResult<T> =
  | { ok: true; data: T; keyOrder?: KeyOrder }
  | { ok: false; error: ApiError };

/** Decoded JSON object as returned by the API. */
export type ApiPayload = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function describeApiError(error: ApiError): string {
  switch (error.kind) {
    case 'transport':
      return `transport failure: ${error.detail}`;
    case 'http':
      return `HTTP ${error.code}${error.body ? `: ${error.body.slice(0, 200)}` : ''}`;
    case 'api_rejected':
      return `API error ${error.code}: ${error.message}`;
  }
}
