/**
 * DealScout — HTTP Transport
 *
 * Thin wrappers over global fetch. Nothing here throws: transport failures
 * and unparseable bodies come back as values so sources can skip and log.
 */

import type { z } from 'zod';

// ============================================================
// TYPES
// ============================================================

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/**
 * A completed response (any status) or a transport failure
 * (DNS, connection reset, timeout).
 */
export type HttpOutcome =
  | { kind: 'response'; status: number; body: string }
  | { kind: 'failure'; reason: string };

export interface HttpGetOptions {
  timeoutMs: number;
  userAgent: string;
  headers?: Record<string, string>;
  params?: Record<string, string | number>;
}

// ============================================================
// REQUESTS
// ============================================================

/**
 * Append query params to a URL. URLs without params pass through untouched,
 * so pre-encoded feed URLs keep their exact form.
 */
export function buildUrl(url: string, params?: Record<string, string | number>): string {
  if (!params || Object.keys(params).length === 0) return url;

  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

/**
 * GET a URL and read the body as text.
 */
export async function httpGet(url: string, options: HttpGetOptions): Promise<HttpOutcome> {
  try {
    const res = await fetch(buildUrl(url, options.params), {
      headers: {
        'User-Agent': options.userAgent,
        ...options.headers,
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    const body = await res.text();
    return { kind: 'response', status: res.status, body };
  } catch (error) {
    return {
      kind: 'failure',
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Parse a JSON body and validate its shape.
 */
export function parseJson<S extends z.ZodTypeAny>(body: string, schema: S): Result<z.infer<S>> {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    return {
      ok: false,
      error: `Malformed JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
  }
  return { ok: true, value: parsed.data };
}

// ============================================================
// TIMING
// ============================================================

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Uniform random delay in [minMs, maxMs].
 */
export function jitteredDelay(minMs: number, maxMs: number, random: () => number = Math.random): number {
  return Math.floor(minMs + random() * (maxMs - minMs));
}
