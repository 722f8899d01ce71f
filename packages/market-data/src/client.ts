// JSON-over-HTTP client with caching, rate limiting and schema validation
// Shared by the NewsAPI and FMP clients

import type { z } from 'zod';

export type QueryValue = string | number | boolean | undefined;

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly retryable: boolean,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export interface JsonClientConfig {
  /** Label used in error messages, e.g. 'NewsAPI' */
  provider: string;
  baseUrl: string;
  apiKey: string;
  /** Query parameter that carries the key (default: 'apikey') */
  authParam?: string;
  /** Requests per minute (default: 300) */
  rateLimitPerMinute?: number;
  /** Seconds (default: 300) */
  defaultCacheTtl?: number;
  /** Milliseconds (default: 10s) */
  timeoutMs?: number;
  /** Entries kept before expired ones are swept (default: 1000) */
  maxCacheEntries?: number;
}

export interface JsonRequestOptions {
  cacheTtl?: number; // seconds, 0 to skip cache
  signal?: AbortSignal;
}

export interface JsonClient {
  readonly provider: string;
  get<S extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, QueryValue>,
    schema: S,
    options?: JsonRequestOptions,
  ): Promise<z.output<S>>;
}

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

/** Cache TTL presets by data type */
export const CacheTTL = {
  REALTIME: 30,       // quotes
  SHORT: 300,         // headlines
  MEDIUM: 3600,
  LONG: 86400,        // profiles
} as const;

export function createJsonClient(config: JsonClientConfig): JsonClient {
  const {
    provider,
    apiKey,
    authParam = 'apikey',
    rateLimitPerMinute = 300,
    defaultCacheTtl = CacheTTL.SHORT,
    timeoutMs = 10_000,
    maxCacheEntries = 1000,
  } = config;
  const baseUrl = config.baseUrl.endsWith('/') ? config.baseUrl : config.baseUrl + '/';

  const cache = new Map<string, CacheEntry>();
  let requestTimestamps: number[] = [];

  function isRateLimited(): boolean {
    const now = Date.now();
    requestTimestamps = requestTimestamps.filter(t => now - t < 60_000);
    return requestTimestamps.length >= rateLimitPerMinute;
  }

  function getCached(key: string): unknown {
    const entry = cache.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      cache.delete(key);
      return undefined;
    }
    return entry.data;
  }

  function setCache(key: string, data: unknown, ttlSeconds: number): void {
    cache.set(key, { data, expiresAt: Date.now() + ttlSeconds * 1000 });
    if (cache.size > maxCacheEntries) {
      const now = Date.now();
      for (const [k, v] of cache) {
        if (now > v.expiresAt) cache.delete(k);
      }
    }
  }

  function validate<S extends z.ZodTypeAny>(data: unknown, schema: S, endpoint: string): z.output<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join('.') || '(root)';
      throw new ProviderError(
        `${provider}: unexpected response shape from ${endpoint} at ${where}: ${issue?.message ?? 'invalid'}`,
        provider,
        false,
      );
    }
    return parsed.data;
  }

  async function get<S extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, QueryValue>,
    schema: S,
    options: JsonRequestOptions = {},
  ): Promise<z.output<S>> {
    if (!apiKey) {
      throw new ProviderError(`${provider}: API key is not configured`, provider, false);
    }

    const url = new URL(endpoint, baseUrl);
    url.searchParams.set(authParam, apiKey);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }

    const cacheKey = url.toString();
    const ttl = options.cacheTtl ?? defaultCacheTtl;
    if (ttl > 0) {
      const cached = getCached(cacheKey);
      if (cached !== undefined) return validate(cached, schema, endpoint);
    }

    if (isRateLimited()) {
      throw new ProviderError(
        `${provider}: rate limit exceeded (${rateLimitPerMinute} req/min). Try again shortly.`,
        provider,
        true,
      );
    }

    requestTimestamps.push(Date.now());

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const onCallerAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    let res: Response;
    try {
      res = await fetch(url.toString(), {
        headers: { 'Accept': 'application/json' },
        signal: controller.signal,
      });
    } catch (err) {
      const aborted = controller.signal.aborted;
      throw new ProviderError(
        aborted
          ? `${provider}: request to ${endpoint} timed out or was cancelled`
          : `${provider}: network error — ${err instanceof Error ? err.message : String(err)}`,
        provider,
        true,
      );
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      const retryable = RETRYABLE_STATUSES.has(res.status);
      if (res.status === 401) throw new ProviderError(`${provider}: Invalid API key`, provider, false, 401);
      if (res.status === 403) throw new ProviderError(`${provider}: Endpoint not available on your plan`, provider, false, 403);
      if (res.status === 429) throw new ProviderError(`${provider}: Rate limited by server`, provider, true, 429);
      throw new ProviderError(`${provider}: HTTP ${res.status} — ${body.slice(0, 200)}`, provider, retryable, res.status);
    }

    const data: unknown = await res.json();
    const result = validate(data, schema, endpoint);

    if (ttl > 0) setCache(cacheKey, data, ttl);

    return result;
  }

  return { provider, get };
}
