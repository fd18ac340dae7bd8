import { createHash } from "node:crypto";
import { z } from "zod";
import type { HttpResponse, RequestOptions, Transport } from "./transport.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./errors.js";
import { ensureMcsshDir, getCacheFilePath } from "./paths.js";
import { readJsonFile, writeSecureFile } from "./utils/fs.js";

const CacheEntrySchema = z.object({
  url: z.string(),
  status: z.number().int(),
  body: z.string(),
  storedAt: z.number(),
  expiresAt: z.number()
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

const CacheFileSchema = z.record(CacheEntrySchema);

export interface CacheStore {
  get(key: string): CacheEntry | undefined;
  set(key: string, entry: CacheEntry): void;
  delete(key: string): void;
}

export interface TtlRule {
  pathSuffix: string;
  ttlSeconds: number;
}

// Provisioning state must never be served stale.
export const DEFAULT_TTL_RULES: TtlRule[] = [
  { pathSuffix: "/user/get_status", ttlSeconds: 0 },
  { pathSuffix: "/user/deploy", ttlSeconds: 0 }
];

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  set(key: string, entry: CacheEntry): void {
    this.entries.set(key, entry);
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

export class FileCacheStore implements CacheStore {
  private readonly path: string;
  private entries: Record<string, CacheEntry> | null = null;

  constructor(path: string = getCacheFilePath()) {
    this.path = path;
  }

  private load(): Record<string, CacheEntry> {
    if (this.entries) return this.entries;
    const parsed = CacheFileSchema.safeParse(readJsonFile(this.path) ?? {});
    this.entries = parsed.success ? parsed.data : {};
    return this.entries;
  }

  private persist(): void {
    ensureMcsshDir();
    writeSecureFile(this.path, JSON.stringify(this.load()));
  }

  get(key: string): CacheEntry | undefined {
    return this.load()[key];
  }

  set(key: string, entry: CacheEntry): void {
    this.load()[key] = entry;
    this.persist();
  }

  delete(key: string): void {
    delete this.load()[key];
    this.persist();
  }
}

export interface CachingTransportOptions {
  store: CacheStore;
  ttlSeconds: number;
  rules?: TtlRule[];
  logger: Logger;
  now?: () => number;
}

export function cacheKey(url: string, headers: Record<string, string> = {}): string {
  const authorization = headers.Authorization ?? headers.authorization ?? "";
  return createHash("sha256").update(`GET ${url}\n${authorization}`).digest("hex");
}

/**
 * Best-effort response cache in front of another transport. Only 200
 * responses are stored; a failing store is logged and bypassed.
 */
export class CachingTransport implements Transport {
  private readonly inner: Transport;
  private readonly store: CacheStore;
  private readonly ttlSeconds: number;
  private readonly rules: TtlRule[];
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(inner: Transport, options: CachingTransportOptions) {
    this.inner = inner;
    this.store = options.store;
    this.ttlSeconds = options.ttlSeconds;
    this.rules = options.rules ?? DEFAULT_TTL_RULES;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  ttlFor(url: string): number {
    let pathname: string;
    try {
      pathname = new URL(url).pathname.replace(/\/+$/, "");
    } catch {
      return 0;
    }
    const rule = this.rules.find((r) => pathname.endsWith(r.pathSuffix));
    return rule ? rule.ttlSeconds : this.ttlSeconds;
  }

  private lookup(key: string): CacheEntry | undefined {
    try {
      const entry = this.store.get(key);
      if (!entry) return undefined;
      if (entry.expiresAt <= this.now()) {
        this.store.delete(key);
        return undefined;
      }
      return entry;
    } catch (error) {
      this.logger.warn("Could not read HTTP cache, continuing without it", { error: errorMessage(error) });
      return undefined;
    }
  }

  private save(key: string, response: HttpResponse, ttl: number): void {
    const storedAt = this.now();
    try {
      this.store.set(key, {
        url: response.url,
        status: response.status,
        body: response.body,
        storedAt,
        expiresAt: storedAt + ttl * 1000
      });
    } catch (error) {
      this.logger.warn("Could not write HTTP cache, continuing without it", { error: errorMessage(error) });
    }
  }

  async get(url: string, options: RequestOptions): Promise<HttpResponse> {
    const ttl = this.ttlFor(url);
    if (ttl <= 0) {
      return this.inner.get(url, options);
    }

    const key = cacheKey(url, options.headers);
    const cached = this.lookup(key);
    if (cached) {
      return { url: cached.url, status: cached.status, body: cached.body, fromCache: true };
    }

    const response = await this.inner.get(url, options);
    if (response.status === 200) {
      this.save(key, response, ttl);
    }
    return response;
  }

  async close(): Promise<void> {
    await this.inner.close?.();
  }
}
