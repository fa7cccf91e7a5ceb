import { createHash } from "node:crypto";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { sortBy } from "lodash";
import { z } from "zod";
import type { PageFetch } from "./crawl";
import { ValidationError } from "./errors";
import { log, logError } from "./helpers/log.helper";
import { rebaseHtml } from "./parse";
import type { CacheEntry, ProxyLookup } from "./types";
import { errorMessage, isNodeError, nowIso } from "./utils";

const CacheEntrySchema = z.object({
  url: z.string(),
  html: z.string(),
  fetchedAt: z.string(),
  via: z.enum(["axios", "playwright"]),
});

/**
 * Canonical form used for cache keys: lower-case scheme and host, no default
 * port, no fragment, query parameters sorted by name, no trailing slash
 * except for the root path.
 */
export function normalizeUrl(raw: string): string {
  let u: URL;
  try {
    u = new URL(raw.trim());
  } catch {
    throw new ValidationError(`Invalid URL: ${raw}`);
  }
  if (u.protocol !== "http:" && u.protocol !== "https:") {
    throw new ValidationError(`Unsupported URL scheme: ${u.protocol}`);
  }

  u.hash = "";
  const params = sortBy(Array.from(u.searchParams), ([name]) => name);
  u.search = "";
  for (const [name, value] of params) u.searchParams.append(name, value);
  if (u.pathname.length > 1) u.pathname = u.pathname.replace(/\/+$/, "") || "/";
  return u.toString();
}

export function cacheKey(url: string): string {
  return createHash("sha256").update(normalizeUrl(url)).digest("hex");
}

export class ProxyFetchError extends Error {
  constructor(
    readonly url: string,
    cause: unknown,
  ) {
    super(`Could not fetch ${url}: ${errorMessage(cause)}`, { cause });
    this.name = "ProxyFetchError";
  }
}

/**
 * File-backed page cache for proxied previews. Entries never expire on their
 * own; invalidate() drops everything. A refresh that fails falls back to the
 * stored copy.
 */
export class ProxyCache {
  private readonly memory = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, Promise<CacheEntry>>();
  private generation = 0;

  constructor(
    private readonly cacheDir: string,
    private readonly fetchPage: PageFetch,
  ) {}

  private fileFor(key: string): string {
    return join(this.cacheDir, `${key}.json`);
  }

  async get(url: string): Promise<CacheEntry | undefined> {
    const key = cacheKey(url);
    const cached = this.memory.get(key);
    if (cached) return cached;

    const generation = this.generation;
    try {
      const raw: unknown = JSON.parse(await readFile(this.fileFor(key), "utf-8"));
      // invalidated while reading
      if (generation !== this.generation) return undefined;
      const parsed = CacheEntrySchema.safeParse(raw);
      if (!parsed.success) {
        log.warn(`Ignoring malformed cache file for ${url}`);
        return undefined;
      }
      this.memory.set(key, parsed.data);
      return parsed.data;
    } catch (err) {
      if (!isNodeError(err, "ENOENT")) logError(`reading cache entry for ${url}`, err);
      return undefined;
    }
  }

  async lookup(url: string, { refresh = false } = {}): Promise<ProxyLookup> {
    const normalized = normalizeUrl(url);
    const existing = await this.get(normalized);
    if (existing && !refresh) return { entry: existing, status: "hit" };

    try {
      return { entry: await this.fetchOnce(normalized), status: "miss" };
    } catch (err) {
      if (existing) {
        log.warn(`Serving stale copy of ${normalized}: ${errorMessage(err)}`);
        return { entry: existing, status: "stale" };
      }
      throw new ProxyFetchError(normalized, err);
    }
  }

  private fetchOnce(url: string): Promise<CacheEntry> {
    const key = cacheKey(url);
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const generation = this.generation;
    const task: Promise<CacheEntry> = (async () => {
      const page = await this.fetchPage(url);
      const entry: CacheEntry = { url, html: rebaseHtml(page.html, url), fetchedAt: nowIso(), via: page.via };
      // an invalidation while fetching means the entry may already be outdated
      if (generation === this.generation) await this.store(key, entry);
      return entry;
    })().finally(() => {
      if (this.inflight.get(key) === task) this.inflight.delete(key);
    });

    this.inflight.set(key, task);
    return task;
  }

  private async store(key: string, entry: CacheEntry): Promise<void> {
    this.memory.set(key, entry);
    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(this.fileFor(key), JSON.stringify(entry), "utf-8");
    } catch (err) {
      logError(`writing cache entry for ${entry.url}`, err);
    }
  }

  async invalidate(): Promise<void> {
    this.generation++;
    this.memory.clear();
    this.inflight.clear();
    await rm(this.cacheDir, { recursive: true, force: true });
    log.info("Proxy cache cleared");
  }
}
