import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PageFetch } from "../src/crawl";
import { ValidationError } from "../src/errors";
import { cacheKey, normalizeUrl, ProxyCache, ProxyFetchError } from "../src/proxyCache";

const PAGE = "<html><head><title>Hello</title></head><body><a href='/next'>next</a></body></html>";

describe("normalizeUrl", () => {
  it("canonicalises case, port, fragment, query order and trailing slash", () => {
    expect(normalizeUrl("HTTPS://Example.COM:443/Path/?b=2&a=1#frag")).toBe("https://example.com/Path?a=1&b=2");
    expect(normalizeUrl("http://example.com")).toBe("http://example.com/");
    expect(normalizeUrl("http://example.com/?")).toBe("http://example.com/");
    expect(normalizeUrl("http://example.com:8080/a")).toBe("http://example.com:8080/a");
  });

  it("keeps the order of repeated parameters", () => {
    expect(normalizeUrl("https://x.org/?z=1&a=2&a=1")).toBe("https://x.org/?a=2&a=1&z=1");
  });

  it("rejects unsupported and unparsable URLs", () => {
    expect(() => normalizeUrl("ftp://example.com/file")).toThrow(ValidationError);
    expect(() => normalizeUrl("not a url")).toThrow(ValidationError);
  });

  it("derives the same key for equivalent URLs", () => {
    const key = cacheKey("https://example.com/a/?y=2&x=1");
    expect(key).toMatch(/^[0-9a-f]{64}$/);
    expect(cacheKey("https://EXAMPLE.com/a?x=1&y=2#top")).toBe(key);
    expect(cacheKey("https://example.com/b")).not.toBe(key);
  });
});

describe("ProxyCache", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cse-hub-cache-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("fetches once and then serves the same entry", async () => {
    const fetchPage = vi.fn<PageFetch>().mockResolvedValue({ html: PAGE, via: "axios" });
    const cache = new ProxyCache(join(dir, "cache"), fetchPage);

    const first = await cache.lookup("https://example.com/page");
    const second = await cache.lookup("https://example.com/page#again");

    expect(first.status).toBe("miss");
    expect(second.status).toBe("hit");
    expect(second.entry).toEqual(first.entry);
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(fetchPage).toHaveBeenCalledWith("https://example.com/page");
    expect(first.entry.html).toContain('<head><base href="https://example.com/page"><title>Hello</title>');
    expect(first.entry.via).toBe("axios");
  });

  it("replaces an existing base element", async () => {
    const html = '<html><head><base href="/other/"></head><body></body></html>';
    const cache = new ProxyCache(join(dir, "cache"), vi.fn<PageFetch>().mockResolvedValue({ html, via: "axios" }));

    const { entry } = await cache.lookup("https://example.com/");

    expect(entry.html).toContain('<base href="https://example.com/">');
    expect(entry.html).not.toContain('href="/other/"');
  });

  it("persists entries to disk", async () => {
    const fetchPage = vi.fn<PageFetch>().mockResolvedValue({ html: PAGE, via: "playwright" });
    await new ProxyCache(join(dir, "cache"), fetchPage).lookup("https://example.com/page");

    const reopened = new ProxyCache(join(dir, "cache"), fetchPage);
    const again = await reopened.lookup("https://example.com/page");

    expect(again.status).toBe("hit");
    expect(again.entry.via).toBe("playwright");
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(await readdir(join(dir, "cache"))).toEqual([`${cacheKey("https://example.com/page")}.json`]);
  });

  it("fetches again after invalidation", async () => {
    const fetchPage = vi
      .fn<PageFetch>()
      .mockResolvedValueOnce({ html: "<p>old</p>", via: "axios" })
      .mockResolvedValueOnce({ html: "<p>new</p>", via: "axios" });
    const cache = new ProxyCache(join(dir, "cache"), fetchPage);

    await cache.lookup("https://example.com/");
    await cache.invalidate();
    const after = await cache.lookup("https://example.com/");

    expect(after.status).toBe("miss");
    expect(after.entry.html).toContain("<p>new</p>");
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("does not bring back a page read from disk during invalidation", async () => {
    const url = "https://example.com/page";
    await new ProxyCache(join(dir, "cache"), vi.fn<PageFetch>().mockResolvedValue({ html: "<p>old</p>", via: "axios" })).lookup(url);
    const cache = new ProxyCache(join(dir, "cache"), vi.fn<PageFetch>().mockResolvedValue({ html: "<p>new</p>", via: "axios" }));

    const pending = cache.lookup(url);
    await cache.invalidate();
    const during = await pending;
    const after = await cache.lookup(url);

    expect(during.status).toBe("miss");
    expect(during.entry.html).toContain("<p>new</p>");
    expect(after.entry.html).toContain("<p>new</p>");
  });

  it("serves the stored copy when a refresh fails", async () => {
    const fetchPage = vi
      .fn<PageFetch>()
      .mockResolvedValueOnce({ html: PAGE, via: "axios" })
      .mockRejectedValueOnce(new Error("ECONNRESET"));
    const cache = new ProxyCache(join(dir, "cache"), fetchPage);

    const first = await cache.lookup("https://example.com/page");
    const refreshed = await cache.lookup("https://example.com/page", { refresh: true });

    expect(refreshed.status).toBe("stale");
    expect(refreshed.entry).toEqual(first.entry);
  });

  it("fails when nothing is cached and the fetch fails", async () => {
    const cache = new ProxyCache(join(dir, "cache"), vi.fn<PageFetch>().mockRejectedValue(new Error("ETIMEDOUT")));

    const err = await cache.lookup("https://example.com/x").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProxyFetchError);
    expect(err instanceof ProxyFetchError && err.message).toBe("Could not fetch https://example.com/x: ETIMEDOUT");
  });

  it("shares one fetch between concurrent lookups", async () => {
    const fetchPage = vi.fn<PageFetch>(
      () => new Promise((resolve) => setTimeout(() => resolve({ html: PAGE, via: "axios" }), 50)),
    );
    const cache = new ProxyCache(join(dir, "cache"), fetchPage);

    const [a, b] = await Promise.all([
      cache.lookup("https://example.com/page"),
      cache.lookup("https://example.com/page/"),
    ]);

    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(a.entry).toEqual(b.entry);
  });
});
