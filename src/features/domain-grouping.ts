import type { DomainGroup, SearchResult } from "../types";
import { hostOf, normalizeHost } from "../utils";

export function domainOf(link: string, displayLink = ""): string {
  const host = hostOf(link);
  if (host) return host;
  const fallback = displayLink ? normalizeHost(displayLink.split("/")[0]) : "";
  return fallback || "unknown";
}

/**
 * Buckets results by domain. Groups appear in the order their first result
 * was seen and keep the rank order of their members.
 */
export function groupByDomain(results: SearchResult[]): DomainGroup[] {
  const groups = new Map<string, SearchResult[]>();
  for (const r of results) {
    const domain = r.domain || domainOf(r.link, r.displayLink);
    const bucket = groups.get(domain);
    if (bucket) bucket.push(r);
    else groups.set(domain, [r]);
  }
  return Array.from(groups, ([domain, members]) => ({ domain, results: members }));
}
