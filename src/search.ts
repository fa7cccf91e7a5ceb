import pLimit from "p-limit";
import { uniqBy } from "lodash";
import { MAX_QUERIES, MAX_RESULTS } from "./constants";
import { pairsForEngine, type CredentialSet } from "./credentials";
import { SearchUnavailableError, ValidationError } from "./errors";
import { CredentialRotator } from "./features/credential-rotation";
import { groupByDomain } from "./features/domain-grouping";
import { log, logError } from "./helpers/log.helper";
import type { CredentialPair, SearchResponse, SearchResult, SortOrder } from "./types";
import { errorMessage, roundTo } from "./utils";

export const ALL_ENGINES = "all";

export type AllResults = {
  results: SearchResult[];
  totalResults: number;
  searchTime: number;
};

export type SearchOptions = {
  query: string;
  engine: string;
  sort: SortOrder;
  maxQueries?: number;
};

export class SearchService {
  constructor(
    private readonly rotator: CredentialRotator,
    private readonly credentials: () => CredentialSet,
    private readonly concurrency = 5,
  ) {}

  engineNames(): string[] {
    return this.credentials().engines.map((e) => e.name);
  }

  /**
   * Fetches the first page, then the remaining pages in parallel. Pages are
   * stitched back together by start index.
   */
  async fetchAllResults(
    pairs: CredentialPair[],
    query: string,
    sort: SortOrder,
    maxQueries = MAX_QUERIES,
  ): Promise<AllResults> {
    const rejected = new Set<string>();
    const first = await this.rotator.run(pairs, { query, start: 1, sort }, rejected);
    const pages = new Map<number, SearchResult[]>([[1, first.page.results]]);
    let searchTime = first.page.searchTime;

    const { totalResults, nextStart } = first.page;
    const remaining = Math.max(0, Math.min(maxQueries - 1, Math.floor((totalResults - 1) / MAX_RESULTS)));
    log.debug(`"${query}": ${totalResults} results, ${remaining} more page(s)`);

    if (remaining && nextStart) {
      const limit = pLimit(this.concurrency);
      const starts = Array.from({ length: remaining }, (_, i) => nextStart + i * MAX_RESULTS);
      const settled = await Promise.allSettled(
        starts.map((start) => limit(() => this.rotator.run(pairs, { query, start, sort }, rejected))),
      );
      settled.forEach((outcome, i) => {
        if (outcome.status === "fulfilled") {
          pages.set(starts[i], outcome.value.page.results);
          searchTime += outcome.value.page.searchTime;
        } else {
          logError(`page starting at ${starts[i]}`, outcome.reason);
        }
      });
    }

    const results = Array.from(pages.keys())
      .sort((a, b) => a - b)
      .flatMap((start) => pages.get(start) ?? []);

    return { results, totalResults, searchTime: roundTo(searchTime) };
  }

  async search({ query, engine, sort, maxQueries }: SearchOptions): Promise<SearchResponse> {
    const q = query.trim();
    if (!q) throw new ValidationError("No search query provided");

    const set = this.credentials();
    const engines = engine === ALL_ENGINES ? set.engines.map((e) => e.name) : [engine];
    if (engine !== ALL_ENGINES && !set.engines.some((e) => e.name === engine)) {
      throw new ValidationError(`Unknown search engine: ${engine}`);
    }
    if (!engines.length) throw new SearchUnavailableError([]);

    const merged: SearchResult[] = [];
    const warnings: string[] = [];
    const failures: unknown[] = [];
    let totalResults = 0;
    let searchTime = 0;

    for (const name of engines) {
      try {
        const all = await this.fetchAllResults(pairsForEngine(set, name), q, sort, maxQueries);
        merged.push(...all.results);
        totalResults += all.totalResults;
        searchTime += all.searchTime;
      } catch (err) {
        // a single engine may fail while the others still answer
        if (engines.length === 1) throw err;
        logError(`engine ${name}`, err);
        failures.push(err);
        warnings.push(`${name}: ${errorMessage(err)}`);
      }
    }

    if (failures.length === engines.length) {
      throw failures.find((f) => f instanceof SearchUnavailableError) ?? failures[0];
    }

    const results = uniqBy(merged, (r) => r.link);
    return {
      query: q,
      engine,
      totalResults,
      searchTime: roundTo(searchTime),
      resultCount: results.length,
      groups: groupByDomain(results),
      warnings,
    };
  }
}
