import { google, type customsearch_v1 } from "googleapis";
import { z } from "zod";
import { MAX_RESULTS } from "./constants";
import { breadcrumbTrail } from "./features/breadcrumb";
import { domainOf } from "./features/domain-grouping";
import type { CredentialPair, PageRequest, SearchPage, SearchResult } from "./types";
import { roundTo } from "./utils";

const ListItemsSchema = z.array(z.object({ name: z.string().nullish() }));

function listItemsOf(item: customsearch_v1.Schema$Result): Array<{ name?: string | null }> {
  const parsed = ListItemsSchema.safeParse(item.pagemap?.listitem);
  return parsed.success ? parsed.data : [];
}

export function toSearchResult(item: customsearch_v1.Schema$Result): SearchResult {
  const link = item.link ?? "";
  const displayLink = item.displayLink ?? "";
  return {
    title: item.htmlTitle ?? item.title ?? "",
    link,
    displayLink,
    snippet: item.htmlSnippet ?? item.snippet ?? "",
    breadcrumbTrail: breadcrumbTrail(link, displayLink, listItemsOf(item)),
    domain: domainOf(link, displayLink),
  };
}

export function toSearchPage(data: customsearch_v1.Schema$Search): SearchPage {
  const nextStart = data.queries?.nextPage?.[0]?.startIndex ?? null;
  const total = Number.parseInt(data.searchInformation?.totalResults ?? "0", 10);
  return {
    results: (data.items ?? []).map(toSearchResult),
    nextStart,
    totalResults: Number.isNaN(total) ? 0 : total,
    searchTime: roundTo(data.searchInformation?.searchTime ?? 0),
  };
}

/** One page of Custom Search results for a single API key / engine pair. */
export class GoogleSearchClient {
  private readonly customsearch = google.customsearch("v1");

  constructor(private readonly timeoutMs = 15000) {}

  readonly searchPage = async (pair: CredentialPair, req: PageRequest): Promise<SearchPage> => {
    const res = await this.customsearch.cse.list(
      {
        q: req.query,
        cx: pair.engineId,
        key: pair.apiKey,
        num: MAX_RESULTS,
        start: req.start,
        sort: req.sort || undefined,
      },
      { timeout: this.timeoutMs },
    );
    return toSearchPage(res.data);
  };
}
