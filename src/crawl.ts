import type { AxiosInstance } from "axios";
import { getHtml } from "./http";
import { log } from "./helpers/log.helper";
import type { BrowserRenderer } from "./playwright.fetch";
import type { FetchVia } from "./types";
import { errorMessage } from "./utils";

export type FetchedPage = { html: string; via: FetchVia };

export type PageFetch = (url: string) => Promise<FetchedPage>;

export type SmartFetchOptions = {
  http: AxiosInstance;
  /** When set, thin or failed static fetches are retried through the browser. */
  renderer?: Pick<BrowserRenderer, "render">;
  maxStaticBytes?: number;
};

/**
 * Static fetch first; falls back to a rendered fetch when the page looks like
 * a client-side shell or the static request fails. Throws when neither works.
 */
export function smartFetcher({ http, renderer, maxStaticBytes = 8000 }: SmartFetchOptions): PageFetch {
  return async (url) => {
    let html: string;
    try {
      html = await getHtml(http, url);
    } catch (err) {
      if (!renderer) throw err;
      log.warn(`Static fetch of ${url} failed (${errorMessage(err)}), rendering instead`);
      return { html: await renderer.render(url), via: "playwright" };
    }

    if (renderer && html.length < maxStaticBytes) {
      try {
        return { html: await renderer.render(url), via: "playwright" };
      } catch (err) {
        log.warn(`Rendering ${url} failed (${errorMessage(err)}), keeping static copy`);
      }
    }
    return { html, via: "axios" };
  };
}
