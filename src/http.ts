import axios, { type AxiosInstance } from "axios";
import { DEFAULT_USER_AGENT } from "./constants";

const MAX_ATTEMPTS = 3;

export function createHttp(userAgent = DEFAULT_USER_AGENT, timeout = 30000): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    },
    timeout,
    maxRedirects: 5,
  });
}

/** GET a page as text, retrying network errors and 5xx answers with backoff. */
export async function getHtml(http: AxiosInstance, url: string, attempt = 1): Promise<string> {
  try {
    const res = await http.get<string>(url, { responseType: "text" });
    return res.data;
  } catch (err) {
    const status = axios.isAxiosError(err) ? err.response?.status : undefined;
    if (attempt < MAX_ATTEMPTS && (!status || status >= 500)) {
      const delay = 500 * 2 ** (attempt - 1);
      await new Promise((r) => setTimeout(r, delay));
      return getHtml(http, url, attempt + 1);
    }
    throw err;
  }
}
