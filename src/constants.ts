import path from "path";

export const SERVICE_NAME = "cse-hub";

// Fixed limits of the Custom Search JSON API
export const MAX_RESULTS = 10;
export const MAX_QUERIES = 10;

export const ROTATION_COOLDOWN_MS = 60 * 60 * 1000;

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

export const SESSION_COOKIE = "session";
export const RATE_LIMIT_COOKIE = "rl_id";
export const SESSION_TTL = "12h";

export type DataPaths = {
  dataDir: string;
  engines: string;
  apiKeys: string;
  websites: string;
  proxiedDomains: string;
  cacheDir: string;
};

export function dataPaths(dataDir: string): DataPaths {
  const dir = path.resolve(dataDir);
  return {
    dataDir: dir,
    engines: path.join(dir, "search_engines.env"),
    apiKeys: path.join(dir, "api_keys.env"),
    websites: path.join(dir, "websites.xlsx"),
    proxiedDomains: path.join(dir, "proxied_domains.txt"),
    cacheDir: path.join(dir, "proxy_cache"),
  };
}
