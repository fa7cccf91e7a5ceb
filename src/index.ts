import { mkdir } from "node:fs/promises";
import type { Server } from "node:http";
import { createApp } from "./api/server";
import { smartFetcher } from "./crawl";
import { loadConfig } from "./env";
import { CredentialRotator } from "./features/credential-rotation";
import { GoogleSearchClient } from "./googleSearch";
import { log, logError } from "./helpers/log.helper";
import { createHttp } from "./http";
import { BrowserRenderer } from "./playwright.fetch";
import { ProxyCache } from "./proxyCache";
import { SearchService } from "./search";
import { AppState } from "./store";
import { ConfigWatcher } from "./watcher";

async function main() {
  const config = loadConfig();
  await mkdir(config.paths.dataDir, { recursive: true });

  const renderer = config.useBrowserFallback ? new BrowserRenderer(config.userAgent) : undefined;
  const fetchPage = smartFetcher({
    http: createHttp(config.userAgent, config.httpTimeoutMs),
    renderer,
    maxStaticBytes: config.maxStaticBytes,
  });
  const proxyCache = new ProxyCache(config.paths.cacheDir, fetchPage);

  const state = new AppState(config.paths, proxyCache);
  await state.loadAll();
  if (!state.credentials.apiKeys.length || !state.credentials.engines.length) {
    log.warn("No API keys or search engines configured, searches will be unavailable");
  }

  const google = new GoogleSearchClient(config.httpTimeoutMs);
  const search = new SearchService(
    new CredentialRotator(google.searchPage),
    () => state.credentials,
    config.searchConcurrency,
  );

  const watcher = new ConfigWatcher(state);
  await watcher.start();

  const app = createApp({ config, state, search, proxyCache });
  const server: Server = app.listen(config.port, config.host, () => {
    log.info(`listening on http://${config.host}:${config.port}`);
    log.info(`data directory: ${config.paths.dataDir}`);
  });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;
    log.info(`${signal} received, shutting down`);
    Promise.allSettled([
      watcher.close(),
      renderer?.close(),
      new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
    ])
      .then((outcomes) => {
        const failed = outcomes.filter((o): o is PromiseRejectedResult => o.status === "rejected");
        failed.forEach((o) => logError("shutdown", o.reason));
        process.exit(failed.length ? 1 : 0);
      })
      .catch((err: unknown) => {
        logError("shutdown", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e: unknown) => {
  logError("startup", e);
  process.exit(1);
});
