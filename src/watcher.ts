import * as chokidar from "chokidar";
import path from "path";
import { log, logError } from "./helpers/log.helper";
import type { AppState } from "./store";

export type ReloadHandler = () => Promise<void>;

/** Maps a changed file to the reload it triggers, or null when it is not watched. */
export function reloadFor(state: AppState, filePath: string): ReloadHandler | null {
  const { apiKeys, engines, websites, proxiedDomains } = state.paths;
  const resolved = path.resolve(filePath);
  if (resolved === apiKeys || resolved === engines) return () => state.reloadCredentials();
  if (resolved === websites) return () => state.reloadCatalog();
  if (resolved === proxiedDomains) return () => state.reloadProxiedDomains();
  return null;
}

export class ConfigWatcher {
  private watcher: chokidar.FSWatcher | null = null;

  constructor(
    private readonly state: AppState,
    private readonly stabilityMs = 300,
  ) {}

  /** Resolves once the initial scan is done and changes are being reported. */
  start(): Promise<void> {
    if (this.watcher) return Promise.resolve();
    const dir = this.state.paths.dataDir;
    log.info(`Watching ${dir} for configuration changes`);

    const watcher = chokidar.watch(dir, {
      depth: 0,
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: this.stabilityMs, pollInterval: 100 },
    });

    const handle = async (filePath: string) => {
      const reload = reloadFor(this.state, filePath);
      if (!reload) return;
      log.info(`[FileChanged] ${path.basename(filePath)}`);
      try {
        await reload();
      } catch (err) {
        logError(`reloading ${path.basename(filePath)}`, err);
      }
    };

    this.watcher = watcher;
    watcher
      .on("add", handle)
      .on("change", handle)
      .on("unlink", handle)
      .on("error", (error) => logError("watcher", error));

    return new Promise((resolve) => watcher.once("ready", () => resolve()));
  }

  async close(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
