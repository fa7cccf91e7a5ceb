import { loadWebsiteCatalog } from "./catalog";
import type { DataPaths } from "./constants";
import { loadCredentials, type CredentialSet } from "./credentials";
import { log } from "./helpers/log.helper";
import { readDomainList } from "./proxiedDomains";
import type { ProxyCache } from "./proxyCache";
import type { WebsiteCatalog } from "./types";

/**
 * File-backed configuration held in memory. Each reload swaps a whole
 * section; readers never see a half-updated one.
 */
export class AppState {
  credentials: CredentialSet = { apiKeys: [], engines: [] };
  catalog: WebsiteCatalog = {};
  proxiedDomains: string[] = [];

  constructor(
    readonly paths: DataPaths,
    private readonly proxyCache?: ProxyCache,
  ) {}

  async reloadCredentials(): Promise<void> {
    this.credentials = await loadCredentials(this.paths.apiKeys, this.paths.engines);
    log.info(
      `Loaded ${this.credentials.apiKeys.length} API key(s) and ${this.credentials.engines.length} search engine(s)`,
    );
  }

  async reloadCatalog(): Promise<void> {
    this.catalog = await loadWebsiteCatalog(this.paths.websites);
    log.info(`Loaded ${Object.keys(this.catalog).length} website categories`);
  }

  async loadProxiedDomains(): Promise<void> {
    this.proxiedDomains = await readDomainList(this.paths.proxiedDomains);
    log.info(`Loaded ${this.proxiedDomains.length} proxied domain(s)`);
  }

  /** Reloads the proxied domain list after a change and drops every cached page. */
  async reloadProxiedDomains(): Promise<void> {
    await this.loadProxiedDomains();
    await this.proxyCache?.invalidate();
  }

  /** Startup load; the page cache on disk is kept. */
  async loadAll(): Promise<void> {
    await Promise.all([this.reloadCredentials(), this.reloadCatalog(), this.loadProxiedDomains()]);
  }
}
