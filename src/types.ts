export type SortOrder = "" | "date";

export type NamedValue = {
  name: string;
  value: string;
};

export type CredentialPair = {
  keyName: string;
  apiKey: string;
  engineName: string;
  engineId: string;
};

export type SearchResult = {
  title: string;
  link: string;
  displayLink: string;
  snippet: string;
  breadcrumbTrail: string;
  domain: string;
};

export type SearchPage = {
  results: SearchResult[];
  nextStart: number | null;
  totalResults: number;
  searchTime: number;
};

export type PageRequest = {
  query: string;
  start: number;
  sort: SortOrder;
};

export type DomainGroup = {
  domain: string;
  results: SearchResult[];
};

export type SearchResponse = {
  query: string;
  engine: string;
  totalResults: number;
  searchTime: number;
  resultCount: number;
  groups: DomainGroup[];
  warnings: string[];
};

export type Website = {
  title: string;
  link: string;
  proxyRequired: boolean;
};

export type WebsiteCategory = {
  websites: Website[];
  maxLimit: number;
};

export type WebsiteCatalog = Record<string, WebsiteCategory>;

export type FetchVia = "axios" | "playwright";

export type CacheEntry = {
  url: string;
  html: string;
  fetchedAt: string; // ISO
  via: FetchVia;
};

export type ProxyLookup = {
  entry: CacheEntry;
  status: "hit" | "miss" | "stale";
};

export type Role = "admin" | "employee";

/** Change set posted by the admin settings page. */
export type ChangeSet = {
  del?: string[];
  upd?: Array<{ original: string; name: string; value?: string }>;
  add?: Array<{ name: string; value?: string }>;
};
