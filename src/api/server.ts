import cookieParser from "cookie-parser";
import cors from "cors";
import express, { type ErrorRequestHandler, type RequestHandler } from "express";
import morgan from "morgan";
import { z } from "zod";
import { MAX_QUERIES, SERVICE_NAME } from "../constants";
import type { AppConfig } from "../env";
import { AppError, ForbiddenError, ValidationError } from "../errors";
import { logError } from "../helpers/log.helper";
import { placeholderHtml } from "../parse";
import { isProxied } from "../proxiedDomains";
import { normalizeUrl, ProxyFetchError, type ProxyCache } from "../proxyCache";
import { ALL_ENGINES, type SearchService } from "../search";
import type { AppState } from "../store";
import { adminRouter } from "./admin";
import {
  ensureRateLimitId,
  loginHandler,
  loginLimiter,
  logoutHandler,
  requireRole,
} from "./auth";

const SearchQuerySchema = z.object({
  q: z.string().default(""),
  engine: z.string().min(1).default(ALL_ENGINES),
  sort_by: z.enum(["", "date"]).default(""),
  max_queries: z.coerce.number().int().min(1).max(MAX_QUERIES).default(MAX_QUERIES),
});

const ProxyQuerySchema = z.object({
  url: z.string().min(1, "url is required"),
  refresh: z
    .string()
    .optional()
    .transform((v) => v === "1" || v === "true"),
});

// proxied pages run in an opaque origin: no access to the app's cookies or API
const PROXY_CSP = "sandbox allow-forms allow-popups";

export type AppDeps = {
  config: AppConfig;
  state: AppState;
  search: SearchService;
  proxyCache: ProxyCache;
  /** access log format, null disables it */
  accessLog?: string | null;
};

function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.output<T> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) throw new ValidationError("Invalid query", parsed.error.flatten());
  return parsed.data;
}

export function createApp({ config, state, search, proxyCache, accessLog = "dev" }: AppDeps): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(cookieParser());
  if (accessLog) app.use(morgan(accessLog));

  const anyUser = requireRole(config.secretKey, "admin", "employee");
  const adminOnly = requireRole(config.secretKey, "admin");
  const limiter = loginLimiter(config.loginRateLimit);

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: SERVICE_NAME });
  });

  app.post("/login", ensureRateLimitId, limiter, loginHandler(config, limiter));
  app.post("/logout", logoutHandler);

  app.get("/api/engines", anyUser, (_req, res) => {
    res.json({ ok: true, engines: search.engineNames() });
  });

  const searchHandler: RequestHandler = async (req, res, next) => {
    try {
      const { q, engine, sort_by, max_queries } = parseQuery(SearchQuerySchema, req.query);
      const result = await search.search({ query: q, engine, sort: sort_by, maxQueries: max_queries });
      res.json({ ok: true, ...result });
    } catch (err) {
      next(err);
    }
  };
  app.get("/api/search", anyUser, searchHandler);

  app.get("/api/websites", anyUser, (_req, res) => {
    res.json({ ok: true, categories: state.catalog });
  });

  const proxyHandler: RequestHandler = async (req, res, next) => {
    try {
      const { url: raw, refresh } = parseQuery(ProxyQuerySchema, req.query);
      const url = normalizeUrl(raw);
      if (!isProxied(state.proxiedDomains, url)) {
        throw new ForbiddenError("Domain is not enabled for proxying");
      }
      const { entry, status } = await proxyCache.lookup(url, { refresh });
      res
        .status(200)
        .set("Content-Security-Policy", PROXY_CSP)
        .set("X-Proxy-Cache", status)
        .set("X-Proxy-Fetched-At", entry.fetchedAt)
        .type("html")
        .send(entry.html);
    } catch (err) {
      if (err instanceof ProxyFetchError) {
        logError("proxy", err);
        res
          .status(502)
          .set("Content-Security-Policy", PROXY_CSP)
          .set("X-Proxy-Cache", "error")
          .type("html")
          .send(placeholderHtml(err.url, err.message));
        return;
      }
      next(err);
    }
  };
  app.get("/proxy", anyUser, proxyHandler);

  app.use("/api/admin", adminOnly, adminRouter(state));

  app.use(express.static(config.publicDir, { index: "index.html" }));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof AppError) {
      const details = err instanceof ValidationError ? err.details : undefined;
      res.status(err.status).json({ ok: false, error: err.message, code: err.code, details });
      return;
    }
    logError("unhandled", err);
    res.status(500).json({ ok: false, error: "Internal server error", code: "internal" });
  };
  app.use(errorHandler);

  return app;
}
