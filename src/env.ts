import "dotenv/config";
import path from "path";
import { z } from "zod";
import { DEFAULT_USER_AGENT, dataPaths, type DataPaths } from "./constants";

const flag = z
  .string()
  .optional()
  .transform((v) => v === "1" || v?.toLowerCase() === "true");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  HOST: z.string().default("0.0.0.0"),
  DATA_DIR: z.string().default(path.join(process.cwd(), "data")),
  PUBLIC_DIR: z.string().default(path.join(process.cwd(), "public")),
  SECRET_KEY: z.string().min(8, "SECRET_KEY must be at least 8 characters"),
  ADMIN_USERNAME: z.string().optional(),
  ADMIN_PASSWORD: z.string().optional(),
  EMPLOYEE_USERNAME: z.string().optional(),
  EMPLOYEE_PASSWORD: z.string().optional(),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  USE_BROWSER_FALLBACK: flag,
  MAX_STATIC_BYTES: z.coerce.number().int().nonnegative().default(8000),
  SEARCH_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(5),
  LOGIN_RATE_LIMIT: z.coerce.number().int().positive().default(5),
});

export type Account = { username: string; password: string };

export type AppConfig = {
  port: number;
  host: string;
  paths: DataPaths;
  publicDir: string;
  secretKey: string;
  accounts: { admin?: Account; employee?: Account };
  userAgent: string;
  httpTimeoutMs: number;
  useBrowserFallback: boolean;
  maxStaticBytes: number;
  searchConcurrency: number;
  loginRateLimit: number;
};

function account(username?: string, password?: string): Account | undefined {
  return username && password ? { username, password } : undefined;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    host: e.HOST,
    paths: dataPaths(e.DATA_DIR),
    publicDir: path.resolve(e.PUBLIC_DIR),
    secretKey: e.SECRET_KEY,
    accounts: {
      admin: account(e.ADMIN_USERNAME, e.ADMIN_PASSWORD),
      employee: account(e.EMPLOYEE_USERNAME, e.EMPLOYEE_PASSWORD),
    },
    userAgent: e.USER_AGENT,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    useBrowserFallback: e.USE_BROWSER_FALLBACK,
    maxStaticBytes: e.MAX_STATIC_BYTES,
    searchConcurrency: e.SEARCH_CONCURRENCY,
    loginRateLimit: e.LOGIN_RATE_LIMIT,
  };
}
