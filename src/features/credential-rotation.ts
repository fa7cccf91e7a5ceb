import { z } from "zod";
import { ROTATION_COOLDOWN_MS } from "../constants";
import {
  SearchFailedError,
  SearchUnavailableError,
  type CredentialFailure,
  type FailureKind,
} from "../errors";
import { log } from "../helpers/log.helper";
import type { CredentialPair, PageRequest, SearchPage } from "../types";
import { errorMessage } from "../utils";

export type PageFetcher = (pair: CredentialPair, request: PageRequest) => Promise<SearchPage>;

export type RotationResult = {
  page: SearchPage;
  pair: CredentialPair;
};

const QUOTA_REASONS = new Set([
  "dailyLimitExceeded",
  "dailyLimitExceededUnreg",
  "rateLimitExceeded",
  "userRateLimitExceeded",
  "quotaExceeded",
]);

// Shape of the errors thrown by googleapis (gaxios) for non-2xx answers
const UpstreamErrorSchema = z.object({
  response: z.object({
    status: z.number(),
    data: z.unknown(),
  }),
});

const GoogleErrorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

export type UpstreamError = {
  status: number;
  reasons: string[];
  message: string;
};

export function upstreamError(err: unknown): UpstreamError | null {
  const parsed = UpstreamErrorSchema.safeParse(err);
  if (!parsed.success) return null;
  const { status, data } = parsed.data.response;
  const body = GoogleErrorBodySchema.safeParse(data);
  const detail = body.success ? body.data.error : undefined;
  const reasons = (detail?.errors ?? []).flatMap((e) => (e.reason ? [e.reason] : []));
  return { status, reasons, message: detail?.message ?? errorMessage(err) };
}

/**
 * Decides whether a failed call should move on to the next credential.
 * Returns null for failures that no other key would fix.
 */
export function classifyFailure(err: unknown): FailureKind | null {
  const upstream = upstreamError(err);
  if (!upstream) return null;
  const { status, reasons, message } = upstream;

  if (status === 429) return "quota";
  if (status === 401) return "auth";
  if (status === 403) {
    return reasons.some((r) => QUOTA_REASONS.has(r)) ? "quota" : "auth";
  }
  if (status === 400) {
    if (reasons.includes("keyInvalid")) return "auth";
    if (/api key/i.test(message)) return "auth";
  }
  return null;
}

export const pairId = (p: CredentialPair) => `${p.keyName}\u0000${p.engineName}`;

/**
 * Tries credential pairs in fixed priority order. Pairs that recently failed
 * for quota or auth reasons are moved behind the healthy ones until their
 * cool-down runs out. Every pair is tried at most once per call.
 */
export class CredentialRotator {
  private readonly coolingUntil = new Map<string, number>();

  constructor(
    private readonly fetchPage: PageFetcher,
    private readonly cooldownMs = ROTATION_COOLDOWN_MS,
    private readonly now: () => number = Date.now,
  ) {}

  order(pairs: CredentialPair[]): CredentialPair[] {
    const t = this.now();
    const healthy: CredentialPair[] = [];
    const cooling: CredentialPair[] = [];
    const seen = new Set<string>();

    for (const pair of pairs) {
      const id = pairId(pair);
      if (seen.has(id)) continue;
      seen.add(id);

      const until = this.coolingUntil.get(id);
      if (until !== undefined && until > t) {
        cooling.push(pair);
      } else {
        if (until !== undefined) this.coolingUntil.delete(id);
        healthy.push(pair);
      }
    }
    return healthy.concat(cooling);
  }

  /**
   * `rejected` collects pairs that failed during one query; callers fetching
   * several pages share it so a rejected pair is not retried for the same query.
   */
  async run(
    pairs: CredentialPair[],
    request: PageRequest,
    rejected: Set<string> = new Set(),
  ): Promise<RotationResult> {
    const failures: CredentialFailure[] = [];

    for (const pair of this.order(pairs)) {
      if (rejected.has(pairId(pair))) continue;
      try {
        const page = await this.fetchPage(pair, request);
        this.coolingUntil.delete(pairId(pair));
        return { page, pair };
      } catch (err) {
        const kind = classifyFailure(err);
        if (!kind) {
          throw new SearchFailedError(
            `Search request failed (${pair.engineName}): ${errorMessage(err)}`,
            upstreamError(err)?.status,
          );
        }
        const message = upstreamError(err)?.message ?? errorMessage(err);
        log.warn(`API key "${pair.keyName}" rejected (${kind}): ${message}, trying next`);
        this.coolingUntil.set(pairId(pair), this.now() + this.cooldownMs);
        rejected.add(pairId(pair));
        failures.push({ keyName: pair.keyName, engineName: pair.engineName, kind, message });
      }
    }

    throw new SearchUnavailableError(failures);
  }
}
