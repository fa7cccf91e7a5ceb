export function trimTo(s: string | undefined, n = 300): string | undefined {
  if (!s) return s;
  const t = s.replace(/\s+/g, " ").trim();
  return t.length > n ? t.slice(0, n - 1) + "…" : t;
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function roundTo(n: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/** Host of a URL without a leading "www.", or null when the URL does not parse. */
export function hostOf(url: string): string | null {
  try {
    return normalizeHost(new URL(url).hostname);
  } catch {
    return null;
  }
}

export function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/^www\./, "");
}
