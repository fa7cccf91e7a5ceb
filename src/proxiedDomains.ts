import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { uniq } from "lodash";
import { ValidationError } from "./errors";
import { logError } from "./helpers/log.helper";
import type { ChangeSet } from "./types";
import { hostOf, isNodeError, normalizeHost } from "./utils";

export function parseDomainList(text: string): string[] {
  return uniq(
    text
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l && !l.startsWith("#"))
      .map(normalizeHost),
  );
}

export async function readDomainList(filePath: string): Promise<string[]> {
  try {
    return parseDomainList(await readFile(filePath, "utf-8"));
  } catch (err) {
    if (!isNodeError(err, "ENOENT")) logError(`loading proxied domains from ${filePath}`, err);
    return [];
  }
}

export async function writeDomainList(filePath: string, domains: string[]): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, domains.map((d) => `${d}\n`).join(""), "utf-8");
}

export function applyListChanges(domains: string[], changes: ChangeSet): string[] {
  const removed = new Set((changes.del ?? []).map(normalizeHost));
  const renames = new Map((changes.upd ?? []).map((u) => [normalizeHost(u.original), normalizeHost(u.name)]));

  const next = domains.filter((d) => !removed.has(d)).map((d) => renames.get(d) || d);
  for (const add of changes.add ?? []) {
    const domain = normalizeHost(add.name);
    if (!domain) throw new ValidationError("Domain must not be empty");
    if (next.includes(domain)) throw new ValidationError(`Duplicate domain: ${domain}`);
    next.push(domain);
  }
  return uniq(next);
}

/** True when the URL's host is a listed domain or one of its subdomains. */
export function isProxied(domains: readonly string[], url: string): boolean {
  const host = hostOf(url);
  if (!host) return false;
  return domains.some((d) => host === d || host.endsWith(`.${d}`));
}
