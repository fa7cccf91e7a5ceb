import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { parse } from "dotenv";
import { ValidationError } from "./errors";
import { log, logError } from "./helpers/log.helper";
import type { ChangeSet, CredentialPair, NamedValue } from "./types";
import { isNodeError } from "./utils";

const LINE = /^\s*(?:export\s+)?(['"]?)(.+?)\1\s*=(.*)$/;

function unquoteValue(raw: string): string {
  // dotenv handles quoting, escapes and trailing comments for the value part
  return parse(`v=${raw.trim()}`).v ?? "";
}

/**
 * Parses `'name'='value'` style lines. Names are unique; a repeated name
 * overwrites the value but keeps its first position.
 */
export function parseEnvEntries(text: string): NamedValue[] {
  const entries = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    if (!line.trim() || line.trimStart().startsWith("#")) continue;
    const m = LINE.exec(line);
    if (!m) continue;
    const name = m[2].trim();
    if (!name) continue;
    entries.set(name, unquoteValue(m[3]));
  }
  return Array.from(entries, ([name, value]) => ({ name, value }));
}

export function serializeEnvEntries(entries: NamedValue[]): string {
  return entries.map(({ name, value }) => `'${name}'='${value}'\n`).join("");
}

export async function readEnvFile(filePath: string): Promise<NamedValue[]> {
  try {
    return parseEnvEntries(await readFile(filePath, "utf-8"));
  } catch (err) {
    if (isNodeError(err, "ENOENT")) {
      log.info(`No credential file at ${filePath}, starting empty`);
    } else {
      logError(`loading ${filePath}`, err);
    }
    return [];
  }
}

export async function writeEnvFile(filePath: string, entries: NamedValue[]): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, serializeEnvEntries(entries), "utf-8");
}

/** Deletes, then renames/updates in place, then appends. */
export function applyEnvChanges(entries: NamedValue[], changes: ChangeSet): NamedValue[] {
  const removed = new Set(changes.del ?? []);
  const updates = new Map((changes.upd ?? []).map((u) => [u.original, u]));

  const next = entries
    .filter((e) => !removed.has(e.name))
    .map((e) => {
      const u = updates.get(e.name);
      if (!u) return e;
      return { name: u.name || e.name, value: u.value || e.value };
    });

  for (const add of changes.add ?? []) {
    if (next.some((e) => e.name === add.name)) {
      throw new ValidationError(`Duplicate name: ${add.name}`);
    }
    next.push({ name: add.name, value: add.value ?? "" });
  }

  const names = new Set(next.map((e) => e.name));
  if (names.size !== next.length) {
    throw new ValidationError("Names must be unique");
  }
  return next;
}

export type CredentialSet = {
  apiKeys: NamedValue[];
  engines: NamedValue[];
};

export async function loadCredentials(apiKeysPath: string, enginesPath: string): Promise<CredentialSet> {
  const [apiKeys, engines] = await Promise.all([readEnvFile(apiKeysPath), readEnvFile(enginesPath)]);
  return { apiKeys, engines };
}

/** Every API key, in file order, paired with the given engine. */
export function pairsForEngine(set: CredentialSet, engineName: string): CredentialPair[] {
  const engine = set.engines.find((e) => e.name === engineName);
  if (!engine) return [];
  return set.apiKeys.map((k) => ({
    keyName: k.name,
    apiKey: k.value,
    engineName: engine.name,
    engineId: engine.value,
  }));
}
