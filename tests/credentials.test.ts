import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  applyEnvChanges,
  loadCredentials,
  pairsForEngine,
  parseEnvEntries,
  readEnvFile,
  writeEnvFile,
} from "../src/credentials";
import { ValidationError } from "../src/errors";

describe("parseEnvEntries", () => {
  it("reads quoted and bare names in file order", () => {
    const text = ["'Primary key'='abc123'", "BACKUP=def456", '"Third one" = "ghi 789"', ""].join("\n");
    expect(parseEnvEntries(text)).toEqual([
      { name: "Primary key", value: "abc123" },
      { name: "BACKUP", value: "def456" },
      { name: "Third one", value: "ghi 789" },
    ]);
  });

  it("skips comments and malformed lines", () => {
    expect(parseEnvEntries("# keys\n\nno equals sign\nA=1\r\n")).toEqual([{ name: "A", value: "1" }]);
  });

  it("keeps the first position of a repeated name with the last value", () => {
    expect(parseEnvEntries("A=1\nB=2\nA=3")).toEqual([
      { name: "A", value: "3" },
      { name: "B", value: "2" },
    ]);
  });
});

describe("applyEnvChanges", () => {
  const entries = [
    { name: "one", value: "1" },
    { name: "two", value: "2" },
    { name: "three", value: "3" },
  ];

  it("deletes, renames in place and appends", () => {
    const next = applyEnvChanges(entries, {
      del: ["one"],
      upd: [
        { original: "two", name: "deux", value: "" },
        { original: "three", name: "three", value: "33" },
      ],
      add: [{ name: "four", value: "4" }],
    });
    expect(next).toEqual([
      { name: "deux", value: "2" },
      { name: "three", value: "33" },
      { name: "four", value: "4" },
    ]);
  });

  it("ignores unknown names", () => {
    expect(applyEnvChanges(entries, { del: ["nope"], upd: [{ original: "nah", name: "x" }] })).toEqual(entries);
  });

  it("rejects duplicate names", () => {
    expect(() => applyEnvChanges(entries, { add: [{ name: "one", value: "x" }] })).toThrow(ValidationError);
    expect(() => applyEnvChanges(entries, { upd: [{ original: "one", name: "two" }] })).toThrow(
      "Names must be unique",
    );
  });
});

describe("credential files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cse-hub-cred-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns nothing for a missing file", async () => {
    expect(await readEnvFile(join(dir, "missing.env"))).toEqual([]);
  });

  it("writes quoted lines that read back the same", async () => {
    const file = join(dir, "nested", "api_keys.env");
    await writeEnvFile(file, [
      { name: "Primary key", value: "abc" },
      { name: "b", value: "def" },
    ]);
    expect(await readFile(file, "utf-8")).toBe("'Primary key'='abc'\n'b'='def'\n");
    expect(await readEnvFile(file)).toEqual([
      { name: "Primary key", value: "abc" },
      { name: "b", value: "def" },
    ]);
  });

  it("pairs every key with the selected engine", async () => {
    await writeFile(join(dir, "api_keys.env"), "'k1'='AAA'\n'k2'='BBB'\n");
    await writeFile(join(dir, "search_engines.env"), "'web'='cx1'\n'news'='cx2'\n");
    const set = await loadCredentials(join(dir, "api_keys.env"), join(dir, "search_engines.env"));

    expect(pairsForEngine(set, "news")).toEqual([
      { keyName: "k1", apiKey: "AAA", engineName: "news", engineId: "cx2" },
      { keyName: "k2", apiKey: "BBB", engineName: "news", engineId: "cx2" },
    ]);
    expect(pairsForEngine(set, "unknown")).toEqual([]);
  });
});
