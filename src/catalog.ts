import { readFile } from "node:fs/promises";
import * as XLSX from "xlsx";
import { log, logError } from "./helpers/log.helper";
import type { Website, WebsiteCatalog } from "./types";
import { isNodeError } from "./utils";

const NAME = "Website Name";
const LINK = "Website Link";
const PROXY = "Require Proxy";
const TRUTHY = new Set(["1", "1.0", "true", "yes"]);

function cellText(v: unknown): string | null {
  if (v === null || v === undefined) return null;
  const s = String(v).trim();
  return s ? s : null;
}

export function requiresProxy(v: unknown): boolean {
  const s = cellText(v);
  return s !== null && TRUTHY.has(s.toLowerCase());
}

/**
 * Every sheet is a category. Sheets without the three expected columns are
 * skipped, as are rows missing a name or a link.
 */
export function parseWorkbook(workbook: XLSX.WorkBook): WebsiteCatalog {
  const catalog: WebsiteCatalog = {};

  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) continue;
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false });
    const header = (rows[0] ?? []).map((h) => cellText(h));
    const [nameCol, linkCol, proxyCol] = [NAME, LINK, PROXY].map((c) => header.indexOf(c));
    if (nameCol < 0 || linkCol < 0 || proxyCol < 0) {
      log.debug(`Sheet "${sheetName}" lacks the website columns, skipped`);
      continue;
    }

    const websites: Website[] = [];
    for (const row of rows.slice(1)) {
      const title = cellText(row[nameCol]);
      const link = cellText(row[linkCol]);
      if (!title || !link) continue;
      websites.push({ title, link, proxyRequired: requiresProxy(row[proxyCol]) });
    }
    catalog[sheetName] = { websites, maxLimit: websites.length };
  }
  return catalog;
}

export async function loadWebsiteCatalog(filePath: string): Promise<WebsiteCatalog> {
  try {
    const workbook = XLSX.read(await readFile(filePath), { type: "buffer" });
    return parseWorkbook(workbook);
  } catch (err) {
    if (!isNodeError(err, "ENOENT")) logError("loading websites", err);
    return {};
  }
}
