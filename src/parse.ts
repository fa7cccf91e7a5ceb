import { load } from "cheerio";
import { trimTo } from "./utils";

/**
 * Points relative links of a proxied page back at its origin by injecting a
 * `<base href>` as the first element of `<head>`.
 */
export function rebaseHtml(html: string, url: string): string {
  const $ = load(html);
  $("base").remove();

  // load() always builds a full document, so <head> exists
  $("head").prepend($("<base>").attr("href", url));
  return $.html();
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function placeholderHtml(url: string, reason: string): string {
  const u = escapeHtml(url);
  return [
    "<!doctype html>",
    '<html><head><meta charset="utf-8"><title>Preview unavailable</title></head>',
    "<body>",
    "<h1>Preview unavailable</h1>",
    `<p>Could not load <a href="${u}" target="_blank" rel="noopener">${u}</a>.</p>`,
    `<p>${escapeHtml(trimTo(reason, 300) ?? "")}</p>`,
    "</body></html>",
  ].join("\n");
}
