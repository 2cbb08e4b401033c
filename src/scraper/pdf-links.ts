import path from "node:path";
import * as cheerio from "cheerio";

/**
 * Collects PDF URLs from anchors and links plus embedded viewers (iframe, embed, object),
 * resolved against the page URL. Matching is on "pdf" anywhere in the value, any case.
 */
export function extractPdfLinks(html: string, baseUrl: string): Set<string> {
  const $ = cheerio.load(html);
  const urls = new Set<string>();

  const maybeAdd = (value: string | undefined) => {
    if (!value || !value.toLowerCase().includes("pdf")) return;
    if (!URL.canParse(value, baseUrl)) return;
    urls.add(new URL(value, baseUrl).toString());
  };

  $("a[href], link[href]").each((_, el) => {
    maybeAdd($(el).attr("href"));
  });

  $("iframe, embed, object").each((_, el) => {
    const $el = $(el);
    maybeAdd($el.attr("src") ?? $el.attr("data"));
  });

  return urls;
}

export function sanitizeFilename(url: string): string {
  const pathname = URL.canParse(url) ? new URL(url).pathname : url;
  let name = path.posix.basename(pathname) || "download.pdf";
  name = name.replace(/[^a-zA-Z0-9._-]/g, "_");
  if (!name.toLowerCase().endsWith(".pdf")) {
    name = `${name}.pdf`;
  }
  return name;
}

export function ensureUniqueFilename(existing: Iterable<string>, desired: string): string {
  const taken = new Set(existing);
  if (!taken.has(desired)) return desired;

  const ext = path.extname(desired);
  const stem = desired.slice(0, desired.length - ext.length);
  for (let counter = 1; ; counter++) {
    const candidate = `${stem}_${counter}${ext}`;
    if (!taken.has(candidate)) return candidate;
  }
}
