import { access, mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { RAG_CONFIG } from "../rag/config.js";
import type { FetchLike } from "../rag/embedding-service.js";
import { DownloadError, errorMessage } from "../rag/errors.js";
import { mergeManifest, type ManifestStore } from "../rag/manifest-store.js";
import type { Manifest } from "../rag/types.js";
import { getLogger, type Logger } from "../utils/logger.js";
import { ensureUniqueFilename, extractPdfLinks, sanitizeFilename } from "./pdf-links.js";

export interface ScrapeOptions {
  /** Re-download files that are already on disk. */
  force?: boolean;
}

export interface ScrapeResult {
  /** Local paths of every discovered PDF now on disk, downloaded or already present. */
  files: string[];
  manifest: Manifest;
  failures: DownloadError[];
}

/** Seed URLs in, local PDFs plus provenance out. */
export interface PdfSource {
  scrapeAndDownload(seedUrls: readonly string[], options?: ScrapeOptions): Promise<ScrapeResult>;
}

export interface PdfScraperOptions {
  downloadDir: string;
  manifestStore: ManifestStore;
  fetch?: FetchLike;
  concurrency?: number;
  politenessDelayMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
}

interface PlannedDownload {
  url: string;
  filename: string;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class PdfScraper implements PdfSource {
  private readonly downloadDir: string;
  private readonly manifestStore: ManifestStore;
  private readonly fetchImpl: FetchLike;
  private readonly concurrency: number;
  private readonly politenessDelayMs: number;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(options: PdfScraperOptions) {
    this.downloadDir = options.downloadDir;
    this.manifestStore = options.manifestStore;
    this.fetchImpl = options.fetch ?? fetch;
    this.concurrency = Math.max(1, options.concurrency ?? RAG_CONFIG.downloadConcurrency);
    this.politenessDelayMs = options.politenessDelayMs ?? RAG_CONFIG.politenessDelayMs;
    this.timeoutMs = options.timeoutMs ?? RAG_CONFIG.requestTimeoutMs;
    this.userAgent = options.userAgent ?? RAG_CONFIG.userAgent;
    this.logger = options.logger ?? getLogger().child({ component: "scraper" });
  }

  async scrapeAndDownload(
    seedUrls: readonly string[],
    options: ScrapeOptions = {},
  ): Promise<ScrapeResult> {
    const force = options.force ?? false;
    const manifest = await this.manifestStore.load();
    const failures: DownloadError[] = [];

    const pdfUrls = new Set<string>();
    for (const seedUrl of seedUrls) {
      this.logger.info({ url: seedUrl }, "scraping page for PDF links");
      try {
        for (const url of await this.discover(seedUrl)) pdfUrls.add(url);
      } catch (err) {
        const failure = err instanceof DownloadError ? err : new DownloadError(seedUrl, errorMessage(err), { cause: err });
        failures.push(failure);
        this.logger.warn({ url: seedUrl, err: failure.message }, "failed to scrape page");
      }
      await this.pause();
    }
    this.logger.info({ count: pdfUrls.size }, "found PDF links");

    await mkdir(this.downloadDir, { recursive: true });
    const { planned, present } = await this.plan([...pdfUrls].sort(), manifest, force);

    const additions: Manifest = {};
    for (const [filename, url] of present) additions[filename] = url;

    const queue = [...planned];
    const workers = Array.from({ length: Math.min(this.concurrency, queue.length) }, async () => {
      for (let item = queue.shift(); item; item = queue.shift()) {
        try {
          await this.download(item);
          additions[item.filename] = item.url;
          this.logger.info({ filename: item.filename }, "downloaded");
        } catch (err) {
          const failure =
            err instanceof DownloadError ? err : new DownloadError(item.url, errorMessage(err), { cause: err });
          failures.push(failure);
          this.logger.warn({ url: item.url, err: failure.message }, "download failed, skipping");
        }
        await this.pause();
      }
    });
    await Promise.all(workers);

    const { manifest: merged, conflicts } = mergeManifest(manifest, additions, { overwrite: force });
    for (const filename of conflicts) {
      this.logger.warn({ filename }, "manifest already maps this file to a different URL, keeping it");
    }
    await this.manifestStore.save(merged);

    const files = Object.keys(additions)
      .sort()
      .map((filename) => path.join(this.downloadDir, filename));
    this.logger.info({ downloaded: files.length, failed: failures.length }, "scrape finished");
    return { files, manifest: merged, failures };
  }

  private async discover(pageUrl: string): Promise<Set<string>> {
    const res = await this.request(pageUrl);
    const contentType = res.headers.get("content-type")?.toLowerCase() ?? "";
    if (contentType.includes("pdf")) {
      // the file itself is fetched again by the download step
      await res.body?.cancel();
      return new Set([res.url || pageUrl]);
    }
    const html = await res.text();
    return extractPdfLinks(html, res.url || pageUrl);
  }

  /**
   * Reuses the filename the manifest already has for a URL. New URLs get a sanitized name
   * that doesn't collide with any other manifest entry.
   */
  private async plan(
    urls: string[],
    manifest: Manifest,
    force: boolean,
  ): Promise<{ planned: PlannedDownload[]; present: Map<string, string> }> {
    const byUrl = new Map<string, string>();
    for (const [filename, url] of Object.entries(manifest)) byUrl.set(url, filename);

    const taken = new Set(Object.keys(manifest));
    const planned: PlannedDownload[] = [];
    const present = new Map<string, string>();

    for (const url of urls) {
      let filename = byUrl.get(url);
      if (!filename) {
        filename = ensureUniqueFilename(taken, sanitizeFilename(url));
        taken.add(filename);
      }

      if (!force && (await fileExists(path.join(this.downloadDir, filename)))) {
        this.logger.debug({ filename }, "already downloaded");
        present.set(filename, url);
        continue;
      }
      planned.push({ url, filename });
    }

    return { planned, present };
  }

  private async download({ url, filename }: PlannedDownload): Promise<void> {
    const res = await this.request(url);
    const body = new Uint8Array(await res.arrayBuffer());
    if (body.length === 0) {
      throw new DownloadError(url, `Empty response body from ${url}`);
    }

    const dest = path.join(this.downloadDir, filename);
    const partPath = `${dest}.part`;
    try {
      await writeFile(partPath, body);
      await rename(partPath, dest);
    } catch (err) {
      await rm(partPath, { force: true });
      throw new DownloadError(url, `Failed to save ${filename}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async request(url: string): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { "User-Agent": this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new DownloadError(url, `Request to ${url} failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok) {
      throw new DownloadError(url, `Failed to fetch ${url} (status: ${res.status})`);
    }
    return res;
  }

  private async pause(): Promise<void> {
    if (this.politenessDelayMs > 0) await sleep(this.politenessDelayMs);
  }
}
