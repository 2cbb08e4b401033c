import { readFile } from "node:fs/promises";
import path from "node:path";
import { getDocumentProxy } from "unpdf";
import { errorMessage } from "./errors.js";
import type { ExtractedDocument, ExtractionFailure, PageContent } from "./types.js";

/** One way of turning PDF bytes into raw per-page text. Index i holds page i + 1. */
export interface PdfTextStrategy {
  readonly name: string;
  extractPages(data: Uint8Array): Promise<string[]>;
}

interface TextContentLike {
  items: ReadonlyArray<object>;
}

function joinTextItems(content: TextContentLike): string {
  return content.items
    .map((item) => ("str" in item && typeof item.str === "string" ? item.str : ""))
    .join(" ");
}

export const unpdfStrategy: PdfTextStrategy = {
  name: "unpdf",
  async extractPages(data) {
    const pdf = await getDocumentProxy(data);
    try {
      const pages: string[] = [];
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        pages.push(joinTextItems(await page.getTextContent()));
      }
      return pages;
    } finally {
      await pdf.destroy();
    }
  },
};

// Dynamic import — the legacy build is only loaded when the first strategy fails
let _pdfjs: typeof import("pdfjs-dist/legacy/build/pdf.mjs") | null = null;

async function getPdfjs() {
  if (!_pdfjs) {
    _pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  }
  return _pdfjs;
}

export const pdfjsStrategy: PdfTextStrategy = {
  name: "pdfjs-dist",
  async extractPages(data) {
    const pdfjs = await getPdfjs();
    const pdf = await pdfjs.getDocument({
      data,
      useSystemFonts: true,
      isEvalSupported: false,
    }).promise;

    try {
      const pages: string[] = [];
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        pages.push(joinTextItems(await page.getTextContent()));
      }
      return pages;
    } finally {
      await pdf.destroy();
    }
  },
};

export const DEFAULT_STRATEGIES: readonly PdfTextStrategy[] = [unpdfStrategy, pdfjsStrategy];

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Tries each strategy in order and keeps the first that yields any text.
 * Never throws: an unreadable file comes back with zero pages and the reasons in `failures`.
 */
export async function extractPdf(
  filePath: string,
  strategies: readonly PdfTextStrategy[] = DEFAULT_STRATEGIES,
): Promise<ExtractedDocument> {
  const doc: ExtractedDocument = {
    source: path.basename(filePath),
    filePath: path.resolve(filePath),
    pages: [],
    strategy: null,
    failures: [],
  };

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (err) {
    doc.failures.push({ strategy: "read", reason: errorMessage(err) });
    return doc;
  }

  for (const strategy of strategies) {
    const failure = await tryStrategy(strategy, buffer, doc);
    if (!failure) return doc;
    doc.failures.push(failure);
  }

  return doc;
}

async function tryStrategy(
  strategy: PdfTextStrategy,
  buffer: Buffer,
  doc: ExtractedDocument,
): Promise<ExtractionFailure | null> {
  let rawPages: string[];
  try {
    // pdf.js may detach the buffer it is given, so every strategy gets its own copy
    rawPages = await strategy.extractPages(new Uint8Array(buffer));
  } catch (err) {
    return { strategy: strategy.name, reason: errorMessage(err) };
  }

  const pages: PageContent[] = [];
  rawPages.forEach((raw, i) => {
    const text = normalizeWhitespace(raw);
    if (text) pages.push({ pageNumber: i + 1, text });
  });

  if (pages.length === 0) {
    return { strategy: strategy.name, reason: "no text found on any page" };
  }

  doc.pages = pages;
  doc.strategy = strategy.name;
  return null;
}
