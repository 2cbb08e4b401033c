import { describe, expect, it } from "vitest";
import { ensureUniqueFilename, extractPdfLinks, sanitizeFilename } from "./pdf-links.js";

describe("extractPdfLinks", () => {
  it("collects anchors and embedded viewers resolved against the page URL", () => {
    const html = `
      <html><body>
        <a href="/files/study1.pdf">Study 1</a>
        <a href="/about">About</a>
        <iframe src="https://x.com/v/study2.pdf"></iframe>
        <embed src="https://y.com/a/study3.PDF">
      </body></html>`;

    expect(extractPdfLinks(html, "https://site.org/base/")).toEqual(
      new Set([
        "https://site.org/files/study1.pdf",
        "https://x.com/v/study2.pdf",
        "https://y.com/a/study3.PDF",
      ]),
    );
  });

  it("reads object data attributes and link tags and drops duplicates", () => {
    const html = `
      <head><link rel="alternate" href="notes.pdf"></head>
      <object data="viewer/notes.pdf"></object>
      <a href="notes.pdf">again</a>`;

    expect([...extractPdfLinks(html, "https://site.org/lessons/")].sort()).toEqual([
      "https://site.org/lessons/notes.pdf",
      "https://site.org/lessons/viewer/notes.pdf",
    ]);
  });

  it("finds nothing in a page without PDF references", () => {
    expect(extractPdfLinks(`<a href="/index.html">home</a><img src="a.png">`, "https://site.org/")).toEqual(
      new Set(),
    );
  });
});

describe("sanitizeFilename", () => {
  it("keeps the last path segment and replaces unsafe characters", () => {
    expect(sanitizeFilename("https://site.org/files/My%20Study.pdf")).toBe("My_20Study.pdf");
    expect(sanitizeFilename("https://site.org/files/study1.pdf?download=1")).toBe("study1.pdf");
  });

  it("adds the extension when the URL has none", () => {
    expect(sanitizeFilename("https://site.org/view")).toBe("view.pdf");
    expect(sanitizeFilename("https://site.org/")).toBe("download.pdf");
  });
});

describe("ensureUniqueFilename", () => {
  it("returns the name unchanged when it is free", () => {
    expect(ensureUniqueFilename(["a.pdf"], "b.pdf")).toBe("b.pdf");
  });

  it("numbers the stem until the name is free", () => {
    expect(ensureUniqueFilename(["a.pdf", "a_1.pdf"], "a.pdf")).toBe("a_2.pdf");
  });
});
