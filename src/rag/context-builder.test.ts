import { describe, expect, it } from "vitest";
import {
  buildContext,
  buildUserPrompt,
  citationTag,
  collectSources,
  formatAnswer,
} from "./context-builder.js";

describe("context builder", () => {
  it("tags each excerpt with its file and page", () => {
    expect(citationTag({ filename: "exodus.pdf", pageNumber: 1 })).toBe("[exodus.pdf p.1]");
    expect(
      buildContext([
        { filename: "exodus.pdf", pageNumber: 1, text: "Moses parted the Red Sea." },
        { filename: "acts.pdf", pageNumber: 3, text: "Paul wrote letters." },
      ]),
    ).toBe("[exodus.pdf p.1] Moses parted the Red Sea.\n\n[acts.pdf p.3] Paul wrote letters.");
  });

  it("puts the question before the context", () => {
    expect(buildUserPrompt("Who?", "[a.pdf p.1] text")).toBe(
      "Question: Who?\n\nContext:\n[a.pdf p.1] text",
    );
  });

  it("lists each page once, sorted", () => {
    expect(
      collectSources([
        { filename: "john.pdf", pageNumber: 2 },
        { filename: "acts.pdf", pageNumber: 3 },
        { filename: "john.pdf", pageNumber: 2 },
        { filename: "acts.pdf", pageNumber: 1 },
      ]),
    ).toEqual(["acts.pdf (p.1)", "acts.pdf (p.3)", "john.pdf (p.2)"]);
  });

  it("formats the answer with its sources line", () => {
    expect(formatAnswer({ body: "He did.", sources: ["a.pdf (p.1)", "b.pdf (p.2)"] })).toBe(
      "He did.\n\nSources: a.pdf (p.1); b.pdf (p.2)",
    );
    expect(formatAnswer({ body: "No idea.", sources: [] })).toBe("No idea.\n\nSources: None");
  });
});
