import { describe, expect, it, vi } from "vitest";
import { DEFAULT_RETRIEVAL_K, Retriever, type SearchableIndex } from "./retriever.js";

describe("Retriever", () => {
  it("searches with the default fan-out of 4", async () => {
    const search = vi.fn<SearchableIndex["search"]>().mockResolvedValue([]);
    const retriever = new Retriever({ search });

    await retriever.retrieve("Red Sea");

    expect(DEFAULT_RETRIEVAL_K).toBe(4);
    expect(search).toHaveBeenCalledWith("Red Sea", 4);
  });

  it("passes through the configured k and the results unchanged", async () => {
    const hit = {
      id: "x",
      text: "Moses parted the Red Sea.",
      filename: "exodus.pdf",
      pageNumber: 1,
      sourceUrl: "",
      chunkIndex: 0,
      score: 0.9,
    };
    const search = vi.fn<SearchableIndex["search"]>().mockResolvedValue([hit]);

    const results = await new Retriever({ search }, 2).retrieve("Moses");

    expect(search).toHaveBeenCalledWith("Moses", 2);
    expect(results).toEqual([hit]);
  });
});
