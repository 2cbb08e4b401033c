import { afterEach, describe, expect, it, vi } from "vitest";
import { parseChatInput, parseCliArgs, reportFatal } from "./cli.js";
import { ConfigurationError, NoPdfsError } from "./rag/errors.js";
import { silentLogger } from "./testing/fakes.js";

describe("parseCliArgs", () => {
  it("defaults every flag to off", () => {
    expect(parseCliArgs([])).toEqual({ rescrape: false, add: false, files: [] });
  });

  it("reads --rescrape and --add with file arguments", () => {
    expect(parseCliArgs(["--rescrape"])).toEqual({ rescrape: true, add: false, files: [] });
    expect(parseCliArgs(["--add", "a.pdf", "b.pdf"])).toEqual({
      rescrape: false,
      add: true,
      files: ["a.pdf", "b.pdf"],
    });
  });

  it("reports unknown flags as a configuration error with usage", () => {
    let caught: unknown;
    try {
      parseCliArgs(["--verbose"]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      remediation: "Usage: chat [--rescrape] | ingest [--rescrape] [--add <file.pdf>...]",
    });
    const printed = vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(reportFatal(caught, silentLogger())).toBe(1);
    expect(printed).toHaveBeenCalledTimes(2);
    printed.mockRestore();
  });
});

describe("parseChatInput", () => {
  it("recognizes the exit commands in any case", () => {
    expect(parseChatInput("exit")).toEqual({ kind: "exit" });
    expect(parseChatInput("  QUIT ")).toEqual({ kind: "exit" });
    expect(parseChatInput("q")).toEqual({ kind: "exit" });
  });

  it("ignores blank lines", () => {
    expect(parseChatInput("   ")).toEqual({ kind: "empty" });
  });

  it("trims questions", () => {
    expect(parseChatInput("  Who parted the Red Sea? ")).toEqual({
      kind: "question",
      text: "Who parted the Red Sea?",
    });
  });
});

describe("reportFatal", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints configuration problems with their remediation", () => {
    const printed = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const code = reportFatal(
      new ConfigurationError("OPENAI_API_KEY environment variable is required.", "Set it in .env."),
      silentLogger(),
    );

    expect(code).toBe(1);
    expect(printed.mock.calls).toEqual([
      ["Error: OPENAI_API_KEY environment variable is required."],
      ["  Set it in .env."],
    ]);
  });

  it("logs other pipeline errors with their code", () => {
    const logger = silentLogger();
    const logged = vi.spyOn(logger, "error");
    const err = new NoPdfsError();

    expect(reportFatal(err, logger)).toBe(1);
    expect(logged).toHaveBeenCalledWith({ code: "NO_PDFS", err }, "No PDFs were downloaded");
  });
});
