import "dotenv/config";
import blessed from "blessed";
import { parseChatInput, parseCliArgs, reportFatal } from "./cli.js";
import { loadSettings, type Settings } from "./rag/config.js";
import { formatAnswer } from "./rag/context-builder.js";
import { GenerationError, errorMessage } from "./rag/errors.js";
import { initRagPipeline, type ReadyRagPipeline } from "./rag/pipeline.js";
import { configureLogger, getLogger } from "./utils/logger.js";

// ── Setup ───────────────────────────────────────────────────────────────────
let settings: Settings;
let pipeline: ReadyRagPipeline;
try {
  const args = parseCliArgs(process.argv.slice(2));
  settings = loadSettings();
  const logger = configureLogger({ level: settings.logLevel, pretty: settings.logPretty });
  pipeline = await initRagPipeline(settings, {
    forceRescrape: args.rescrape,
    logger,
    onEmbeddingProgress: (done, total) => logger.debug({ done, total }, "embedding"),
  });
} catch (err) {
  process.exit(reportFatal(err, getLogger()));
}

let answering = false;

// ── UI Setup ────────────────────────────────────────────────────────────────
const screen = blessed.screen({
  smartCSR: true,
  title: "study chat",
});

const chatBox = blessed.log({
  parent: screen,
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-3",
  scrollable: true,
  alwaysScroll: true,
  scrollbar: {
    ch: "│",
    style: { bg: "blue" },
  },
  border: { type: "line" },
  style: {
    border: { fg: "blue" },
  },
  label: ` study chat — ${settings.chatModel} `,
  tags: true,
  mouse: true,
});

const inputBox = blessed.textbox({
  parent: screen,
  bottom: 0,
  left: 0,
  width: "100%",
  height: 3,
  border: { type: "line" },
  style: {
    border: { fg: "green" },
    focus: { border: { fg: "yellow" } },
  },
  label: " you > ",
  inputOnFocus: false,
  mouse: true,
});

// Interrupt or end of input: leave without waiting for an in-flight answer.
// The index is only read here, so there is nothing to flush.
function quit(): void {
  screen.destroy();
  process.exit(0);
}

screen.key(["C-c", "C-d"], quit);
inputBox.key(["C-c", "C-d"], quit);

// Re-focus input whenever it loses focus (e.g. mouse click on chatBox)
// Use setTimeout to break the blur→focus→render→blur cycle
inputBox.on("blur", () => {
  if (!answering) setTimeout(() => promptInput(), 0);
});

chatBox.log("Ask a question about the study materials. Type 'exit', 'quit' or 'q' to stop.");
chatBox.log(`{grey-fg}${pipeline.ingestion.states.join(" → ")}{/}`);
chatBox.log("");
screen.render();

// ── Input Helpers ───────────────────────────────────────────────────────────
function promptInput(): void {
  inputBox.readInput(() => {/* handled by submit event */});
}

// ── Spinner ─────────────────────────────────────────────────────────────────
const spinFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
let spinIdx = 0;
let spinTimer: ReturnType<typeof setInterval> | null = null;
let spinElapsed = 0;
let spinLabel = "searching";

function startSpinner(label: string): void {
  stopSpinner();
  spinLabel = label;
  spinIdx = 0;
  spinElapsed = 0;
  updateSpinnerLine();
  spinTimer = setInterval(() => {
    spinIdx = (spinIdx + 1) % spinFrames.length;
    spinElapsed += 100;
    updateSpinnerLine();
  }, 100);
}

function lastLineHasSpinner(): number | null {
  const lines: string[] = chatBox.getLines();
  const lastIdx = lines.length - 1;
  const last = lines[lastIdx];
  return last !== undefined && last.includes(spinLabel) ? lastIdx : null;
}

function updateSpinnerLine(): void {
  const idx = lastLineHasSpinner();
  if (idx !== null) chatBox.deleteLine(idx);
  const secs = (spinElapsed / 1000).toFixed(1);
  chatBox.log(`{grey-fg}  ${spinFrames[spinIdx] ?? ""} ${spinLabel}... ${secs}s{/}`);
  screen.render();
}

function stopSpinner(): void {
  if (spinTimer) {
    clearInterval(spinTimer);
    spinTimer = null;
  }
  const idx = lastLineHasSpinner();
  if (idx !== null) chatBox.deleteLine(idx);
}

// ── Chat Logic ──────────────────────────────────────────────────────────────
async function answerQuestion(question: string): Promise<void> {
  startSpinner("searching");
  const answer = await pipeline.assembler.answer(question);
  stopSpinner();

  for (const line of formatAnswer(answer).split("\n")) {
    chatBox.log("  " + blessed.escape(line));
  }
}

// ── Input Handler ───────────────────────────────────────────────────────────
inputBox.on("submit", (value: string) => {
  inputBox.clearValue();
  screen.render();

  const input = parseChatInput(value);
  if (input.kind === "exit") {
    quit();
    return;
  }
  if (input.kind === "empty" || answering) {
    promptInput();
    return;
  }

  chatBox.log(`{green-fg}you >{/} ${blessed.escape(input.text)}`);
  answering = true;
  inputBox.style.border.fg = "grey";
  (inputBox as blessed.Widgets.BoxElement).setLabel(" ... ");
  screen.render();

  answerQuestion(input.text)
    .catch((err: unknown) => {
      stopSpinner();
      // scoped to this question; the loop carries on
      const prefix = err instanceof GenerationError ? "generation error" : "error";
      chatBox.log(`{red-fg}${prefix}:{/} ${blessed.escape(errorMessage(err))}`);
    })
    .finally(() => {
      answering = false;
      chatBox.log("");
      inputBox.style.border.fg = "green";
      (inputBox as blessed.Widgets.BoxElement).setLabel(" you > ");
      screen.render();
      promptInput();
    });
});

inputBox.key(["escape"], () => {
  inputBox.cancel();
});

screen.render();
promptInput();
