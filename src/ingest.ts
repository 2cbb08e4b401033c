import "dotenv/config";
import path from "node:path";
import { parseCliArgs, reportFatal } from "./cli.js";
import { loadSettings } from "./rag/config.js";
import { createRagPipeline } from "./rag/pipeline.js";
import { configureLogger, getLogger } from "./utils/logger.js";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  const settings = loadSettings();
  const logger = configureLogger({ level: settings.logLevel, pretty: settings.logPretty });

  const pipeline = createRagPipeline(settings, {
    logger,
    onEmbeddingProgress: (done, total) => logger.debug({ done, total }, "embedding"),
  });

  if (args.add) {
    if (args.files.length === 0) {
      console.error("Usage: ingest --add <file.pdf> [more.pdf...]");
      return 1;
    }
    const added = await pipeline.orchestrator.addPdfs(args.files.map((f) => path.resolve(f)));
    logger.info({ added, total: await pipeline.store.size() }, "index updated");
    return 0;
  }

  const result = await pipeline.orchestrator.run({ forceRescrape: args.rescrape });
  logger.info(
    { states: result.states.join(" -> "), chunks: await pipeline.store.size() },
    "index ready",
  );
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.exitCode = reportFatal(err, getLogger());
  });
