import { loadConfig } from "./config.js";
import { loadCorpus } from "./corpus/loader.js";
import { createInMemoryEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";
import { createConsoleLogger } from "./logging.js";

const config = loadConfig();
const logger = createConsoleLogger({ minLevel: config.logLevel, format: config.logFormat });

const docs = await loadCorpus(config.artRoot, { maxBytes: config.maxDocumentBytes, logger });
const engine = createInMemoryEngine(docs, {
  selection: config.selection,
  tieBreaker: config.tieBreaker,
  logger,
});

const { server, port } = await startServer({ port: config.port, engine, logger });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

logger.info(`listening on :${port}`, { documents: engine.size(), selection: config.selection });
