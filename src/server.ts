import { startServer } from "./http/server.js";
import { loadConfig } from "./config.js";
import { QueryEngine } from "./core/impl/queryEngine.js";
import { readDictionaryFile } from "./io/dictionary.js";

const config = loadConfig();
const log = (line: string) => console.log(line);

const terms = config.dictionaryPath ? await readDictionaryFile(config.dictionaryPath) : [];
const engine = new QueryEngine(terms, { backend: config.backend });
if (config.dictionaryPath) log(`loaded ${engine.size} terms from ${config.dictionaryPath}`);

const { server, port } = await startServer({
  port: config.port,
  metricsEnabled: config.metricsEnabled,
  engine,
  maxK: config.maxK,
  log: config.logRequests ? log : () => {},
});

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

log(`listening on :${port} (${engine.backend})`);
