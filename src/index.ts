import { buildApp } from "./app";
import { loadOverviewConfig } from "./config/overview_config";
import { buildLoggerOptions } from "./logger";

const config = loadOverviewConfig();
const app = buildApp({
  logger: buildLoggerOptions(config),
  duplicatePolicy: config.duplicatePolicy,
});

async function main() {
  await app.listen({ port: config.port, host: config.host });
  app.log.info({ duplicatePolicy: config.duplicatePolicy }, "server.started");
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
