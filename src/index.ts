import "dotenv/config";
import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { buildRuntime } from "./runtime.js";

const config = loadRuntimeConfig();
const runtime = buildRuntime(config);
const app = buildApp(config, runtime);

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    runtime.logger.info(
      { host: config.host, port: config.port, storage: config.storageBackend, providers: config.providers },
      "settlement API listening",
    );
  })
  .catch((error: unknown) => {
    runtime.logger.fatal({ err: error }, "failed to start settlement API");
    process.exit(1);
  });
