import "dotenv/config";
import { loadConfig } from "../config/loader.js";
import { createInsightsService } from "../service/bootstrap.js";
import { createLogger } from "../lib/logger.js";
import { createApp } from "./app.js";

// ---------------------------------------------------------------------------
// Server entry point
// ---------------------------------------------------------------------------

const config = loadConfig();
const log = createLogger({ level: config.logLevel, scope: "http" });
const service = createInsightsService(config);
const app = createApp(service, config, log);

app.listen(config.port, () => {
  log.info("Listening", {
    port: config.port,
    llmEnabled: service.llmEnabled,
    origins: config.allowedOrigins.join(","),
  });
});
