import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { IntermediateStore, errorMessage, getLogger, loadConfig } from "@print-migrator/core";
import { UploadClient } from "@print-migrator/clients";
import { createApp } from "./app";

// Load env from repo root first, then allow app-local overrides
const rootEnv = path.resolve(__dirname, "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const logger = getLogger("api");

function main() {
  const config = loadConfig();
  const hasCredentials = Boolean(config.erpnext.apiKey && config.erpnext.apiSecret);
  if (!hasCredentials) logger.warn("upload.disabled", { reason: "ERPNEXT_API_KEY/ERPNEXT_API_SECRET not set" });

  const app = createApp({
    config,
    store: new IntermediateStore(config.dataDir),
    uploader: hasCredentials ? new UploadClient(config.erpnext) : undefined,
  });
  app.listen(config.apiPort, () => {
    logger.info("api.listening", { port: config.apiPort, data_dir: config.dataDir, erpnext: config.erpnext.baseUrl });
  });
}

try {
  main();
} catch (e) {
  logger.error("api.start_failed", { error: errorMessage(e) });
  process.exitCode = 1;
}
