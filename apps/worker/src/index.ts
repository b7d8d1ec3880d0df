import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import {
  ConfigError,
  IntermediateStore,
  errorMessage,
  getLogger,
  loadConfig,
  requireCredentials,
  runBatch,
} from "@print-migrator/core";
import { UploadClient } from "@print-migrator/clients";
import { loadManifest } from "./manifest";

// Load env from repo root first, then allow app-local overrides
const rootEnv = path.resolve(__dirname, "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const logger = getLogger("worker");

async function main(): Promise<number> {
  const file = process.argv[2] ?? process.env.MIGRATION_MANIFEST;
  if (!file) {
    throw new ConfigError("Usage: worker <manifest.json> (or set MIGRATION_MANIFEST)", ["MIGRATION_MANIFEST"]);
  }
  const config = loadConfig();
  const manifest = await loadManifest(file);
  const uploader = manifest.upload ? new UploadClient(requireCredentials(config)) : undefined;

  logger.info("worker.start", { manifest: file, version: manifest.version, jobs: manifest.jobs.length, upload: Boolean(uploader) });
  const summary = await runBatch(
    manifest.jobs,
    {
      store: new IntermediateStore(config.dataDir),
      outputDir: config.outputDir,
      extractOptions: { maxBytes: config.pdfMaxBytes },
      uploader,
      export: config.export,
    },
    { concurrency: config.batchConcurrency }
  );

  for (const err of summary.errors) {
    logger.error("worker.document_failed", { document: err.name, error: err.error, code: err.code, body: err.body });
  }
  logger.info("worker.summary", { total: summary.total, success: summary.success, failed: summary.failed });
  return summary.failed > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    logger.error("worker.aborted", { error: errorMessage(e) });
    process.exitCode = 2;
  });
