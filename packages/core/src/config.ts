import { z } from "zod";
import { ConfigError } from "./errors";

const blankAsUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const intWithDefault = (def: number, min: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).default(def));

const EnvSchema = z.object({
  ERPNEXT_URL: z.preprocess(blankAsUndefined, z.string().url().default("http://localhost:8000")),
  ERPNEXT_API_KEY: z.string().default(""),
  ERPNEXT_API_SECRET: z.string().default(""),
  ERPNEXT_TIMEOUT_MS: intWithDefault(30000, 1),
  UPLOAD_MAX_ATTEMPTS: intWithDefault(3, 1),
  UPLOAD_RETRY_DELAY_MS: intWithDefault(2000, 0),
  DATA_DIR: z.preprocess(blankAsUndefined, z.string().default("./data")),
  OUTPUT_DIR: z.preprocess(blankAsUndefined, z.string().default("./data/output")),
  EXPORT_AUTHOR: z.string().default(""),
  EXPORT_VERSION: z.preprocess(blankAsUndefined, z.string().default("1.0.0")),
  PDF_MAX_SIZE_MB: intWithDefault(50, 1),
  BATCH_CONCURRENCY: intWithDefault(1, 1),
  API_PORT: intWithDefault(3001, 0),
});

export interface ErpNextConfig {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
}

export interface MigratorConfig {
  erpnext: ErpNextConfig;
  dataDir: string;
  outputDir: string;
  export: { author: string; version: string };
  pdfMaxBytes: number;
  batchConcurrency: number;
  apiPort: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MigratorConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => i.path.join("."));
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`, keys);
  }
  const e = parsed.data;
  return {
    erpnext: {
      baseUrl: e.ERPNEXT_URL.replace(/\/+$/, ""),
      apiKey: e.ERPNEXT_API_KEY,
      apiSecret: e.ERPNEXT_API_SECRET,
      timeoutMs: e.ERPNEXT_TIMEOUT_MS,
      maxAttempts: e.UPLOAD_MAX_ATTEMPTS,
      retryDelayMs: e.UPLOAD_RETRY_DELAY_MS,
    },
    dataDir: e.DATA_DIR,
    outputDir: e.OUTPUT_DIR,
    export: { author: e.EXPORT_AUTHOR, version: e.EXPORT_VERSION },
    pdfMaxBytes: e.PDF_MAX_SIZE_MB * 1024 * 1024,
    batchConcurrency: e.BATCH_CONCURRENCY,
    apiPort: e.API_PORT,
  };
}

// Upload needs credentials; extraction and export do not.
export function requireCredentials(config: MigratorConfig): ErpNextConfig {
  const missing: string[] = [];
  if (!config.erpnext.apiKey) missing.push("ERPNEXT_API_KEY");
  if (!config.erpnext.apiSecret) missing.push("ERPNEXT_API_SECRET");
  if (missing.length) {
    throw new ConfigError(`Missing ERPNext credentials: ${missing.join(", ")}`, missing);
  }
  return config.erpnext;
}
