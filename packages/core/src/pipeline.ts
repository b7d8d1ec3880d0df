import { MigratorError, UploadError, errorMessage } from "./errors";
import { exportMapping, writeArtifact } from "./export";
import { extractElements } from "./ingest/pdf";
import { ExtractOptions } from "./ingest/types";
import { getLogger } from "./logger";
import { proposeMapping } from "./mapping/mapper";
import { getDocType } from "./schemas";
import { IntermediateStore } from "./store/intermediate";
import { ArtifactUploader, ExportArtifact, ExporterKind, MappingOverrides, UploadResult, ValidationResult } from "./types";
import { assertValidMapping } from "./validation/validator";

export interface MigrationJob {
  name: string;
  doctype: string;
  sourcePdf: string;
}

export interface PipelineDeps {
  store: IntermediateStore;
  outputDir: string;
  extractOptions?: ExtractOptions;
  uploader?: ArtifactUploader;
  export?: { author?: string; version?: string; now?: () => Date };
}

export interface DocumentResult {
  name: string;
  doctype: string;
  elements: number;
  validation: ValidationResult;
  files: Array<{ kind: ExporterKind; file: string }>;
  upload?: UploadResult;
}

export interface BatchError {
  name: string;
  error: string;
  code?: string;
  // response body of a rejected upload, as ERPNext sent it
  body?: string;
}

export interface BatchSummary {
  total: number;
  success: number;
  failed: number;
  results: DocumentResult[];
  errors: BatchError[];
}

const EXPORTS: ExporterKind[] = ["jinja", "json"];

/**
 * Run one document end to end: extract, persist, map, validate, export and,
 * when an uploader is given, upload the Jinja print format. Each run maps the
 * current PDF afresh; only a reviewed mapping is carried over between runs.
 */
export async function processDocument(job: MigrationJob, deps: PipelineDeps): Promise<DocumentResult> {
  const log = getLogger("core").child({ document: job.name, doctype: job.doctype });
  const schema = getDocType(job.doctype);
  log.info("pipeline.start", { source: job.sourcePdf });

  const elements = await extractElements(job.sourcePdf, deps.extractOptions);
  await deps.store.saveElements(job.name, elements);

  // a mapping confirmed by a person takes precedence over the heuristic
  const review = await deps.store.loadReview(job.name);
  const overrides: MappingOverrides = review && review.doctype === schema.id ? review.mapping : {};
  const { mapping } = proposeMapping(elements, schema, overrides);
  await deps.store.saveMapping(job.name, schema.id, mapping);

  const validation = assertValidMapping(mapping, schema);

  const meta = { name: job.name, ...deps.export };
  const files: DocumentResult["files"] = [];
  let template: ExportArtifact | null = null;
  for (const kind of EXPORTS) {
    const artifact = exportMapping(kind, mapping, schema, meta);
    files.push({ kind, file: await writeArtifact(artifact, deps.outputDir) });
    if (kind === "jinja") template = artifact;
  }

  const result: DocumentResult = { name: job.name, doctype: schema.id, elements: elements.length, validation, files };
  if (deps.uploader && template) {
    result.upload = await deps.uploader.upload(template);
  }
  log.info("pipeline.complete", { warnings: validation.warnings.length, uploaded: Boolean(result.upload) });
  return result;
}

/**
 * Process jobs with a fixed number of concurrent workers. A failing document is
 * recorded in `errors` and never stops the rest of the batch.
 */
export async function runBatch(
  jobs: MigrationJob[],
  deps: PipelineDeps,
  opts: { concurrency?: number } = {}
): Promise<BatchSummary> {
  const log = getLogger("core");
  const concurrency = Math.max(1, opts.concurrency ?? 1);
  const results: DocumentResult[] = [];
  const errors: BatchError[] = [];
  let next = 0;

  const worker = async () => {
    while (next < jobs.length) {
      const job = jobs[next++];
      try {
        results.push(await processDocument(job, deps));
      } catch (e) {
        const entry: BatchError = { name: job.name, error: errorMessage(e) };
        if (e instanceof MigratorError) entry.code = e.code;
        if (e instanceof UploadError && e.body) entry.body = e.body;
        log.error("pipeline.failed", { document: job.name, error: entry.error, code: entry.code, body: entry.body });
        errors.push(entry);
      }
    }
  };

  log.info("batch.start", { total: jobs.length, concurrency });
  await Promise.all(Array.from({ length: Math.min(concurrency, jobs.length) }, () => worker()));

  const summary: BatchSummary = { total: jobs.length, success: results.length, failed: errors.length, results, errors };
  log.info("batch.complete", { total: summary.total, success: summary.success, failed: summary.failed });
  return summary;
}
