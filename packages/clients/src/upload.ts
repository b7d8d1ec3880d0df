import fetch from "node-fetch";
import {
  ArtifactUploader,
  ErpNextConfig,
  ExportArtifact,
  UploadError,
  UploadResult,
  UploadState,
  errorMessage,
  getLogger,
} from "@print-migrator/core";

export type HttpRequest = {
  method: "PUT" | "POST";
  headers: Record<string, string>;
  body?: string;
  timeout?: number;
};

export type HttpResponseLike = {
  ok: boolean;
  status: number;
  text(): Promise<string>;
};

export type HttpFetch = (url: string, init: HttpRequest) => Promise<HttpResponseLike>;

export type UploadClientOptions = {
  fetchImpl?: HttpFetch;
  sleep?: (ms: number) => Promise<void>;
};

export type UploadStats = {
  total: number;
  success: number;
  failed: number;
  results: UploadResult[];
  errors: Array<{ name: string; error: string; status?: number }>;
};

const RESOURCE = "Print Format";

const defaultFetch: HttpFetch = (url, init) => fetch(url, init);
const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** 5xx and transport failures are transient; any 4xx is final. */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 && status < 600;
}

/**
 * Creates or updates ERPNext Print Format records from Jinja artifacts.
 * Tries PUT on the named record first and falls back to POST when it does not exist.
 */
export class UploadClient implements ArtifactUploader {
  private readonly fetchImpl: HttpFetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log = getLogger("clients");

  constructor(private readonly config: ErpNextConfig, opts: UploadClientOptions = {}) {
    this.fetchImpl = opts.fetchImpl ?? defaultFetch;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  private headers(): Record<string, string> {
    return {
      "content-type": "application/json",
      accept: "application/json",
      authorization: `token ${this.config.apiKey}:${this.config.apiSecret}`,
    };
  }

  private resourceUrl(name?: string): string {
    const base = `${this.config.baseUrl.replace(/\/+$/, "")}/api/resource/${encodeURIComponent(RESOURCE)}`;
    return name === undefined ? base : `${base}/${encodeURIComponent(name)}`;
  }

  printFormatDoc(artifact: ExportArtifact): Record<string, string | number> {
    return {
      name: artifact.name,
      doc_type: artifact.metadata.doctype,
      standard: "No",
      custom_format: 1,
      print_format_type: "Jinja",
      html: artifact.content,
      disabled: 0,
    };
  }

  private async send(artifact: ExportArtifact): Promise<{ status: number; ok: boolean; body: string }> {
    const body = JSON.stringify(this.printFormatDoc(artifact));
    const init = { headers: this.headers(), body, timeout: this.config.timeoutMs };
    let res = await this.fetchImpl(this.resourceUrl(artifact.name), { method: "PUT", ...init });
    if (res.status === 404) {
      this.log.debug("upload.create", { resource: artifact.name });
      res = await this.fetchImpl(this.resourceUrl(), { method: "POST", ...init });
    }
    return { status: res.status, ok: res.ok, body: await res.text() };
  }

  async upload(artifact: ExportArtifact): Promise<UploadResult> {
    if (artifact.kind !== "jinja") {
      throw new UploadError(artifact.name, `only jinja print formats can be uploaded, got ${artifact.kind}`);
    }
    if (artifact.status === "validation_failed") {
      throw new UploadError(artifact.name, "artifact failed validation");
    }

    const maxAttempts = Math.max(1, this.config.maxAttempts);
    const transitions: UploadState[] = [];
    const record = (state: UploadState) => {
      transitions.push(state);
      this.log.trace("upload.state", { resource: artifact.name, ...state });
    };

    for (let attempt = 1; ; attempt++) {
      record({ state: "pending", attempt });
      record({ state: "in_flight", attempt });

      let status: number | undefined;
      let body = "";
      let message = "";
      let cause: unknown;
      try {
        const res = await this.send(artifact);
        if (res.ok) {
          record({ state: "succeeded", attempt, httpStatus: res.status });
          this.log.info("upload.succeeded", { resource: artifact.name, status: res.status, attempts: attempt });
          return { name: artifact.name, status: "succeeded", httpStatus: res.status, attempts: attempt, transitions, body: res.body };
        }
        status = res.status;
        body = res.body;
        message = `HTTP ${res.status}`;
      } catch (e) {
        message = errorMessage(e);
        cause = e;
      }

      const transient = status === undefined || isRetryableStatus(status);
      const retryable = transient && attempt < maxAttempts;
      record(
        status === undefined
          ? { state: "failed", attempt, retryable, error: message }
          : { state: "failed", attempt, retryable, httpStatus: status, error: message }
      );
      if (!retryable) {
        this.log.error("upload.failed", { resource: artifact.name, status, attempts: attempt, error: message, body });
        throw new UploadError(artifact.name, message, status, body, { cause, transitions });
      }
      this.log.warn("upload.attempt.failed", {
        resource: artifact.name,
        status,
        attempt,
        error: message,
        body,
        retry_in_ms: this.config.retryDelayMs,
      });
      if (this.config.retryDelayMs > 0) await this.sleep(this.config.retryDelayMs);
    }
  }

  /** Upload one after another; failures are counted, not thrown. */
  async uploadMany(artifacts: ExportArtifact[]): Promise<UploadStats> {
    const stats: UploadStats = { total: artifacts.length, success: 0, failed: 0, results: [], errors: [] };
    this.log.info("upload.batch.start", { total: stats.total });
    for (const artifact of artifacts) {
      try {
        stats.results.push(await this.upload(artifact));
        stats.success++;
      } catch (e) {
        stats.failed++;
        const status = e instanceof UploadError ? e.status : undefined;
        stats.errors.push(status === undefined ? { name: artifact.name, error: errorMessage(e) } : { name: artifact.name, error: errorMessage(e), status });
      }
    }
    this.log.info("upload.batch.complete", { total: stats.total, success: stats.success, failed: stats.failed });
    return stats;
  }
}
