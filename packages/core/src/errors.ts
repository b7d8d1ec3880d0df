import { UploadState, ValidationIssue } from "./types";

export type ErrorCode =
  | "EXTRACTION_FAILED"
  | "VALIDATION_FAILED"
  | "RENDER_FAILED"
  | "UPLOAD_FAILED"
  | "STORE_FAILED"
  | "CONFIG_INVALID";

export class MigratorError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ExtractionFailure =
  | "not_found"
  | "unreadable"
  | "too_large"
  | "not_pdf"
  | "corrupt"
  | "password_protected";

export class ExtractionError extends MigratorError {
  public readonly reason: ExtractionFailure;
  public readonly file: string;

  constructor(file: string, reason: ExtractionFailure, detail?: string, options?: { cause?: unknown }) {
    super(`Cannot extract '${file}': ${reason.replace(/_/g, " ")}${detail ? ` (${detail})` : ""}`, "EXTRACTION_FAILED", { file, reason }, options);
    this.reason = reason;
    this.file = file;
  }
}

export class ValidationError extends MigratorError {
  public readonly field: string;
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const first = issues[0];
    const field = first?.field ?? "";
    super(first ? first.message : "Mapping is invalid", "VALIDATION_FAILED", { field, fields: issues.map((i) => i.field) });
    this.field = field;
    this.issues = issues;
  }
}

export class RenderError extends MigratorError {
  public readonly fields: string[];

  constructor(exporter: string, document: string, fields: string[], options?: { cause?: unknown }) {
    super(`Refusing to render '${document}' with ${exporter}: invalid mapping${fields.length ? ` for ${fields.join(", ")}` : ""}`, "RENDER_FAILED", { exporter, document, fields }, options);
    this.fields = fields;
  }
}

export class UploadError extends MigratorError {
  public readonly resource: string;
  public readonly status?: number;
  public readonly body: string;
  public readonly transitions: UploadState[];

  constructor(
    resource: string,
    message: string,
    status?: number,
    body = "",
    options?: { cause?: unknown; transitions?: UploadState[] }
  ) {
    super(`Upload of '${resource}' failed: ${message}`, "UPLOAD_FAILED", { resource, status }, { cause: options?.cause });
    this.resource = resource;
    this.status = status;
    this.body = body;
    this.transitions = options?.transitions ?? [];
  }
}

export class StoreError extends MigratorError {
  public readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`Intermediate file '${file}': ${message}`, "STORE_FAILED", { file }, options);
    this.file = file;
  }
}

export class ConfigError extends MigratorError {
  public readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super(message, "CONFIG_INVALID", { keys });
    this.keys = keys;
  }
}

// matched by shape: fs and pdf.js errors may come from another realm
export function errorMessage(e: unknown): string {
  if (typeof e === "object" && e !== null && "message" in e && typeof e.message === "string") return e.message;
  return String(e);
}

export function hasErrorCode(e: unknown, code: string): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === code;
}

export function hasErrorName(e: unknown, name: string): boolean {
  return typeof e === "object" && e !== null && "name" in e && e.name === name;
}
