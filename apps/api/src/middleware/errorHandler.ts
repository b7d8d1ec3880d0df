import { NextFunction, Request, Response } from "express";
import {
  ConfigError,
  ExtractionError,
  ExtractionFailure,
  MigratorError,
  RenderError,
  StoreError,
  UploadError,
  ValidationError,
  errorMessage,
  getLogger,
} from "@print-migrator/core";
import { HttpError } from "../errors";

const log = getLogger("api");

const EXTRACTION_STATUS: Record<ExtractionFailure, number> = {
  not_found: 404,
  unreadable: 422,
  too_large: 413,
  not_pdf: 415,
  corrupt: 422,
  password_protected: 422,
};

type ErrorBody = { error: string; message: string; request_id?: string } & Record<string, unknown>;

function toResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof HttpError) {
    const body: ErrorBody = { error: err.code, message: err.message };
    if (err.details !== undefined) body.details = err.details;
    return { status: err.status, body };
  }
  if (err instanceof ValidationError) {
    return { status: 422, body: { error: "validation_failed", message: err.message, field: err.field, issues: err.issues } };
  }
  if (err instanceof RenderError) {
    return { status: 422, body: { error: "render_failed", message: err.message, fields: err.fields } };
  }
  if (err instanceof ExtractionError) {
    return { status: EXTRACTION_STATUS[err.reason], body: { error: "extraction_failed", message: err.message, reason: err.reason } };
  }
  if (err instanceof UploadError) {
    return {
      status: 502,
      body: { error: "upload_failed", message: err.message, upstream_status: err.status ?? null, upstream_body: err.body },
    };
  }
  if (err instanceof ConfigError) {
    return { status: 503, body: { error: "not_configured", message: err.message, keys: err.keys } };
  }
  if (err instanceof StoreError) {
    return { status: 500, body: { error: "store_failed", message: err.message } };
  }
  if (err instanceof MigratorError) {
    return { status: 500, body: { error: err.code.toLowerCase(), message: err.message } };
  }
  // body-parser errors carry their own 4xx status
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return { status: err.status, body: { error: "bad_request", message: errorMessage(err) } };
  }
  return { status: 500, body: { error: "internal", message: "Internal server error" } };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const { status, body } = toResponse(err);
  const requestId = typeof res.locals.requestId === "string" ? res.locals.requestId : undefined;
  const ctx = { request_id: requestId, method: req.method, path: req.path, status, error: errorMessage(err) };
  if (status >= 500) log.error("request.failed", ctx);
  else log.info("request.rejected", ctx);
  if (requestId) body.request_id = requestId;
  res.status(status).json(body);
}
