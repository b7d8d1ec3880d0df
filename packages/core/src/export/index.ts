import { createHash } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { RenderError } from "../errors";
import { getLogger } from "../logger";
import { DocTypeSchema, ExportArtifact, ExporterKind, Mapping } from "../types";
import { validateMapping } from "../validation/validator";
import { buildMetadata, ExportMeta, TemplateExporter } from "./base";
import { JinjaExporter } from "./jinja";
import { JsonExporter } from "./json";
import { PreviewExporter } from "./preview";

export const EXPORTER_KINDS = ["jinja", "json", "preview"] as const satisfies readonly ExporterKind[];

export function getExporter(kind: ExporterKind): TemplateExporter {
  switch (kind) {
    case "jinja":
      return new JinjaExporter();
    case "json":
      return new JsonExporter();
    case "preview":
      return new PreviewExporter();
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unsupported exporter '${String(unknownKind)}'`);
    }
  }
}

/**
 * Export without throwing on validation problems: an invalid mapping yields an
 * artifact with status "validation_failed", no content and the errors.
 */
export function exportMapping(kind: ExporterKind, mapping: Mapping, schema: DocTypeSchema, meta: ExportMeta): ExportArtifact {
  const log = getLogger("core").child({ document: meta.name, doctype: schema.id });
  const result = validateMapping(mapping, schema);
  if (!result.isValid) {
    log.warn("export.validation_failed", { exporter: kind, errors: result.errors.length });
    const artifact: ExportArtifact = {
      kind,
      name: meta.name,
      content: "",
      metadata: buildMetadata(schema, meta),
      status: "validation_failed",
      errors: result.errors,
      warnings: result.warnings,
    };
    return Object.freeze(artifact);
  }
  const artifact = getExporter(kind).render(mapping, schema, meta);
  log.info("export.complete", { exporter: kind, status: artifact.status, warnings: artifact.warnings.length });
  return artifact;
}

export function slug(name: string): string {
  const s = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s || "print-format";
}

const PLAIN_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * File stem for a print format name. Plain names are used as they are; any
 * other name is slugged and suffixed with a short hash of the original, so two
 * names never share a file.
 */
export function artifactStem(name: string): string {
  if (PLAIN_NAME.test(name)) return name;
  const digest = createHash("sha1").update(name, "utf8").digest("hex").slice(0, 8);
  return `${slug(name)}-${digest}`;
}

/** Write an artifact as `<stem>.<extension>` under dir and return the file path. */
export async function writeArtifact(artifact: ExportArtifact, dir: string): Promise<string> {
  if (artifact.status === "validation_failed") {
    throw new RenderError(artifact.kind, artifact.name, []);
  }
  const file = path.join(dir, `${artifactStem(artifact.name)}.${getExporter(artifact.kind).extension}`);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(file, artifact.content, "utf8");
  getLogger("core").debug("export.written", { document: artifact.name, file, bytes: Buffer.byteLength(artifact.content) });
  return file;
}

export { escapeHtml, unescapeHtml } from "./escape";
export { BaseExporter, buildMetadata } from "./base";
export type { ExportMeta, TemplateExporter } from "./base";
export { JinjaExporter } from "./jinja";
export { JsonExporter } from "./json";
export { PreviewExporter } from "./preview";
