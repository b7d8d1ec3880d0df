import { RenderError } from "../errors";
import { getLogger } from "../logger";
import { validateMapping } from "../validation/validator";
import { ArtifactMetadata, DocTypeSchema, ExportArtifact, ExporterKind, Mapping } from "../types";

export interface ExportMeta {
  name: string;
  title?: string;
  author?: string;
  version?: string;
  now?: () => Date;
}

export interface TemplateExporter {
  readonly kind: ExporterKind;
  readonly extension: string;
  /** Throws RenderError when the mapping does not validate. */
  render(mapping: Mapping, schema: DocTypeSchema, meta: ExportMeta): ExportArtifact;
}

export function buildMetadata(schema: DocTypeSchema, meta: ExportMeta): ArtifactMetadata {
  const now = meta.now ?? (() => new Date());
  return {
    doctype: schema.doctype,
    schemaId: schema.id,
    name: meta.name,
    title: meta.title ?? schema.title,
    version: meta.version ?? "1.0.0",
    author: meta.author ?? "",
    exportedAt: now().toISOString(),
  };
}

export abstract class BaseExporter implements TemplateExporter {
  abstract readonly kind: ExporterKind;
  abstract readonly extension: string;

  // Must not depend on metadata.exportedAt: identical inputs give identical content.
  protected abstract renderContent(mapping: Mapping, schema: DocTypeSchema, metadata: ArtifactMetadata): string;

  render(mapping: Mapping, schema: DocTypeSchema, meta: ExportMeta): ExportArtifact {
    const log = getLogger("core").child({ document: meta.name, doctype: schema.id });
    const result = validateMapping(mapping, schema);
    if (!result.isValid) {
      const fields = Array.from(new Set(result.issues.filter((i) => i.severity === "error").map((i) => i.field)));
      log.warn("export.rejected", { exporter: this.kind, fields });
      throw new RenderError(this.kind, meta.name, fields);
    }
    const metadata = buildMetadata(schema, meta);
    const content = this.renderContent(mapping, schema, metadata);
    log.debug("export.rendered", { exporter: this.kind, bytes: Buffer.byteLength(content), warnings: result.warnings.length });
    const artifact: ExportArtifact = {
      kind: this.kind,
      name: meta.name,
      content,
      metadata,
      status: result.warnings.length ? "partial" : "success",
      errors: [],
      warnings: result.warnings,
    };
    return Object.freeze(artifact);
  }
}
