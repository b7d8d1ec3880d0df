import { ArtifactMetadata, DocTypeSchema, Mapping } from "../types";
import { BaseExporter } from "./base";
import { escapeHtml } from "./escape";
import { renderPage } from "./html";

// Same layout as the template with the mapped values filled in, for review before upload.
export class PreviewExporter extends BaseExporter {
  readonly kind = "preview";
  readonly extension = "preview.html";

  protected renderContent(mapping: Mapping, schema: DocTypeSchema, metadata: ArtifactMetadata): string {
    return renderPage(mapping, schema, metadata, {
      scalar: (field) => {
        const value = mapping[field.name];
        return typeof value === "string" ? escapeHtml(value) : "";
      },
      tableBody: (field) => {
        const rows = mapping[field.name];
        if (!Array.isArray(rows)) return [];
        const width = field.columns?.length ?? 0;
        return rows.map((row) => {
          const cells: string[] = [];
          for (let i = 0; i < width; i++) cells.push(`<td>${escapeHtml(row[i] ?? "")}</td>`);
          return `<tr>${cells.join("")}</tr>`;
        });
      },
    });
  }
}
