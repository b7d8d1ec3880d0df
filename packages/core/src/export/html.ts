import { ArtifactMetadata, DocTypeSchema, Mapping, SchemaFieldDescriptor } from "../types";
import { escapeHtml } from "./escape";

const STYLE = [
  "body { font-family: Arial, sans-serif; margin: 20px; }",
  ".header { font-size: 18px; font-weight: bold; margin-bottom: 20px; }",
  ".section { margin-top: 15px; margin-bottom: 15px; }",
  ".field-label { font-weight: bold; display: inline-block; width: 180px; }",
  "table { width: 100%; border-collapse: collapse; margin-top: 10px; }",
  "th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }",
  "th { background-color: #f2f2f2; }",
];

export interface CellWriter {
  scalar(field: SchemaFieldDescriptor): string;
  // one entry per output line of the table body
  tableBody(field: SchemaFieldDescriptor): string[];
}

/** Shared page layout for the template and preview exporters. Only mapped fields are laid out. */
export function renderPage(mapping: Mapping, schema: DocTypeSchema, metadata: ArtifactMetadata, cells: CellWriter): string {
  const mapped = schema.fields.filter((f) => Object.prototype.hasOwnProperty.call(mapping, f.name));
  const scalars = mapped.filter((f) => f.type !== "table");
  const tables = mapped.filter((f) => f.type === "table");

  const out: string[] = [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="UTF-8">',
    `<meta name="print-format" content="${escapeHtml(metadata.name)}">`,
    `<meta name="doctype" content="${escapeHtml(metadata.doctype)}">`,
    `<meta name="version" content="${escapeHtml(metadata.version)}">`,
  ];
  if (metadata.author) out.push(`<meta name="author" content="${escapeHtml(metadata.author)}">`);
  out.push(`<title>${escapeHtml(metadata.title)}</title>`, "<style>", ...STYLE, "</style>", "</head>", "<body>");
  out.push(`<div class="header">${escapeHtml(metadata.title)}</div>`);

  if (scalars.length) {
    out.push('<div class="section">');
    for (const field of scalars) {
      out.push(
        `<div class="field"><span class="field-label">${escapeHtml(field.label)}</span> <span class="field-value">${cells.scalar(field)}</span></div>`
      );
    }
    out.push("</div>");
  }

  for (const field of tables) {
    const columns = field.columns ?? [];
    out.push(
      `<div class="section" data-table="${escapeHtml(field.name)}">`,
      `<div class="table-title">${escapeHtml(field.label)}</div>`,
      "<table>",
      `<thead><tr>${columns.map((c) => `<th>${escapeHtml(c.label)}</th>`).join("")}</tr></thead>`,
      "<tbody>",
      ...cells.tableBody(field),
      "</tbody>",
      "</table>",
      "</div>"
    );
  }

  out.push("</body>", "</html>");
  return out.join("\n") + "\n";
}
