import { ArtifactMetadata, DocTypeSchema, Mapping } from "../types";
import { BaseExporter } from "./base";
import { renderPage } from "./html";

/**
 * Reusable ERPNext print format. Fields become `{{ doc.<field> }}` placeholders
 * and child tables iterate their rows; mapped values are never written into the
 * template, ERPNext fills them in at print time.
 */
export class JinjaExporter extends BaseExporter {
  readonly kind = "jinja";
  readonly extension = "html";

  protected renderContent(mapping: Mapping, schema: DocTypeSchema, metadata: ArtifactMetadata): string {
    return renderPage(mapping, schema, metadata, {
      scalar: (field) => `{{ doc.${field.name} }}`,
      tableBody: (field) => [
        `{% for row in doc.${field.name} %}`,
        `<tr>${(field.columns ?? []).map((c) => `<td>{{ row.${c.name} }}</td>`).join("")}</tr>`,
        "{% endfor %}",
      ],
    });
  }
}
