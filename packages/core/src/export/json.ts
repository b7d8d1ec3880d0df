import { ArtifactMetadata, DocTypeSchema, FieldType, Mapping } from "../types";
import { BaseExporter } from "./base";

const FIELD_TYPES: Record<FieldType, string> = {
  text: "Data",
  link: "Link",
  date: "Date",
  table: "Table",
};

export class JsonExporter extends BaseExporter {
  readonly kind = "json";
  readonly extension = "json";

  protected renderContent(mapping: Mapping, schema: DocTypeSchema, metadata: ArtifactMetadata): string {
    const document: Record<string, string | Array<Record<string, string>>> = {};
    for (const field of schema.fields) {
      const value = mapping[field.name];
      if (value === undefined) continue;
      if (typeof value === "string") {
        document[field.name] = value;
        continue;
      }
      const columns = field.columns ?? [];
      document[field.name] = value.map((row) => {
        const obj: Record<string, string> = {};
        columns.forEach((c, i) => {
          obj[c.name] = row[i] ?? "";
        });
        return obj;
      });
    }

    const body = {
      doctype: metadata.doctype,
      schema: metadata.schemaId,
      name: metadata.name,
      title: metadata.title,
      version: metadata.version,
      author: metadata.author,
      fields: schema.fields.map((f) => ({
        fieldname: f.name,
        label: f.label,
        fieldtype: FIELD_TYPES[f.type],
        reqd: f.mandatory ? 1 : 0,
        ...(f.columns ? { columns: f.columns.map((c) => c.name) } : {}),
      })),
      document,
    };
    return JSON.stringify(body, null, 2) + "\n";
  }
}
