import { z } from "zod";
import { DocTypeSchema } from "../types";
import coaAmb from "./coa-amb.json";
import quotation from "./quotation.json";
import quotationExport from "./quotation-export.json";

const identifier = z.string().regex(/^[a-z_][a-z0-9_]*$/, "must be a lowercase identifier");

const ColumnSchema = z.object({ name: identifier, label: z.string().min(1) });

const FieldSchema = z
  .object({
    name: identifier,
    label: z.string().min(1),
    type: z.enum(["text", "link", "date", "table"]),
    mandatory: z.boolean(),
    columns: z.array(ColumnSchema).min(1).optional(),
  })
  .refine((f) => (f.type === "table") === (f.columns !== undefined), {
    message: "columns are required on table fields and only allowed there",
  });

export const DocTypeSchemaSchema = z
  .object({
    id: z.string().min(1),
    doctype: z.string().min(1),
    title: z.string().min(1),
    fields: z.array(FieldSchema).min(1),
  })
  .refine((s) => new Set(s.fields.map((f) => f.name)).size === s.fields.length, {
    message: "field names must be unique",
  });

export function parseDocTypeSchema(raw: unknown): DocTypeSchema {
  return DocTypeSchemaSchema.parse(raw);
}

const BUILTIN: DocTypeSchema[] = [coaAmb, quotation, quotationExport].map(parseDocTypeSchema);

export function listDocTypes(): DocTypeSchema[] {
  return BUILTIN.slice();
}

export function findDocType(id: string): DocTypeSchema | undefined {
  return BUILTIN.find((s) => s.id === id);
}

export function getDocType(id: string): DocTypeSchema {
  const schema = findDocType(id);
  if (!schema) {
    throw new Error(`Unknown document type '${id}'. Supported: ${BUILTIN.map((s) => s.id).join(", ")}`);
  }
  return schema;
}
