import { ValidationError } from "../errors";
import { DocTypeSchema, Mapping, MappingValue, SchemaFieldDescriptor, ValidationIssue, ValidationResult } from "../types";

function isBlank(value: MappingValue | undefined): boolean {
  return value === undefined || (typeof value === "string" && value.trim() === "");
}

function describe(field: SchemaFieldDescriptor): string {
  return `'${field.name}' (${field.label})`;
}

function error(code: ValidationIssue["code"], field: string, message: string): ValidationIssue {
  return { severity: "error", code, field, message };
}

function warning(code: ValidationIssue["code"], field: string, message: string): ValidationIssue {
  return { severity: "warning", code, field, message };
}

/**
 * Check a mapping against a doctype schema. Pure: the same input always yields
 * the same issues in the same order.
 *
 * Order of rules: mandatory scalar fields, child tables, value shapes and row
 * widths, then warnings for unmapped optional fields and unknown keys.
 */
export function validateMapping(mapping: Mapping, schema: DocTypeSchema): ValidationResult {
  const issues: ValidationIssue[] = [];
  const has = (name: string) => Object.prototype.hasOwnProperty.call(mapping, name);
  const get = (name: string): MappingValue | undefined => (has(name) ? mapping[name] : undefined);

  for (const field of schema.fields) {
    if (field.type === "table" || !field.mandatory) continue;
    const value = get(field.name);
    if (Array.isArray(value)) continue; // reported as a shape problem below
    if (isBlank(value)) {
      issues.push(error("mandatory_missing", field.name, `Mandatory field ${describe(field)} is not mapped`));
    }
  }

  for (const field of schema.fields) {
    if (field.type !== "table") continue;
    const value = get(field.name);
    if (typeof value === "string") continue;
    const rows = value?.length ?? 0;
    if (rows === 0) {
      issues.push(error("child_table_empty", field.name, `Child table ${describe(field)} requires at least 1 row, found 0`));
    }
  }

  for (const field of schema.fields) {
    const value = get(field.name);
    if (value === undefined) continue;
    if (field.type === "table" && typeof value === "string") {
      issues.push(error("type_mismatch", field.name, `Field ${describe(field)} expects table rows, got text`));
    } else if (field.type !== "table" && Array.isArray(value)) {
      issues.push(error("type_mismatch", field.name, `Field ${describe(field)} expects text, got table rows`));
    } else if (Array.isArray(value) && field.columns) {
      const width = field.columns.length;
      value.forEach((row, i) => {
        if (row.length !== width) {
          issues.push(
            warning("row_width", field.name, `Child table '${field.name}' row ${i + 1} has ${row.length} cells, expected ${width}`)
          );
        }
      });
    }
  }

  for (const field of schema.fields) {
    if (field.type === "table" || field.mandatory) continue;
    if (isBlank(get(field.name))) {
      issues.push(warning("optional_missing", field.name, `Optional field ${describe(field)} is not mapped`));
    }
  }

  const known = new Set(schema.fields.map((f) => f.name));
  for (const key of Object.keys(mapping)) {
    if (!known.has(key)) {
      issues.push(warning("unknown_field", key, `Field '${key}' is not part of ${schema.doctype}`));
    }
  }

  const errors = issues.filter((i) => i.severity === "error").map((i) => i.message);
  const warnings = issues.filter((i) => i.severity === "warning").map((i) => i.message);
  return { isValid: errors.length === 0, errors, warnings, issues };
}

/** Throws ValidationError naming the first offending field. */
export function assertValidMapping(mapping: Mapping, schema: DocTypeSchema): ValidationResult {
  const result = validateMapping(mapping, schema);
  if (!result.isValid) {
    throw new ValidationError(result.issues.filter((i) => i.severity === "error"));
  }
  return result;
}
