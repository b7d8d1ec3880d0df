export type BBox = [number, number, number, number]; // x0, y0, x1, y1 (top-left origin, points)

export interface FontInfo {
  name: string;
  family?: string;
  size: number;
}

interface ElementBase {
  page: number; // 0-based
  bbox: BBox;
  font: FontInfo;
}

export interface TextElement extends ElementBase {
  kind: "text";
  text: string;
}

export interface TableElement extends ElementBase {
  kind: "table";
  cells: string[][];
}

export type ExtractedElement = TextElement | TableElement;

export type FieldType = "text" | "link" | "date" | "table";

export interface ColumnDescriptor {
  name: string;
  label: string;
}

export interface SchemaFieldDescriptor {
  name: string;
  label: string;
  type: FieldType;
  mandatory: boolean;
  columns?: ColumnDescriptor[]; // table fields only
}

export interface DocTypeSchema {
  id: string;
  doctype: string;
  title: string;
  fields: SchemaFieldDescriptor[];
}

export type TableRows = string[][];
export type MappingValue = string | TableRows;
export type Mapping = Record<string, MappingValue>;

// null explicitly unmaps a field
export type MappingOverrides = Record<string, MappingValue | null>;

export interface FieldProvenance {
  origin: "heuristic" | "override";
  score?: number;
  page?: number;
  bbox?: BBox;
}

export interface ProposedMapping {
  mapping: Mapping;
  provenance: Record<string, FieldProvenance>;
}

export type IssueCode =
  | "mandatory_missing"
  | "child_table_empty"
  | "type_mismatch"
  | "optional_missing"
  | "unknown_field"
  | "row_width";

export interface ValidationIssue {
  severity: "error" | "warning";
  code: IssueCode;
  field: string;
  message: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  issues: ValidationIssue[];
}

export type ExporterKind = "jinja" | "json" | "preview";

export type ExportStatus = "success" | "validation_failed" | "partial";

export interface ArtifactMetadata {
  doctype: string;
  schemaId: string;
  name: string;
  title: string;
  version: string;
  author: string;
  exportedAt: string;
}

export interface ExportArtifact {
  kind: ExporterKind;
  name: string;
  content: string;
  metadata: ArtifactMetadata;
  status: ExportStatus;
  errors: string[];
  warnings: string[];
}

export type UploadState =
  | { state: "pending"; attempt: number }
  | { state: "in_flight"; attempt: number }
  | { state: "succeeded"; attempt: number; httpStatus: number }
  | { state: "failed"; attempt: number; retryable: boolean; httpStatus?: number; error: string };

export interface UploadResult {
  name: string;
  status: "succeeded";
  httpStatus: number;
  attempts: number;
  transitions: UploadState[];
  body: string;
}

export interface ArtifactUploader {
  upload(artifact: ExportArtifact): Promise<UploadResult>;
}
