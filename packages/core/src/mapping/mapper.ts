import { getLogger } from "../logger";
import {
  DocTypeSchema,
  ExtractedElement,
  FieldProvenance,
  Mapping,
  MappingOverrides,
  ProposedMapping,
  SchemaFieldDescriptor,
  TableElement,
  TableRows,
  TextElement,
} from "../types";

export const LABEL_THRESHOLD = 0.6;
const SAME_LINE_TOLERANCE = 3; // points

function normalizeLabel(s: string): string {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

function bigrams(s: string): Map<string, number> {
  const out = new Map<string, number>();
  const compact = s.replace(/ /g, "");
  for (let i = 0; i < compact.length - 1; i++) {
    const g = compact.slice(i, i + 2);
    out.set(g, (out.get(g) ?? 0) + 1);
  }
  return out;
}

/** Dice coefficient over character bigrams of the normalized strings, in [0, 1]. */
export function similarity(a: string, b: string): number {
  const na = normalizeLabel(a);
  const nb = normalizeLabel(b);
  if (!na || !nb) return 0;
  if (na === nb) return 1;
  const ga = bigrams(na);
  const gb = bigrams(nb);
  let sizeA = 0;
  let sizeB = 0;
  let shared = 0;
  for (const n of ga.values()) sizeA += n;
  for (const n of gb.values()) sizeB += n;
  if (!sizeA || !sizeB) return 0;
  for (const [g, n] of ga) shared += Math.min(n, gb.get(g) ?? 0);
  return (2 * shared) / (sizeA + sizeB);
}

/** Split "Label: value" on the first colon. */
function splitLabelValue(text: string): { label: string; value: string } | null {
  const idx = text.indexOf(":");
  if (idx <= 0) return null;
  return { label: text.slice(0, idx).trim(), value: text.slice(idx + 1).trim() };
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

type Candidate = { value: string; score: number; source: ExtractedElement };

function rightNeighbour(el: TextElement, texts: TextElement[]): TextElement | undefined {
  let best: TextElement | undefined;
  for (const other of texts) {
    if (other === el || other.page !== el.page) continue;
    if (Math.abs(other.bbox[3] - el.bbox[3]) > SAME_LINE_TOLERANCE) continue;
    if (other.bbox[0] < el.bbox[2]) continue;
    if (!best || other.bbox[0] < best.bbox[0]) best = other;
  }
  return best;
}

function elementBelow(el: TextElement, texts: TextElement[]): TextElement | undefined {
  let best: TextElement | undefined;
  for (const other of texts) {
    if (other === el || other.page !== el.page) continue;
    if (other.bbox[3] <= el.bbox[3] + SAME_LINE_TOLERANCE) continue;
    const overlaps = other.bbox[0] < el.bbox[2] && other.bbox[2] > el.bbox[0];
    if (!overlaps) continue;
    if (!best || other.bbox[1] < best.bbox[1]) best = other;
  }
  return best;
}

function scalarCandidates(field: SchemaFieldDescriptor, texts: TextElement[], tables: TableElement[]): Candidate[] {
  const out: Candidate[] = [];
  for (const el of texts) {
    const split = splitLabelValue(el.text);
    const score = similarity(field.label, split ? split.label : el.text);
    if (score < LABEL_THRESHOLD) continue;
    let value = split?.value ?? "";
    let source: ExtractedElement = el;
    if (!value) {
      const next = rightNeighbour(el, texts) ?? elementBelow(el, texts);
      if (next) {
        value = next.text;
        source = next;
      }
    }
    if (value) out.push({ value, score, source });
  }

  // label/value blocks laid out in two columns are detected as tables
  for (const table of tables) {
    for (const row of table.cells) {
      for (let i = 0; i < row.length; i++) {
        const split = splitLabelValue(row[i]);
        const score = similarity(field.label, split ? split.label : row[i]);
        if (score < LABEL_THRESHOLD) continue;
        const value = split?.value || (row[i + 1] ?? "").trim();
        if (value) out.push({ value, score, source: table });
      }
    }
  }
  return out;
}

function headerScore(field: SchemaFieldDescriptor, header: string[]): number {
  const columns = field.columns ?? [];
  if (!columns.length) return 0;
  let total = 0;
  for (const col of columns) {
    total += Math.max(0, ...header.map((h) => similarity(col.label, h)));
  }
  return total / columns.length;
}

function columnIndexes(field: SchemaFieldDescriptor, header: string[]): number[] {
  return (field.columns ?? []).map((col) => {
    let bestIdx = -1;
    let bestScore = LABEL_THRESHOLD;
    header.forEach((h, i) => {
      const s = similarity(col.label, h);
      if (s > bestScore || (bestIdx === -1 && s === bestScore)) {
        bestIdx = i;
        bestScore = s;
      }
    });
    return bestIdx;
  });
}

function tableRows(field: SchemaFieldDescriptor, tables: TableElement[]): { rows: TableRows; score: number; source: TableElement } | null {
  let best: { table: TableElement; score: number } | null = null;
  for (const table of tables) {
    if (table.cells.length === 0) continue;
    const score = headerScore(field, table.cells[0]);
    if (score >= LABEL_THRESHOLD && (!best || score > best.score)) best = { table, score };
  }
  if (!best) return null;

  const chosen = best.table;
  const header = chosen.cells[0];
  const headerKey = header.join("\u0000");
  // tables continued on later pages repeat the header
  const parts = tables.filter((t) => t === chosen || (t.page > chosen.page && t.cells[0]?.join("\u0000") === headerKey));
  const indexes = columnIndexes(field, header);
  const rows: TableRows = [];
  for (const part of parts) {
    for (const raw of part.cells.slice(1)) {
      const row = indexes.map((i) => (i >= 0 ? (raw[i] ?? "").trim() : ""));
      if (row.some((c) => c !== "")) rows.push(row);
    }
  }
  return { rows, score: best.score, source: chosen };
}

/** Apply user overrides on top of a mapping. `null` removes the field. */
export function applyOverrides(mapping: Mapping, overrides: MappingOverrides): Mapping {
  const out: Mapping = { ...mapping };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === null) {
      delete out[key];
    } else {
      out[key] = typeof value === "string" ? value : value.map((row) => row.slice());
    }
  }
  return out;
}

/**
 * Propose a mapping from extracted elements onto the schema's fields.
 * Overrides win over anything the heuristic finds; fields with no confident
 * match are left out of the mapping rather than defaulted.
 */
export function proposeMapping(
  elements: ExtractedElement[],
  schema: DocTypeSchema,
  overrides: MappingOverrides = {}
): ProposedMapping {
  const log = getLogger("core").child({ doctype: schema.id });
  const texts = elements.filter((e): e is TextElement => e.kind === "text");
  const tables = elements.filter((e): e is TableElement => e.kind === "table");

  const mapping: Mapping = {};
  const provenance: Record<string, FieldProvenance> = {};
  const claimed = new Set<TableElement>();

  for (const field of schema.fields) {
    if (field.type !== "table") continue;
    const found = tableRows(field, tables);
    if (!found || found.rows.length === 0) continue;
    claimed.add(found.source);
    mapping[field.name] = found.rows;
    provenance[field.name] = { origin: "heuristic", score: round2(found.score), page: found.source.page, bbox: found.source.bbox };
  }

  const freeTables = tables.filter((t) => !claimed.has(t));
  for (const field of schema.fields) {
    if (field.type === "table") continue;
    let best: Candidate | null = null;
    for (const c of scalarCandidates(field, texts, freeTables)) {
      if (!best || c.score > best.score) best = c;
    }
    if (!best) continue;
    mapping[field.name] = best.value;
    provenance[field.name] = { origin: "heuristic", score: round2(best.score), page: best.source.page, bbox: best.source.bbox };
  }

  const merged = applyOverrides(mapping, overrides);
  for (const [key, value] of Object.entries(overrides)) {
    if (value === null) delete provenance[key];
    else provenance[key] = { origin: "override" };
  }

  const unmapped = schema.fields.filter((f) => !(f.name in merged)).map((f) => f.name);
  log.info("mapping.proposed", {
    elements: elements.length,
    mapped: Object.keys(merged).length,
    overrides: Object.keys(overrides).length,
    unmapped,
  });
  return { mapping: merged, provenance };
}
