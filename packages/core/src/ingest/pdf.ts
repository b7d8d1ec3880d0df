import { promises as fs } from "fs";
import { ExtractionError, errorMessage, hasErrorCode, hasErrorName } from "../errors";
import { getLogger } from "../logger";
import { BBox, ExtractedElement, FontInfo, TableElement, TextElement } from "../types";
import { ExtractOptions, PdfDocumentSource, PdfPageContent, PdfTextItem } from "./types";

const LINE_TOLERANCE = 3; // points
const DEFAULT_WORD_GAP = 2.5;
const DEFAULT_COLUMN_GAP = 12;
const MIN_TABLE_ROWS = 2;
const DEFAULT_MAX_BYTES = 50 * 1024 * 1024;

type PositionedItem = PdfTextItem & { x: number; y: number };

type Cell = {
  text: string;
  bbox: BBox;
  font: FontInfo;
};

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function clusterItemsIntoLines(items: PdfTextItem[]) {
  const lines: Array<{ y: number; items: PositionedItem[] }> = [];
  for (const raw of items) {
    if (!raw.str.trim()) continue;
    const x = Number(raw.transform[4] || 0);
    const y = Number(raw.transform[5] || 0);
    let line = lines.find((ln) => Math.abs(ln.y - y) <= LINE_TOLERANCE);
    if (!line) {
      line = { y, items: [] };
      lines.push(line);
    }
    line.items.push({ ...raw, x, y });
  }

  // Sort top-to-bottom (PDF origin bottom-left)
  lines.sort((a, b) => b.y - a.y);

  return lines;
}

function itemWidth(item: PdfTextItem, text: string): number {
  const rawWidth = Number(item.width ?? Math.abs(item.transform[0] || 0));
  return rawWidth || text.length * 4;
}

function fontOf(item: PdfTextItem, height: number, fonts: Record<string, string>): FontInfo {
  const name = item.fontName ?? "unknown";
  const size = Math.hypot(item.transform[2] || 0, item.transform[3] || 0) || height;
  const family = fonts[name];
  return family ? { name, family, size: round2(size) } : { name, size: round2(size) };
}

// Split one line into cells using the same gap thresholds that keep table columns apart:
// wide jumps start a new cell, smaller gaps become a space inside the cell.
function splitIntoCells(
  line: { items: PositionedItem[] },
  viewportHeight: number,
  fonts: Record<string, string>
): Cell[] {
  const sorted = line.items.slice().sort((a, b) => a.x - b.x);
  let totalWidth = 0;
  let totalChars = 0;
  for (const item of sorted) {
    const normalized = item.str.replace(/\u00A0/g, " ");
    totalWidth += itemWidth(item, normalized);
    totalChars += normalized.replace(/\s+/g, "").length || normalized.length;
  }
  const avgCharWidth = totalChars ? totalWidth / totalChars : 0;
  const wordGapThreshold = Math.max(DEFAULT_WORD_GAP, avgCharWidth * 0.6);
  const columnGapThreshold = Math.max(DEFAULT_COLUMN_GAP, avgCharWidth * 3.5);

  const cells: Cell[] = [];
  let current: Cell | null = null;
  let prevRight: number | null = null;
  for (const item of sorted) {
    const text = item.str.replace(/\u00A0/g, " ");
    const width = itemWidth(item, text);
    const height = Number(item.height || Math.abs(item.transform[3] || 0));
    const left = item.x;
    const right = left + width;
    const bottom = viewportHeight - item.y;
    const top = bottom - height;
    const gap = prevRight === null ? 0 : left - prevRight;

    if (!current || gap > columnGapThreshold) {
      current = { text, bbox: [left, top, right, bottom], font: fontOf(item, height, fonts) };
      cells.push(current);
    } else {
      current.text += gap > wordGapThreshold ? ` ${text}` : text;
      current.bbox = [
        Math.min(current.bbox[0], left),
        Math.min(current.bbox[1], top),
        Math.max(current.bbox[2], right),
        Math.max(current.bbox[3], bottom),
      ];
    }
    prevRight = right;
  }

  return cells.map((c) => ({
    text: c.text.replace(/\s+/g, " ").trim(),
    bbox: [round2(c.bbox[0]), round2(c.bbox[1]), round2(c.bbox[2]), round2(c.bbox[3])],
    font: c.font,
  }));
}

function unionBBox(boxes: BBox[]): BBox {
  return [
    Math.min(...boxes.map((b) => b[0])),
    Math.min(...boxes.map((b) => b[1])),
    Math.max(...boxes.map((b) => b[2])),
    Math.max(...boxes.map((b) => b[3])),
  ];
}

function toText(page: number, cell: Cell): TextElement {
  return { kind: "text", page, bbox: cell.bbox, font: cell.font, text: cell.text };
}

function toTable(page: number, rows: Cell[][]): TableElement {
  const width = Math.max(...rows.map((r) => r.length));
  const cells = rows.map((r) => {
    const texts = r.map((c) => c.text);
    while (texts.length < width) texts.push("");
    return texts;
  });
  return {
    kind: "table",
    page,
    bbox: unionBBox(rows.flat().map((c) => c.bbox)),
    font: rows[0][0].font,
    cells,
  };
}

/**
 * Turn one page of positioned text items into elements, top-to-bottom.
 * Runs of two or more consecutive multi-cell lines become a table; everything
 * else becomes one text element per cell.
 */
export function elementsFromPage(page: number, content: PdfPageContent): ExtractedElement[] {
  const lines = clusterItemsIntoLines(content.items)
    .map((ln) => splitIntoCells(ln, content.height, content.fonts))
    .filter((cells) => cells.length > 0);

  const out: ExtractedElement[] = [];
  let run: Cell[][] = [];
  const flush = () => {
    if (run.length >= MIN_TABLE_ROWS) {
      out.push(toTable(page, run));
    } else {
      for (const row of run) for (const cell of row) out.push(toText(page, cell));
    }
    run = [];
  };

  for (const cells of lines) {
    if (cells.length >= 2) {
      run.push(cells);
      continue;
    }
    flush();
    out.push(toText(page, cells[0]));
  }
  flush();

  return out;
}

export async function loadWithPdfjs(data: Uint8Array): Promise<PdfDocumentSource> {
  const pdfjs = await import("pdfjs-dist");
  const doc = await pdfjs.getDocument({
    data,
    verbosity: 0,
    isEvalSupported: false,
    disableFontFace: true,
    useSystemFonts: false,
  }).promise;

  return {
    pageCount: doc.numPages,
    async getPage(index: number): Promise<PdfPageContent> {
      const page = await doc.getPage(index + 1);
      const viewport = page.getViewport({ scale: 1 });
      const content = await page.getTextContent();
      const items: PdfTextItem[] = [];
      for (const item of content.items) {
        if (!("str" in item)) continue;
        items.push({
          str: item.str,
          transform: item.transform.map(Number),
          width: item.width,
          height: item.height,
          fontName: item.fontName,
        });
      }
      const fonts: Record<string, string> = {};
      for (const [name, style] of Object.entries(content.styles)) {
        fonts[name] = style.fontFamily;
      }
      page.cleanup();
      return { width: viewport.width, height: viewport.height, items, fonts };
    },
    async close() {
      await doc.destroy();
    },
  };
}

function isPdfHeader(data: Uint8Array): boolean {
  return Buffer.from(data.subarray(0, 5)).toString("ascii") === "%PDF-";
}

export async function extractElementsFromBuffer(
  data: Uint8Array,
  opts: ExtractOptions & { source?: string } = {}
): Promise<ExtractedElement[]> {
  const source = opts.source ?? "<buffer>";
  const log = getLogger("core").child({ document: source });
  const maxBytes = opts.maxBytes ?? DEFAULT_MAX_BYTES;
  // pdf.js takes ownership of the buffer and detaches it
  const bytes = data.byteLength;
  if (bytes > maxBytes) {
    throw new ExtractionError(source, "too_large", `${bytes} bytes, limit ${maxBytes}`);
  }
  if (!isPdfHeader(data)) {
    throw new ExtractionError(source, "not_pdf", "missing %PDF- header");
  }

  const loader = opts.loader ?? loadWithPdfjs;
  let doc: PdfDocumentSource;
  try {
    doc = await loader(data);
  } catch (e) {
    if (hasErrorName(e, "PasswordException")) {
      throw new ExtractionError(source, "password_protected", undefined, { cause: e });
    }
    throw new ExtractionError(source, "corrupt", errorMessage(e), { cause: e });
  }

  const elements: ExtractedElement[] = [];
  try {
    for (let p = 0; p < doc.pageCount; p++) {
      let content: PdfPageContent;
      try {
        content = await doc.getPage(p);
      } catch (e) {
        throw new ExtractionError(source, "corrupt", `page ${p + 1}: ${errorMessage(e)}`, { cause: e });
      }
      elements.push(...elementsFromPage(p, content));
    }
  } finally {
    await doc.close();
  }

  const tables = elements.filter((e) => e.kind === "table").length;
  log.info("extract.complete", { pages: doc.pageCount, elements: elements.length, tables, bytes });
  if (elements.length === 0) {
    log.warn("extract.no_text", { pages: doc.pageCount });
  }
  return elements;
}

/**
 * Read a PDF from disk and return its positioned elements in page order.
 * Throws ExtractionError for missing, oversized, corrupt or password-protected files.
 */
export async function extractElements(filePath: string, opts: ExtractOptions = {}): Promise<ExtractedElement[]> {
  const maxBytes = opts.maxBytes ?? DEFAULT_MAX_BYTES;
  let size: number;
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) throw new ExtractionError(filePath, "unreadable", "not a regular file");
    size = stat.size;
  } catch (e) {
    if (e instanceof ExtractionError) throw e;
    if (hasErrorCode(e, "ENOENT")) {
      throw new ExtractionError(filePath, "not_found", undefined, { cause: e });
    }
    throw new ExtractionError(filePath, "unreadable", errorMessage(e), { cause: e });
  }
  if (size > maxBytes) {
    throw new ExtractionError(filePath, "too_large", `${size} bytes, limit ${maxBytes}`);
  }

  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (e) {
    throw new ExtractionError(filePath, "unreadable", errorMessage(e), { cause: e });
  }
  return extractElementsFromBuffer(new Uint8Array(data.buffer, data.byteOffset, data.byteLength), {
    ...opts,
    source: filePath,
  });
}
