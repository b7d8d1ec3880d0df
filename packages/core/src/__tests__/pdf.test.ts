/**
 * PDF structure extraction – unit tests (PDF engine replaced by a fake loader)
 */
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { ExtractionError } from "../errors";
import { elementsFromPage, extractElements, extractElementsFromBuffer } from "../ingest/pdf";
import { PdfLoader, PdfPageContent, PdfTextItem } from "../ingest/types";

const item = (str: string, x: number, y: number, width: number, fontName = "g_d0_f1"): PdfTextItem => ({
  str,
  transform: [12, 0, 0, 12, x, y],
  width,
  height: 12,
  fontName,
});

const page = (items: PdfTextItem[]): PdfPageContent => ({
  width: 600,
  height: 800,
  items,
  fonts: { g_d0_f1: "Helvetica" },
});

const font = { name: "g_d0_f1", family: "Helvetica", size: 12 };

const certificate = page([
  item("Ash", 50, 620, 18),
  item("2%", 150, 620, 12),
  item("%", 250, 620, 6),
  item("Certificate of Analysis", 50, 750, 150),
  item("Product Item:", 50, 700, 70),
  item("ITEM-001", 200, 700, 45),
  item(" ", 300, 700, 5),
  item("Test", 50, 670, 20),
  item("Results", 74, 670, 35),
  item("Parameter", 50, 650, 50),
  item("Value", 150, 650, 30),
  item("Unit", 250, 650, 20),
  item("Moisture", 50, 635, 45),
  item("5%", 150, 635, 12),
  item("%", 250, 635, 6),
]);

const PDF_BYTES = new Uint8Array(Buffer.from("%PDF-1.4\n%fake\n"));

function fakeLoader(pages: PdfPageContent[], calls = { closed: 0 }): PdfLoader {
  return async () => ({
    pageCount: pages.length,
    getPage: async (index: number) => pages[index],
    close: async () => {
      calls.closed++;
    },
  });
}

async function reasonOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof ExtractionError) return e.reason;
    throw e;
  }
  return "resolved";
}

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("elementsFromPage", () => {
  it("orders elements top-to-bottom and groups aligned rows into a table", () => {
    expect(elementsFromPage(0, certificate)).toEqual([
      { kind: "text", page: 0, bbox: [50, 38, 200, 50], font, text: "Certificate of Analysis" },
      { kind: "text", page: 0, bbox: [50, 88, 120, 100], font, text: "Product Item:" },
      { kind: "text", page: 0, bbox: [200, 88, 245, 100], font, text: "ITEM-001" },
      { kind: "text", page: 0, bbox: [50, 118, 109, 130], font, text: "Test Results" },
      {
        kind: "table",
        page: 0,
        bbox: [50, 138, 270, 180],
        font,
        cells: [
          ["Parameter", "Value", "Unit"],
          ["Moisture", "5%", "%"],
          ["Ash", "2%", "%"],
        ],
      },
    ]);
  });

  it("pads short table rows", () => {
    const elements = elementsFromPage(
      1,
      page([item("A", 50, 500, 10), item("B", 150, 500, 10), item("C", 250, 500, 10), item("D", 50, 480, 10), item("E", 150, 480, 10)])
    );
    expect(elements).toHaveLength(1);
    expect(elements[0]).toMatchObject({ kind: "table", page: 1, cells: [["A", "B", "C"], ["D", "E", ""]] });
  });

  it("falls back to an unknown font without a family", () => {
    const [el] = elementsFromPage(0, { width: 600, height: 800, items: [{ str: "Hi", transform: [9, 0, 0, 9, 10, 700] }], fonts: {} });
    expect(el.font).toEqual({ name: "unknown", size: 9 });
    expect(el.bbox).toEqual([10, 91, 19, 100]);
  });

  it("returns nothing for a page without text", () => {
    expect(elementsFromPage(0, page([item("  ", 10, 10, 5)]))).toEqual([]);
  });
});

describe("extractElementsFromBuffer", () => {
  it("extracts every page in order and closes the document", async () => {
    const calls = { closed: 0 };
    const elements = await extractElementsFromBuffer(PDF_BYTES, {
      loader: fakeLoader([certificate, page([item("Page two", 50, 700, 40)])], calls),
    });
    expect(elements).toHaveLength(6);
    expect(elements[5]).toMatchObject({ kind: "text", page: 1, text: "Page two" });
    expect(calls.closed).toBe(1);
  });

  it("rejects bytes without a PDF header", async () => {
    await expect(reasonOf(extractElementsFromBuffer(new Uint8Array(Buffer.from("hello")), { loader: fakeLoader([]) }))).resolves.toBe(
      "not_pdf"
    );
  });

  it("rejects data over the size limit", async () => {
    await expect(reasonOf(extractElementsFromBuffer(PDF_BYTES, { maxBytes: 4, loader: fakeLoader([]) }))).resolves.toBe("too_large");
  });

  it("reports password protected documents", async () => {
    const locked = new Error("No password given");
    locked.name = "PasswordException";
    const loader: PdfLoader = async () => {
      throw locked;
    };
    await expect(reasonOf(extractElementsFromBuffer(PDF_BYTES, { loader }))).resolves.toBe("password_protected");
  });

  it("reports other load failures as corrupt, naming the source", async () => {
    const loader: PdfLoader = async () => {
      throw new Error("bad xref");
    };
    await expect(extractElementsFromBuffer(PDF_BYTES, { loader, source: "coa.pdf" })).rejects.toThrow(
      "Cannot extract 'coa.pdf': corrupt (bad xref)"
    );
  });

  it("closes the document when a page fails", async () => {
    const calls = { closed: 0 };
    const loader: PdfLoader = async () => ({
      pageCount: 1,
      getPage: async () => {
        throw new Error("boom");
      },
      close: async () => {
        calls.closed++;
      },
    });
    await expect(extractElementsFromBuffer(PDF_BYTES, { loader, source: "x.pdf" })).rejects.toThrow(
      "Cannot extract 'x.pdf': corrupt (page 1: boom)"
    );
    expect(calls.closed).toBe(1);
  });
});

describe("extractElements", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "extract-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a file from disk", async () => {
    const file = path.join(dir, "coa.pdf");
    await fs.writeFile(file, PDF_BYTES);
    const elements = await extractElements(file, { loader: fakeLoader([certificate]) });
    expect(elements.map((e) => e.kind)).toEqual(["text", "text", "text", "text", "table"]);
  });

  it("reports a missing file", async () => {
    const file = path.join(dir, "missing.pdf");
    await expect(reasonOf(extractElements(file, { loader: fakeLoader([]) }))).resolves.toBe("not_found");
    await expect(extractElements(file)).rejects.toThrow(`Cannot extract '${file}': not found`);
  });

  it("reports a file that is not a PDF", async () => {
    const file = path.join(dir, "notes.pdf");
    await fs.writeFile(file, "plain text");
    await expect(reasonOf(extractElements(file, { loader: fakeLoader([]) }))).resolves.toBe("not_pdf");
  });

  it("checks the size limit before reading", async () => {
    const file = path.join(dir, "big.pdf");
    await fs.writeFile(file, PDF_BYTES);
    await expect(reasonOf(extractElements(file, { maxBytes: 8, loader: fakeLoader([]) }))).resolves.toBe("too_large");
  });

  it("reports a directory as unreadable", async () => {
    await expect(reasonOf(extractElements(dir))).resolves.toBe("unreadable");
  });
});
