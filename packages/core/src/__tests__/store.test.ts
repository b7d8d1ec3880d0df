import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { StoreError } from "../errors";
import { IntermediateStore } from "../store/intermediate";
import { ExtractedElement } from "../types";

const elements: ExtractedElement[] = [
  { kind: "text", page: 0, bbox: [50, 88, 120, 100], font: { name: "f1", family: "Helvetica", size: 12 }, text: "Product Item:" },
  { kind: "table", page: 0, bbox: [50, 138, 270, 180], font: { name: "f1", size: 12 }, cells: [["Parameter", "Value"], ["Ash", "2%"]] },
];

describe("IntermediateStore", () => {
  let dir: string;
  let store: IntermediateStore;
  let logSpy: jest.SpyInstance;

  beforeEach(async () => {
    logSpy = jest.spyOn(console, "log").mockImplementation();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "store-"));
    store = new IntermediateStore(dir);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("saves and loads elements under a file named after the document", async () => {
    const file = await store.saveElements("COA AMB", elements);
    expect(file).toBe(path.join(dir, "COA%20AMB.elements.json"));
    expect(await store.loadElements("COA AMB")).toEqual(elements);

    const raw = JSON.parse(await fs.readFile(file, "utf8"));
    expect(raw).toMatchObject({ version: 1, kind: "elements", document: "COA AMB" });
  });

  it("saves and loads mappings", async () => {
    expect(await store.hasMapping("COA-1")).toBe(false);
    await store.saveMapping("COA-1", "coa-amb", { product_item: "ITEM-001", child_table: [["Ash", "2%"]] });

    expect(await store.hasMapping("COA-1")).toBe(true);
    expect(await store.loadMapping("COA-1")).toEqual({
      doctype: "coa-amb",
      mapping: { product_item: "ITEM-001", child_table: [["Ash", "2%"]] },
    });
  });

  it("keeps documents with similar names apart", async () => {
    await store.saveMapping("Quote A", "quotation", { customer: "Acme" });
    await store.saveMapping("Quote/A", "quotation", { customer: "Globex" });

    expect(await store.loadMapping("Quote_A")).toBeNull();
    expect(await store.loadMapping("Quote A")).toEqual({ doctype: "quotation", mapping: { customer: "Acme" } });
    expect(await store.loadMapping("Quote/A")).toEqual({ doctype: "quotation", mapping: { customer: "Globex" } });
    expect(store.fileFor("Quote/A", "mapping")).toBe(path.join(dir, "Quote%2FA.mapping.json"));
  });

  it("stores a reviewed mapping beside the latest proposal", async () => {
    await store.saveMapping("COA-1", "coa-amb", { product_item: "ITEM-001" });
    const file = await store.saveReview("COA-1", "coa-amb", { product_item: "REVIEWED" });

    expect(file).toBe(path.join(dir, "COA-1.review.json"));
    expect(await store.loadReview("COA-1")).toEqual({ doctype: "coa-amb", mapping: { product_item: "REVIEWED" } });
    expect(await store.loadMapping("COA-1")).toEqual({ doctype: "coa-amb", mapping: { product_item: "ITEM-001" } });
    expect(await store.loadReview("COA-2")).toBeNull();
  });

  it("returns null for documents that were never stored", async () => {
    expect(await store.loadElements("nothing")).toBeNull();
    expect(await store.loadMapping("nothing")).toBeNull();
  });

  it("rejects files that are not JSON", async () => {
    await fs.writeFile(store.fileFor("bad", "mapping"), "{not json", "utf8");
    await expect(store.loadMapping("bad")).rejects.toBeInstanceOf(StoreError);
  });

  it("rejects files of the wrong shape", async () => {
    await fs.writeFile(store.fileFor("bad", "elements"), JSON.stringify({ version: 1, kind: "elements", document: "bad", elements: [{ kind: "image" }] }));
    await expect(store.loadElements("bad")).rejects.toThrow("unexpected content");
  });

  it("loads an older version with a warning", async () => {
    await fs.writeFile(
      store.fileFor("old", "mapping"),
      JSON.stringify({ version: 0, kind: "mapping", document: "old", doctype: "coa-amb", mapping: { product_item: "X" } })
    );
    expect(await store.loadMapping("old")).toEqual({ doctype: "coa-amb", mapping: { product_item: "X" } });
    const lines = logSpy.mock.calls.map((c) => String(c[0]));
    expect(lines.some((l) => l.includes("store.version_mismatch"))).toBe(true);
  });
});
