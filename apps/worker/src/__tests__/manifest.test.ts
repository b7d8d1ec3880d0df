import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { ConfigError } from "@print-migrator/core";
import { loadManifest, parseManifest } from "../manifest";

const entry = (name: string, source_pdf = `pdfs/${name}.pdf`) => ({ name, doctype: "coa-amb", source_pdf });

describe("parseManifest", () => {
  it("resolves source paths against the manifest directory", () => {
    const manifest = parseManifest({ version: 2, print_formats: [entry("COA-1"), entry("COA-2", "/abs/coa-2.pdf")] }, "/srv/batch");
    expect(manifest).toEqual({
      version: "2",
      upload: false,
      jobs: [
        { name: "COA-1", doctype: "coa-amb", sourcePdf: "/srv/batch/pdfs/COA-1.pdf" },
        { name: "COA-2", doctype: "coa-amb", sourcePdf: "/abs/coa-2.pdf" },
      ],
    });
  });

  it("keeps the upload flag", () => {
    expect(parseManifest({ version: "1", upload: true, print_formats: [entry("A")] }, "/srv").upload).toBe(true);
  });

  it("rejects duplicate names", () => {
    expect(() => parseManifest({ version: "1", print_formats: [entry("A"), entry("A")] }, "/srv", "batch.json")).toThrow(
      "Invalid manifest 'batch.json': print_formats: print format names must be unique"
    );
  });

  it("rejects names that would share an output file", () => {
    expect(() => parseManifest({ version: "1", print_formats: [entry("COA-1"), entry("coa-1")] }, "/srv", "batch.json")).toThrow(
      "Invalid manifest 'batch.json': print_formats: print format names must map to distinct file names"
    );
    expect(parseManifest({ version: "1", print_formats: [entry("COA AMB"), entry("coa-amb")] }, "/srv").jobs).toHaveLength(2);
  });

  it("rejects an empty batch and names the key", () => {
    expect.assertions(2);
    try {
      parseManifest({ version: "1", print_formats: [] }, "/srv");
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) expect(e.keys).toEqual(["print_formats"]);
    }
  });
});

describe("loadManifest", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "print-migrator-manifest-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a manifest from disk", async () => {
    const file = path.join(dir, "batch.json");
    await fs.writeFile(file, JSON.stringify({ version: "1", print_formats: [entry("COA-1")] }));
    const manifest = await loadManifest(file);
    expect(manifest.jobs).toEqual([{ name: "COA-1", doctype: "coa-amb", sourcePdf: path.join(dir, "pdfs", "COA-1.pdf") }]);
  });

  it("wraps unreadable files in a ConfigError", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ not json");
    await expect(loadManifest(file)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadManifest(path.join(dir, "missing.json"))).rejects.toMatchObject({ keys: ["MIGRATION_MANIFEST"] });
  });
});
