import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { StoreError, errorMessage, hasErrorCode } from "../errors";
import { getLogger } from "../logger";
import { ExtractedElement, Mapping } from "../types";

export const STORE_VERSION = 1;

const BBoxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);
const FontSchema = z.object({ name: z.string(), family: z.string().optional(), size: z.number() });

const ElementSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), page: z.number().int().min(0), bbox: BBoxSchema, font: FontSchema, text: z.string() }),
  z.object({
    kind: z.literal("table"),
    page: z.number().int().min(0),
    bbox: BBoxSchema,
    font: FontSchema,
    cells: z.array(z.array(z.string())),
  }),
]);

export const MappingSchema = z.record(z.union([z.string(), z.array(z.array(z.string()))]));

const Header = { version: z.number().int(), document: z.string() };

const ElementsFile = z.object({ ...Header, kind: z.literal("elements"), elements: z.array(ElementSchema) });
const MappingFile = z.object({ ...Header, kind: z.literal("mapping"), doctype: z.string(), mapping: MappingSchema });
const ReviewFile = z.object({ ...Header, kind: z.literal("review"), doctype: z.string(), mapping: MappingSchema });

type FileKind = "elements" | "mapping" | "review";

export interface StoredMapping {
  doctype: string;
  mapping: Mapping;
}

/**
 * Per-document JSON files under one directory: `<doc>.elements.json`,
 * `<doc>.mapping.json` (the latest proposal or edit) and `<doc>.review.json`
 * (the mapping a person confirmed). Absent files load as null; malformed ones
 * throw StoreError.
 */
export class IntermediateStore {
  private readonly log = getLogger("core");

  constructor(public readonly dir: string) {}

  fileFor(document: string, kind: FileKind): string {
    // percent-encoding keeps distinct document names in distinct files
    return path.join(this.dir, `${encodeURIComponent(document)}.${kind}.json`);
  }

  async saveElements(document: string, elements: ExtractedElement[]): Promise<string> {
    return this.write(this.fileFor(document, "elements"), { version: STORE_VERSION, kind: "elements", document, elements });
  }

  async loadElements(document: string): Promise<ExtractedElement[] | null> {
    const file = this.fileFor(document, "elements");
    const raw = await this.read(file);
    if (!raw) return null;
    return this.parse(file, ElementsFile, raw.json).elements;
  }

  async saveMapping(document: string, doctype: string, mapping: Mapping): Promise<string> {
    return this.write(this.fileFor(document, "mapping"), { version: STORE_VERSION, kind: "mapping", document, doctype, mapping });
  }

  async loadMapping(document: string): Promise<StoredMapping | null> {
    const file = this.fileFor(document, "mapping");
    const raw = await this.read(file);
    if (!raw) return null;
    const parsed = this.parse(file, MappingFile, raw.json);
    return { doctype: parsed.doctype, mapping: parsed.mapping };
  }

  async saveReview(document: string, doctype: string, mapping: Mapping): Promise<string> {
    return this.write(this.fileFor(document, "review"), { version: STORE_VERSION, kind: "review", document, doctype, mapping });
  }

  async loadReview(document: string): Promise<StoredMapping | null> {
    const file = this.fileFor(document, "review");
    const raw = await this.read(file);
    if (!raw) return null;
    const parsed = this.parse(file, ReviewFile, raw.json);
    return { doctype: parsed.doctype, mapping: parsed.mapping };
  }

  async hasMapping(document: string): Promise<boolean> {
    try {
      await fs.access(this.fileFor(document, "mapping"));
      return true;
    } catch {
      return false;
    }
  }

  private async write(file: string, payload: object): Promise<string> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
      const tmp = `${file}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(payload, null, 2) + "\n", "utf8");
      await fs.rename(tmp, file);
    } catch (e) {
      throw new StoreError(file, `write failed: ${errorMessage(e)}`, { cause: e });
    }
    this.log.debug("store.saved", { file });
    return file;
  }

  private async read(file: string): Promise<{ json: unknown } | null> {
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (e) {
      if (hasErrorCode(e, "ENOENT")) return null;
      throw new StoreError(file, `read failed: ${errorMessage(e)}`, { cause: e });
    }
    try {
      return { json: JSON.parse(text) };
    } catch (e) {
      throw new StoreError(file, `invalid JSON: ${errorMessage(e)}`, { cause: e });
    }
  }

  private parse<T extends { version: number }>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      throw new StoreError(file, `unexpected content: ${detail}`);
    }
    if (parsed.data.version !== STORE_VERSION) {
      this.log.warn("store.version_mismatch", { file, found: parsed.data.version, expected: STORE_VERSION });
    }
    return parsed.data;
  }
}
