import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError, MigrationJob, artifactStem, errorMessage } from "@print-migrator/core";

const EntrySchema = z.object({
  name: z.string().trim().min(1),
  doctype: z.string().min(1),
  source_pdf: z.string().min(1),
  description: z.string().optional(),
});

export const ManifestSchema = z
  .object({
    version: z.union([z.string(), z.number()]),
    upload: z.boolean().default(false),
    print_formats: z.array(EntrySchema).min(1),
  })
  .refine((m) => new Set(m.print_formats.map((p) => p.name)).size === m.print_formats.length, {
    message: "print format names must be unique",
    path: ["print_formats"],
  })
  // output directories may be case-insensitive
  .refine((m) => new Set(m.print_formats.map((p) => artifactStem(p.name).toLowerCase())).size === m.print_formats.length, {
    message: "print format names must map to distinct file names",
    path: ["print_formats"],
  });

export interface Manifest {
  version: string;
  upload: boolean;
  jobs: MigrationJob[];
}

/** Parse a manifest; relative `source_pdf` paths resolve against baseDir. */
export function parseManifest(raw: unknown, baseDir: string, source = "manifest"): Manifest {
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => i.path.join("."));
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid manifest '${source}': ${detail}`, keys);
  }
  return {
    version: String(parsed.data.version),
    upload: parsed.data.upload,
    jobs: parsed.data.print_formats.map((p) => ({
      name: p.name,
      doctype: p.doctype,
      sourcePdf: path.resolve(baseDir, p.source_pdf),
    })),
  };
}

export async function loadManifest(file: string): Promise<Manifest> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, "utf8"));
  } catch (e) {
    throw new ConfigError(`Cannot read manifest '${file}': ${errorMessage(e)}`, ["MIGRATION_MANIFEST"]);
  }
  return parseManifest(raw, path.dirname(path.resolve(file)), file);
}
