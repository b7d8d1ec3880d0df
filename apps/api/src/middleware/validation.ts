import { z } from "zod";
import { EXPORTER_KINDS, getLogger } from "@print-migrator/core";
import { BadRequestError } from "../errors";

const log = getLogger("api");

/** Parse a request part with zod; failures become a 400 with per-path details. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, part = "body"): z.output<S> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  const details = parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
  log.warn("request.invalid", { part, issues: details });
  throw new BadRequestError(`Invalid request ${part}`, details);
}

export const DocumentParams = z.object({
  name: z
    .string()
    .trim()
    .min(1)
    .max(140)
    .regex(/^[^/\\]+$/, "must not contain path separators"),
});

const Rows = z.array(z.array(z.string()));

export const ProposeBody = z.object({
  doctype: z.string().min(1),
  overrides: z.record(z.union([z.string(), Rows, z.null()])).optional(),
});

export const MappingBody = z.object({
  doctype: z.string().min(1),
  mapping: z.record(z.union([z.string(), Rows])),
});

export const ValidateBody = z
  .object({
    doctype: z.string().min(1).optional(),
    mapping: z.record(z.union([z.string(), Rows])).optional(),
  })
  .refine((b) => b.mapping === undefined || b.doctype !== undefined, {
    message: "doctype is required when a mapping is given",
    path: ["doctype"],
  });

export const ExportBody = z.object({
  kind: z.enum(EXPORTER_KINDS),
  write: z.boolean().optional(),
});
