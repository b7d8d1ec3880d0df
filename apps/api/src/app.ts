import express, { NextFunction, Request, RequestHandler, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import {
  ArtifactUploader,
  ConfigError,
  DocTypeSchema,
  ExtractOptions,
  IntermediateStore,
  MigratorConfig,
  exportMapping,
  extractElementsFromBuffer,
  findDocType,
  getExporter,
  getLogger,
  listDocTypes,
  proposeMapping,
  validateMapping,
  writeArtifact,
} from "@print-migrator/core";
import { BadRequestError, HttpError, NotFoundError } from "./errors";
import { errorHandler } from "./middleware/errorHandler";
import { DocumentParams, ExportBody, MappingBody, ProposeBody, ValidateBody, parseInput } from "./middleware/validation";

export interface ApiDeps {
  config: MigratorConfig;
  store: IntermediateStore;
  uploader?: ArtifactUploader;
  extractOptions?: ExtractOptions;
  now?: () => Date;
  accessLog?: boolean;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const wrap =
  (fn: AsyncHandler): RequestHandler =>
  (req, res, next) => {
    fn(req, res).catch(next);
  };

function documentName(req: Request): string {
  return parseInput(DocumentParams, req.params, "params").name;
}

function schemaFor(id: string): DocTypeSchema {
  const schema = findDocType(id);
  if (!schema) throw new NotFoundError("DocType schema", id);
  return schema;
}

export function createApp(deps: ApiDeps) {
  const { config, store } = deps;
  const logger = getLogger("api");
  const app = express();

  app.use(cors());
  app.use(helmet());
  if (deps.accessLog ?? true) {
    // Only log failing requests; the app logs its own events.
    app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  }
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers["x-request-id"];
    res.locals.requestId = typeof header === "string" && header ? header : uuidv4();
    res.setHeader("x-request-id", res.locals.requestId);
    next();
  });

  const json = express.json({ limit: "5mb" });
  const pdf = express.raw({ type: "application/pdf", limit: config.pdfMaxBytes });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/doctypes", (_req, res) => {
    res.json(listDocTypes().map((s) => ({ id: s.id, doctype: s.doctype, title: s.title, fields: s.fields.length })));
  });

  app.get("/doctypes/:id", (req, res) => {
    res.json(schemaFor(req.params.id));
  });

  app.post(
    "/documents/:name/extract",
    pdf,
    wrap(async (req, res) => {
      const name = documentName(req);
      if (!Buffer.isBuffer(req.body)) {
        throw new HttpError(415, "unsupported_media_type", "Expected a PDF body with content-type application/pdf");
      }
      const buf: Buffer = req.body;
      const elements = await extractElementsFromBuffer(new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength), {
        ...deps.extractOptions,
        maxBytes: config.pdfMaxBytes,
        source: name,
      });
      await store.saveElements(name, elements);
      logger.info("document.extracted", { document: name, request_id: res.locals.requestId, elements: elements.length });
      res.status(201).json({
        document: name,
        count: elements.length,
        tables: elements.filter((e) => e.kind === "table").length,
        elements,
      });
    })
  );

  app.post(
    "/documents/:name/mapping",
    json,
    wrap(async (req, res) => {
      const name = documentName(req);
      const body = parseInput(ProposeBody, req.body);
      const schema = schemaFor(body.doctype);
      const elements = await store.loadElements(name);
      if (!elements) throw new NotFoundError("Extracted elements for document", name);
      const review = await store.loadReview(name);
      const reviewed = review && review.doctype === schema.id ? review.mapping : {};
      const proposal = proposeMapping(elements, schema, { ...reviewed, ...body.overrides });
      await store.saveMapping(name, schema.id, proposal.mapping);
      const validation = validateMapping(proposal.mapping, schema);
      res.json({ document: name, doctype: schema.id, ...proposal, validation });
    })
  );

  app.put(
    "/documents/:name/mapping",
    json,
    wrap(async (req, res) => {
      const name = documentName(req);
      const body = parseInput(MappingBody, req.body);
      const schema = schemaFor(body.doctype);
      // stored as given; export and upload refuse it until it validates
      await store.saveReview(name, schema.id, body.mapping);
      await store.saveMapping(name, schema.id, body.mapping);
      const validation = validateMapping(body.mapping, schema);
      logger.info("mapping.saved", { document: name, doctype: schema.id, valid: validation.isValid });
      res.json({ document: name, doctype: schema.id, mapping: body.mapping, validation });
    })
  );

  app.post(
    "/documents/:name/validate",
    json,
    wrap(async (req, res) => {
      const name = documentName(req);
      const body = parseInput(ValidateBody, req.body ?? {});
      if (body.mapping && body.doctype) {
        res.json(validateMapping(body.mapping, schemaFor(body.doctype)));
        return;
      }
      const stored = await store.loadMapping(name);
      if (!stored) throw new NotFoundError("Mapping for document", name);
      if (body.doctype && body.doctype !== stored.doctype) {
        throw new BadRequestError(`Document '${name}' is mapped to '${stored.doctype}', not '${body.doctype}'`);
      }
      res.json(validateMapping(stored.mapping, schemaFor(stored.doctype)));
    })
  );

  app.post(
    "/documents/:name/export",
    json,
    wrap(async (req, res) => {
      const name = documentName(req);
      const body = parseInput(ExportBody, req.body);
      const stored = await store.loadMapping(name);
      if (!stored) throw new NotFoundError("Mapping for document", name);
      const artifact = exportMapping(body.kind, stored.mapping, schemaFor(stored.doctype), {
        name,
        author: config.export.author,
        version: config.export.version,
        now: deps.now,
      });
      if (artifact.status === "validation_failed") {
        res.status(422).json(artifact);
        return;
      }
      const file = body.write ? await writeArtifact(artifact, config.outputDir) : undefined;
      res.json(file ? { ...artifact, file } : artifact);
    })
  );

  app.post(
    "/documents/:name/upload",
    wrap(async (req, res) => {
      const name = documentName(req);
      if (!deps.uploader) {
        throw new ConfigError("Upload is not configured: set ERPNEXT_API_KEY and ERPNEXT_API_SECRET", [
          "ERPNEXT_API_KEY",
          "ERPNEXT_API_SECRET",
        ]);
      }
      const stored = await store.loadMapping(name);
      if (!stored) throw new NotFoundError("Mapping for document", name);
      const artifact = getExporter("jinja").render(stored.mapping, schemaFor(stored.doctype), {
        name,
        author: config.export.author,
        version: config.export.version,
        now: deps.now,
      });
      const result = await deps.uploader.upload(artifact);
      logger.info("document.uploaded", { document: name, request_id: res.locals.requestId, attempts: result.attempts });
      res.json(result);
    })
  );

  app.use((req, _res, next) => {
    next(new HttpError(404, "not_found", `No route for ${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
