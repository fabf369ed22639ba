import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { ZodError } from "zod";
import {
  BadRequestError,
  PdfjsTextLayer,
  PipelineError,
  PopplerRasterizer,
  TesseractOcrEngine,
  buildDocx,
  compressPdf,
  describeError,
  extractDocumentText,
  extractStructuredText,
  getLogger,
  guessAdapter,
  imagesToPdf,
  mergePdfs,
  pdfToJpgZip,
  pptToPdf,
  protectPdf,
  rotatePdf,
  splitPdf,
  unlockPdf,
  uploadLimitFor,
  wordToPdf,
  type Artifact,
  type CommandRunner,
  type Logger,
  type OcrEngine,
  type Rasterizer,
  type ServiceConfig,
  type StructuredText,
  type TextLayerExtractor,
  type ToolchainOptions,
  type UploadedFile,
} from "@core";
import {
  MultiFileBody,
  PdfToJpgBody,
  ProtectBody,
  RotateBody,
  SingleFileBody,
  SplitBody,
  UnlockBody,
  decodeFiles,
  jsonBodyLimit,
} from "./upload";

export interface AppDeps {
  config: Readonly<ServiceConfig>;
  logger?: Logger;
  textLayer?: TextLayerExtractor;
  rasterizer?: Rasterizer;
  /** A fresh engine per request; it is closed when the request finishes. */
  createOcrEngine?: () => OcrEngine;
  runner?: CommandRunner;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function asyncHandler(fn: Handler): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function sendArtifact(res: Response, artifact: Artifact): void {
  res.attachment(artifact.filename);
  res.type(artifact.contentType);
  res.send(artifact.data);
}

function requirePdf(file: UploadedFile): void {
  if (guessAdapter(file.name, file.mime) !== "pdf") throw new BadRequestError("Upload a PDF file");
}

export function createApp(deps: AppDeps) {
  const { config } = deps;
  const logger = deps.logger ?? getLogger("api");
  const textLayer = deps.textLayer ?? new PdfjsTextLayer(logger);
  const rasterizer =
    deps.rasterizer ??
    new PopplerRasterizer({ binary: config.binaries.pdftoppm, timeoutMs: config.subprocessTimeoutMs, runner: deps.runner });
  const createOcrEngine =
    deps.createOcrEngine ??
    (() => new TesseractOcrEngine({ lang: config.ocrLang, langPath: config.ocrLangPath, concurrency: config.ocrConcurrency, logger }));

  const toolchain = (binary: string, log: Logger): ToolchainOptions => ({
    binary,
    timeoutMs: config.subprocessTimeoutMs,
    runner: deps.runner,
    logger: log,
  });

  // Text of one upload through the acquisition strategy, with the OCR engine scoped to the call.
  async function structuredText(file: UploadedFile, log: Logger, pdfOnly: boolean): Promise<StructuredText> {
    const ocr = createOcrEngine();
    const collab = { textLayer, rasterizer, ocr, logger: log };
    const opts = {
      ocrDpi: config.ocrDpi,
      maxOcrPages: config.maxOcrPages,
      timeoutMs: config.acquisitionTimeoutMs,
      bulletPolicy: config.bulletPolicy,
    };
    const doc = { data: file.data, filename: file.name, mime: file.mime };
    try {
      return pdfOnly ? await extractStructuredText(doc, collab, opts) : await extractDocumentText(doc, collab, opts);
    } finally {
      await ocr.close().catch((err: unknown) => log.warn("ocr.close.failed", { error: describeError(err) }));
    }
  }

  const app = express();
  app.use(express.json({ limit: jsonBodyLimit(Math.max(config.uploadLimitBytes, config.compressUploadLimitBytes)) }));
  app.use(cors());
  app.use(helmet());
  // Successful responses are not access-logged.
  app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  app.use((req, res, next) => {
    const header = req.headers["x-request-id"];
    req.requestId = typeof header === "string" && header ? header : uuidv4();
    req.log = logger.child({ request_id: req.requestId });
    res.setHeader("x-request-id", req.requestId);
    next();
  });

  app.get("/", (_req, res) => {
    res.type("text/plain").send("pdfdesk conversion API");
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post(
    "/extract-text",
    asyncHandler(async (req, res) => {
      const body = SingleFileBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "extract-text"));
      const log = req.log.child({ tool: "extract-text", filename: file.name });
      const result = await structuredText(file, log, false);
      log.info("extract_text.done", { path: result.path, pages: result.pages.length, chars: result.text.length });
      res.json({ text: result.text, path: result.path, pages: result.pages });
    })
  );

  app.post(
    "/pdf-to-word",
    asyncHandler(async (req, res) => {
      const body = SingleFileBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "pdf-to-word"));
      requirePdf(file);
      const log = req.log.child({ tool: "pdf-to-word", filename: file.name });
      const result = await structuredText(file, log, true);
      log.info("pdf_to_word.text", { path: result.path, chars: result.text.length });
      sendArtifact(res, await buildDocx(result.text));
    })
  );

  app.post(
    "/word-to-pdf",
    asyncHandler(async (req, res) => {
      const body = SingleFileBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "word-to-pdf"));
      const log = req.log.child({ tool: "word-to-pdf", filename: file.name });
      sendArtifact(res, await wordToPdf(file, toolchain(config.binaries.soffice, log)));
    })
  );

  app.post(
    "/ppt-to-pdf",
    asyncHandler(async (req, res) => {
      const body = SingleFileBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "ppt-to-pdf"));
      const log = req.log.child({ tool: "ppt-to-pdf", filename: file.name });
      sendArtifact(res, await pptToPdf(file, toolchain(config.binaries.soffice, log)));
    })
  );

  app.post(
    "/jpg-to-pdf",
    asyncHandler(async (req, res) => {
      const body = MultiFileBody.parse(req.body);
      const files = decodeFiles(body.files, uploadLimitFor(config, "jpg-to-pdf"));
      sendArtifact(res, await imagesToPdf(files, req.log.child({ tool: "jpg-to-pdf" })));
    })
  );

  app.post(
    "/pdf-to-jpg",
    asyncHandler(async (req, res) => {
      const body = PdfToJpgBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "pdf-to-jpg"));
      requirePdf(file);
      sendArtifact(res, await pdfToJpgZip(file, rasterizer, { dpi: config.pdfToJpgDpi, pages: body.pages }));
    })
  );

  app.post(
    "/merge-pdf",
    asyncHandler(async (req, res) => {
      const body = MultiFileBody.parse(req.body);
      const files = decodeFiles(body.files, uploadLimitFor(config, "merge-pdf"));
      sendArtifact(res, await mergePdfs(files));
    })
  );

  app.post(
    "/split-pdf",
    asyncHandler(async (req, res) => {
      const body = SplitBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "split-pdf"));
      requirePdf(file);
      sendArtifact(res, await splitPdf(file, body.ranges));
    })
  );

  app.post(
    "/rotate-pdf",
    asyncHandler(async (req, res) => {
      const body = RotateBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "rotate-pdf"));
      requirePdf(file);
      sendArtifact(res, await rotatePdf(file, body.angle));
    })
  );

  app.post(
    "/compress-pdf",
    asyncHandler(async (req, res) => {
      const body = SingleFileBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "compress-pdf"));
      requirePdf(file);
      const log = req.log.child({ tool: "compress-pdf", filename: file.name });
      sendArtifact(res, await compressPdf(file, toolchain(config.binaries.gs, log)));
    })
  );

  app.post(
    "/protect-pdf",
    asyncHandler(async (req, res) => {
      const body = ProtectBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "protect-pdf"));
      requirePdf(file);
      const log = req.log.child({ tool: "protect-pdf", filename: file.name });
      sendArtifact(res, await protectPdf(file, body.password, toolchain(config.binaries.qpdf, log)));
    })
  );

  app.post(
    "/unlock-pdf",
    asyncHandler(async (req, res) => {
      const body = UnlockBody.parse(req.body);
      const [file] = decodeFiles([body.file], uploadLimitFor(config, "unlock-pdf"));
      requirePdf(file);
      const log = req.log.child({ tool: "unlock-pdf", filename: file.name });
      sendArtifact(res, await unlockPdf(file, body.password, toolchain(config.binaries.qpdf, log)));
    })
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const log = req.log ?? logger;
    if (err instanceof PipelineError) {
      log.warn("request.failed", { path: req.path, category: err.category, error: err.message });
      res.status(err.status).json({ error: err.category, message: err.message });
      return;
    }
    if (err instanceof ZodError) {
      const message = err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
      res.status(400).json({ error: "BAD_REQUEST", message });
      return;
    }
    if (typeof err === "object" && err !== null && "type" in err) {
      if (err.type === "entity.too.large") {
        res.status(413).json({ error: "PAYLOAD_TOO_LARGE", message: "Request body is too large" });
        return;
      }
      if (err.type === "entity.parse.failed") {
        res.status(400).json({ error: "BAD_REQUEST", message: "Malformed JSON body" });
        return;
      }
    }
    log.error("request.error", { path: req.path, error: describeError(err) });
    res.status(500).json({ error: "INTERNAL", message: describeError(err) });
  });

  return app;
}
