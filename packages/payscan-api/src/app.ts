import {
  AnalyzeReceiptRequestSchema,
  AnalyzeReceiptResponseSchema,
  BatchAnalyzeRequestSchema,
  BatchAnalyzeResponseSchema,
  HealthResponseSchema,
  ScanReceiptRequestSchema,
  type AnalyzeReceiptResponse,
  type ExpenseOverrides,
  type HealthResponse,
  type TextDocument,
} from "@payscan/contracts";
import {
  RecognitionFailedError,
  consoleLogger,
  describeError,
  inspectReceipt,
  textDocumentFromText,
  toExpenseDraft,
  type EngineLogger,
  type ReceiptAnalysis,
  type ReceiptScanner,
} from "@payscan/engine";
import express, { type ErrorRequestHandler, type Express } from "express";
import type { ApiConfig } from "./config/env.js";
import { bodyParserErrorType, parseBody, sendError } from "./routes/http-utils.js";

type CreateAppParams = {
  config: ApiConfig;
  scanner?: ReceiptScanner | null;
  logger?: EngineLogger;
};

type ReceiptTextInput = {
  document?: TextDocument;
  ocrText?: string;
};

function toTextDocument(input: ReceiptTextInput): TextDocument {
  return input.document ?? textDocumentFromText(input.ocrText ?? "");
}

function toAnalyzeResponse(
  analysis: ReceiptAnalysis,
  overrides?: ExpenseOverrides,
): AnalyzeReceiptResponse {
  return AnalyzeReceiptResponseSchema.parse({
    result: analysis.result,
    found: analysis.found,
    draft: toExpenseDraft(analysis.result, overrides),
  });
}

export function createApp(params: CreateAppParams): Express {
  const logger = params.logger ?? consoleLogger;
  const scanner = params.scanner ?? null;

  const app = express();
  // Scan requests carry the image inline as a data URL.
  app.use(express.json({ limit: params.config.bodyLimit }));

  app.get("/health", (_req, res) => {
    const payload: HealthResponse = {
      ok: true,
      service: "payscan-api",
      now: new Date().toISOString(),
    };
    HealthResponseSchema.parse(payload);
    res.json(payload);
  });

  app.post("/v1/receipts/analyze", (req, res) => {
    const body = parseBody(AnalyzeReceiptRequestSchema, req, res);
    if (!body) {
      return;
    }

    const analysis = inspectReceipt(toTextDocument(body), logger);
    logger.info(`[payscan-api] analyzed ${analysis.result.category} receipt`);
    res.json(toAnalyzeResponse(analysis, body.overrides));
  });

  app.post("/v1/receipts/batch/analyze", (req, res) => {
    const body = parseBody(BatchAnalyzeRequestSchema, req, res);
    if (!body) {
      return;
    }

    const results = body.receipts.map((entry) => {
      const analysis = inspectReceipt(toTextDocument(entry), logger);
      return { receiptId: entry.receiptId, result: analysis.result, found: analysis.found };
    });
    logger.info(`[payscan-api] analyzed batch of ${results.length} receipts`);
    res.json(BatchAnalyzeResponseSchema.parse({ results }));
  });

  app.post("/v1/receipts/scan", async (req, res) => {
    if (!scanner) {
      sendError(res, 503, {
        error: "recognizer_unavailable",
        message: "no text recognizer is configured",
      });
      return;
    }

    const body = parseBody(ScanReceiptRequestSchema, req, res);
    if (!body) {
      return;
    }

    let analysis: ReceiptAnalysis;
    try {
      analysis = await scanner.scan({ imageDataUrl: body.imageDataUrl });
    } catch (error) {
      if (error instanceof RecognitionFailedError) {
        sendError(res, 502, { error: error.code, message: error.message });
        return;
      }
      throw error;
    }

    res.json(toAnalyzeResponse(analysis, body.overrides));
  });

  app.use((req, res) => {
    sendError(res, 404, { error: "not_found", message: `no route for ${req.method} ${req.path}` });
  });

  const handleError: ErrorRequestHandler = (error, _req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    switch (bodyParserErrorType(error)) {
      case "entity.parse.failed":
        sendError(res, 400, { error: "invalid_json", message: "request body is not valid JSON" });
        return;
      case "entity.too.large":
        sendError(res, 413, { error: "payload_too_large" });
        return;
      default:
        logger.error(`[payscan-api] request failed: ${describeError(error)}`);
        sendError(res, 500, { error: "internal_error" });
    }
  };
  app.use(handleError);

  return app;
}
