import { HealthResponseSchema } from "@payscan/contracts";
import {
  ReceiptScanner,
  silentLogger,
  textDocumentFromLines,
  type EngineLogger,
  type TextRecognizer,
} from "@payscan/engine";
import type { AddressInfo } from "node:net";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createApp } from "./app.js";

type RunningTestServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

const servers: RunningTestServer[] = [];

afterEach(async () => {
  while (servers.length > 0) {
    const server = servers.pop();
    if (server) {
      await server.close();
    }
  }
});

type TestServerOptions = {
  recognizer?: TextRecognizer;
  scanner?: ReceiptScanner;
  logger?: EngineLogger;
  bodyLimit?: string;
};

async function startTestServer(options: TestServerOptions = {}): Promise<RunningTestServer> {
  const { recognizer } = options;
  const app = createApp({
    config: { port: 0, bodyLimit: options.bodyLimit ?? "1mb" },
    scanner:
      options.scanner ??
      (recognizer ? new ReceiptScanner({ recognizer, logger: silentLogger }) : null),
    logger: options.logger ?? silentLogger,
  });

  const listener = await new Promise<ReturnType<typeof app.listen>>((resolve) => {
    const server = app.listen(0, () => resolve(server));
  });

  const address = listener.address() as AddressInfo;
  const running: RunningTestServer = {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise((resolve, reject) => {
        listener.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
  };

  servers.push(running);
  return running;
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

const physicalLines = ["SuperMart", "Bill No: INV-2024-117", "2 x 150", "Grand Total Rs. 450"];
const upiText = "Paid to Raj Traders\nUPI Ref No 400881234567\nAmount: Rs 1200";
const image = { imageDataUrl: "data:image/png;base64,AAAA" };

describe("payscan api", () => {
  it("reports health", async () => {
    const server = await startTestServer();

    const response = await fetch(`${server.baseUrl}/health`);
    const body = HealthResponseSchema.parse(await response.json());

    expect(response.status).toBe(200);
    expect(body.service).toBe("payscan-api");
  });

  it("analyzes a recognized document and pre-fills the draft", async () => {
    const server = await startTestServer();

    const response = await postJson(`${server.baseUrl}/v1/receipts/analyze`, {
      document: textDocumentFromLines(physicalLines),
      overrides: { description: "Groceries" },
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      result: {
        fullText: physicalLines.join("\n"),
        referenceNumber: "INV-2024-117",
        amount: 450,
        description: "SuperMart",
        category: "PHYSICAL_RECEIPT",
      },
      found: { referenceNumber: true, amount: true, description: true },
      draft: {
        serialNumber: "INV-2024-117",
        amount: "450",
        description: "Groceries",
        receiptType: "PHYSICAL_RECEIPT",
        receiptTypeLabel: "Physical Receipt",
      },
    });
  });

  it("analyzes plain OCR text", async () => {
    const server = await startTestServer();

    const response = await postJson(`${server.baseUrl}/v1/receipts/analyze`, { ocrText: upiText });
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.result).toEqual({
      fullText: upiText,
      referenceNumber: "400881234567",
      amount: 1200,
      description: "Raj Traders",
      category: "UPI_PAYMENT",
    });
    expect(body.draft.receiptTypeLabel).toBe("UPI Transaction");
  });

  it("requires exactly one text source", async () => {
    const server = await startTestServer();

    const response = await postJson(`${server.baseUrl}/v1/receipts/analyze`, {
      document: textDocumentFromLines(physicalLines),
      ocrText: upiText,
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "invalid_request",
      issues: [{ path: ["document"], message: "exactly one of document or ocrText is required" }],
    });
  });

  it("rejects malformed JSON", async () => {
    const server = await startTestServer();

    const response = await fetch(`${server.baseUrl}/v1/receipts/analyze`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{",
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "invalid_json",
      message: "request body is not valid JSON",
    });
  });

  it("analyzes a batch in request order", async () => {
    const server = await startTestServer();

    const response = await postJson(`${server.baseUrl}/v1/receipts/batch/analyze`, {
      receipts: [
        { receiptId: "r-2", ocrText: upiText },
        { receiptId: "r-1", document: textDocumentFromLines(physicalLines) },
        { receiptId: "r-3", ocrText: "random unrelated text with no numbers" },
      ],
    });
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(
      body.results.map((entry: { receiptId: string; result: { category: string } }) => [
        entry.receiptId,
        entry.result.category,
      ]),
    ).toEqual([
      ["r-2", "UPI_PAYMENT"],
      ["r-1", "PHYSICAL_RECEIPT"],
      ["r-3", "UNKNOWN"],
    ]);
    expect(body.results[2].found).toEqual({
      referenceNumber: false,
      amount: false,
      description: true,
    });
  });

  it("reports scanning as unavailable without a recognizer", async () => {
    const server = await startTestServer();

    const response = await postJson(`${server.baseUrl}/v1/receipts/scan`, image);

    expect(response.status).toBe(503);
    expect((await response.json()).error).toBe("recognizer_unavailable");
  });

  it("scans an image through the recognizer", async () => {
    const recognize = vi.fn<TextRecognizer["recognize"]>(async () =>
      textDocumentFromLines(physicalLines),
    );
    const server = await startTestServer({ recognizer: { recognize } });

    const response = await postJson(`${server.baseUrl}/v1/receipts/scan`, {
      ...image,
      overrides: { amount: 500 },
    });
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(recognize).toHaveBeenCalledWith(image);
    expect(body.result.amount).toBe(450);
    expect(body.draft.amount).toBe("500");
  });

  it("maps recognition failures to 502", async () => {
    const server = await startTestServer({
      recognizer: {
        recognize: async () => {
          throw new Error("camera offline");
        },
      },
    });

    const response = await postJson(`${server.baseUrl}/v1/receipts/scan`, image);

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      error: "recognition_failed",
      message: "text recognition failed: camera offline",
    });
  });

  it("rejects an image that is not a data URL", async () => {
    const recognize = vi.fn<TextRecognizer["recognize"]>();
    const server = await startTestServer({ recognizer: { recognize } });

    const response = await postJson(`${server.baseUrl}/v1/receipts/scan`, {
      imageDataUrl: "https://images.test.local/receipt.png",
    });

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe("invalid_request");
    expect(recognize).not.toHaveBeenCalled();
  });

  it("rejects bodies over the configured limit", async () => {
    const server = await startTestServer({ bodyLimit: "1kb" });

    const response = await postJson(`${server.baseUrl}/v1/receipts/analyze`, {
      ocrText: "Grand Total Rs 450 ".repeat(100),
    });

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: "payload_too_large" });
  });

  it("logs unexpected failures and answers 500", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const scanner = new ReceiptScanner({
      recognizer: { recognize: vi.fn<TextRecognizer["recognize"]>() },
      logger: silentLogger,
    });
    vi.spyOn(scanner, "scan").mockRejectedValue(new Error("analysis store offline"));
    const server = await startTestServer({ scanner, logger });

    const response = await postJson(`${server.baseUrl}/v1/receipts/scan`, image);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "internal_error" });
    expect(logger.error).toHaveBeenCalledWith(
      "[payscan-api] request failed: analysis store offline",
    );
  });

  it("answers unknown routes with JSON", async () => {
    const server = await startTestServer();

    const response = await fetch(`${server.baseUrl}/v1/nothing`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: "not_found",
      message: "no route for GET /v1/nothing",
    });
  });
});
