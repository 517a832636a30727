import { TextDocumentSchema } from "@payscan/contracts";
import {
  HttpTextRecognizer,
  type ReceiptImage,
  type TextRecognizer,
} from "../client/text-recognizer.js";
import { RecognitionFailedError, describeError } from "../errors.js";
import { consoleLogger, type EngineLogger } from "../logger.js";
import { inspectReceipt } from "./receipt-analyzer.js";
import type { ReceiptAnalysis } from "./types.js";

type ReceiptScannerOptions = {
  recognizer: TextRecognizer;
  logger?: EngineLogger;
};

export class ReceiptScanner {
  private readonly recognizer: TextRecognizer;
  private readonly logger: EngineLogger;

  constructor(options: ReceiptScannerOptions) {
    this.recognizer = options.recognizer;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Recognizes the image, then analyzes the text. Any recognition problem surfaces as
   * RecognitionFailedError and the analyzer is not run.
   */
  async scan(image: ReceiptImage): Promise<ReceiptAnalysis> {
    let recognized: unknown;
    try {
      recognized = await this.recognizer.recognize(image);
    } catch (error) {
      this.logger.warn(`[payscan-engine] recognition failed: ${describeError(error)}`);
      if (error instanceof RecognitionFailedError) {
        throw error;
      }
      throw new RecognitionFailedError(`text recognition failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const parsed = TextDocumentSchema.safeParse(recognized);
    if (!parsed.success) {
      this.logger.warn("[payscan-engine] recognizer produced a malformed document");
      throw new RecognitionFailedError("text recognition produced a malformed document", {
        cause: parsed.error,
      });
    }

    const analysis = inspectReceipt(parsed.data, this.logger);
    this.logger.info(
      `[payscan-engine] scanned ${analysis.result.category} receipt (${parsed.data.lines.length} lines)`,
    );
    return analysis;
  }
}

export type RecognizerConfig = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
};

const DEFAULT_RECOGNIZER_TIMEOUT_MS = 15_000;

export function resolveRecognizerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): RecognizerConfig | null {
  const baseUrl = env.PAYSCAN_RECOGNIZER_BASE_URL?.trim();
  if (!baseUrl) {
    return null;
  }

  const timeoutRaw = env.PAYSCAN_RECOGNIZER_TIMEOUT_MS?.trim();
  const timeoutMs = timeoutRaw ? Number.parseInt(timeoutRaw, 10) : DEFAULT_RECOGNIZER_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`invalid PAYSCAN_RECOGNIZER_TIMEOUT_MS: ${timeoutRaw}`);
  }

  return {
    baseUrl,
    apiKey: env.PAYSCAN_RECOGNIZER_API_KEY?.trim() || undefined,
    timeoutMs,
  };
}

export function createReceiptScannerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  logger: EngineLogger = consoleLogger,
): ReceiptScanner | null {
  const config = resolveRecognizerConfigFromEnv(env);
  if (!config) {
    return null;
  }

  return new ReceiptScanner({
    recognizer: new HttpTextRecognizer(config),
    logger,
  });
}
