import {
  RecognizeTextRequestSchema,
  RecognizeTextResponseSchema,
  type TextDocument,
} from "@payscan/contracts";
import { RecognitionFailedError, describeError } from "../errors.js";

export type ReceiptImage = {
  imageDataUrl: string;
};

export type TextRecognizer = {
  recognize: (image: ReceiptImage) => Promise<TextDocument>;
};

export type HttpTextRecognizerOptions = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 15_000;

export class HttpTextRecognizer implements TextRecognizer {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(options: HttpTextRecognizerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async recognize(image: ReceiptImage): Promise<TextDocument> {
    const body = RecognizeTextRequestSchema.parse(image);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1/recognize`, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RecognitionFailedError(`text recognition request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new RecognitionFailedError(`text recognition failed: ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new RecognitionFailedError("text recognition returned invalid JSON", { cause: error });
    }

    const parsed = RecognizeTextResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RecognitionFailedError("text recognition returned a malformed document", {
        cause: parsed.error,
      });
    }
    return parsed.data.document;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}
