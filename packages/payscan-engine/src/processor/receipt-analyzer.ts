import type { ExtractionResult, ReceiptAnalysis, TextDocument } from "./types.js";
import { silentLogger, type EngineLogger } from "../logger.js";
import { extractAmount } from "./amount-extractor.js";
import { classifyReceipt } from "./classifier.js";
import { extractDescription } from "./description-extractor.js";
import { cleanupText } from "./normalization.js";
import { matchReference } from "./reference-extractor.js";

/**
 * Runs the full pipeline and reports, per field, whether an extractor produced a value.
 * A found amount of exactly 0 and a missing amount both surface as `amount: 0` in the
 * result; `found.amount` tells them apart.
 */
export function inspectReceipt(
  doc: TextDocument,
  logger: EngineLogger = silentLogger,
): ReceiptAnalysis {
  const category = classifyReceipt(doc);
  logger.debug(`[payscan-engine] detected category ${category}`);

  const reference = matchReference(doc, category);
  const referenceNumber = cleanupText(reference?.value ?? "");
  logger.debug(
    reference
      ? `[payscan-engine] reference number: ${referenceNumber} (rule ${reference.rule})`
      : "[payscan-engine] reference number: (none)",
  );

  const { amount, confidence } = extractAmount(doc, category);
  logger.debug(`[payscan-engine] amount: ${amount} (confidence ${confidence})`);

  const description = extractDescription(doc, category);
  logger.debug(`[payscan-engine] description: ${description || "(none)"}`);

  const result: Readonly<ExtractionResult> = Object.freeze({
    fullText: doc.fullText,
    referenceNumber,
    amount,
    description,
    category,
  });

  return {
    result,
    found: {
      referenceNumber: referenceNumber.length > 0,
      amount: confidence > 0,
      description: description.length > 0,
    },
  };
}

export function analyzeReceipt(
  doc: TextDocument,
  logger: EngineLogger = silentLogger,
): Readonly<ExtractionResult> {
  return inspectReceipt(doc, logger).result;
}
