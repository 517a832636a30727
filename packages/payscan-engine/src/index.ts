export * from "./client/text-recognizer.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./prefill/expense-draft.js";
export { analyzeReceipt, inspectReceipt } from "./processor/receipt-analyzer.js";
export * from "./processor/receipt-scanner.js";
export type {
  AmountSelection,
  ExtractionResult,
  ReceiptAnalysis,
  ReceiptCategory,
  TextDocument,
} from "./processor/types.js";
export * from "./source/text-document.js";
