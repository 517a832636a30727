import { z } from "zod";

export const ReceiptCategorySchema = z.enum([
  "PHYSICAL_RECEIPT",
  "DIGITAL_PAYMENT",
  "UPI_PAYMENT",
  "UNKNOWN",
]);

export const IdSchema = z.string().min(1).max(128);

export const TextDocumentSchema = z.object({
  fullText: z.string().max(50_000),
  lines: z.array(z.string().max(2_000)).max(2_000),
  blocks: z.array(z.string().max(50_000)).max(500),
});

export const ExtractionResultSchema = z.object({
  fullText: z.string(),
  referenceNumber: z.string(),
  amount: z.number().nonnegative(),
  description: z.string(),
  category: ReceiptCategorySchema,
});

export const ExtractionFieldsSchema = z.object({
  referenceNumber: z.boolean(),
  amount: z.boolean(),
  description: z.boolean(),
});

export const ExpenseOverridesSchema = z.object({
  serialNumber: z.string().max(120).optional(),
  amount: z.number().nonnegative().optional(),
  description: z.string().max(240).optional(),
});

export const ExpenseDraftSchema = z.object({
  serialNumber: z.string(),
  amount: z.string(),
  description: z.string(),
  receiptType: z.union([ReceiptCategorySchema.exclude(["UNKNOWN"]), z.literal("")]),
  receiptTypeLabel: z.string(),
});

export const AnalyzeReceiptRequestSchema = z
  .object({
    document: TextDocumentSchema.optional(),
    ocrText: z.string().min(1).max(50_000).optional(),
    overrides: ExpenseOverridesSchema.optional(),
  })
  .refine((body) => (body.document === undefined) !== (body.ocrText === undefined), {
    message: "exactly one of document or ocrText is required",
    path: ["document"],
  });

export const AnalyzeReceiptResponseSchema = z.object({
  result: ExtractionResultSchema,
  found: ExtractionFieldsSchema,
  draft: ExpenseDraftSchema,
});

export const BatchAnalyzeEntrySchema = z
  .object({
    receiptId: IdSchema,
    document: TextDocumentSchema.optional(),
    ocrText: z.string().min(1).max(50_000).optional(),
  })
  .refine((entry) => (entry.document === undefined) !== (entry.ocrText === undefined), {
    message: "exactly one of document or ocrText is required",
    path: ["document"],
  });

export const BatchAnalyzeRequestSchema = z.object({
  receipts: z.array(BatchAnalyzeEntrySchema).min(1).max(10),
});

export const BatchAnalyzeResponseSchema = z.object({
  results: z.array(
    z.object({
      receiptId: IdSchema,
      result: ExtractionResultSchema,
      found: ExtractionFieldsSchema,
    }),
  ),
});

export const ImageDataUrlSchema = z.string().startsWith("data:image/").max(15_000_000);

export const ScanReceiptRequestSchema = z.object({
  imageDataUrl: ImageDataUrlSchema,
  overrides: ExpenseOverridesSchema.optional(),
});

export const RecognizeTextRequestSchema = z.object({
  imageDataUrl: ImageDataUrlSchema,
});

export const RecognizeTextResponseSchema = z.object({
  document: TextDocumentSchema,
});

export const HealthResponseSchema = z.object({
  ok: z.literal(true),
  service: z.string().min(1),
  now: z.iso.datetime(),
});

export const ErrorResponseSchema = z.object({
  error: z.string().min(1),
  message: z.string().optional(),
  issues: z
    .array(
      z.object({
        path: z.array(z.union([z.string(), z.number()])),
        message: z.string(),
      }),
    )
    .optional(),
});

export type ReceiptCategory = z.infer<typeof ReceiptCategorySchema>;
export type TextDocument = z.infer<typeof TextDocumentSchema>;
export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;
export type ExtractionFields = z.infer<typeof ExtractionFieldsSchema>;
export type ExpenseOverrides = z.infer<typeof ExpenseOverridesSchema>;
export type ExpenseDraft = z.infer<typeof ExpenseDraftSchema>;
export type AnalyzeReceiptRequest = z.infer<typeof AnalyzeReceiptRequestSchema>;
export type AnalyzeReceiptResponse = z.infer<typeof AnalyzeReceiptResponseSchema>;
export type BatchAnalyzeEntry = z.infer<typeof BatchAnalyzeEntrySchema>;
export type BatchAnalyzeRequest = z.infer<typeof BatchAnalyzeRequestSchema>;
export type BatchAnalyzeResponse = z.infer<typeof BatchAnalyzeResponseSchema>;
export type ScanReceiptRequest = z.infer<typeof ScanReceiptRequestSchema>;
export type RecognizeTextRequest = z.infer<typeof RecognizeTextRequestSchema>;
export type RecognizeTextResponse = z.infer<typeof RecognizeTextResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
