import type {
  ExtractionFields,
  ExtractionResult,
  ReceiptCategory,
  TextDocument,
} from "@payscan/contracts";

export type { ExtractionResult, ReceiptCategory, TextDocument };

export type AmountCandidate = Readonly<{
  value: number;
  confidence: number;
  context: string;
}>;

export type AmountSelection = {
  amount: number;
  confidence: number;
};

export type ReceiptAnalysis = {
  result: Readonly<ExtractionResult>;
  found: ExtractionFields;
};

/**
 * One step of an ordered cascade. Rules are evaluated in declaration order and the
 * first one that yields an accepted value wins. `pattern` must carry the `g` flag.
 */
export type ExtractionRule = {
  name: string;
  pattern: RegExp;
  accept?: (token: string) => boolean;
};

export type ReferenceMatch = {
  value: string;
  rule: string;
};
