import type { ReceiptCategory, TextDocument } from "./types.js";
import {
  DIGITAL_KEYWORDS,
  PAYMENT_ID_BONUS,
  PHYSICAL_KEYWORDS,
  QUANTITY_LINE_BONUS,
  UPI_DIGITAL_BONUS,
  UPI_KEYWORDS,
  UPI_MIN_SCORE,
  scoreKeywords,
} from "./keywords.js";

const QUANTITY_LINE = /(?<!\d)\d+\s*x\s*\d+/;
const PAYMENT_ID = /payment\s+id\s*:\s*[a-z0-9]+/i;

export type CategoryScores = {
  physical: number;
  digital: number;
  upi: number;
};

export function scoreCategories(doc: TextDocument): CategoryScores {
  const lowered = doc.fullText.toLowerCase();

  const physical = scoreKeywords(lowered, PHYSICAL_KEYWORDS);
  const digital = scoreKeywords(lowered, DIGITAL_KEYWORDS);
  const upi = scoreKeywords(lowered, UPI_KEYWORDS);

  let physicalScore = physical.score;
  let digitalScore = digital.score + upi.hits * UPI_DIGITAL_BONUS;

  if (doc.lines.some((line) => QUANTITY_LINE.test(line))) {
    physicalScore += QUANTITY_LINE_BONUS;
  }
  if (PAYMENT_ID.test(doc.fullText)) {
    digitalScore += PAYMENT_ID_BONUS;
  }

  return { physical: physicalScore, digital: digitalScore, upi: upi.score };
}

/**
 * UPI is checked first: its vocabulary also feeds the digital score, so it has to win
 * ties against digital.
 */
export function classifyReceipt(doc: TextDocument): ReceiptCategory {
  const scores = scoreCategories(doc);

  if (scores.upi >= UPI_MIN_SCORE && scores.upi >= scores.digital) {
    return "UPI_PAYMENT";
  }
  if (scores.digital > scores.physical) {
    return "DIGITAL_PAYMENT";
  }
  if (scores.physical > 0) {
    return "PHYSICAL_RECEIPT";
  }
  return "UNKNOWN";
}
