export type KeywordTable = ReadonlyMap<string, number>;

export const PHYSICAL_KEYWORDS: KeywordTable = new Map([
  ["cash memo", 3],
  ["bill", 2],
  ["invoice", 2],
  ["receipt", 2],
  ["store", 1],
  ["gst", 3],
  ["tax invoice", 3],
  ["cash counter", 3],
  ["customer", 1],
  ["thank you", 1],
  ["total", 1],
  ["subtotal", 2],
  ["qty", 2],
  ["price", 1],
]);

export const DIGITAL_KEYWORDS: KeywordTable = new Map([
  ["transaction", 3],
  ["payment successful", 3],
  ["payment complete", 3],
  ["digital receipt", 3],
  ["confirmation", 2],
  ["reference", 2],
  ["transaction id", 3],
  ["paid to", 3],
  ["payment mode", 3],
  ["date & time", 2],
  ["paid from", 2],
]);

// Every UPI hit also counts toward the digital score.
export const UPI_KEYWORDS: KeywordTable = new Map([
  ["upi", 3],
  ["upi id", 3],
  ["upi ref", 3],
  ["upi reference", 3],
  ["bhim", 3],
  ["gpay", 3],
  ["google pay", 3],
  ["phonepe", 3],
  ["paytm", 3],
  ["vpa", 3],
  ["upi transaction", 3],
]);

export const UPI_DIGITAL_BONUS = 1;
export const QUANTITY_LINE_BONUS = 2;
export const PAYMENT_ID_BONUS = 2;
export const UPI_MIN_SCORE = 3;

/**
 * Sums the weight of every phrase that occurs in the lower-cased text. Each phrase counts
 * once however often it repeats.
 */
export function scoreKeywords(loweredText: string, table: KeywordTable): {
  score: number;
  hits: number;
} {
  let score = 0;
  let hits = 0;
  for (const [phrase, weight] of table) {
    if (loweredText.includes(phrase)) {
      score += weight;
      hits += 1;
    }
  }
  return { score, hits };
}
