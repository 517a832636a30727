import type { AmountCandidate, AmountSelection, ReceiptCategory, TextDocument } from "./types.js";
import { clampConfidence, flattenLines, parseAmount } from "./normalization.js";

export const BASE_CONFIDENCE = 0.5;
export const TOTAL_CONTEXT_BOOST = 0.3;
export const TAIL_POSITION_BOOST = 0.1;
export const LARGE_AMOUNT_BOOST = 0.1;
export const LARGE_AMOUNT_THRESHOLD = 100;
export const TAIL_POSITION_RATIO = 0.7;
export const CONTEXT_RADIUS = 20;

export const TOTAL_LINE_CONFIDENCE = 0.9;
export const TRAILING_LINE_CONFIDENCE = 0.8;
export const DIGITAL_AMOUNT_CONFIDENCE = 0.8;
export const LOOSE_AMOUNT_CONFIDENCE = 0.5;
export const SYMBOL_FALLBACK_CONFIDENCE = 0.3;

export const TIE_WINDOW = 0.1;
const TIE_EPSILON = 1e-9;

const NO_AMOUNT: AmountSelection = { amount: 0, confidence: 0 };

// Digit-led patterns only start at the beginning of a digit run, and an optional currency
// marker owns the whitespace after it.
export const CURRENCY_AMOUNT_PATTERNS: readonly RegExp[] = [
  /(?:₹|Rs\.?|INR)\s*(\d+(?:[.,]\d+)?)/g,
  /(?<!\d)(\d+(?:[.,]\d+)?)\s*(?:₹|Rs\.?|INR)/g,
  /(?:total|grand total|amount|sum|net amount)[\s:]*(?:(?:₹|Rs\.?|INR)\s*)?(\d+(?:[.,]\d+)?)/gi,
  /(?:total|grand total|amount|sum|net amount)[\s:]*(?:₹|Rs\.?|INR|Rupees)\s*(\d+(?:[.,]\d+)?)/gi,
  /(?<!\d)(\d+(?:[.,]\d+)?)\s*(?:₹|Rs\.?|INR|Rupees)\s*(?:total|only)/gi,
  /(?:₹|Rs\.?|INR)\s*([\d,]+(?:\.\d*)?)/gi,
  /(?<![\d,])([\d,]+(?:\.\d*)?)\s*(?:₹|Rs\.?|INR)/gi,
  /(?:rupees|rs)\s+([\d,]+(?:\.\d*)?)/gi,
];

const DIGITAL_AMOUNT_PATTERNS: readonly RegExp[] = [
  /(?:amount|transaction amount)[\s:]*(?:(?:₹|Rs\.?|INR)\s*)?(\d+(?:[.,]\d+)?)/gi,
  /paid[\s:]*(?:(?:₹|Rs\.?|INR)\s*)?(\d+(?:[.,]\d+)?)/gi,
];

const LOOSE_AMOUNT_PATTERNS: readonly RegExp[] = [
  /(?:amount|total|price)[.:]?\s*(?:(?:rs|inr|₹|rupees)\s*)?(\d+(?:[.,]\d+)?)/gi,
  /(?<!\d)(\d+(?:[.,]\d+)?)\s*(?:\/-|rs|only)/gi,
];

const TOTAL_LINE_KEYWORDS = [
  "grand total",
  "total amount",
  "net amount",
  "total payable",
  "amount payable",
];
const TRAILING_LINE_COUNT = 5;
const TRAILING_LINE_KEYWORDS = /total|amount|pay|paid/i;
const TOTAL_CONTEXT = /total|\bsum\b|\bnet\b/i;
const FIRST_NUMBER = /\d{1,3}(?:,\d{2,3})+(?:\.\d+)?|\d+(?:\.\d+)?/;
const SYMBOL_FALLBACK = /(?:₹|₨|\$|rs\.?|inr)\s*(\d[\d,]*(?:\.\d+)?)/i;

/**
 * Orders candidates by confidence, then by value. Negative when `a` ranks below `b`.
 */
export function compareAmountCandidates(a: AmountCandidate, b: AmountCandidate): number {
  if (a.confidence !== b.confidence) {
    return a.confidence - b.confidence;
  }
  return a.value - b.value;
}

/**
 * Picks the most confident candidate. Candidates within the tie window of the best one
 * are treated as a tie and the largest value among them wins.
 */
export function selectAmountCandidate(
  candidates: readonly AmountCandidate[],
  tieWindow: number = TIE_WINDOW,
): AmountCandidate | undefined {
  let best: AmountCandidate | undefined;
  for (const candidate of candidates) {
    if (!best || compareAmountCandidates(candidate, best) > 0) {
      best = candidate;
    }
  }
  if (!best) {
    return undefined;
  }

  const topConfidence = best.confidence;
  let selected = best;
  for (const candidate of candidates) {
    if (topConfidence - candidate.confidence > tieWindow + TIE_EPSILON) {
      continue;
    }
    if (
      candidate.value > selected.value ||
      (candidate.value === selected.value && candidate.confidence > selected.confidence)
    ) {
      selected = candidate;
    }
  }
  return selected;
}

export function harvestCurrencyCandidates(text: string): AmountCandidate[] {
  const candidates: AmountCandidate[] = [];

  for (const pattern of CURRENCY_AMOUNT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const value = parseAmount(match[1]);
      if (value === undefined) {
        continue;
      }

      const start = match.index ?? 0;
      const end = start + match[0].length;
      const context = surrounding(text, start, end, CONTEXT_RADIUS);

      let confidence = BASE_CONFIDENCE;
      if (TOTAL_CONTEXT.test(context)) {
        confidence += TOTAL_CONTEXT_BOOST;
      }
      if (end > text.length * TAIL_POSITION_RATIO) {
        confidence += TAIL_POSITION_BOOST;
      }
      if (value > LARGE_AMOUNT_THRESHOLD) {
        confidence += LARGE_AMOUNT_BOOST;
      }

      candidates.push({ value, confidence: clampConfidence(confidence), context });
    }
  }

  return candidates;
}

export function harvestCategoryCandidates(
  doc: TextDocument,
  text: string,
  category: ReceiptCategory,
): AmountCandidate[] {
  switch (category) {
    case "PHYSICAL_RECEIPT":
      return harvestPhysicalCandidates(doc.lines);
    case "DIGITAL_PAYMENT":
    case "UPI_PAYMENT":
      return harvestPatternCandidates(text, DIGITAL_AMOUNT_PATTERNS, DIGITAL_AMOUNT_CONFIDENCE);
    case "UNKNOWN":
    default:
      return harvestPatternCandidates(text, LOOSE_AMOUNT_PATTERNS, LOOSE_AMOUNT_CONFIDENCE);
  }
}

export function extractAmount(doc: TextDocument, category: ReceiptCategory): AmountSelection {
  const text = flattenLines(doc.fullText);
  const candidates = [
    ...harvestCurrencyCandidates(text),
    ...harvestCategoryCandidates(doc, text, category),
  ];

  const selected = selectAmountCandidate(candidates);
  if (selected) {
    return { amount: selected.value, confidence: selected.confidence };
  }

  const fallback = parseAmount(SYMBOL_FALLBACK.exec(text)?.[1]);
  if (fallback !== undefined) {
    return { amount: fallback, confidence: SYMBOL_FALLBACK_CONFIDENCE };
  }
  return NO_AMOUNT;
}

function harvestPhysicalCandidates(lines: readonly string[]): AmountCandidate[] {
  const candidates: AmountCandidate[] = [];

  for (const line of lines) {
    const lowered = line.toLowerCase();
    for (const keyword of TOTAL_LINE_KEYWORDS) {
      if (!lowered.includes(keyword)) {
        continue;
      }
      const value = firstNumber(line);
      if (value !== undefined) {
        candidates.push({ value, confidence: TOTAL_LINE_CONFIDENCE, context: line });
      }
    }
  }

  for (const line of lines.slice(-TRAILING_LINE_COUNT)) {
    if (!TRAILING_LINE_KEYWORDS.test(line)) {
      continue;
    }
    const value = firstNumber(line);
    if (value !== undefined) {
      candidates.push({ value, confidence: TRAILING_LINE_CONFIDENCE, context: line });
    }
  }

  return candidates;
}

function harvestPatternCandidates(
  text: string,
  patterns: readonly RegExp[],
  confidence: number,
): AmountCandidate[] {
  const candidates: AmountCandidate[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const value = parseAmount(match[1]);
      if (value === undefined) {
        continue;
      }
      const start = match.index ?? 0;
      candidates.push({
        value,
        confidence,
        context: surrounding(text, start, start + match[0].length, CONTEXT_RADIUS / 2),
      });
    }
  }
  return candidates;
}

function firstNumber(line: string): number | undefined {
  return parseAmount(FIRST_NUMBER.exec(line)?.[0]);
}

function surrounding(text: string, start: number, end: number, radius: number): string {
  return text.slice(Math.max(0, start - radius), Math.min(text.length, end + radius));
}
