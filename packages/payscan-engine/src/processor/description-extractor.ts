import type { ReceiptCategory, TextDocument } from "./types.js";
import { cleanupText, collapseWhitespace, firstNonBlankLine } from "./normalization.js";

export const MAX_PAYEE_LENGTH = 50;
export const MAX_BLOCK_LENGTH = 100;
const HEADER_LINE_COUNT = 3;
const MIN_STORE_NAME_LENGTH = 4;
const MAX_ITEM_LINE_LENGTH = 50;
const ITEM_PREVIEW_COUNT = 2;

const PAYEE_PATTERNS: readonly RegExp[] = [
  /paid\s+to[:\s]*(.+?)(?=\s*(?:paid from|upi id|date)|$)/i,
  /\b(?:recipient|merchant|to|payee)\b[:\s]*(.+?)(?=\s*(?:transaction|\bid\b|date)|$)/i,
  /\bpaid\s*to\s*(.+?)(?=\s+(?:on|at)\b|$)/i,
];
const HANDLE_LINE = /@|upi id|vpa/i;
const HANDLE_NAME = /(?<![A-Za-z._-])([A-Za-z._-]+)@/;
const NOT_A_STORE_NAME = /bill|invoice|receipt|#|date|time/i;
const ITEM_SECTION_START = /\b(?:item|description|qty|quantity|product)\b/i;
const ITEM_SECTION_END = /\b(?:total|subtotal|sum|amount|tax|gst)\b/i;
const NOT_AN_ITEM = /\b(?:date|time|payment|card|cash)\b/i;

export function extractDescription(doc: TextDocument, category: ReceiptCategory): string {
  const found = describeByCategory(doc, category);
  if (found) {
    return found;
  }
  return cleanupText(firstNonBlankLine(doc.lines) ?? "");
}

function describeByCategory(doc: TextDocument, category: ReceiptCategory): string | undefined {
  switch (category) {
    case "DIGITAL_PAYMENT":
    case "UPI_PAYMENT":
      return findPayee(doc.lines) ?? findPaymentHandle(doc.lines);
    case "PHYSICAL_RECEIPT":
      return findStoreName(doc.lines) ?? summarizeItems(doc.lines);
    case "UNKNOWN":
    default:
      return largestBlock(doc.blocks);
  }
}

// Whitespace runs are collapsed before the stop-word lookaheads run.
function findPayee(lines: readonly string[]): string | undefined {
  for (const line of lines.map(collapseWhitespace)) {
    for (const pattern of PAYEE_PATTERNS) {
      const payee = pattern.exec(line)?.[1]?.trim();
      if (!payee || payee.length >= MAX_PAYEE_LENGTH) {
        continue;
      }
      const cleaned = cleanupText(payee);
      if (cleaned) {
        return cleaned;
      }
    }
  }
  return undefined;
}

function findPaymentHandle(lines: readonly string[]): string | undefined {
  const line = lines.find((candidate) => HANDLE_LINE.test(candidate));
  if (!line) {
    return undefined;
  }

  const name = HANDLE_NAME.exec(line)?.[1]?.replace(/[._-]+/g, " ").trim();
  if (name && name.length > 2) {
    return nonEmpty(cleanupText(name));
  }
  return nonEmpty(cleanupText(line));
}

function findStoreName(lines: readonly string[]): string | undefined {
  for (const raw of lines.slice(0, HEADER_LINE_COUNT)) {
    const line = raw.trim();
    if (line.length >= MIN_STORE_NAME_LENGTH && !NOT_A_STORE_NAME.test(line)) {
      return nonEmpty(cleanupText(line));
    }
  }
  return undefined;
}

function summarizeItems(lines: readonly string[]): string | undefined {
  const items: string[] = [];
  let collecting = false;

  for (const line of lines) {
    if (!collecting) {
      collecting = ITEM_SECTION_START.test(line);
      continue;
    }
    if (ITEM_SECTION_END.test(line)) {
      break;
    }

    const trimmed = line.trim();
    if (trimmed.length > 0 && line.length < MAX_ITEM_LINE_LENGTH && !NOT_AN_ITEM.test(line)) {
      items.push(trimmed);
    }
  }

  if (items.length === 0) {
    return undefined;
  }
  return nonEmpty(cleanupText(items.slice(0, ITEM_PREVIEW_COUNT).join(", ")));
}

function largestBlock(blocks: readonly string[]): string | undefined {
  let largest = "";
  for (const block of blocks) {
    if (block.length > largest.length) {
      largest = block;
    }
  }

  const truncated =
    largest.length > MAX_BLOCK_LENGTH ? `${largest.slice(0, MAX_BLOCK_LENGTH)}...` : largest;
  return nonEmpty(cleanupText(truncated));
}

function nonEmpty(value: string): string | undefined {
  return value.length > 0 ? value : undefined;
}
