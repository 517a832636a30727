import type {
  ExtractionRule,
  ReceiptCategory,
  ReferenceMatch,
  TextDocument,
} from "./types.js";
import { flattenLines } from "./normalization.js";

const DIGITAL_TOKEN = String.raw`(\w{6,}|\w{2,}-\w{2,}-\w{2,})`;
const SEP = String.raw`[\s.:#_-]*`;
const PHYSICAL_TOKEN = String.raw`([A-Za-z0-9][-A-Za-z0-9/]{3,})`;
const GENERIC_TOKEN = String.raw`([A-Za-z0-9-]+)`;
const NUMBER_WORD = String.raw`(?:(?:no|num|number)${SEP})?`;

const hasDigit = (token: string): boolean => /\d/.test(token);

// Broader rules sit at the end of each list.
export const DIGITAL_REFERENCE_RULES: readonly ExtractionRule[] = [
  {
    name: "transaction-id",
    pattern: new RegExp(`(?:order|txn|transaction|payment)${SEP}id${SEP}${DIGITAL_TOKEN}`, "gi"),
  },
  {
    name: "reference-number",
    pattern: new RegExp(`(?:reference|ref|utr)${SEP}${NUMBER_WORD}${DIGITAL_TOKEN}`, "gi"),
  },
  {
    name: "upi-ref",
    pattern: new RegExp(`(?:upi|payment)${SEP}ref${SEP}(?:no${SEP})?${DIGITAL_TOKEN}`, "gi"),
  },
  {
    name: "bare-id",
    pattern: new RegExp(`\\b(?:id|txnid)${SEP}${DIGITAL_TOKEN}`, "gi"),
  },
  {
    name: "txn-id-or-ref",
    pattern: new RegExp(
      `(?:txn|transaction)${SEP}(?:id|ref)${SEP}([A-Za-z0-9][-A-Za-z0-9]{5,})`,
      "gi",
    ),
  },
];

export const PHYSICAL_REFERENCE_RULES: readonly ExtractionRule[] = [
  {
    name: "bill-number",
    pattern: new RegExp(`(?:bill|invoice|receipt)${SEP}${NUMBER_WORD}${PHYSICAL_TOKEN}`, "gi"),
  },
  {
    name: "serial-number",
    pattern: new RegExp(`\\b(?:serial|s[/.]?n)${SEP}${PHYSICAL_TOKEN}`, "gi"),
  },
  {
    name: "hash-bill-number",
    pattern: new RegExp(
      `(?:bill|invoice)${SEP}${NUMBER_WORD}#\\s*${PHYSICAL_TOKEN}`,
      "gi",
    ),
  },
  {
    name: "hash-before-bill",
    pattern: new RegExp(`#\\s*${PHYSICAL_TOKEN}\\s*(?=bill|invoice)`, "gi"),
  },
  {
    name: "registration-id",
    pattern: new RegExp(`\\b(?:gstin|gst|cin|tin)${SEP}${PHYSICAL_TOKEN}`, "gi"),
  },
];

// Generic tokens only count when they carry a digit.
export const GENERIC_REFERENCE_RULES: readonly ExtractionRule[] = [
  {
    name: "serial-or-no",
    pattern: new RegExp(`\\b(?:serial|s[/.]?n|no)\\b[.:#]?\\s*${GENERIC_TOKEN}`, "gi"),
    accept: hasDigit,
  },
  {
    name: "bill",
    pattern: new RegExp(`\\b(?:bill|invoice)[.:#]?\\s*${GENERIC_TOKEN}`, "gi"),
    accept: hasDigit,
  },
  {
    name: "receipt",
    pattern: new RegExp(`\\breceipt[.:#]?\\s*${GENERIC_TOKEN}`, "gi"),
    accept: hasDigit,
  },
  {
    name: "transaction",
    pattern: new RegExp(`\\btransaction[.:#]?\\s*${GENERIC_TOKEN}`, "gi"),
    accept: hasDigit,
  },
];

const DIGITAL_FALLBACK_LINES = 5;
const PHYSICAL_FALLBACK_LINES = 4;
const MONEY_LINE = /\b(?:total|amount|rs|inr|rupees?)\b|₹/i;
const STANDALONE_HEADER = /^#?\s*(?:no[.:]?\s*)?(\w{4,})$/i;

/**
 * Returns the first acceptable token of the first rule that yields one. Rule patterns carry
 * the `g` flag so later matches are tried when an earlier token is rejected.
 */
export function runCascade(
  text: string,
  rules: readonly ExtractionRule[],
): ReferenceMatch | undefined {
  for (const rule of rules) {
    for (const match of text.matchAll(rule.pattern)) {
      const token = match[1]?.trim();
      if (token && (rule.accept?.(token) ?? true)) {
        return { value: token, rule: rule.name };
      }
    }
  }
  return undefined;
}

export function matchReference(
  doc: TextDocument,
  category: ReceiptCategory,
): ReferenceMatch | undefined {
  const text = flattenLines(doc.fullText);

  switch (category) {
    case "DIGITAL_PAYMENT":
    case "UPI_PAYMENT":
      return (
        runCascade(text, DIGITAL_REFERENCE_RULES) ??
        fromFallback("standalone-id", findStandaloneId(doc.lines))
      );
    case "PHYSICAL_RECEIPT":
      return (
        runCascade(text, PHYSICAL_REFERENCE_RULES) ??
        fromFallback("header-number", findHeaderNumber(doc.lines))
      );
    case "UNKNOWN":
    default:
      return runCascade(text, GENERIC_REFERENCE_RULES);
  }
}

export function extractReference(doc: TextDocument, category: ReceiptCategory): string {
  return matchReference(doc, category)?.value ?? "";
}

function fromFallback(rule: string, value: string | undefined): ReferenceMatch | undefined {
  return value ? { value, rule } : undefined;
}

function findStandaloneId(lines: readonly string[]): string | undefined {
  for (const line of lines.slice(0, DIGITAL_FALLBACK_LINES)) {
    const alphanumeric = line.trim().replace(/[^A-Za-z0-9]/g, "");
    if (
      alphanumeric.length >= 6 &&
      alphanumeric.length <= 20 &&
      !/^\d+$/.test(alphanumeric) &&
      !MONEY_LINE.test(line)
    ) {
      return alphanumeric;
    }
  }
  return undefined;
}

function findHeaderNumber(lines: readonly string[]): string | undefined {
  for (const line of lines.slice(0, PHYSICAL_FALLBACK_LINES)) {
    const token = STANDALONE_HEADER.exec(line.trim())?.[1];
    if (token) {
      return token.trim();
    }
  }
  return undefined;
}
