const DISALLOWED_CHARACTERS = /[^\p{L}\p{N}\p{P}\p{Z}\s]/gu;
const WHITESPACE_RUN = /\s+/g;
const LINE_BREAKS = /\r?\n|\r/g;

/**
 * Keeps letters, digits, punctuation and whitespace, then collapses whitespace runs.
 * Applying it twice gives the same string as applying it once.
 */
export function cleanupText(value: string): string {
  return collapseWhitespace(value.replace(DISALLOWED_CHARACTERS, "")).trim();
}

export function collapseWhitespace(value: string): string {
  return value.replace(WHITESPACE_RUN, " ");
}

export function flattenLines(fullText: string): string {
  return fullText.replace(LINE_BREAKS, " ");
}

export function firstNonBlankLine(lines: readonly string[]): string | undefined {
  return lines.find((line) => line.trim().length > 0);
}

/**
 * Parses a matched amount, dropping thousands separators. Returns undefined for anything
 * that is not a finite non-negative number.
 */
export function parseAmount(raw: string | undefined): number | undefined {
  if (!raw) {
    return undefined;
  }

  const digits = raw.replace(/,/g, "").trim();
  if (!/^\d+(?:\.\d+)?\.?$/.test(digits)) {
    return undefined;
  }

  const value = Number.parseFloat(digits);
  if (!Number.isFinite(value) || value < 0) {
    return undefined;
  }
  return value;
}

export function clampConfidence(confidence: number): number {
  if (!Number.isFinite(confidence) || confidence < 0) {
    return 0;
  }
  if (confidence > 1) {
    return 1;
  }
  return Number.parseFloat(confidence.toFixed(4));
}
