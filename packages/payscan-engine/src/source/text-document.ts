import type { TextDocument } from "@payscan/contracts";

const LINE_BREAK = /\r?\n|\r/;
const PARAGRAPH_BREAK = /\r?\n[^\S\r\n]*\r?\n/;

/**
 * Builds a document from plain recognized text. Lines are the trimmed non-blank lines;
 * blocks are the paragraphs separated by blank lines.
 */
export function textDocumentFromText(text: string): TextDocument {
  const lines = text
    .split(LINE_BREAK)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const blocks = text
    .split(PARAGRAPH_BREAK)
    .map((block) => block.trim())
    .filter((block) => block.length > 0);

  return { fullText: text, lines, blocks };
}

/**
 * Builds a document from recognized lines in reading order. Without explicit blocks the
 * lines form a single block.
 */
export function textDocumentFromLines(
  lines: readonly string[],
  blocks?: readonly string[],
): TextDocument {
  const fullText = lines.join("\n");
  return {
    fullText,
    lines: [...lines],
    blocks: blocks ? [...blocks] : fullText.length > 0 ? [fullText] : [],
  };
}

export const EMPTY_TEXT_DOCUMENT: TextDocument = Object.freeze({
  fullText: "",
  lines: [],
  blocks: [],
});
