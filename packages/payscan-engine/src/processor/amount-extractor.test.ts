import { describe, expect, it } from "vitest";
import { textDocumentFromLines, textDocumentFromText } from "../source/text-document.js";
import {
  compareAmountCandidates,
  extractAmount,
  harvestCategoryCandidates,
  harvestCurrencyCandidates,
  selectAmountCandidate,
} from "./amount-extractor.js";

describe("selectAmountCandidate", () => {
  it("prefers the larger amount among near-ties", () => {
    const selected = selectAmountCandidate([
      { value: 500, confidence: 0.85, context: "Subtotal 500" },
      { value: 1200, confidence: 0.8, context: "Total 1200" },
    ]);

    expect(selected?.value).toBe(1200);
  });

  it("keeps the most confident amount when the gap exceeds the tie window", () => {
    const selected = selectAmountCandidate([
      { value: 500, confidence: 0.9, context: "Total 500" },
      { value: 1200, confidence: 0.75, context: "Card ending 1200" },
    ]);

    expect(selected?.value).toBe(500);
  });

  it("returns undefined without candidates", () => {
    expect(selectAmountCandidate([])).toBeUndefined();
  });

  it("orders candidates by confidence, then value", () => {
    const low = { value: 900, confidence: 0.5, context: "" };
    const high = { value: 10, confidence: 0.9, context: "" };
    const highLarger = { value: 20, confidence: 0.9, context: "" };

    expect(compareAmountCandidates(low, high)).toBeLessThan(0);
    expect(compareAmountCandidates(highLarger, high)).toBeGreaterThan(0);
    expect(compareAmountCandidates(high, high)).toBe(0);
  });
});

describe("harvestCurrencyCandidates", () => {
  it("scores total context, tail position and size", () => {
    const candidates = harvestCurrencyCandidates("Tea Rs 40 Grand Total Rs 450");

    expect(candidates[0]).toEqual({
      value: 40,
      confidence: 0.8,
      context: "Tea Rs 40 Grand Total Rs 450",
    });
    expect(candidates[1]?.value).toBe(450);
    expect(candidates[1]?.confidence).toBe(1);
  });

  it("reads amounts spelled out in rupees", () => {
    expect(harvestCurrencyCandidates("Received rupees 2,500 with thanks")).toEqual([
      { value: 2500, confidence: 0.6, context: "Received rupees 2,500 with thanks" },
    ]);
  });
});

describe("harvestCategoryCandidates", () => {
  it("reads keyword lines among the last lines of a printed receipt", () => {
    const doc = textDocumentFromLines(["Cafe", "Coffee 120", "Amount due 180"]);

    expect(harvestCategoryCandidates(doc, doc.fullText, "PHYSICAL_RECEIPT")).toEqual([
      { value: 180, confidence: 0.8, context: "Amount due 180" },
    ]);
    expect(extractAmount(doc, "PHYSICAL_RECEIPT")).toEqual({ amount: 180, confidence: 0.8 });
  });

  it("uses the loose patterns for unknown documents", () => {
    const doc = textDocumentFromText("Pay 450 /- only");

    expect(harvestCategoryCandidates(doc, doc.fullText, "UNKNOWN")).toEqual([
      { value: 450, confidence: 0.5, context: "Pay 450 /- only" },
    ]);
    expect(extractAmount(doc, "UNKNOWN")).toEqual({ amount: 450, confidence: 0.5 });
  });
});

describe("extractAmount", () => {
  it("reads the grand total of a printed receipt", () => {
    const doc = textDocumentFromLines([
      "SuperMart",
      "Bill No: INV-2024-117",
      "2 x 150",
      "Grand Total Rs. 450",
    ]);

    expect(extractAmount(doc, "PHYSICAL_RECEIPT")).toEqual({ amount: 450, confidence: 1 });
  });

  it("prefers the grand total over a subtotal", () => {
    const doc = textDocumentFromLines([
      "Fresh Mart",
      "Subtotal 380.00",
      "Tax 20.00",
      "Grand Total 400.00",
    ]);

    expect(extractAmount(doc, "PHYSICAL_RECEIPT")).toEqual({ amount: 400, confidence: 1 });
  });

  it("keeps decimals of comma-grouped totals", () => {
    const doc = textDocumentFromText("Grand Total 1,250.50");

    expect(extractAmount(doc, "PHYSICAL_RECEIPT").amount).toBe(1250.5);
  });

  it("reads the paid amount of a UPI confirmation", () => {
    const doc = textDocumentFromLines([
      "Paid to Raj Traders",
      "UPI Ref No 400881234567",
      "Amount: Rs 1200",
    ]);

    expect(extractAmount(doc, "UPI_PAYMENT")).toEqual({ amount: 1200, confidence: 0.8 });
  });

  it("falls back to any number after a currency symbol", () => {
    const doc = textDocumentFromText("Donation $45");

    expect(extractAmount(doc, "UNKNOWN")).toEqual({ amount: 45, confidence: 0.3 });
  });

  it("never reports a negative amount", () => {
    const doc = textDocumentFromText("Refund Rs -50");

    expect(extractAmount(doc, "UNKNOWN")).toEqual({ amount: 0, confidence: 0 });
  });

  it("returns zero when the text carries no amount", () => {
    const doc = textDocumentFromText("random unrelated text with no numbers");

    expect(extractAmount(doc, "UNKNOWN")).toEqual({ amount: 0, confidence: 0 });
  });
});
