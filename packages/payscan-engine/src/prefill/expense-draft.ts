import type {
  ExpenseDraft,
  ExpenseOverrides,
  ExtractionResult,
  ReceiptCategory,
} from "@payscan/contracts";

const RECEIPT_TYPE_LABELS: Record<ReceiptCategory, string> = {
  PHYSICAL_RECEIPT: "Physical Receipt",
  DIGITAL_PAYMENT: "Digital Payment",
  UPI_PAYMENT: "UPI Transaction",
  UNKNOWN: "",
};

export function receiptTypeLabel(category: ReceiptCategory): string {
  return RECEIPT_TYPE_LABELS[category];
}

/**
 * Pre-fills the expense form. Values the user already typed take precedence over
 * extracted ones; an amount that is not positive is left blank.
 */
export function toExpenseDraft(
  result: ExtractionResult,
  overrides: ExpenseOverrides = {},
): ExpenseDraft {
  const amount = overrides.amount ?? result.amount;

  return {
    serialNumber: overrides.serialNumber ?? result.referenceNumber,
    amount: amount > 0 ? String(amount) : "",
    description: overrides.description ?? result.description,
    receiptType: result.category === "UNKNOWN" ? "" : result.category,
    receiptTypeLabel: receiptTypeLabel(result.category),
  };
}
