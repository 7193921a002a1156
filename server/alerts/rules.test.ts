import { parseISO } from "date-fns";
import { describe, expect, it } from "vitest";
import { makeInvoice, makeSnapshot, makeTransaction } from "../test/factories";
import {
  alertKey,
  DEFAULT_THRESHOLDS,
  lowCashRule,
  overdueInvoiceRule,
  overdueSeverity,
  unusualTransactionRule,
  upcomingPaymentRule,
} from "./rules";

const today = parseISO("2024-01-05");

describe("overdueInvoiceRule", () => {
  it("flags an open invoice past its due date", () => {
    const snapshot = makeSnapshot({
      invoices: [
        makeInvoice({
          invoiceId: 100,
          invoiceNo: "INV-100",
          customerName: "Acme AS",
          dateDue: "2024-01-01",
          totalIncVat: 500,
          balance: 500,
        }),
      ],
    });

    expect(overdueInvoiceRule.evaluate(snapshot, today, DEFAULT_THRESHOLDS)).toEqual([
      {
        alertType: "overdue_invoice",
        severity: "low",
        title: "Overdue invoice INV-100",
        description: "Acme AS: 500.00 outstanding, 4 days overdue",
        amount: 500,
        dueDate: "2024-01-01",
        entityType: "invoice",
        entityId: "100",
      },
    ]);
  });

  it("ignores invoices due today, paid or credited", () => {
    const snapshot = makeSnapshot({
      invoices: [
        makeInvoice({ invoiceId: 1, dateDue: "2024-01-05", balance: 100 }),
        makeInvoice({ invoiceId: 2, dateDue: "2023-12-01", balance: 0 }),
        makeInvoice({ invoiceId: 3, dateDue: "2023-12-01", balance: 100, isCredited: true }),
        makeInvoice({ invoiceId: 4, balance: 100 }),
      ],
    });

    expect(overdueInvoiceRule.evaluate(snapshot, today, DEFAULT_THRESHOLDS)).toEqual([]);
  });

  it("grades severity by days overdue", () => {
    expect(overdueSeverity(30, DEFAULT_THRESHOLDS)).toBe("low");
    expect(overdueSeverity(31, DEFAULT_THRESHOLDS)).toBe("medium");
    expect(overdueSeverity(60, DEFAULT_THRESHOLDS)).toBe("medium");
    expect(overdueSeverity(61, DEFAULT_THRESHOLDS)).toBe("high");
  });

  it("falls back to the invoice id and an unknown customer", () => {
    const snapshot = makeSnapshot({
      invoices: [makeInvoice({ invoiceId: 7, dateDue: "2023-10-01", balance: 12500 })],
    });

    const [candidate] = overdueInvoiceRule.evaluate(snapshot, today, DEFAULT_THRESHOLDS);
    expect(candidate.title).toBe("Overdue invoice 7");
    expect(candidate.description).toBe("Unknown customer: 12,500.00 outstanding, 96 days overdue");
    expect(candidate.severity).toBe("high");
  });
});

describe("upcomingPaymentRule", () => {
  it("covers due dates from today through the lookahead", () => {
    const snapshot = makeSnapshot({
      invoices: [
        makeInvoice({ invoiceId: 1, invoiceNo: "INV-101", dateDue: "2024-01-05", balance: 100 }),
        makeInvoice({ invoiceId: 2, invoiceNo: "INV-102", dateDue: "2024-01-12", balance: 200 }),
        makeInvoice({ invoiceId: 3, invoiceNo: "INV-103", dateDue: "2024-01-13", balance: 300 }),
        makeInvoice({ invoiceId: 4, invoiceNo: "INV-104", dateDue: "2024-01-04", balance: 400 }),
      ],
    });

    const candidates = upcomingPaymentRule.evaluate(snapshot, today, DEFAULT_THRESHOLDS);

    expect(candidates.map((candidate) => candidate.title)).toEqual([
      "Invoice INV-101 due today",
      "Invoice INV-102 due in 7 days",
    ]);
    expect(candidates.every((candidate) => candidate.severity === "low")).toBe(true);
  });
});

describe("lowCashRule", () => {
  const snapshot = makeSnapshot({
    transactions: [
      makeTransaction({ transactionId: "a", date: "2024-01-02", amount: -1000 }),
      makeTransaction({ transactionId: "b", date: "2024-01-03", amount: 200 }),
      makeTransaction({ transactionId: "c", date: "2023-11-01", amount: 5000 }),
    ],
  });

  it("fires when trailing net flow is below the threshold", () => {
    expect(lowCashRule.evaluate(snapshot, today, DEFAULT_THRESHOLDS)).toEqual([
      {
        alertType: "low_cash",
        severity: "high",
        title: "Negative cash flow",
        description: "Net cash flow over the last 30 days is -800.00 (in 200.00, out 1,000.00)",
        amount: -800,
        dueDate: null,
        entityType: "company",
        entityId: null,
      },
    ]);
  });

  it("respects a configured threshold", () => {
    expect(lowCashRule.evaluate(snapshot, today, { ...DEFAULT_THRESHOLDS, lowCashThreshold: 1000 })).toEqual([]);
  });

  it("stays quiet without recent transactions", () => {
    expect(lowCashRule.evaluate(makeSnapshot(), today, DEFAULT_THRESHOLDS)).toEqual([]);
  });
});

describe("unusualTransactionRule", () => {
  it("flags recent amounts far above the baseline", () => {
    const routine = Array.from({ length: 9 }, (_, i) =>
      makeTransaction({ transactionId: `r${i}`, date: `2023-12-${String(10 + i).padStart(2, "0")}`, amount: 100 })
    );
    const snapshot = makeSnapshot({
      transactions: [
        ...routine,
        makeTransaction({
          transactionId: "big",
          voucherNo: "V-9",
          description: "Equipment",
          date: "2024-01-04",
          amount: -5000,
        }),
      ],
    });

    expect(unusualTransactionRule.evaluate(snapshot, today, DEFAULT_THRESHOLDS)).toEqual([
      {
        alertType: "unusual_transaction",
        severity: "medium",
        title: "Unusual transaction V-9",
        description: "Equipment of -5,000.00 on 2024-01-04 is more than 5x the 90-day average",
        amount: -5000,
        dueDate: null,
        entityType: "transaction",
        entityId: "big",
      },
    ]);
  });
});

describe("alertKey", () => {
  it("identifies alerts by type and entity", () => {
    expect(alertKey({ alertType: "low_cash", entityType: "company", entityId: null })).toBe("low_cash|company|");
    expect(alertKey({ alertType: "overdue_invoice", entityType: "invoice", entityId: "100" })).toBe(
      "overdue_invoice|invoice|100"
    );
  });
});
