import { describe, expect, it } from "vitest";
import { makeInvoice, makeSnapshot, makeTransaction } from "../test/factories";
import {
  classifyPaymentSpeed,
  computeCustomerRollups,
  computeDashboardMetrics,
  computeFinancialMetrics,
  computeMonthlySeries,
  computeOperationalMetrics,
  isOpenInvoice,
  paymentDays,
} from "./metricDefinitions";

const january = { periodStart: "2024-01-01", periodEnd: "2024-01-31" };

const snapshot = makeSnapshot({
  invoices: [
    makeInvoice({
      invoiceId: 1,
      customerId: 10,
      customerName: "Fjord AS",
      dateInvoiced: "2024-01-05",
      dateDue: "2024-01-19",
      datePaid: "2024-01-15",
      totalIncVat: 1000,
      totalVat: 200,
      amountPaid: 1000,
      balance: 0,
    }),
    makeInvoice({
      invoiceId: 2,
      customerId: 10,
      customerName: "Fjord AS",
      dateInvoiced: "2024-01-20",
      dateDue: "2024-02-03",
      totalIncVat: 500,
      totalVat: 100,
      balance: 500,
    }),
    makeInvoice({
      invoiceId: 3,
      customerId: 20,
      customerName: "Nord AS",
      dateInvoiced: "2023-11-15",
      dateDue: "2023-11-29",
      totalIncVat: 300,
      totalVat: 60,
      balance: 300,
    }),
    makeInvoice({
      invoiceId: 4,
      customerId: 20,
      dateInvoiced: "2024-01-10",
      status: "Cancelled",
      totalIncVat: 999,
      balance: 999,
    }),
    makeInvoice({
      invoiceId: 5,
      customerId: 30,
      dateInvoiced: "2023-01-10",
      datePaid: "2023-01-20",
      totalIncVat: 400,
      amountPaid: 400,
      balance: 0,
    }),
  ],
  transactions: [
    makeTransaction({ transactionId: "t1", date: "2024-01-10", amount: 800 }),
    makeTransaction({ transactionId: "t2", date: "2024-01-12", amount: -300 }),
    makeTransaction({ transactionId: "t3", date: "2024-02-02", amount: 50 }),
  ],
});

function valueOf(name: string) {
  return computeDashboardMetrics(snapshot, january).find((metric) => metric.name === name)?.value;
}

describe("invoice helpers", () => {
  it("treats credited and cancelled invoices as settled", () => {
    expect(isOpenInvoice(makeInvoice({ invoiceId: 1, balance: 10 }))).toBe(true);
    expect(isOpenInvoice(makeInvoice({ invoiceId: 1, balance: 10, isCredited: true }))).toBe(false);
    expect(isOpenInvoice(makeInvoice({ invoiceId: 1, balance: 10, status: "cancelled" }))).toBe(false);
    expect(isOpenInvoice(makeInvoice({ invoiceId: 1, balance: 0 }))).toBe(false);
  });

  it("counts payment days between invoicing and payment", () => {
    expect(paymentDays(makeInvoice({ invoiceId: 1, dateInvoiced: "2024-01-05", datePaid: "2024-01-15" }))).toBe(10);
    expect(paymentDays(makeInvoice({ invoiceId: 1, dateInvoiced: "2024-01-05" }))).toBeNull();
  });
});

describe("computeDashboardMetrics", () => {
  it("emits every metric in a fixed order", () => {
    expect(computeDashboardMetrics(snapshot, january).map((metric) => metric.name)).toEqual([
      "total_revenue",
      "outstanding_receivables",
      "net_cash_flow",
      "avg_invoice_value",
      "aging_current",
      "aging_30_days",
      "aging_60_days",
      "aging_90_plus_days",
      "invoice_count",
      "overdue_invoice_count",
      "avg_payment_days",
      "vat_invoiced",
      "active_customers",
      "avg_customer_revenue",
    ]);
  });

  it("sums revenue from non-cancelled invoices in the window", () => {
    const [revenue] = computeFinancialMetrics(snapshot, january);
    expect(revenue).toEqual({
      name: "total_revenue",
      category: "financial",
      value: 1500,
      unit: "NOK",
      metadata: { invoice_count: 2 },
    });
  });

  it("computes receivables, cash flow and aging", () => {
    expect(valueOf("outstanding_receivables")).toBe(800);
    expect(valueOf("avg_invoice_value")).toBe(750);
    expect(valueOf("aging_current")).toBe(500);
    expect(valueOf("aging_30_days")).toBe(0);
    expect(valueOf("aging_60_days")).toBe(300);
    expect(valueOf("aging_90_plus_days")).toBe(0);

    const flow = computeFinancialMetrics(snapshot, january).find((metric) => metric.name === "net_cash_flow");
    expect(flow?.value).toBe(500);
    expect(flow?.metadata).toEqual({ inflow: 800, outflow: 300 });
  });

  it("computes operational, tax and customer metrics", () => {
    const overdue = computeOperationalMetrics(snapshot, january).find(
      (metric) => metric.name === "overdue_invoice_count"
    );
    expect(overdue?.value).toBe(1);
    expect(overdue?.metadata).toEqual({ total_amount: 300 });

    expect(valueOf("invoice_count")).toBe(2);
    expect(valueOf("avg_payment_days")).toBe(10);
    expect(valueOf("vat_invoiced")).toBe(300);
    expect(valueOf("active_customers")).toBe(1);
    expect(valueOf("avg_customer_revenue")).toBe(1500);
  });

  it("skips averages over empty sets", () => {
    const names = computeDashboardMetrics(makeSnapshot(), january).map((metric) => metric.name);

    expect(names).not.toContain("avg_invoice_value");
    expect(names).not.toContain("avg_payment_days");
    expect(names).not.toContain("avg_customer_revenue");
    expect(names).toContain("total_revenue");
  });
});

describe("classifyPaymentSpeed", () => {
  it("applies the payment speed thresholds", () => {
    expect(classifyPaymentSpeed(null, false)).toBe("average");
    expect(classifyPaymentSpeed(14, false)).toBe("fast_payer");
    expect(classifyPaymentSpeed(15, false)).toBe("average");
    expect(classifyPaymentSpeed(45, false)).toBe("average");
    expect(classifyPaymentSpeed(46, false)).toBe("slow_payer");
    expect(classifyPaymentSpeed(5, true)).toBe("overdue");
  });
});

describe("computeCustomerRollups", () => {
  it("rolls up the trailing year per customer", () => {
    expect(computeCustomerRollups(snapshot, "2024-01-31")).toEqual([
      {
        customerId: 10,
        customerName: "Fjord AS",
        totalRevenue: 1500,
        invoiceCount: 2,
        avgPaymentDays: 10,
        lastInvoiceDate: "2024-01-20",
        paymentStatus: "fast_payer",
        lifetimeValue: 1500,
      },
      {
        customerId: 20,
        customerName: "Nord AS",
        totalRevenue: 300,
        invoiceCount: 1,
        avgPaymentDays: null,
        lastInvoiceDate: "2023-11-15",
        paymentStatus: "overdue",
        lifetimeValue: 300,
      },
    ]);
  });
});

describe("computeMonthlySeries", () => {
  it("pairs each month with the same month a year earlier", () => {
    expect(computeMonthlySeries(snapshot, january)).toEqual([
      {
        metricName: "revenue_monthly",
        date: "2024-01-01",
        value: 1500,
        comparisonValue: 400,
        metadata: { month: "2024-01" },
      },
      {
        metricName: "net_cash_flow_monthly",
        date: "2024-01-01",
        value: 500,
        comparisonValue: null,
        metadata: { month: "2024-01" },
      },
    ]);
  });

  it("covers every month the window touches", () => {
    const points = computeMonthlySeries(makeSnapshot(), { periodStart: "2023-12-15", periodEnd: "2024-02-10" });

    expect(points.filter((point) => point.metricName === "revenue_monthly").map((point) => point.date)).toEqual([
      "2023-12-01",
      "2024-01-01",
      "2024-02-01",
    ]);
    expect(points.every((point) => point.value === 0 && point.comparisonValue === null)).toBe(true);
  });
});
