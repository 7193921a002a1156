import type { Invoice, Transaction } from "@shared/schema";
import type { FactSnapshot } from "../ingestion/types";

const CHANGED = new Date("2024-01-01T00:00:00Z");

export function makeInvoice(overrides: Partial<Invoice> & Pick<Invoice, "invoiceId">): Invoice {
  return {
    orderId: null,
    customerId: null,
    customerName: null,
    invoiceNo: null,
    supplierName: null,
    supplierOrgNo: null,
    invoiceText: null,
    dateInvoiced: null,
    dateDue: null,
    datePaid: null,
    dateChanged: CHANGED,
    totalIncVat: 0,
    totalVat: 0,
    amountPaid: 0,
    balance: 0,
    currencySymbol: "NOK",
    status: null,
    externalStatus: null,
    isCredited: false,
    firstSyncedAt: CHANGED,
    syncedAt: CHANGED,
    ...overrides,
  };
}

export function makeTransaction(
  overrides: Partial<Transaction> & Pick<Transaction, "transactionId" | "date" | "amount">
): Transaction {
  return {
    voucherNo: null,
    lineNo: null,
    accountNo: null,
    debit: overrides.amount > 0 ? overrides.amount : 0,
    credit: overrides.amount < 0 ? -overrides.amount : 0,
    currency: "NOK",
    description: null,
    invoiceNo: null,
    linkId: null,
    ocr: null,
    customerId: null,
    projectId: null,
    departmentId: null,
    dateChanged: CHANGED,
    firstSyncedAt: CHANGED,
    syncedAt: CHANGED,
    ...overrides,
  };
}

export function makeSnapshot(facts: Partial<Omit<FactSnapshot, "asOf">> = {}, asOf = new Date()): FactSnapshot {
  return {
    asOf,
    companies: [],
    persons: [],
    invoices: [],
    products: [],
    transactions: [],
    accounts: [],
    ...facts,
  };
}
