import { eq } from "drizzle-orm";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { invoices, transactions } from "@shared/schema";
import { AnalyticsError } from "../errors";
import { createTestDatabase, type TestDatabase } from "../test/testDb";
import { FactStore } from "./factStore";

function invoiceRecord(overrides: Record<string, unknown> = {}) {
  return {
    invoiceId: 100,
    invoiceNo: "INV-100",
    customerId: 42,
    customerName: "Acme AS",
    dateInvoiced: "2023-12-01",
    dateDue: "2024-01-01",
    dateChanged: "2024-01-02T10:00:00Z",
    totalIncVat: 500,
    totalVat: 100,
    amountPaid: 0,
    ...overrides,
  };
}

describe("FactStore", () => {
  let testDb: TestDatabase;
  let store: FactStore;

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    testDb = await createTestDatabase();
    store = new FactStore(testDb.db);
  });

  beforeEach(async () => {
    await testDb.reset();
  });

  afterAll(async () => {
    await testDb.close();
    vi.restoreAllMocks();
  });

  async function storedInvoice(invoiceId: number) {
    const [row] = await testDb.db.select().from(invoices).where(eq(invoices.invoiceId, invoiceId));
    return row;
  }

  it("inserts a new record and derives the balance", async () => {
    const result = await store.upsert("invoice", invoiceRecord());

    expect(result).toEqual({ kind: "invoice", key: "100", outcome: "inserted" });
    const row = await storedInvoice(100);
    expect(row.balance).toBe(500);
    expect(row.customerName).toBe("Acme AS");
  });

  it("replaces the stored row when the record is newer", async () => {
    await store.upsert("invoice", invoiceRecord());
    const result = await store.upsert(
      "invoice",
      invoiceRecord({ dateChanged: "2024-01-03T08:00:00Z", amountPaid: 200, customerName: "Acme Holding AS" })
    );

    expect(result.outcome).toBe("updated");
    const row = await storedInvoice(100);
    expect(row.balance).toBe(300);
    expect(row.amountPaid).toBe(200);
    expect(row.customerName).toBe("Acme Holding AS");
  });

  it("rejects records that are not strictly newer", async () => {
    await store.upsert("invoice", invoiceRecord());

    const same = await store.upsert("invoice", invoiceRecord({ amountPaid: 500 }));
    const older = await store.upsert(
      "invoice",
      invoiceRecord({ dateChanged: "2023-12-30T00:00:00Z", amountPaid: 500 })
    );

    expect(same.outcome).toBe("stale");
    expect(older.outcome).toBe("stale");
    const row = await storedInvoice(100);
    expect(row.amountPaid).toBe(0);
    expect(row.dateChanged.toISOString()).toBe("2024-01-02T10:00:00.000Z");
  });

  it("rejects a balance that contradicts the totals", async () => {
    const result = await store.upsert("invoice", invoiceRecord({ balance: 400 }));

    expect(result).toEqual({
      kind: "invoice",
      key: "100",
      outcome: "invalid",
      error: "balance: balance 400 does not equal totalIncVat - amountPaid (500)",
    });
    expect(await storedInvoice(100)).toBeUndefined();
  });

  it("accepts any balance on a credited invoice", async () => {
    const result = await store.upsert("invoice", invoiceRecord({ isCredited: true, balance: 0 }));

    expect(result.outcome).toBe("inserted");
    expect((await storedInvoice(100)).balance).toBe(0);
  });

  it("derives the signed transaction amount from debit and credit", async () => {
    await store.upsert("transaction", {
      transactionId: "T-1",
      date: "2024-01-03",
      debit: 0,
      credit: 250,
      dateChanged: "2024-01-03T12:00:00Z",
    });

    const [row] = await testDb.db.select().from(transactions).where(eq(transactions.transactionId, "T-1"));
    expect(row.amount).toBe(-250);
  });

  it("isolates failures within a batch", async () => {
    const result = await store.upsertBatch("invoice", [
      invoiceRecord({ invoiceId: 1 }),
      invoiceRecord({ invoiceId: 2, balance: 10 }),
      invoiceRecord({ invoiceId: 3 }),
      invoiceRecord({ invoiceId: 1 }),
    ]);

    expect(result).toEqual({
      inserted: 2,
      updated: 0,
      skipped: 1,
      errors: [{ externalId: "2", error: "balance: balance 10 does not equal totalIncVat - amountPaid (500)" }],
    });
  });

  it("reports records without a key", async () => {
    const result = await store.upsertBatch("company", [{ companyName: "Nameless" }]);

    expect(result.inserted).toBe(0);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].externalId).toBe("(missing key)");
  });

  it("refuses unknown record kinds", async () => {
    await expect(store.upsertBatch("supplier", [])).rejects.toBeInstanceOf(AnalyticsError);
    await expect(store.upsertBatch("supplier", [])).rejects.toMatchObject({ code: "UNKNOWN_FACT_KIND" });
  });

  it("snapshots only what was synced by the cut-off", async () => {
    await store.upsert("invoice", invoiceRecord({ invoiceId: 1 }), new Date("2024-01-05T00:00:00Z"));
    await store.upsert("invoice", invoiceRecord({ invoiceId: 2 }), new Date("2024-01-06T00:00:00Z"));
    await store.upsert(
      "account",
      { accountNo: "1920", name: "Bank", dateChanged: "2024-01-01T00:00:00Z" },
      new Date("2024-01-04T00:00:00Z")
    );

    const snapshot = await store.snapshotAsOf(new Date("2024-01-05T12:00:00Z"));

    expect(snapshot.invoices.map((invoice) => invoice.invoiceId)).toEqual([1]);
    expect(snapshot.accounts.map((account) => account.accountNo)).toEqual(["1920"]);
    expect(snapshot.transactions).toEqual([]);
    expect(Object.isFrozen(snapshot.invoices)).toBe(true);
  });

  it("keeps a record known by the cut-off in its latest version", async () => {
    await store.upsert("invoice", invoiceRecord(), new Date("2024-01-03T00:00:00Z"));
    await store.upsert(
      "invoice",
      invoiceRecord({ dateChanged: "2024-01-06T00:00:00Z", amountPaid: 100 }),
      new Date("2024-01-06T00:00:00Z")
    );

    const snapshot = await store.snapshotAsOf(new Date("2024-01-04T00:00:00Z"));

    expect(snapshot.invoices).toHaveLength(1);
    expect(snapshot.invoices[0]).toMatchObject({ invoiceId: 100, amountPaid: 100, balance: 400 });
    expect(snapshot.invoices[0].firstSyncedAt.toISOString()).toBe("2024-01-03T00:00:00.000Z");
    expect(snapshot.invoices[0].syncedAt.toISOString()).toBe("2024-01-06T00:00:00.000Z");
  });

  it("reads everything committed when no cut-off is given", async () => {
    const later = new Date(Date.now() + 5 * 60000);
    await store.upsert("invoice", invoiceRecord({ invoiceId: 1 }));
    await store.upsert("invoice", invoiceRecord({ invoiceId: 2 }), later);

    const snapshot = await store.snapshotAsOf();

    expect(snapshot.invoices.map((invoice) => invoice.invoiceId).sort()).toEqual([1, 2]);
  });
});
