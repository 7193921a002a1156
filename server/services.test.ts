import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createServices, type Services } from "./services";
import { createTestDatabase, type TestDatabase } from "./test/testDb";

describe("createServices", () => {
  let testDb: TestDatabase;
  let services: Services;

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    testDb = await createTestDatabase();
    services = createServices(testDb.db, {
      METRICS_WINDOW_DAYS: 90,
      METRICS_INTERVAL_MINUTES: 60,
      ALERTS_INTERVAL_MINUTES: 15,
      ARCHIVE_INTERVAL_HOURS: 24,
      ALERT_UPCOMING_LOOKAHEAD_DAYS: 7,
      ALERT_LOW_CASH_THRESHOLD: 0,
      PREDICTION_RETENTION_DAYS: 365,
      LEDGER_REQUIRE_DEPLOYED_MODEL: false,
    });
  });

  afterAll(async () => {
    await testDb.close();
    vi.restoreAllMocks();
  });

  it("schedules the batch jobs with their configured intervals", () => {
    expect(services.scheduler.getJobStatus().map((job) => [job.name, job.intervalMinutes])).toEqual([
      ["metrics_recompute", 60],
      ["alert_evaluation", 15],
      ["prediction_archival", 1440],
    ]);
  });

  it("runs every job against an empty store", async () => {
    const metrics = await services.scheduler.runNow("metrics_recompute");
    const alerts = await services.scheduler.runNow("alert_evaluation");
    const archival = await services.scheduler.runNow("prediction_archival");

    expect(metrics.success).toBe(true);
    expect(metrics.summary).toMatch(/^\d+ dashboard metrics, 0 customers, \d+ series points$/);
    expect(alerts.summary).toBe("0 created, 0 resolved");
    expect(archival.summary).toBe("0 predictions archived");
  });
});
