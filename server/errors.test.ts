import { describe, expect, it } from "vitest";
import { z } from "zod";
import { AnalyticsError, createError, handleAPIError, isConnectionFailure, isUniqueViolation } from "./errors";

describe("createError", () => {
  it("maps codes to HTTP statuses", () => {
    expect(createError("VALIDATION_ERROR").statusCode).toBe(400);
    expect(createError("INVALID_PREDICTION_BATCH").statusCode).toBe(400);
    expect(createError("ALERT_NOT_FOUND").statusCode).toBe(404);
    expect(createError("UNKNOWN_FACT_KIND").statusCode).toBe(404);
    expect(createError("CONCURRENCY_CONFLICT").statusCode).toBe(409);
    expect(createError("INVALID_RUN_TRANSITION").statusCode).toBe(409);
    expect(createError("MODEL_NOT_DEPLOYED").statusCode).toBe(422);
    expect(createError("STORE_UNAVAILABLE").statusCode).toBe(503);
    expect(createError("CALCULATION_ERROR").statusCode).toBe(500);
  });

  it("uses the friendly message unless one is given", () => {
    expect(createError("ALERT_NOT_FOUND").message).toBe("We couldn't find that alert.");
    expect(createError("ALERT_NOT_FOUND", { alertId: 7 }, "No alert 7").message).toBe("No alert 7");
  });
});

describe("handleAPIError", () => {
  it("passes analytics errors through", () => {
    const error = createError("TRAINING_RUN_NOT_FOUND", { runId: 3 });

    expect(handleAPIError(error)).toEqual({
      message: "We couldn't find that training run.",
      code: "TRAINING_RUN_NOT_FOUND",
      statusCode: 404,
      details: { runId: 3 },
    });
  });

  it("turns schema failures into validation errors", () => {
    const result = z.object({ periodStart: z.string() }).safeParse({});
    expect(result.success).toBe(false);
    if (result.success) return;

    const handled = handleAPIError(result.error);

    expect(handled.code).toBe("VALIDATION_ERROR");
    expect(handled.statusCode).toBe(400);
    expect(handled.details).toEqual({ issues: [{ path: "periodStart", message: "Required" }] });
  });

  it("reports driver unique violations as conflicts", () => {
    const driverError = Object.assign(new Error("duplicate key value"), { code: "23505" });
    const wrapped = new Error("Failed query", { cause: driverError });

    expect(isUniqueViolation(driverError)).toBe(true);
    expect(isUniqueViolation(wrapped)).toBe(true);
    expect(handleAPIError(wrapped).statusCode).toBe(409);
  });

  it("reports lost connections as store unavailable", () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });

    expect(isConnectionFailure(refused)).toBe(true);
    expect(handleAPIError(refused).code).toBe("STORE_UNAVAILABLE");
  });

  it("hides unexpected errors behind a generic message", () => {
    expect(handleAPIError(new Error("relation does not exist"))).toEqual({
      message: "Something went wrong. Please try again or contact support.",
      code: "UNKNOWN_ERROR",
      statusCode: 500,
    });
    expect(handleAPIError("boom").statusCode).toBe(500);
  });

  it("keeps the class identity", () => {
    expect(createError("INVALID_PERIOD")).toBeInstanceOf(AnalyticsError);
  });
});
