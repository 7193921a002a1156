import { ZodError } from "zod";

export interface AppError extends Error {
  code: string;
  statusCode: number;
  isOperational: boolean;
  details?: Record<string, unknown>;
}

export class AnalyticsError extends Error implements AppError {
  code: string;
  statusCode: number;
  isOperational: boolean;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = "UNKNOWN_ERROR",
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AnalyticsError";
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    this.details = details;
  }
}

export const ErrorCodes = {
  STORE_UNAVAILABLE: "STORE_UNAVAILABLE",
  CONCURRENCY_CONFLICT: "CONCURRENCY_CONFLICT",

  UNKNOWN_FACT_KIND: "UNKNOWN_FACT_KIND",
  INVALID_PREDICTION_BATCH: "INVALID_PREDICTION_BATCH",
  MODEL_NOT_DEPLOYED: "MODEL_NOT_DEPLOYED",

  ALERT_NOT_FOUND: "ALERT_NOT_FOUND",
  TRAINING_RUN_NOT_FOUND: "TRAINING_RUN_NOT_FOUND",
  INVALID_RUN_TRANSITION: "INVALID_RUN_TRANSITION",
  NO_EVALUATION_DATA: "NO_EVALUATION_DATA",

  INVALID_PERIOD: "INVALID_PERIOD",
  CALCULATION_ERROR: "CALCULATION_ERROR",

  VALIDATION_ERROR: "VALIDATION_ERROR",
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export const UserFriendlyMessages: Record<string, string> = {
  [ErrorCodes.STORE_UNAVAILABLE]: "The analytics store is unavailable. Previously computed results will be served again once it is back.",
  [ErrorCodes.CONCURRENCY_CONFLICT]: "Another writer updated the same records. Please retry.",

  [ErrorCodes.UNKNOWN_FACT_KIND]: "That record type is not synced by this service.",
  [ErrorCodes.INVALID_PREDICTION_BATCH]: "The prediction batch is not valid and was not applied.",
  [ErrorCodes.MODEL_NOT_DEPLOYED]: "That model version has no deployed training run.",

  [ErrorCodes.ALERT_NOT_FOUND]: "We couldn't find that alert.",
  [ErrorCodes.TRAINING_RUN_NOT_FOUND]: "We couldn't find that training run.",
  [ErrorCodes.INVALID_RUN_TRANSITION]: "The training run cannot move to that state.",
  [ErrorCodes.NO_EVALUATION_DATA]: "This model has no reconciled predictions to evaluate yet.",

  [ErrorCodes.INVALID_PERIOD]: "The period start must not be after the period end.",
  [ErrorCodes.CALCULATION_ERROR]: "We encountered an issue calculating your metrics.",

  [ErrorCodes.VALIDATION_ERROR]: "Some of the information provided isn't valid. Please check and try again.",
};

export function createError(
  code: ErrorCode,
  details?: Record<string, unknown>,
  customMessage?: string
): AnalyticsError {
  const errorCode = ErrorCodes[code];
  const message = customMessage || UserFriendlyMessages[errorCode] || "An unexpected error occurred.";

  let statusCode = 500;
  if (code === "VALIDATION_ERROR" || code === "INVALID_PREDICTION_BATCH" || code === "INVALID_PERIOD") statusCode = 400;
  else if (code.includes("NOT_FOUND") || code === "UNKNOWN_FACT_KIND") statusCode = 404;
  else if (code === "CONCURRENCY_CONFLICT" || code === "INVALID_RUN_TRANSITION") statusCode = 409;
  else if (code === "MODEL_NOT_DEPLOYED" || code === "NO_EVALUATION_DATA") statusCode = 422;
  else if (code === "STORE_UNAVAILABLE") statusCode = 503;

  return new AnalyticsError(message, errorCode, statusCode, details);
}

const UNIQUE_VIOLATION = "23505";
const CONNECTION_FAILURES = new Set(["ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "57P01", "57P03", "08001", "08006"]);

function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}

/**
 * Drizzle wraps driver errors; the Postgres SQLSTATE sits on the error or its cause.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (pgErrorCode(error) === UNIQUE_VIOLATION) return true;
  return error instanceof Error && error.cause !== undefined && pgErrorCode(error.cause) === UNIQUE_VIOLATION;
}

export function isConnectionFailure(error: unknown): boolean {
  const code = pgErrorCode(error) ?? (error instanceof Error ? pgErrorCode(error.cause) : undefined);
  return code !== undefined && CONNECTION_FAILURES.has(code);
}

export function handleAPIError(error: unknown): {
  message: string;
  code: string;
  statusCode: number;
  details?: Record<string, unknown>;
} {
  if (error instanceof AnalyticsError) {
    return {
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      details: error.details,
    };
  }

  if (error instanceof ZodError) {
    return handleAPIError(
      createError("VALIDATION_ERROR", {
        issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      })
    );
  }

  if (isConnectionFailure(error)) {
    return handleAPIError(createError("STORE_UNAVAILABLE"));
  }

  if (isUniqueViolation(error)) {
    return handleAPIError(createError("CONCURRENCY_CONFLICT"));
  }

  if (error instanceof Error) {
    return {
      message: "Something went wrong. Please try again or contact support.",
      code: "UNKNOWN_ERROR",
      statusCode: 500,
    };
  }

  return {
    message: "An unexpected error occurred. Please try again.",
    code: "UNKNOWN_ERROR",
    statusCode: 500,
  };
}

export function logError(error: unknown, context?: string): void {
  const timestamp = new Date().toISOString();
  const prefix = context ? `[${context}]` : "[Error]";

  if (error instanceof AnalyticsError) {
    console.error(`${timestamp} ${prefix} ${error.code}: ${error.message}`, error.details || "");
  } else if (error instanceof Error) {
    console.error(`${timestamp} ${prefix} ${error.name}: ${error.message}`);
    if (error.stack) {
      console.error(error.stack);
    }
  } else {
    console.error(`${timestamp} ${prefix} Unknown error:`, error);
  }
}
