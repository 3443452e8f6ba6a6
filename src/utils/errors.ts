export type UploadPhase = "configuration" | "connect" | "exchange" | "transfer";

export type ErrorDetails = Record<string, string | number | undefined>;

export class UploadError extends Error {
  readonly phase: UploadPhase;
  readonly exitCode: number;
  readonly details: ErrorDetails;

  constructor(
    message: string,
    phase: UploadPhase,
    exitCode: number,
    details: ErrorDetails = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "UploadError";
    this.phase = phase;
    this.exitCode = exitCode;
    this.details = details;
    Object.setPrototypeOf(this, UploadError.prototype);
  }
}

export class ConfigurationError extends UploadError {
  readonly field: string;

  constructor(message: string, field: string, options?: ErrorOptions) {
    super(message, "configuration", 2, { field }, options);
    this.name = "ConfigurationError";
    this.field = field;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class ConnectionError extends UploadError {
  constructor(message: string, details: ErrorDetails = {}, options?: ErrorOptions) {
    super(message, "connect", 3, details, options);
    this.name = "ConnectionError";
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

export class AuthenticationError extends UploadError {
  constructor(message: string, details: ErrorDetails = {}, options?: ErrorOptions) {
    super(message, "connect", 4, details, options);
    this.name = "AuthenticationError";
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class TimedOutError extends UploadError {
  readonly uploadId: string;
  readonly timeoutSeconds: number;

  constructor(uploadId: string, timeoutSeconds: number) {
    super(
      `No upload response within ${timeoutSeconds}s`,
      "exchange",
      5,
      { uploadId, timeoutSeconds },
    );
    this.name = "TimedOutError";
    this.uploadId = uploadId;
    this.timeoutSeconds = timeoutSeconds;
    Object.setPrototypeOf(this, TimedOutError.prototype);
  }
}

export class RejectedError extends UploadError {
  readonly uploadId: string;
  readonly reason: string;

  constructor(uploadId: string, reason: string, status?: string) {
    super(`Upload request rejected: ${reason}`, "exchange", 6, {
      uploadId,
      reason,
      status,
    });
    this.name = "RejectedError";
    this.uploadId = uploadId;
    this.reason = reason;
    Object.setPrototypeOf(this, RejectedError.prototype);
  }
}

export class TransferError extends UploadError {
  readonly status?: number;
  readonly code?: string;

  constructor(
    message: string,
    details: { status?: number; code?: string; file?: string } = {},
    options?: ErrorOptions,
  ) {
    super(message, "transfer", 7, details, options);
    this.name = "TransferError";
    this.status = details.status;
    this.code = details.code;
    Object.setPrototypeOf(this, TransferError.prototype);
  }
}

export interface FailureReport {
  message: string;
  exitCode: number;
  context: {
    phase: UploadPhase | "unknown";
    error: string;
    exitCode: number;
  } & ErrorDetails;
}

/**
 * Maps any thrown value to the diagnostic logged by the driver. Timeouts,
 * rejections and every other failure share this one shape.
 */
export function describeFailure(error: unknown): FailureReport {
  if (error instanceof UploadError) {
    return {
      message: error.message,
      exitCode: error.exitCode,
      context: {
        ...error.details,
        phase: error.phase,
        error: error.name,
        exitCode: error.exitCode,
      },
    };
  }

  return {
    message: error instanceof Error ? error.message : "Unknown error",
    exitCode: 1,
    context: {
      phase: "unknown",
      error: error instanceof Error ? error.name : typeof error,
      exitCode: 1,
    },
  };
}

/**
 * Reads the `code` property Node and MQTT.js attach to their errors.
 */
export function errorCode(error: unknown): string | number | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    if (typeof code === "string" || typeof code === "number") {
      return code;
    }
  }
  return undefined;
}
