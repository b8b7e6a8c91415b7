import { AppError } from "./app-error.js";

export interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** A source file (or one of its records) is not valid log JSON. */
export class ParseError extends AppError {
  public readonly source: string;

  constructor(message: string, source: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 422,
      code: "PARSE_ERROR",
      details: { source, ...options?.details },
      cause: options?.cause,
    });
    this.source = source;
  }
}

/** The target collection could not be verified or created. Fatal for a run. */
export class CollectionSetupError extends AppError {
  public readonly collectionName: string;

  constructor(message: string, collectionName: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "COLLECTION_SETUP_FAILED",
      details: { collectionName, ...options?.details },
      cause: options?.cause,
    });
    this.collectionName = collectionName;
  }
}

export class WriteError extends AppError {
  /** Chunks that reached the store before the failing batch. */
  public readonly chunksWritten: number;

  constructor(message: string, chunksWritten: number, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "WRITE_FAILED",
      details: { chunksWritten, ...options?.details },
      cause: options?.cause,
    });
    this.chunksWritten = chunksWritten;
  }
}

export class UpstreamTimeoutError extends AppError {
  public readonly service: string;

  constructor(service: string, timeoutMs: number, options?: ErrorExtras) {
    super({
      message: `${service} did not respond within ${String(timeoutMs)}ms`,
      statusCode: 504,
      code: "UPSTREAM_TIMEOUT",
      details: { service, timeoutMs, ...options?.details },
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class UpstreamUnavailableError extends AppError {
  public readonly service: string;

  constructor(service: string, message = `${service} is unavailable`, options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "UPSTREAM_UNAVAILABLE",
      details: { service, ...options?.details },
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

/** The ingestion tracker file exists but does not hold a list of source ids. */
export class TrackerStateError extends AppError {
  constructor(message: string, filePath: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "TRACKER_STATE_INVALID",
      isOperational: false,
      details: { filePath, ...options?.details },
      cause: options?.cause,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}
