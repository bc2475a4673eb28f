/**
 * Error types surfaced by the book pipeline and its transport.
 * `statusCode` is what the HTTP layer answers with.
 */

export class BookError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Rejected before any job exists. */
export class ValidationError extends BookError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class PayloadTooLargeError extends BookError {
  constructor(maxMb: number) {
    super(`File too large. Maximum size is ${maxMb}MB`, 413);
  }
}

export class ConfigurationError extends BookError {
  constructor(message: string) {
    super(message, 500);
  }
}

export type LookupReason = "not_found" | "not_ready";

export class LookupError extends BookError {
  readonly reason: LookupReason;

  constructor(reason: LookupReason, message: string) {
    super(message, reason === "not_found" ? 404 : 400);
    this.reason = reason;
  }
}

/** A template bundle or one of its files could not be loaded. Fatal to the job. */
export class TemplateLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateLoadError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
