/**
 * Review Pipeline Errors
 *
 * Each error carries a `kind` so the orchestrator can decide between
 * retrying, recording a per-item failure, or stopping the run.
 */

import type { ParsedReviewFields, RequiredReviewField } from "./types";

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly kind: "TRANSIENT" | "TERMINAL",
    public readonly url: string,
    public readonly status?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export class ParseError extends Error {
  readonly kind = "MISSING_FIELDS" as const;

  constructor(
    message: string,
    public readonly url: string,
    public readonly missingFields: RequiredReviewField[],
    public readonly partial: Partial<ParsedReviewFields>,
    public readonly strategiesTried: string[]
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export class ResolveError extends Error {
  constructor(
    message: string,
    public readonly kind: "NO_MATCH" | "SERVICE_UNAVAILABLE",
    public readonly locationText: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "ResolveError";
  }
}

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly kind: "WRITE_CONFLICT" | "UNAVAILABLE",
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export class TombstoneConfirmationError extends Error {
  constructor(public readonly restaurantId: string) {
    super(`Refusing to tombstone ${restaurantId} without confirm: true`);
    this.name = "TombstoneConfirmationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * Map any thrown value to the `kind` reported in a run summary.
 */
export function errorKind(error: unknown): string {
  if (
    error instanceof FetchError ||
    error instanceof ParseError ||
    error instanceof ResolveError ||
    error instanceof StoreError
  ) {
    return error.kind;
  }
  return "UNEXPECTED";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
