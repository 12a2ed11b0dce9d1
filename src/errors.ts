// Error taxonomy shared by gateway, engine, cache and stats

export type RejectionKind =
  | "NotReadOnly"
  | "MultiStatement"
  | "LimitOutOfRange"
  | "OffsetOutOfRange"
  | "Malformed"
  | "UnknownTable";

export type ExecutionErrorKind =
  | "StorageBusy"
  | "SyntaxRejectedByEngine"
  | "Timeout"
  | "StorageFailure";

export abstract class ServiceError extends Error {
  abstract readonly kind: string;

  /** Text safe to hand back to the calling agent. */
  abstract get userMessage(): string;
}

/** Input refused before anything reaches storage. */
export class RejectionError extends ServiceError {
  constructor(
    readonly kind: RejectionKind,
    readonly reason: string,
  ) {
    super(`${kind}: ${reason}`);
    this.name = "RejectionError";
  }

  get userMessage(): string {
    return `Query rejected (${this.kind}): ${this.reason}`;
  }
}

export class InvalidArgumentError extends ServiceError {
  readonly kind = "InvalidArgument";

  constructor(readonly reason: string) {
    super(reason);
    this.name = "InvalidArgumentError";
  }

  get userMessage(): string {
    return `Invalid arguments: ${this.reason}`;
  }
}

export class ExecutionError extends ServiceError {
  constructor(
    readonly kind: ExecutionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ExecutionError";
  }

  // Storage messages can leak schema internals; only syntax errors pass through.
  get userMessage(): string {
    switch (this.kind) {
      case "StorageBusy":
        return "Query failed: the weather store is busy, try again shortly";
      case "Timeout":
        return "Query failed: execution timed out";
      case "SyntaxRejectedByEngine":
        return `Query failed: ${this.message}`;
      case "StorageFailure":
        return "Query failed: the weather store is unavailable";
    }
  }
}

export class InsufficientDataError extends ServiceError {
  readonly kind = "InsufficientData";

  constructor(
    readonly qualifyingYears: number,
    readonly startYear: number,
    readonly endYear: number,
  ) {
    super(`only ${qualifyingYears} qualifying year(s) in ${startYear}-${endYear}, need at least 2`);
    this.name = "InsufficientDataError";
  }

  get userMessage(): string {
    return `Insufficient data for a trend: ${this.message}`;
  }
}

/** Cache store failure. Logged and bypassed, never surfaced. */
export class CacheError extends ServiceError {
  readonly kind = "CacheUnavailable";

  constructor(
    readonly operation: "read" | "write" | "delete",
    options?: { cause?: unknown },
  ) {
    super(`cache ${operation} failed`, options);
    this.name = "CacheError";
  }

  get userMessage(): string {
    return "Cache unavailable";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
