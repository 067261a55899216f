/**
 * Typed error catalog.
 *
 * Host resolution itself never fails on client input; these errors only
 * signal misuse of resource ids by an embedder.
 */

export class RequestContextError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

export type BadResourceReason = "not-found" | "wrong-kind";

export class BadResourceError extends RequestContextError {
  constructor(
    public readonly rid: number,
    public readonly reason: BadResourceReason,
    expected?: string,
  ) {
    super(
      "BAD_RESOURCE",
      reason === "not-found"
        ? `Bad resource ID: ${rid}`
        : `Resource ${rid} is not a ${expected ?? "compatible resource"}`,
      { rid, reason, ...(expected !== undefined && { expected }) },
    );
  }
}

export class UnknownConnectionError extends RequestContextError {
  constructor(details?: Record<string, unknown>) {
    super(
      "CONNECTION_UNKNOWN",
      "Request arrived on a connection without computed properties",
      details,
    );
  }
}
