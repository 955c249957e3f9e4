import type { FetchErrorKind, ResourceKind } from "@refdata/shared";

/** A failed exchange call, tagged with the kind recorded in the failure snapshot. */
export class ExchangeError extends Error {
  readonly kind: Exclude<FetchErrorKind, "unknown">;
  readonly status?: number;

  constructor(
    kind: Exclude<FetchErrorKind, "unknown">,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ExchangeError";
    this.kind = kind;
    this.status = options.status;
  }
}

export class LogWriteError extends Error {
  readonly resource: ResourceKind;
  readonly sequence: number;

  constructor(resource: ResourceKind, sequence: number, message: string, cause?: unknown) {
    super(`Log append failed for ${resource}#${sequence}: ${message}`, { cause });
    this.name = "LogWriteError";
    this.resource = resource;
    this.sequence = sequence;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
