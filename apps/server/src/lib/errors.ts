import type { ZodError } from "zod";
import type { EconomyError, EconomyErrorKind } from "@ledger/shared";
import type { Logger } from "./logger";

export type { EconomyError, EconomyErrorKind };

export type Result<T> = { ok: true; value: T } | { ok: false; error: EconomyError };

/**
 * Raised inside a ledger transaction to abort it. Never escapes an operation:
 * the operation wrapper turns it back into a failed Result.
 */
export class EconomyFailure extends Error {
  readonly error: EconomyError;

  constructor(error: EconomyError) {
    super(error.message);
    this.name = "EconomyFailure";
    this.error = error;
  }
}

export function fail(kind: EconomyErrorKind, message: string, extra?: { resource?: string; shortfall?: number }): never {
  throw new EconomyFailure({ kind, message, ...extra });
}

export const STORE_ERROR_MESSAGE = "The ledger store failed; the operation was not applied.";

/** Converts anything thrown out of a transaction into a failed Result, logging as it goes. */
export function toFailure(log: Logger, op: string, err: unknown): { ok: false; error: EconomyError } {
  if (err instanceof EconomyFailure) {
    log.info({ op, kind: err.error.kind, resource: err.error.resource, shortfall: err.error.shortfall }, err.error.message);
    return { ok: false, error: err.error };
  }
  log.error({ op, err }, "ledger store error");
  return { ok: false, error: { kind: "StoreError", message: STORE_ERROR_MESSAGE } };
}

export function describeZodError(err: ZodError): string {
  return err.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}
