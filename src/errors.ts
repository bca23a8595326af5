export type FailureKind =
  | "parse"
  | "no-cached-data"
  | "not-found"
  | "invariant"
  | "fetch";

export abstract class AvailabilityFailure extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Source document is missing the sections or headers the grid needs. */
export class ParseFailure extends AvailabilityFailure {
  readonly kind = "parse" as const;
}

/** A cache-only run asked for a day the store has never covered. */
export class NoCachedDataFailure extends AvailabilityFailure {
  readonly kind = "no-cached-data" as const;

  constructor(
    readonly bookingDate: string,
    message = `No stored availability for ${bookingDate}`
  ) {
    super(message);
  }
}

export class NotFoundFailure extends AvailabilityFailure {
  readonly kind = "not-found" as const;

  constructor(readonly resourceId: string, message = `Unknown resource: ${resourceId}`) {
    super(message);
  }
}

export class InvariantViolation extends AvailabilityFailure {
  readonly kind = "invariant" as const;
}

export class FetchFailure extends AvailabilityFailure {
  readonly kind = "fetch" as const;
}

export type Result<T, F extends AvailabilityFailure = AvailabilityFailure> =
  | { ok: true; value: T }
  | { ok: false; error: F };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<F extends AvailabilityFailure>(error: F): { ok: false; error: F } {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
