import { fail, NotFoundFailure, ok, Result } from "./errors";
import { IntervalStore } from "./intervalStore";
import { Duration, Resource } from "./types";

/**
 * Point-in-time reads over the interval store. Every method is a pure read
 * and may run alongside a writer.
 */
export class StateQueryEngine {
  constructor(private readonly store: IntervalStore) {}

  resource(resourceId: string): Result<Resource, NotFoundFailure> {
    const resource = this.store.getResource(resourceId);
    return resource ? ok(resource) : fail(new NotFoundFailure(resourceId));
  }

  /** True iff a stored interval has start <= instant < end. */
  isAvailable(resourceId: string, instant: Date): Result<boolean, NotFoundFailure> {
    const found = this.resource(resourceId);
    if (!found.ok) {
      return found;
    }
    return ok(this.store.query(resourceId, instant) !== null);
  }

  /**
   * Time until the resource's state flips. Available: until the covering
   * interval ends. Unavailable: until the next interval starts, or unbounded
   * when the scraped horizon holds no further interval.
   */
  durationUntilChange(resourceId: string, instant: Date): Result<Duration, NotFoundFailure> {
    const found = this.resource(resourceId);
    if (!found.ok) {
      return found;
    }

    const covering = this.store.query(resourceId, instant);
    if (covering) {
      return ok({
        kind: "bounded",
        ms: covering.end.getTime() - instant.getTime(),
        until: covering.end,
      });
    }

    const next = this.store.nextInterval(resourceId, instant);
    if (!next) {
      return ok({ kind: "unbounded", available: false });
    }

    return ok({
      kind: "bounded",
      ms: next.start.getTime() - instant.getTime(),
      until: next.start,
    });
  }

  /** Available time within [start, end), in minutes. */
  availableMinutes(resourceId: string, start: Date, end: Date): Result<number, NotFoundFailure> {
    const found = this.resource(resourceId);
    if (!found.ok) {
      return found;
    }

    let totalMs = 0;
    for (const interval of this.store.queryRange(resourceId, start, end)) {
      const from = Math.max(interval.start.getTime(), start.getTime());
      const to = Math.min(interval.end.getTime(), end.getTime());
      totalMs += Math.max(0, to - from);
    }
    return ok(Math.round(totalMs / 60_000));
  }

  /** Availability of each known id at `instant`; unknown ids are left out. */
  snapshot(resourceIds: readonly string[], instant: Date): Map<string, boolean> {
    const states = new Map<string, boolean>();
    for (const resourceId of resourceIds) {
      const result = this.isAvailable(resourceId, instant);
      if (result.ok) {
        states.set(resourceId, result.value);
      }
    }
    return states;
  }
}
