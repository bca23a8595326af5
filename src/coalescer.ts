import { AvailabilityInterval, SlotRecord } from "./types";

interface Span {
  resourceId: string;
  start: number;
  end: number;
  available: boolean;
}

/**
 * Merges slot records into the minimal set of availability intervals.
 * Unavailable slots are dropped: no interval already means unavailable.
 * Output is ordered by resource, then start.
 */
export function coalesceSlots(slots: readonly SlotRecord[]): AvailabilityInterval[] {
  return sweep(
    slots.map((slot) => ({
      resourceId: slot.resourceId,
      start: slot.start.getTime(),
      end: slot.end.getTime(),
      available: slot.available,
    }))
  );
}

/** Same sweep over intervals; every interval counts as available. */
export function coalesceIntervals(
  intervals: readonly AvailabilityInterval[]
): AvailabilityInterval[] {
  return sweep(
    intervals.map((interval) => ({
      resourceId: interval.resourceId,
      start: interval.start.getTime(),
      end: interval.end.getTime(),
      available: true,
    }))
  );
}

function sweep(spans: Span[]): AvailabilityInterval[] {
  // Multi-day input is not guaranteed to arrive in order, so sort fully.
  const sorted = spans
    .filter((span) => span.available && span.start < span.end)
    .sort((a, b) =>
      a.resourceId === b.resourceId
        ? a.start - b.start || a.end - b.end
        : a.resourceId < b.resourceId
          ? -1
          : 1
    );

  const merged: AvailabilityInterval[] = [];
  let current: Span | undefined;

  for (const span of sorted) {
    // Touching (start === end) or overlapping spans of the same resource join.
    if (current && current.resourceId === span.resourceId && span.start <= current.end) {
      current.end = Math.max(current.end, span.end);
      continue;
    }

    if (current) {
      merged.push(toInterval(current));
    }
    current = { ...span };
  }

  if (current) {
    merged.push(toInterval(current));
  }

  return merged;
}

function toInterval(span: Span): AvailabilityInterval {
  return {
    resourceId: span.resourceId,
    start: new Date(span.start),
    end: new Date(span.end),
  };
}
