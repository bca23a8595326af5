import { describe, expect, it } from "vitest";
import { coalesceIntervals, coalesceSlots } from "../src/coalescer";
import { addMinutes } from "../src/time";
import { SlotRecord } from "../src/types";
import { at, seededRandom } from "./helpers/grid";

function slot(resourceId: string, hours: number, minutes: number, available: boolean): SlotRecord {
  const start = at(hours, minutes);
  return { resourceId, kind: "crew", start, end: addMinutes(start, 15), available };
}

function randomDay(seed: number, resources: string[]): SlotRecord[] {
  const random = seededRandom(seed);
  const slots: SlotRecord[] = [];
  for (const resourceId of resources) {
    for (let index = 0; index < 96; index++) {
      slots.push(slot(resourceId, Math.floor(index / 4), (index % 4) * 15, random() < 0.6));
    }
  }
  // Shuffle so ordering is the coalescer's job.
  for (let index = slots.length - 1; index > 0; index--) {
    const swap = Math.floor(random() * (index + 1));
    const current = slots[index];
    const other = slots[swap];
    if (current && other) {
      slots[index] = other;
      slots[swap] = current;
    }
  }
  return slots;
}

describe("coalesceSlots", () => {
  it("drops a leading unavailable slot and joins the rest", () => {
    const intervals = coalesceSlots([
      slot("R1", 8, 0, false),
      slot("R1", 8, 15, true),
      slot("R1", 8, 30, true),
      slot("R1", 8, 45, true),
    ]);

    expect(intervals).toEqual([{ resourceId: "R1", start: at(8, 15), end: at(9) }]);
  });

  it("splits around a gap", () => {
    const intervals = coalesceSlots([
      slot("R1", 8, 0, true),
      slot("R1", 8, 15, false),
      slot("R1", 8, 30, true),
    ]);

    expect(intervals).toEqual([
      { resourceId: "R1", start: at(8), end: at(8, 15) },
      { resourceId: "R1", start: at(8, 30), end: at(8, 45) },
    ]);
  });

  it("never joins different resources", () => {
    const intervals = coalesceSlots([slot("R2", 8, 15, true), slot("R1", 8, 0, true)]);

    expect(intervals).toEqual([
      { resourceId: "R1", start: at(8), end: at(8, 15) },
      { resourceId: "R2", start: at(8, 15), end: at(8, 30) },
    ]);
  });

  it("returns nothing when every slot is unavailable", () => {
    expect(coalesceSlots([slot("R1", 8, 0, false), slot("R1", 8, 15, false)])).toEqual([]);
  });

  it("produces disjoint, non-touching intervals that cover exactly the available slots", () => {
    for (let seed = 1; seed <= 25; seed++) {
      const slots = randomDay(seed, ["R1", "R2", "R3"]);
      const intervals = coalesceSlots(slots);

      for (let index = 1; index < intervals.length; index++) {
        const previous = intervals[index - 1];
        const current = intervals[index];
        if (previous && current && previous.resourceId === current.resourceId) {
          expect(current.start.getTime()).toBeGreaterThan(previous.end.getTime());
        }
      }

      for (const record of slots) {
        const covered = intervals.some(
          (interval) =>
            interval.resourceId === record.resourceId &&
            interval.start.getTime() <= record.start.getTime() &&
            record.end.getTime() <= interval.end.getTime()
        );
        expect(covered).toBe(record.available);
      }
    }
  });

  it("is idempotent", () => {
    for (let seed = 1; seed <= 25; seed++) {
      const once = coalesceSlots(randomDay(seed, ["R1", "R2"]));
      expect(coalesceIntervals(once)).toEqual(once);
    }
  });
});

describe("coalesceIntervals", () => {
  it("merges overlapping and touching intervals", () => {
    const merged = coalesceIntervals([
      { resourceId: "R1", start: at(10), end: at(11) },
      { resourceId: "R1", start: at(8), end: at(9) },
      { resourceId: "R1", start: at(8, 30), end: at(10) },
      { resourceId: "R1", start: at(12), end: at(13) },
    ]);

    expect(merged).toEqual([
      { resourceId: "R1", start: at(8), end: at(11) },
      { resourceId: "R1", start: at(12), end: at(13) },
    ]);
  });

  it("drops empty intervals", () => {
    expect(coalesceIntervals([{ resourceId: "R1", start: at(8), end: at(8) }])).toEqual([]);
  });
});
