import { DiscrepancyRecord, StateMap } from "./types";

export interface SourceLabels {
  a: string;
  b: string;
}

const DEFAULT_LABELS: SourceLabels = { a: "source A", b: "source B" };

function isMap(states: StateMap): states is ReadonlyMap<string, boolean> {
  return states instanceof Map;
}

function toMap(states: StateMap): ReadonlyMap<string, boolean> {
  return isMap(states) ? states : new Map(Object.entries(states));
}

function describe(state: boolean): string {
  return state ? "available" : "unavailable";
}

/**
 * One record per resource that both sources report with different states.
 * Resources only one source knows about are skipped. Swapping the sources
 * flags the same resources.
 */
export function reconcile(
  sourceA: StateMap,
  sourceB: StateMap,
  labels: SourceLabels = DEFAULT_LABELS
): DiscrepancyRecord[] {
  const a = toMap(sourceA);
  const b = toMap(sourceB);
  const records: DiscrepancyRecord[] = [];

  for (const [resourceId, stateA] of a) {
    const stateB = b.get(resourceId);
    if (stateB === undefined || stateA === stateB) {
      continue;
    }

    records.push({
      resourceId,
      sourceAState: stateA,
      sourceBState: stateB,
      explanation: `${labels.a} says ${resourceId} is ${describe(stateA)}, ${labels.b} says ${resourceId} is ${describe(stateB)}`,
    });
  }

  return records.sort((x, y) => (x.resourceId < y.resourceId ? -1 : x.resourceId > y.resourceId ? 1 : 0));
}
