import { IntervalStore } from "../../src/intervalStore";
import { RosterEntry } from "../../src/types";

export interface CrewRow {
  name: string;
  id?: string;
  role?: string;
  skills?: string;
  cells: string[];
}

export interface ApplianceRow {
  name: string;
  cells: string[];
}

export interface GridSpec {
  times: string[];
  crew?: CrewRow[];
  appliances?: ApplianceRow[];
  resolution?: number;
}

function header(times: string[]): string {
  const descriptive = ["Role", "Name", "Skills", "Hours", ""].map((label) => `<td>${label}</td>`).join("");
  return `<tr class="gridheader">${descriptive}${times.map((time) => `<td>${time}</td>`).join("")}</tr>`;
}

function cells(values: string[]): string {
  return values.map((value) => `<td>${value}</td>`).join("");
}

/** Builds a grid document in the portal's layout. */
export function gridHtml(spec: GridSpec): string {
  const resolution = spec.resolution === undefined ? "" : ` data-resolution="${spec.resolution}"`;

  const crewRows = (spec.crew ?? [])
    .map((row) => {
      const id = row.id ? ` data-id="${row.id}"` : "";
      const role = row.role ?? "FFT";
      return (
        `<tr class="employee" data-name="${row.name}"${id}>` +
        `<td data-role="${role}">${role}</td><td>${row.name}</td>` +
        `<td class="skillCol">${row.skills ?? ""}</td><td>56</td><td></td>` +
        `${cells(row.cells)}</tr>`
      );
    })
    .join("\n");

  const applianceRows = (spec.appliances ?? [])
    .map(
      (row) =>
        `<tr class="appliance" data-name="${row.name}"><td colspan="5">${row.name}</td>${cells(row.cells)}</tr>`
    )
    .join("\n");

  return `<html><body>
<table id="gridAvail"${resolution}>
${header(spec.times)}
${crewRows}
</table>
<table id="gridAppliance"${resolution}>
${header(spec.times)}
${applianceRows}
</table>
</body></html>`;
}

/** Every quarter-hour label of a day: "0000" ... "2345". */
export function quarterHours(): string[] {
  const labels: string[] = [];
  for (let minutes = 0; minutes < 24 * 60; minutes += 15) {
    const hh = Math.floor(minutes / 60).toString().padStart(2, "0");
    const mm = (minutes % 60).toString().padStart(2, "0");
    labels.push(`${hh}${mm}`);
  }
  return labels;
}

export function crew(id: string, role: string, skills: string[]): RosterEntry {
  return { id, kind: "crew", name: id, role, skills };
}

export function appliance(id: string): RosterEntry {
  return { id, kind: "appliance", name: id, skills: [] };
}

export function memoryStore(roster: RosterEntry[] = []): IntervalStore {
  const store = new IntervalStore(":memory:");
  if (roster.length > 0) {
    store.importRoster(roster);
  }
  return store;
}

/** Local wall-clock instant on 5 August 2025. */
export function at(hours: number, minutes = 0, day = 5): Date {
  return new Date(2025, 7, day, hours, minutes, 0, 0);
}

/** Park-Miller generator; property checks stay repeatable. */
export function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
}
