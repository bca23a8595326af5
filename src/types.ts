export type ResourceKind = "crew" | "appliance";

/** Which resources a sync run or reset applies to. */
export type ResourceScope = ResourceKind | "all";

export interface Resource {
  id: string;
  kind: ResourceKind;
  name: string;
  role?: string; // Crew only, e.g. "WC", "CC", "FFC", "FFD", "FFT"
  skills: string[]; // Crew only, e.g. ["BA", "LGV"]
  contractHours?: string; // Crew only, as the portal writes it: "56", "42h"
}

export type RosterEntry = Resource;

/** Available throughout [start, end). */
export interface AvailabilityInterval {
  resourceId: string;
  start: Date;
  end: Date;
}

export interface SlotRecord {
  resourceId: string;
  kind: ResourceKind;
  start: Date;
  end: Date;
  available: boolean;
  marker?: string; // Raw cell text, diagnostic only
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface ParsedRow {
  id: string;
  kind: ResourceKind;
  name: string;
  role?: string;
  skills: string[];
  contractHours?: string;
}

export interface ParsedGrid {
  bookingDate: string; // "dd/mm/yyyy"
  resolutionMinutes: number;
  crew: ParsedRow[];
  appliances: ParsedRow[];
  slots: SlotRecord[];
}

export type CacheDirective =
  | "cache-only"
  | "cache-preferred"
  | "cache-off"
  | "fresh-start";

export type Duration =
  | { kind: "bounded"; ms: number; until: Date }
  // Nothing further within the scraped horizon; not a promise of "never".
  | { kind: "unbounded"; available: boolean };

export interface DayCoverage {
  resourceId: string;
  bookingDate: string;
  fetchedAt: Date;
}

export interface UpsertDayResult {
  bookingDate: string;
  fetched: boolean;
  intervalsWritten: number;
}

export interface ReadinessCriteria {
  crewCount: boolean;
  technicalRescue: boolean;
  largeGoodsVehicle: boolean;
  breathingApparatus: boolean;
  officerInCharge: boolean;
}

export interface ReadinessCounts {
  crew: number;
  technicalRescue: number;
  largeGoodsVehicle: number;
  breathingApparatus: number; // BA holders without TTR
  officerInCharge: number;
}

export interface ReadinessResult {
  unitId: string;
  at: Date;
  ready: boolean;
  criteria: ReadinessCriteria;
  counts: ReadinessCounts;
  // The portal's own flag for the appliance; may differ from `ready`.
  applianceAvailable: boolean;
  availableCrew: string[];
}

export interface DiscrepancyRecord {
  resourceId: string;
  sourceAState: boolean;
  sourceBState: boolean;
  explanation: string;
}

export type StateMap = ReadonlyMap<string, boolean> | Readonly<Record<string, boolean>>;

export interface CrewingSummaryEntry {
  available: number;
  difference: number;
}

export interface OnDutyFirefighter {
  role: string;
  name: string;
  skills: string[];
}

export interface StationDisplay {
  time: string;
  date: string;
  station: string;
  crewingSummary: Record<string, CrewingSummaryEntry>;
  onDuty: OnDutyFirefighter[];
  appliances: Record<string, boolean>;
}
