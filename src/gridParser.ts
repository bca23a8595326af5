import * as cheerio from "cheerio";
import { ParseFailure } from "./errors";
import { logger } from "./logger";
import { atMinuteOfDay, parseBookingDate, parseTimeLabel } from "./time";
import { ParsedGrid, ParsedRow, ResourceKind, RosterEntry, SlotRecord } from "./types";

const log = logger.child("parser");

export interface GridCell {
  text: string;
  title: string;
}

/** Decides whether one grid cell means "available". */
export interface CellPolicy {
  name: string;
  isAvailable(cell: GridCell): boolean;
}

/**
 * Crew cells: a blank cell is available, any code at all (leave, sick,
 * training, ...) is unavailable. If the portal ever starts leaving cells
 * blank for "not yet scheduled", this is the rule to change.
 */
export const BLANK_CELL_MEANS_AVAILABLE: CellPolicy = {
  name: "blank-cell-means-available",
  isAvailable: (cell) => cell.text === "",
};

const OFF_THE_RUN = /\boff\s+the\s+run\b|^OTR$/i;

/** Appliance cells: only an explicit "off the run" marker is unavailable. */
export const OFF_THE_RUN_MEANS_UNAVAILABLE: CellPolicy = {
  name: "off-the-run-means-unavailable",
  isAvailable: (cell) => !OFF_THE_RUN.test(cell.text) && !OFF_THE_RUN.test(cell.title),
};

interface SectionSpec {
  kind: ResourceKind;
  tableSelector: string;
  rowSelector: string;
  policy: CellPolicy;
}

const CREW_SECTION: SectionSpec = {
  kind: "crew",
  tableSelector: "table#gridAvail",
  rowSelector: "tr.employee",
  policy: BLANK_CELL_MEANS_AVAILABLE,
};

const APPLIANCE_SECTION: SectionSpec = {
  kind: "appliance",
  tableSelector: "table#gridAppliance",
  rowSelector: "tr.appliance",
  policy: OFF_THE_RUN_MEANS_UNAVAILABLE,
};

interface TimeColumn {
  position: number;
  minutes: number;
}

interface SectionResult {
  rows: ParsedRow[];
  slots: SlotRecord[];
  resolutionMinutes: number;
}

export interface GridParserOptions {
  defaultResolutionMinutes: number;
}

export class GridParser {
  constructor(
    private readonly options: GridParserOptions = { defaultResolutionMinutes: 15 }
  ) {}

  /**
   * Turns one day's availability grid into slot records.
   *
   * @param bookingDate - the day the grid represents, "dd/mm/yyyy"
   * @throws ParseFailure when a section, its header or a time label is missing or malformed
   */
  parse(html: string, bookingDate: string): ParsedGrid {
    const day = parseBookingDate(bookingDate);
    if (!day) {
      throw new ParseFailure(`Invalid booking date "${bookingDate}"`);
    }

    const $ = cheerio.load(html);
    const crew = this.parseSection($, CREW_SECTION, day);
    const appliances = this.parseSection($, APPLIANCE_SECTION, day);

    log.debug(
      `Parsed grid for ${bookingDate}: ${crew.rows.length} crew, ${appliances.rows.length} appliance(s)`
    );

    return {
      bookingDate,
      resolutionMinutes: crew.resolutionMinutes,
      crew: crew.rows,
      appliances: appliances.rows,
      slots: [...crew.slots, ...appliances.slots],
    };
  }

  private parseSection(
    $: cheerio.CheerioAPI,
    section: SectionSpec,
    day: Date
  ): SectionResult {
    const table = $(section.tableSelector).first();
    if (table.length === 0) {
      throw new ParseFailure(`Grid is missing the ${section.tableSelector} section`);
    }

    const header = table.find("tr.gridheader").first();
    if (header.length === 0) {
      throw new ParseFailure(`${section.tableSelector} has no tr.gridheader row`);
    }

    // Header cells may span columns; track absolute positions so row cells line up.
    const headerCells: Array<{ position: number; label: string }> = [];
    let position = 0;
    header.find("td, th").each((_, cell) => {
      const $cell = $(cell);
      headerCells.push({ position, label: $cell.text().trim() });
      position += this.colspan($cell.attr("colspan"));
    });

    const columns = this.timeColumns(headerCells, section.tableSelector);
    const resolutionMinutes = this.resolveResolution(columns, table.attr("data-resolution"), section.tableSelector);
    const hoursPosition = headerCells.find((cell) => /^(contract\s+)?hours$/i.test(cell.label))?.position;

    const rows: ParsedRow[] = [];
    const slots: SlotRecord[] = [];
    const seen = new Set<string>();

    table.find(section.rowSelector).each((_, tr) => {
      const $row = $(tr);
      const cells: GridCell[] = [];
      const positions: number[] = [];
      let cursor = 0;

      $row.find("td").each((__, td) => {
        const $td = $(td);
        positions.push(cursor);
        cells.push({ text: $td.text().trim(), title: ($td.attr("title") ?? "").trim() });
        cursor += this.colspan($td.attr("colspan"));
      });

      const name = ($row.attr("data-name") ?? cells[0]?.text ?? "").trim();
      if (!name) {
        log.debug(`Skipping unnamed row in ${section.tableSelector}`);
        return;
      }

      const id = ($row.attr("data-id") ?? "").trim() || name;
      if (seen.has(id)) {
        log.warn(`Duplicate ${section.kind} row "${id}" in grid, keeping the first`);
        return;
      }
      seen.add(id);

      const cellAt = new Map<number, GridCell>();
      positions.forEach((pos, index) => {
        const cell = cells[index];
        if (cell) {
          cellAt.set(pos, cell);
        }
      });

      const roleAttr = $row.find("td").first().attr("data-role") ?? $row.attr("data-role");
      const skillText = $row.find("td.skillCol").first().text();
      const hoursText = hoursPosition === undefined ? "" : cellAt.get(hoursPosition)?.text ?? "";
      rows.push(this.describeRow(section.kind, id, name, roleAttr, skillText, hoursText));

      for (const column of columns) {
        // A row that stops short of the header has no entry for those columns.
        const cell = cellAt.get(column.position) ?? { text: "", title: "" };
        const available = section.policy.isAvailable(cell);
        const slot: SlotRecord = {
          resourceId: id,
          kind: section.kind,
          // Wall-clock times, so a clock-change day keeps each slot on its label.
          start: atMinuteOfDay(day, column.minutes),
          end: atMinuteOfDay(day, column.minutes + resolutionMinutes),
          available,
        };

        const marker = cell.text || cell.title;
        if (!available && marker) {
          slot.marker = marker;
        }

        slots.push(slot);
      }
    });

    return { rows, slots, resolutionMinutes };
  }

  private timeColumns(
    headerCells: Array<{ position: number; label: string }>,
    tableSelector: string
  ): TimeColumn[] {
    const firstTime = headerCells.findIndex((cell) => parseTimeLabel(cell.label) !== null);
    if (firstTime === -1) {
      throw new ParseFailure(`${tableSelector} header has no time columns`);
    }

    const columns: TimeColumn[] = [];
    for (const cell of headerCells.slice(firstTime)) {
      const minutes = parseTimeLabel(cell.label);
      if (minutes === null) {
        throw new ParseFailure(`Unrecognised time column "${cell.label}" in ${tableSelector}`);
      }

      const previous = columns[columns.length - 1];
      if (previous && minutes <= previous.minutes) {
        throw new ParseFailure(`Time column "${cell.label}" is out of order in ${tableSelector}`);
      }

      columns.push({ position: cell.position, minutes });
    }

    return columns;
  }

  private describeRow(
    kind: ResourceKind,
    id: string,
    name: string,
    roleAttr: string | undefined,
    skillText: string,
    hoursText: string
  ): ParsedRow {
    if (kind === "appliance") {
      return { id, kind, name, skills: [] };
    }

    const role = (roleAttr ?? "").trim();
    const skills = splitSkills(skillText);

    const row: ParsedRow = { id, kind, name, skills };
    if (role) {
      row.role = role;
    }
    if (hoursText) {
      row.contractHours = hoursText;
    }
    return row;
  }

  /**
   * Slot length is the smallest gap between consecutive time columns. A
   * single column falls back to `data-resolution`, then to the configured
   * default. A declared resolution that disagrees with the spacing is a
   * ParseFailure.
   */
  private resolveResolution(columns: TimeColumn[], raw: string | undefined, tableSelector: string): number {
    let declared: number | null = null;
    if (raw !== undefined) {
      const value = parseInt(raw, 10);
      if (!isNaN(value) && value > 0) {
        declared = value;
      } else {
        log.warn(`Ignoring invalid data-resolution "${raw}"`);
      }
    }

    let spacing: number | null = null;
    for (let index = 1; index < columns.length; index++) {
      const current = columns[index];
      const previous = columns[index - 1];
      if (current && previous) {
        const gap = current.minutes - previous.minutes;
        spacing = spacing === null ? gap : Math.min(spacing, gap);
      }
    }

    if (spacing === null) {
      return declared ?? this.options.defaultResolutionMinutes;
    }
    if (declared !== null && declared !== spacing) {
      throw new ParseFailure(
        `${tableSelector} declares ${declared}-minute slots but its columns are ${spacing} minutes apart`
      );
    }
    return spacing;
  }

  private colspan(raw: string | undefined): number {
    const value = parseInt(raw ?? "1", 10);
    return isNaN(value) || value < 1 ? 1 : value;
  }
}

export function splitSkills(raw: string): string[] {
  return raw
    .split(/[\s,]+/)
    .map((skill) => skill.trim().toUpperCase())
    .filter(Boolean);
}

/** Roster entries for every row of a parsed grid. */
export function rosterFromGrid(grid: ParsedGrid): RosterEntry[] {
  return [...grid.crew, ...grid.appliances].map((row) => {
    const entry: RosterEntry = { id: row.id, kind: row.kind, name: row.name, skills: row.skills };
    if (row.role) {
      entry.role = row.role;
    }
    if (row.contractHours) {
      entry.contractHours = row.contractHours;
    }
    return entry;
  });
}
