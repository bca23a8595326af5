import * as cheerio from "cheerio";
import { ParseFailure } from "./errors";
import { splitSkills } from "./gridParser";
import { logger } from "./logger";
import { CrewingSummaryEntry, OnDutyFirefighter, Resource, StationDisplay } from "./types";

const log = logger.child("station-display");

const SUMMARY_PATTERN = /^(\d+)\s*\(([-+]?\d+)\)$/;
const OFF_THE_RUN = /\boff\s+the\s+run\b|^OTR$/i;

/**
 * Reads the live station display page: who is on duty right now, the
 * crewing summary per skill and, when shown, each appliance's status.
 *
 * @throws ParseFailure when the time, date or station header is missing
 */
export function parseStationDisplay(html: string): StationDisplay {
  const $ = cheerio.load(html);

  const header = (id: string): string => {
    const span = $(`span#${id}`).first();
    if (span.length === 0) {
      throw new ParseFailure(`Station display is missing span#${id}`);
    }
    return span.text().trim();
  };

  const time = header("lblTime");
  const date = header("lblDate");
  const station = header("lblStation");

  const crewingSummary: Record<string, CrewingSummaryEntry> = {};
  $("table#gvCrewing tr").each((_, row) => {
    const cells = $(row).find("td");
    if (cells.length !== 2) {
      return;
    }

    const skill = cells.eq(0).text().trim();
    const match = cells.eq(1).text().trim().match(SUMMARY_PATTERN);
    if (skill && match && match[1] && match[2]) {
      crewingSummary[skill] = {
        available: parseInt(match[1], 10),
        difference: parseInt(match[2], 10),
      };
    }
  });

  const onDuty: OnDutyFirefighter[] = [];
  $("table#gvOnDuty tr").each((_, row) => {
    const cells = $(row).find("td");
    if (cells.length !== 3) {
      return;
    }

    const name = cells.eq(1).text().trim();
    if (!name) {
      return;
    }

    onDuty.push({
      role: cells.eq(0).text().trim(),
      name,
      skills: splitSkills(cells.eq(2).text().replace(/[()]/g, "")),
    });
  });

  const appliances: Record<string, boolean> = {};
  $("table#gvAppliances tr").each((_, row) => {
    const cells = $(row).find("td");
    if (cells.length < 2) {
      return;
    }

    const name = cells.eq(0).text().trim();
    if (name) {
      appliances[name] = !OFF_THE_RUN.test(cells.eq(1).text().trim());
    }
  });

  log.debug(`Station display for ${station} at ${date} ${time}: ${onDuty.length} on duty`);

  return { time, date, station, crewingSummary, onDuty, appliances };
}

/**
 * Turns a station display into resource states. Crew on the on-duty list are
 * available and every other rostered crew member is not; appliances follow
 * their status row and are left out when the display has none.
 */
export function stationFeedStates(
  display: StationDisplay,
  roster: readonly Resource[]
): Map<string, boolean> {
  const onDuty = new Set(display.onDuty.map((firefighter) => firefighter.name.toUpperCase()));
  const states = new Map<string, boolean>();

  for (const resource of roster) {
    if (resource.kind === "crew") {
      states.set(resource.id, onDuty.has(resource.name.toUpperCase()));
      continue;
    }

    const status = display.appliances[resource.name] ?? display.appliances[resource.id];
    if (status !== undefined) {
      states.set(resource.id, status);
    }
  }

  return states;
}
