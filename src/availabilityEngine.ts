import { CacheThresholds, DEFAULT_CACHE_THRESHOLDS, freshnessMinutes, isCoverageFresh } from "./cachePolicy";
import { coalesceSlots } from "./coalescer";
import {
  errorMessage,
  fail,
  FetchFailure,
  NoCachedDataFailure,
  NotFoundFailure,
  ok,
  ParseFailure,
  Result,
} from "./errors";
import { GridParser, rosterFromGrid } from "./gridParser";
import { IntervalStore } from "./intervalStore";
import { logger } from "./logger";
import { StateQueryEngine } from "./queryEngine";
import { ReadinessEvaluator, ReadinessEvaluatorOptions } from "./readiness";
import { reconcile, SourceLabels } from "./reconciliation";
import { addDays, dayOffset, dayWindow, formatBookingDate } from "./time";
import {
  AvailabilityInterval,
  CacheDirective,
  DayCoverage,
  DiscrepancyRecord,
  Duration,
  ParsedGrid,
  ReadinessResult,
  ResourceScope,
  RosterEntry,
  StateMap,
  UpsertDayResult,
} from "./types";

const log = logger.child("engine");

/** Supplies one day's raw grid document. */
export interface GridSource {
  fetchGrid(bookingDate: string): Promise<string>;
}

export type UpsertDayFailure = ParseFailure | NoCachedDataFailure | FetchFailure;

export interface SyncSummary {
  results: Array<Result<UpsertDayResult, UpsertDayFailure>>;
  fetchedDays: number;
  intervalsWritten: number;
  failures: number;
  stoppedEarly: boolean;
}

export interface SyncOptions {
  /**
   * Stop once every in-scope crew member's current or next available
   * interval ends inside the days already synced.
   */
  stopWhenDetermined?: boolean;
}

export interface AvailabilityEngineOptions {
  store: IntervalStore;
  source: GridSource;
  parser?: GridParser;
  cacheThresholds?: CacheThresholds;
  readiness?: ReadinessEvaluatorOptions;
  now?: () => Date;
}

function inScope(scope: ResourceScope, kind: "crew" | "appliance"): boolean {
  return scope === "all" || scope === kind;
}

export class AvailabilityEngine {
  readonly query: StateQueryEngine;
  readonly readiness: ReadinessEvaluator;

  private readonly store: IntervalStore;
  private readonly source: GridSource;
  private readonly parser: GridParser;
  private readonly cacheThresholds: CacheThresholds;
  private readonly now: () => Date;

  constructor(options: AvailabilityEngineOptions) {
    this.store = options.store;
    this.source = options.source;
    this.parser = options.parser ?? new GridParser();
    this.cacheThresholds = options.cacheThresholds ?? DEFAULT_CACHE_THRESHOLDS;
    this.now = options.now ?? (() => new Date());
    this.query = new StateQueryEngine(this.store);
    this.readiness = new ReadinessEvaluator(this.store, this.query, options.readiness);
  }

  importRoster(entries: readonly RosterEntry[]): number {
    return this.store.importRoster(entries);
  }

  /**
   * Brings one day of the store up to date for `scope`, honouring the cache
   * directive. A cache-only miss leaves the store untouched.
   */
  async upsertDay(
    scope: ResourceScope,
    day: Date,
    directive: CacheDirective
  ): Promise<Result<UpsertDayResult, UpsertDayFailure>> {
    const bookingDate = formatBookingDate(day);
    const scopeIds = this.store.resourceIds(scope);

    if (directive === "fresh-start") {
      this.store.reset(scopeIds);
    } else if (directive !== "cache-off") {
      const coverage = this.store.coverage(scopeIds, bookingDate);

      if (directive === "cache-only") {
        if (coverage.length === 0) {
          log.debug(`[cache-only] No stored availability for ${bookingDate}`);
          return fail(new NoCachedDataFailure(bookingDate));
        }
        log.debug(`[cache-only] Using stored availability for ${bookingDate}`);
        return ok({ bookingDate, fetched: false, intervalsWritten: 0 });
      }

      const now = this.now();
      const windowMinutes = freshnessMinutes(dayOffset(now, day), this.cacheThresholds);
      const oldest = coverage.reduce<DayCoverage | undefined>(
        (acc, entry) => (!acc || entry.fetchedAt.getTime() < acc.fetchedAt.getTime() ? entry : acc),
        undefined
      );
      // A resource without coverage (new to the roster) makes the day stale.
      const complete = coverage.length === scopeIds.length;
      if (oldest && complete && isCoverageFresh(oldest, now, windowMinutes)) {
        log.debug(`[cache-preferred] Stored data for ${bookingDate} is fresh (${windowMinutes}m window)`);
        return ok({ bookingDate, fetched: false, intervalsWritten: 0 });
      }
    }

    let html: string;
    try {
      log.debug(`[${directive}] Fetching grid for ${bookingDate}`);
      html = await this.source.fetchGrid(bookingDate);
    } catch (error) {
      return fail(
        error instanceof FetchFailure
          ? error
          : new FetchFailure(`Failed to fetch grid for ${bookingDate}: ${errorMessage(error)}`, {
              cause: error,
            })
      );
    }

    let grid: ParsedGrid;
    try {
      grid = this.parser.parse(html, bookingDate);
    } catch (error) {
      if (error instanceof ParseFailure) {
        return fail(error);
      }
      throw error;
    }

    const intervalsWritten = this.writeDay(scope, day, grid);
    return ok({ bookingDate, fetched: true, intervalsWritten });
  }

  /**
   * Runs `upsertDay` for up to `days` consecutive days. fresh-start clears
   * the scope once, before the first day; later days fetch as cache-off.
   */
  async syncDays(
    scope: ResourceScope,
    start: Date,
    days: number,
    directive: CacheDirective,
    options: SyncOptions = {}
  ): Promise<SyncSummary> {
    const summary: SyncSummary = {
      results: [],
      fetchedDays: 0,
      intervalsWritten: 0,
      failures: 0,
      stoppedEarly: false,
    };

    for (let offset = 0; offset < days; offset++) {
      const day = addDays(start, offset);
      const dayDirective: CacheDirective =
        directive === "fresh-start" && offset > 0 ? "cache-off" : directive;

      log.info(`Processing day ${offset + 1}/${days}: ${formatBookingDate(day)}`);
      const result = await this.upsertDay(scope, day, dayDirective);
      summary.results.push(result);

      if (result.ok) {
        summary.fetchedDays += result.value.fetched ? 1 : 0;
        summary.intervalsWritten += result.value.intervalsWritten;
      } else {
        summary.failures += 1;
        log.warn(`Day ${formatBookingDate(day)} not updated (${result.error.kind}): ${result.error.message}`);
      }

      if (options.stopWhenDetermined && offset < days - 1 && this.crewDetermined(scope, start, day)) {
        log.info(`All crew availability determined after ${offset + 1} day(s), stopping`);
        summary.stoppedEarly = true;
        break;
      }
    }

    return summary;
  }

  isAvailable(resourceId: string, instant: Date): Result<boolean, NotFoundFailure> {
    return this.query.isAvailable(resourceId, instant);
  }

  durationUntilChange(resourceId: string, instant: Date): Result<Duration, NotFoundFailure> {
    return this.query.durationUntilChange(resourceId, instant);
  }

  evaluateReadiness(unitId: string, instant: Date): Result<ReadinessResult, NotFoundFailure> {
    return this.readiness.evaluate(unitId, instant);
  }

  /** Computed availability for every resource in `scope` at `instant`. */
  computedStates(scope: ResourceScope, instant: Date): Map<string, boolean> {
    return this.query.snapshot(this.store.resourceIds(scope), instant);
  }

  reconcile(sourceA: StateMap, sourceB: StateMap, labels?: SourceLabels): DiscrepancyRecord[] {
    return reconcile(sourceA, sourceB, labels);
  }

  /**
   * True when every crew member in scope has a current or next interval
   * that ends before the end of `lastDay`. An interval reaching the edge of
   * the synced days may continue past it.
   */
  private crewDetermined(scope: ResourceScope, instant: Date, lastDay: Date): boolean {
    if (!inScope(scope, "crew")) {
      return false;
    }

    const crewIds = this.store.resourceIds("crew");
    if (crewIds.length === 0) {
      return false;
    }

    const horizon = dayWindow(lastDay).end.getTime();
    return crewIds.every((id) => {
      const interval = this.store.query(id, instant) ?? this.store.nextInterval(id, instant);
      return interval !== null && interval.end.getTime() < horizon;
    });
  }

  private writeDay(scope: ResourceScope, day: Date, grid: ParsedGrid): number {
    const window = dayWindow(day);

    // Appliances are registered on first sight; crew only come from the roster.
    const unknownAppliances = rosterFromGrid(grid).filter(
      (entry) => entry.kind === "appliance" && !this.store.getResource(entry.id)
    );

    const byResource = new Map<string, AvailabilityInterval[]>();
    for (const interval of coalesceSlots(grid.slots)) {
      const list = byResource.get(interval.resourceId) ?? [];
      list.push(interval);
      byResource.set(interval.resourceId, list);
    }

    return this.store.transaction(() => {
      if (inScope(scope, "appliance") && unknownAppliances.length > 0) {
        log.info(`Registering appliance(s): ${unknownAppliances.map((entry) => entry.id).join(", ")}`);
        this.store.importRoster(unknownAppliances);
      }

      let written = 0;
      let rowsWritten = 0;

      for (const row of [...grid.crew, ...grid.appliances]) {
        if (!inScope(scope, row.kind)) {
          continue;
        }

        const resource = this.store.getResource(row.id);
        if (!resource) {
          log.warn(`No roster entry for ${row.kind} "${row.id}", skipping`);
          continue;
        }
        if (resource.kind !== row.kind) {
          log.warn(`Grid lists "${row.id}" as ${row.kind} but the roster has ${resource.kind}, skipping`);
          continue;
        }

        written += this.store.replaceWindow(row.id, window, byResource.get(row.id) ?? []);
        rowsWritten += 1;
      }

      // Every in-scope resource was looked for in this grid, listed or not.
      this.store.recordCoverage(this.store.resourceIds(scope), grid.bookingDate, this.now());
      log.info(`Stored ${written} interval(s) for ${rowsWritten} resource(s) on ${grid.bookingDate}`);
      return written;
    });
  }
}
