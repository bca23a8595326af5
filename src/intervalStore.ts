import Database from "better-sqlite3";
import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import { coalesceIntervals } from "./coalescer";
import { InvariantViolation, NotFoundFailure } from "./errors";
import { splitSkills } from "./gridParser";
import { logger } from "./logger";
import { RosterEntrySchema } from "./roster";
import {
  AvailabilityInterval,
  DayCoverage,
  Resource,
  ResourceKind,
  ResourceScope,
  RosterEntry,
  TimeWindow,
} from "./types";

const log = logger.child("store");

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS resources (
    id      TEXT PRIMARY KEY,
    kind    TEXT NOT NULL CHECK (kind IN ('crew', 'appliance')),
    name    TEXT NOT NULL,
    role    TEXT,
    skills  TEXT NOT NULL DEFAULT '',
    contract_hours TEXT
  );

  CREATE TABLE IF NOT EXISTS intervals (
    resource_id TEXT NOT NULL REFERENCES resources(id) ON DELETE CASCADE,
    start_ms    INTEGER NOT NULL,
    end_ms      INTEGER NOT NULL,
    PRIMARY KEY (resource_id, start_ms),
    CHECK (start_ms < end_ms)
  );

  CREATE INDEX IF NOT EXISTS idx_intervals_resource_end
    ON intervals(resource_id, end_ms);

  CREATE TABLE IF NOT EXISTS day_coverage (
    resource_id  TEXT NOT NULL REFERENCES resources(id) ON DELETE CASCADE,
    booking_date TEXT NOT NULL,
    fetched_at   INTEGER NOT NULL,
    PRIMARY KEY (resource_id, booking_date)
  );
`;

const ResourceRowSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["crew", "appliance"]),
  name: z.string(),
  role: z.string().nullable(),
  skills: z.string(),
  contract_hours: z.string().nullable(),
});

const ColumnInfoSchema = z.array(z.object({ name: z.string() }));

const IntervalRowSchema = z
  .object({
    resource_id: z.string().min(1),
    start_ms: z.number().int(),
    end_ms: z.number().int(),
  })
  .refine((row) => row.start_ms < row.end_ms, { message: "Stored interval has start >= end" });

const CoverageRowSchema = z.object({
  resource_id: z.string().min(1),
  booking_date: z.string(),
  fetched_at: z.number().int(),
});

function toResource(row: unknown): Resource {
  const parsed = ResourceRowSchema.parse(row);
  const resource: Resource = {
    id: parsed.id,
    kind: parsed.kind,
    name: parsed.name,
    skills: splitSkills(parsed.skills),
  };
  if (parsed.role) {
    resource.role = parsed.role;
  }
  if (parsed.contract_hours) {
    resource.contractHours = parsed.contract_hours;
  }
  return resource;
}

function toInterval(row: unknown): AvailabilityInterval {
  const parsed = IntervalRowSchema.parse(row);
  return {
    resourceId: parsed.resource_id,
    start: new Date(parsed.start_ms),
    end: new Date(parsed.end_ms),
  };
}

function toCoverage(row: unknown): DayCoverage {
  const parsed = CoverageRowSchema.parse(row);
  return {
    resourceId: parsed.resource_id,
    bookingDate: parsed.booking_date,
    fetchedAt: new Date(parsed.fetched_at),
  };
}

function assertValidInterval(resourceId: string, interval: AvailabilityInterval): void {
  if (interval.resourceId !== resourceId) {
    throw new InvariantViolation(
      `Interval for ${interval.resourceId} cannot be written to ${resourceId}`
    );
  }

  const start = interval.start.getTime();
  const end = interval.end.getTime();
  if (!Number.isFinite(start) || !Number.isFinite(end) || start >= end) {
    throw new InvariantViolation(
      `Interval for ${resourceId} must have start < end (got ${interval.start.toString()} -> ${interval.end.toString()})`
    );
  }
}

function prepareStatements(db: Database.Database) {
  return {
    upsertResource: db.prepare(`
      INSERT INTO resources (id, kind, name, role, skills, contract_hours)
      VALUES (@id, @kind, @name, @role, @skills, @contractHours)
      ON CONFLICT(id) DO UPDATE SET
        kind = excluded.kind,
        name = excluded.name,
        role = excluded.role,
        skills = excluded.skills,
        contract_hours = excluded.contract_hours
    `),
    getResource: db.prepare(`SELECT * FROM resources WHERE id = ?`),
    listResources: db.prepare(`SELECT * FROM resources ORDER BY id`),
    listResourcesByKind: db.prepare(`SELECT * FROM resources WHERE kind = ? ORDER BY id`),

    // Touching counts: end_ms >= start, start_ms <= end.
    selectTouching: db.prepare(`
      SELECT resource_id, start_ms, end_ms FROM intervals
      WHERE resource_id = ? AND end_ms >= ? AND start_ms <= ?
      ORDER BY start_ms
    `),
    deleteTouching: db.prepare(`
      DELETE FROM intervals
      WHERE resource_id = ? AND end_ms >= ? AND start_ms <= ?
    `),
    insertInterval: db.prepare(`
      INSERT INTO intervals (resource_id, start_ms, end_ms) VALUES (?, ?, ?)
    `),

    covering: db.prepare(`
      SELECT resource_id, start_ms, end_ms FROM intervals
      WHERE resource_id = ? AND start_ms <= ? AND end_ms > ?
      LIMIT 1
    `),
    overlapping: db.prepare(`
      SELECT resource_id, start_ms, end_ms FROM intervals
      WHERE resource_id = ? AND start_ms < ? AND end_ms > ?
      ORDER BY start_ms
    `),
    next: db.prepare(`
      SELECT resource_id, start_ms, end_ms FROM intervals
      WHERE resource_id = ? AND start_ms > ?
      ORDER BY start_ms
      LIMIT 1
    `),
    allForResource: db.prepare(`
      SELECT resource_id, start_ms, end_ms FROM intervals
      WHERE resource_id = ?
      ORDER BY start_ms
    `),

    getCoverage: db.prepare(`
      SELECT resource_id, booking_date, fetched_at FROM day_coverage
      WHERE resource_id = ? AND booking_date = ?
    `),
    upsertCoverage: db.prepare(`
      INSERT INTO day_coverage (resource_id, booking_date, fetched_at)
      VALUES (?, ?, ?)
      ON CONFLICT(resource_id, booking_date) DO UPDATE SET fetched_at = excluded.fetched_at
    `),

    deleteIntervalsFor: db.prepare(`DELETE FROM intervals WHERE resource_id = ?`),
    deleteCoverageFor: db.prepare(`DELETE FROM day_coverage WHERE resource_id = ?`),

    countResources: db.prepare(`SELECT COUNT(*) AS total FROM resources`),
    countIntervals: db.prepare(`SELECT COUNT(*) AS total FROM intervals`),
  };
}

/**
 * Persists resources and their availability intervals in SQLite.
 *
 * Every write keeps each resource's intervals pairwise disjoint and
 * non-touching, and runs inside a single transaction.
 */
export class IntervalStore {
  private readonly db: Database.Database;
  private readonly stmts: ReturnType<typeof prepareStatements>;

  /** @param dbPath - file path, or ":memory:" */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.ensureDirSync(path.dirname(dbPath));
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);
    this.migrate();

    this.stmts = prepareStatements(this.db);
  }

  // Databases created before contract hours were tracked lack the column.
  private migrate(): void {
    const columns = ColumnInfoSchema.parse(this.db.prepare("PRAGMA table_info(resources)").all());
    if (!columns.some((column) => column.name === "contract_hours")) {
      this.db.exec("ALTER TABLE resources ADD COLUMN contract_hours TEXT");
      log.info("Migrated resources: added contract_hours column");
    }
  }

  /** Runs `fn` in one transaction; nested store writes join it. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ── Resources ───────────────────────────────────────────

  importRoster(entries: readonly RosterEntry[]): number {
    const validated = entries.map((entry) => RosterEntrySchema.parse(entry));

    this.transaction(() => {
      for (const entry of validated) {
        this.stmts.upsertResource.run({
          id: entry.id,
          kind: entry.kind,
          name: entry.name,
          role: entry.role ?? null,
          skills: entry.skills.join(" "),
          contractHours: entry.contractHours ?? null,
        });
      }
    });

    log.debug(`Imported ${validated.length} roster entries`);
    return validated.length;
  }

  getResource(id: string): Resource | null {
    const row = this.stmts.getResource.get(id);
    return row === undefined ? null : toResource(row);
  }

  listResources(kind?: ResourceKind): Resource[] {
    const rows = kind
      ? this.stmts.listResourcesByKind.all(kind)
      : this.stmts.listResources.all();
    return rows.map(toResource);
  }

  resourceIds(scope: ResourceScope): string[] {
    return this.listResources(scope === "all" ? undefined : scope).map((resource) => resource.id);
  }

  // ── Writes ──────────────────────────────────────────────

  /**
   * Merges `intervals` into what is stored for the resource. Overlapping or
   * touching rows are replaced by their union.
   *
   * @returns rows inserted
   * @throws InvariantViolation for an empty/inverted interval or one tagged with another resource
   * @throws NotFoundFailure when the resource is not in the roster
   */
  upsert(resourceId: string, intervals: readonly AvailabilityInterval[]): number {
    this.requireResource(resourceId);
    intervals.forEach((interval) => assertValidInterval(resourceId, interval));

    if (intervals.length === 0) {
      return 0;
    }

    // reduce, not a spread: a large batch would overflow the argument list.
    const from = intervals.reduce((min, interval) => Math.min(min, interval.start.getTime()), Infinity);
    const to = intervals.reduce((max, interval) => Math.max(max, interval.end.getTime()), -Infinity);

    return this.transaction(() => {
      const existing = this.stmts.selectTouching.all(resourceId, from, to).map(toInterval);
      this.stmts.deleteTouching.run(resourceId, from, to);
      return this.insertAll(coalesceIntervals([...existing, ...intervals]));
    });
  }

  /**
   * Replaces the resource's availability inside `window` with `intervals`
   * (clipped to the window). Stored availability outside the window is kept
   * and re-joined where it touches the new data.
   *
   * @returns rows inserted
   */
  replaceWindow(
    resourceId: string,
    window: TimeWindow,
    intervals: readonly AvailabilityInterval[]
  ): number {
    this.requireResource(resourceId);

    const windowStart = window.start.getTime();
    const windowEnd = window.end.getTime();
    if (!(windowStart < windowEnd)) {
      throw new InvariantViolation(`Replacement window for ${resourceId} must have start < end`);
    }
    intervals.forEach((interval) => assertValidInterval(resourceId, interval));

    const fresh: AvailabilityInterval[] = [];
    for (const interval of intervals) {
      const start = Math.max(interval.start.getTime(), windowStart);
      const end = Math.min(interval.end.getTime(), windowEnd);
      if (start < end) {
        fresh.push({ resourceId, start: new Date(start), end: new Date(end) });
      } else {
        log.debug(`Dropping interval for ${resourceId} outside its replacement window`);
      }
    }

    return this.transaction(() => {
      const kept: AvailabilityInterval[] = [];
      const existing = this.stmts.selectTouching.all(resourceId, windowStart, windowEnd).map(toInterval);

      for (const interval of existing) {
        const start = interval.start.getTime();
        const end = interval.end.getTime();
        if (start < windowStart) {
          kept.push({ resourceId, start: interval.start, end: new Date(Math.min(end, windowStart)) });
        }
        if (end > windowEnd) {
          kept.push({ resourceId, start: new Date(Math.max(start, windowEnd)), end: interval.end });
        }
      }

      this.stmts.deleteTouching.run(resourceId, windowStart, windowEnd);
      return this.insertAll(coalesceIntervals([...kept, ...fresh]));
    });
  }

  recordCoverage(resourceIds: readonly string[], bookingDate: string, fetchedAt: Date): void {
    this.transaction(() => {
      for (const resourceId of resourceIds) {
        this.stmts.upsertCoverage.run(resourceId, bookingDate, fetchedAt.getTime());
      }
    });
  }

  /**
   * Deletes every interval and coverage row for the given resources. The only
   * write that destroys data outside of coalescing.
   *
   * @returns intervals deleted
   */
  reset(resourceIds: readonly string[]): number {
    return this.transaction(() => {
      let deleted = 0;
      for (const resourceId of resourceIds) {
        deleted += this.stmts.deleteIntervalsFor.run(resourceId).changes;
        this.stmts.deleteCoverageFor.run(resourceId);
      }
      log.info(`Reset ${resourceIds.length} resource(s), deleted ${deleted} interval(s)`);
      return deleted;
    });
  }

  // ── Reads ───────────────────────────────────────────────

  /** The interval covering `instant` (start <= instant < end), if any. */
  query(resourceId: string, instant: Date): AvailabilityInterval | null {
    const t = instant.getTime();
    const row = this.stmts.covering.get(resourceId, t, t);
    return row === undefined ? null : toInterval(row);
  }

  /** Intervals overlapping [start, end), unclipped. */
  queryRange(resourceId: string, start: Date, end: Date): AvailabilityInterval[] {
    return this.stmts.overlapping.all(resourceId, end.getTime(), start.getTime()).map(toInterval);
  }

  /** The first interval starting strictly after `instant`. */
  nextInterval(resourceId: string, instant: Date): AvailabilityInterval | null {
    const row = this.stmts.next.get(resourceId, instant.getTime());
    return row === undefined ? null : toInterval(row);
  }

  intervalsFor(resourceId: string): AvailabilityInterval[] {
    return this.stmts.allForResource.all(resourceId).map(toInterval);
  }

  coverage(resourceIds: readonly string[], bookingDate: string): DayCoverage[] {
    const found: DayCoverage[] = [];
    for (const resourceId of resourceIds) {
      const row = this.stmts.getCoverage.get(resourceId, bookingDate);
      if (row !== undefined) {
        found.push(toCoverage(row));
      }
    }
    return found;
  }

  counts(): { resources: number; intervals: number } {
    const CountSchema = z.object({ total: z.number().int() });
    return {
      resources: CountSchema.parse(this.stmts.countResources.get()).total,
      intervals: CountSchema.parse(this.stmts.countIntervals.get()).total,
    };
  }

  close(): void {
    this.db.close();
  }

  private requireResource(resourceId: string): void {
    if (this.stmts.getResource.get(resourceId) === undefined) {
      throw new NotFoundFailure(resourceId);
    }
  }

  private insertAll(intervals: readonly AvailabilityInterval[]): number {
    for (const interval of intervals) {
      this.stmts.insertInterval.run(
        interval.resourceId,
        interval.start.getTime(),
        interval.end.getTime()
      );
    }
    return intervals.length;
  }
}
