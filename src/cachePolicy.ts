import { CacheDirective, DayCoverage } from "./types";

const DIRECTIVE_ALIASES = new Map<string, CacheDirective>([
  ["cache-only", "cache-only"],
  ["cache-preferred", "cache-preferred"],
  ["cache-first", "cache-preferred"],
  ["cache-off", "cache-off"],
  ["no-cache", "cache-off"],
  ["fresh-start", "fresh-start"],
]);

export function parseCacheDirective(value: string): CacheDirective | null {
  return DIRECTIVE_ALIASES.get(value.trim().toLowerCase()) ?? null;
}

/**
 * Freshness window in minutes keyed by the largest day offset it applies to.
 * Today's grid changes quickly, days further out rarely do.
 */
export type CacheThresholds = ReadonlyArray<readonly [maxDayOffset: number, minutes: number]>;

export const DEFAULT_CACHE_THRESHOLDS: CacheThresholds = [
  [0, 15],
  [1, 60],
  [2, 360],
  [8, 1440],
];

export function freshnessMinutes(
  dayOffset: number,
  thresholds: CacheThresholds = DEFAULT_CACHE_THRESHOLDS
): number {
  const sorted = [...thresholds].sort((a, b) => a[0] - b[0]);
  for (const [maxOffset, minutes] of sorted) {
    if (dayOffset <= maxOffset) {
      return minutes;
    }
  }

  const last = sorted[sorted.length - 1];
  return last ? last[1] : 0;
}

export function isCoverageFresh(
  coverage: DayCoverage,
  now: Date,
  windowMinutes: number
): boolean {
  const ageMs = now.getTime() - coverage.fetchedAt.getTime();
  return ageMs >= 0 && ageMs < windowMinutes * 60_000;
}
