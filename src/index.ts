import cron from "node-cron";
import { AvailabilityEngine } from "./availabilityEngine";
import { AppConfig, loadConfigFromEnvironment } from "./config";
import { errorMessage } from "./errors";
import { GridParser } from "./gridParser";
import { IntervalStore } from "./intervalStore";
import { logger, setLogLevel } from "./logger";
import { PortalClient } from "./portalClient";
import { parseRoster } from "./roster";
import { parseStationDisplay, stationFeedStates } from "./stationDisplayParser";
import { TelegramService } from "./telegramService";
import { formatDuration } from "./time";
import { ReadinessResult } from "./types";

interface Runtime {
  config: AppConfig;
  client: PortalClient;
  store: IntervalStore;
  engine: AvailabilityEngine;
  telegram: TelegramService | null;
  lastReadiness: ReadinessResult | null;
  running: boolean;
}

function createRuntime(config: AppConfig): Runtime {
  const client = new PortalClient(config.portal);
  const store = new IntervalStore(config.dbPath);
  const engine = new AvailabilityEngine({
    store,
    source: client,
    parser: new GridParser({ defaultResolutionMinutes: config.slotMinutes }),
    cacheThresholds: config.cacheThresholds,
    readiness: {
      requirements: config.requirements,
      unitCrew: new Map([[config.unitId, config.unitCrew]]),
    },
  });

  let telegram: TelegramService | null = null;
  if (config.telegram) {
    try {
      telegram = new TelegramService(config.telegram.botToken, config.telegram.chatId);
      logger.info("Telegram service enabled");
    } catch (error) {
      logger.warn(`Failed to initialize Telegram service: ${errorMessage(error)}`);
    }
  }

  return { config, client, store, engine, telegram, lastReadiness: null, running: false };
}

async function refreshRoster(runtime: Runtime): Promise<void> {
  try {
    const roster = parseRoster(await runtime.client.fetchRoster());
    runtime.engine.importRoster(roster);
    logger.info(`Roster refreshed: ${roster.length} resource(s)`);
  } catch (error) {
    logger.warn(`Roster refresh failed, keeping stored roster: ${errorMessage(error)}`);
  }
}

function readinessChanged(a: ReadinessResult | null, b: ReadinessResult): boolean {
  return !a || a.ready !== b.ready || a.applianceAvailable !== b.applianceAvailable;
}

async function checkReadiness(runtime: Runtime, now: Date): Promise<void> {
  const result = runtime.engine.evaluateReadiness(runtime.config.unitId, now);
  if (!result.ok) {
    logger.warn(result.error.message);
    return;
  }

  const readiness = result.value;
  logger.info(
    `${readiness.unitId}: rules say ${readiness.ready ? "ready" : "not ready"}, portal says ${
      readiness.applianceAvailable ? "available" : "off the run"
    } (${readiness.counts.crew} crew)`
  );

  const change = runtime.engine.durationUntilChange(readiness.unitId, now);
  if (change.ok && change.value.kind === "bounded") {
    logger.info(`${readiness.unitId} portal state changes in ${formatDuration(change.value.ms)}`);
  }

  if (readinessChanged(runtime.lastReadiness, readiness)) {
    if (runtime.telegram) {
      await runtime.telegram.sendReadiness(readiness);
    } else {
      logger.debug("Telegram service not configured, skipping readiness notification");
    }
  }
  runtime.lastReadiness = readiness;
}

async function reconcileStationFeed(runtime: Runtime, now: Date): Promise<void> {
  try {
    const display = parseStationDisplay(await runtime.client.fetchStationDisplay());
    const feed = stationFeedStates(display, runtime.store.listResources());
    const computed = runtime.engine.computedStates("all", now);
    const discrepancies = runtime.engine.reconcile(computed, feed, {
      a: "schedule",
      b: "station feed",
    });

    if (discrepancies.length === 0) {
      logger.info(`Station feed agrees for ${feed.size} resource(s)`);
      return;
    }

    discrepancies.forEach((record) => logger.warn(record.explanation));
    if (runtime.telegram) {
      await runtime.telegram.sendDiscrepancies(discrepancies);
    }
  } catch (error) {
    logger.warn(`Station feed check skipped: ${errorMessage(error)}`);
  }
}

async function runCycle(runtime: Runtime): Promise<void> {
  if (runtime.running) {
    logger.warn("Previous cycle still running, skipping this tick");
    return;
  }

  runtime.running = true;
  logger.info(`Starting fetch → parse → store cycle (${runtime.config.cacheDirective})`);

  try {
    const offline = runtime.config.cacheDirective === "cache-only";
    if (!offline) {
      await refreshRoster(runtime);
    }

    const now = new Date();
    const summary = await runtime.engine.syncDays(
      "all",
      now,
      runtime.config.maxDays,
      runtime.config.cacheDirective,
      { stopWhenDetermined: runtime.config.syncEarlyStop }
    );
    logger.info(
      `Cycle complete: ${summary.fetchedDays} day(s) fetched, ${summary.intervalsWritten} interval(s) written, ${summary.failures} failure(s)`
    );

    await checkReadiness(runtime, now);
    if (!offline) {
      await reconcileStationFeed(runtime, now);
    }
  } catch (error) {
    logger.error(`Failed to complete cycle: ${errorMessage(error)}`, error);
  } finally {
    runtime.running = false;
  }
}

function bootstrap(): void {
  const config = loadConfigFromEnvironment();
  setLogLevel(config.logLevel);

  const runtime = createRuntime(config);
  const counts = runtime.store.counts();
  logger.info(`Database ${config.dbPath}: ${counts.resources} resource(s), ${counts.intervals} interval(s)`);

  const schedule = cron.schedule(config.cronPattern, () => void runCycle(runtime), {
    timezone: config.timezone,
  });

  logger.info(`Scheduler ready with pattern "${config.cronPattern}"`);

  void runCycle(runtime);

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down scheduler...`);
    schedule.stop();
    runtime.store.close();
    process.exit(0);
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap();
