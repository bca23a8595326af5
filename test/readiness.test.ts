import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundFailure } from "../src/errors";
import { IntervalStore } from "../src/intervalStore";
import { StateQueryEngine } from "../src/queryEngine";
import { DEFAULT_REQUIREMENTS, evaluateRules, ReadinessEvaluator } from "../src/readiness";
import { Resource } from "../src/types";
import { appliance, at, crew, memoryStore } from "./helpers/grid";

const OFFICER = crew("OIC", "WC", ["BA"]);
const DRIVER = crew("DRV", "FFT", ["LGV"]);
const RESCUE = crew("TTR1", "FFT", ["TTR", "BA"]);
const WEARER = crew("BA1", "FFT", ["BA"]);
const SPARE = crew("FF5", "FFT", []);

const FULL_CREW = [OFFICER, DRIVER, RESCUE, WEARER, SPARE];

describe("evaluateRules", () => {
  it("passes every criterion with a full crew", () => {
    const result = evaluateRules(FULL_CREW);

    expect(result).toEqual({
      ready: true,
      criteria: {
        crewCount: true,
        technicalRescue: true,
        largeGoodsVehicle: true,
        breathingApparatus: true,
        officerInCharge: true,
      },
      counts: {
        crew: 5,
        technicalRescue: 1,
        largeGoodsVehicle: 1,
        breathingApparatus: 2,
        officerInCharge: 1,
      },
    });
  });

  it("fails below the minimum crew", () => {
    const result = evaluateRules([OFFICER, RESCUE, WEARER]);

    expect(result.ready).toBe(false);
    expect(result.criteria.crewCount).toBe(false);
  });

  it("fails without a TTR holder", () => {
    const result = evaluateRules([OFFICER, DRIVER, crew("X", "FFT", ["BA"]), WEARER, SPARE]);

    expect(result.ready).toBe(false);
    expect(result.criteria.technicalRescue).toBe(false);
    expect(result.counts.breathingApparatus).toBe(3);
  });

  it("fails without an LGV driver", () => {
    const result = evaluateRules([OFFICER, RESCUE, WEARER, SPARE]);

    expect(result.criteria.largeGoodsVehicle).toBe(false);
    expect(result.ready).toBe(false);
  });

  it("does not count TTR holders towards breathing apparatus", () => {
    const result = evaluateRules([
      OFFICER,
      DRIVER,
      crew("T1", "FFT", ["TTR", "BA"]),
      crew("T2", "FFT", ["TTR", "BA"]),
    ]);

    expect(result.counts.breathingApparatus).toBe(1);
    expect(result.criteria.breathingApparatus).toBe(false);
    expect(result.criteria.crewCount).toBe(true);
  });

  it("needs an officer among the BA wearers", () => {
    const result = evaluateRules([
      crew("CC1", "CC", ["TTR", "BA"]),
      DRIVER,
      WEARER,
      crew("BA2", "FFT", ["BA"]),
      crew("WC1", "WC", []),
    ]);

    expect(result.counts.breathingApparatus).toBe(2);
    expect(result.counts.officerInCharge).toBe(0);
    expect(result.criteria.officerInCharge).toBe(false);
    expect(result.ready).toBe(false);
  });

  it("takes officer roles from the requirements", () => {
    const crewWithCrewManager = [crew("CC1", "CC", ["BA"]), DRIVER, RESCUE, WEARER];

    expect(evaluateRules(crewWithCrewManager).ready).toBe(true);
    expect(evaluateRules(crewWithCrewManager, { ...DEFAULT_REQUIREMENTS, officerRoles: ["WC"] }).ready).toBe(
      false
    );
  });

  it("never turns not-ready when someone else becomes available", () => {
    const pool: Resource[] = [...FULL_CREW, crew("CC2", "CC", ["BA", "LGV"]), crew("FF7", "FFT", ["TTR"])];

    for (let mask = 0; mask < 1 << pool.length; mask++) {
      const subset = pool.filter((_, index) => (mask & (1 << index)) !== 0);
      if (!evaluateRules(subset).ready) {
        continue;
      }

      pool.forEach((extra, index) => {
        if ((mask & (1 << index)) === 0) {
          expect(evaluateRules([...subset, extra]).ready).toBe(true);
        }
      });
    }
  });
});

describe("ReadinessEvaluator", () => {
  let store: IntervalStore;
  let query: StateQueryEngine;

  beforeEach(() => {
    store = memoryStore([...FULL_CREW, appliance("P22P6")]);
    query = new StateQueryEngine(store);
    for (const member of FULL_CREW) {
      store.upsert(member.id, [{ resourceId: member.id, start: at(8), end: at(12) }]);
    }
  });

  afterEach(() => {
    store.close();
  });

  it("evaluates crew available at the instant", () => {
    const result = new ReadinessEvaluator(store, query).evaluate("P22P6", at(9));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.ready).toBe(true);
      expect(result.value.at).toEqual(at(9));
      expect(result.value.availableCrew).toEqual(["BA1", "DRV", "FF5", "OIC", "TTR1"]);
      expect(result.value.applianceAvailable).toBe(false);
    }
  });

  it("reports the appliance's own flag alongside the rules", () => {
    store.upsert("P22P6", [{ resourceId: "P22P6", start: at(6), end: at(10) }]);
    const evaluator = new ReadinessEvaluator(store, query);

    const during = evaluator.evaluate("P22P6", at(9));
    const after = evaluator.evaluate("P22P6", at(13));

    expect(during.ok && during.value.applianceAvailable).toBe(true);
    expect(after.ok && after.value.applianceAvailable).toBe(false);
    expect(after.ok && after.value.ready).toBe(false);
    expect(after.ok && after.value.counts.crew).toBe(0);
  });

  it("limits the pool to the crew assigned to the unit", () => {
    const evaluator = new ReadinessEvaluator(store, query, {
      unitCrew: new Map([["P22P6", ["OIC", "DRV", "TTR1"]]]),
    });

    const result = evaluator.evaluate("P22P6", at(9));

    expect(result.ok && result.value.availableCrew).toEqual(["DRV", "OIC", "TTR1"]);
    expect(result.ok && result.value.criteria.crewCount).toBe(false);
  });

  it.each(["NOPE", "OIC"])("rejects %s as a unit", (unitId) => {
    const result = new ReadinessEvaluator(store, query).evaluate(unitId, at(9));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotFoundFailure);
      expect(result.error.message).toBe(`Unknown appliance: ${unitId}`);
    }
  });
});
