import { fail, NotFoundFailure, ok, Result } from "./errors";
import { IntervalStore } from "./intervalStore";
import { StateQueryEngine } from "./queryEngine";
import { ReadinessCounts, ReadinessCriteria, ReadinessResult, Resource } from "./types";

export interface ReadinessRequirements {
  minCrew: number;
  minTechnicalRescue: number;
  minLargeGoodsVehicle: number;
  minBreathingApparatus: number;
  minOfficerInCharge: number;
  technicalRescueSkill: string;
  largeGoodsVehicleSkill: string;
  breathingApparatusSkill: string;
  officerRoles: string[];
}

export const DEFAULT_REQUIREMENTS: ReadinessRequirements = {
  minCrew: 4,
  minTechnicalRescue: 1,
  minLargeGoodsVehicle: 1,
  minBreathingApparatus: 2,
  minOfficerInCharge: 1,
  technicalRescueSkill: "TTR",
  largeGoodsVehicleSkill: "LGV",
  breathingApparatusSkill: "BA",
  officerRoles: ["WC", "CC", "FFC"],
};

function hasSkill(resource: Resource, skill: string): boolean {
  return resource.skills.includes(skill.toUpperCase());
}

/**
 * Applies the crewing rules to a set of available crew.
 *
 * BA holders who also hold TTR are left out of the BA and officer counts:
 * the TTR holder is counted against technical rescue instead.
 */
export function evaluateRules(
  availableCrew: readonly Resource[],
  requirements: ReadinessRequirements = DEFAULT_REQUIREMENTS
): { ready: boolean; criteria: ReadinessCriteria; counts: ReadinessCounts } {
  const officerRoles = new Set(requirements.officerRoles.map((role) => role.toUpperCase()));

  const technicalRescue = availableCrew.filter((crew) =>
    hasSkill(crew, requirements.technicalRescueSkill)
  );
  const breathingApparatus = availableCrew.filter(
    (crew) =>
      hasSkill(crew, requirements.breathingApparatusSkill) &&
      !hasSkill(crew, requirements.technicalRescueSkill)
  );

  const counts: ReadinessCounts = {
    crew: availableCrew.length,
    technicalRescue: technicalRescue.length,
    largeGoodsVehicle: availableCrew.filter((crew) =>
      hasSkill(crew, requirements.largeGoodsVehicleSkill)
    ).length,
    breathingApparatus: breathingApparatus.length,
    officerInCharge: breathingApparatus.filter((crew) =>
      officerRoles.has((crew.role ?? "").toUpperCase())
    ).length,
  };

  const criteria: ReadinessCriteria = {
    crewCount: counts.crew >= requirements.minCrew,
    technicalRescue: counts.technicalRescue >= requirements.minTechnicalRescue,
    largeGoodsVehicle: counts.largeGoodsVehicle >= requirements.minLargeGoodsVehicle,
    breathingApparatus: counts.breathingApparatus >= requirements.minBreathingApparatus,
    officerInCharge: counts.officerInCharge >= requirements.minOfficerInCharge,
  };

  return {
    ready: Object.values(criteria).every(Boolean),
    criteria,
    counts,
  };
}

export interface ReadinessEvaluatorOptions {
  requirements?: ReadinessRequirements;
  // Unit id -> crew ids that ride it. Units not listed draw on every crew resource.
  unitCrew?: ReadonlyMap<string, readonly string[]>;
}

export class ReadinessEvaluator {
  private readonly requirements: ReadinessRequirements;
  private readonly unitCrew: ReadonlyMap<string, readonly string[]>;

  constructor(
    private readonly store: IntervalStore,
    private readonly query: StateQueryEngine,
    options: ReadinessEvaluatorOptions = {}
  ) {
    this.requirements = options.requirements ?? DEFAULT_REQUIREMENTS;
    this.unitCrew = options.unitCrew ?? new Map();
  }

  /**
   * Rule-based readiness of an appliance at `instant`, alongside the
   * portal's own availability flag for it.
   */
  evaluate(unitId: string, instant: Date): Result<ReadinessResult, NotFoundFailure> {
    const unit = this.store.getResource(unitId);
    if (!unit || unit.kind !== "appliance") {
      return fail(new NotFoundFailure(unitId, `Unknown appliance: ${unitId}`));
    }

    const applianceAvailable = this.query.isAvailable(unitId, instant);
    if (!applianceAvailable.ok) {
      return applianceAvailable;
    }

    const available = this.crewPool(unitId).filter((crew) => {
      const state = this.query.isAvailable(crew.id, instant);
      return state.ok && state.value;
    });

    const { ready, criteria, counts } = evaluateRules(available, this.requirements);

    return ok({
      unitId,
      at: instant,
      ready,
      criteria,
      counts,
      applianceAvailable: applianceAvailable.value,
      availableCrew: available.map((crew) => crew.id),
    });
  }

  private crewPool(unitId: string): Resource[] {
    const crew = this.store.listResources("crew");
    const assigned = this.unitCrew.get(unitId);
    if (!assigned || assigned.length === 0) {
      return crew;
    }

    const ids = new Set(assigned);
    return crew.filter((resource) => ids.has(resource.id));
  }
}
