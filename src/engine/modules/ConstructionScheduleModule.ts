import type { CostParameters, ProjectParameters, ReactorScheduleEntry } from '../schema/LcoeInputV1';
import { roundHalfEven } from '../utils/rounding';

/**
 * ConstructionScheduleModule
 *
 * Staggered build-out: reactor i starts construction round(i × delay) years
 * after the first, every reactor takes round(first build time) years to build,
 * then operates for reactorsLifetimeYears.
 *
 * All years are 1-indexed. A reactor is under construction in
 * [constructionStartYear, constructionEndYear] and generating in
 * (constructionEndYear, operationEndYear].
 *
 * Nothing here is cached: each query rebuilds the schedule from `project`.
 */
export function buildConstructionSchedule(project: ProjectParameters): ReactorScheduleEntry[] {
  const buildYears = roundHalfEven(project.firstReactorConstructionTimeYears);
  const schedule: ReactorScheduleEntry[] = [];

  for (let i = 0; i < project.nReactors; i++) {
    const constructionStartYear = roundHalfEven(i * project.delayBetweenReactorsYears) + 1;
    const constructionEndYear = constructionStartYear + buildYears - 1;
    schedule.push({
      reactorIndex: i,
      constructionStartYear,
      constructionEndYear,
      operationEndYear: constructionEndYear + project.reactorsLifetimeYears,
    });
  }

  return schedule;
}

/** Final year in which any reactor still generates. */
export function lastOperationYear(project: ProjectParameters): number {
  return buildConstructionSchedule(project).reduce((max, r) => Math.max(max, r.operationEndYear), 0);
}

export function reactorsOperationalInYear(project: ProjectParameters, year: number): number {
  return buildConstructionSchedule(project)
    .filter(r => r.constructionEndYear < year && year <= r.operationEndYear)
    .length;
}

/**
 * CAPEX drawn in `year` (USD).
 *
 * Each reactor under construction draws costPerReactorUsd divided by the
 * first reactor's nominal (unrounded) build time, whatever its own schedule.
 */
export function capexSpendingInYear(project: ProjectParameters, costs: CostParameters, year: number): number {
  const annualSpendPerReactor = costs.costPerReactorUsd / project.firstReactorConstructionTimeYears;
  return buildConstructionSchedule(project)
    .filter(r => r.constructionStartYear <= year && year <= r.constructionEndYear)
    .reduce(acc => acc + annualSpendPerReactor, 0);
}

// ─── Undiscounted totals ──────────────────────────────────────────────────────

/** Overnight capital cost of the whole plant (USD). */
export function computeCapex(project: ProjectParameters, costs: CostParameters): number {
  return project.nReactors * costs.costPerReactorUsd;
}

/** Non-fuel operating cost with every reactor running (USD/year). */
export function computeOpexPerYear(project: ProjectParameters, costs: CostParameters): number {
  return project.nReactors * costs.exploitationCostPerYearPerReactorUsd;
}

/** Dismantling cost of the whole plant (USD, undiscounted). */
export function computeDismantlingTotal(project: ProjectParameters, costs: CostParameters): number {
  return project.nReactors * costs.dismantlingCostPerReactorUsd;
}
