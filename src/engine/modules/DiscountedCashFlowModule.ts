import type {
  CashFlowYear,
  CostParameters,
  DiscountedBreakdown,
  FuelCycleBreakdown,
  ProjectParameters,
} from '../schema/LcoeInputV1';
import { ERROR_CODES } from '../../contracts/errors.ids';
import { LcoeEngineError } from '../LcoeEngineError';
import { annualEnergyMWh } from './FuelEnergyModule';
import { fuelCycleBreakdownPerYear, fuelCycleCostPerYear, mapFuelCycleSteps } from './FuelCycleModule';
import {
  buildConstructionSchedule,
  capexSpendingInYear,
  lastOperationYear,
  reactorsOperationalInYear,
} from './ConstructionScheduleModule';

/** End-of-year discount factor (1 + r)^−year. */
export function discountFactor(rate: number, year: number): number {
  return Math.pow(1 + rate, -year);
}

/**
 * Year-by-year undiscounted cash flows, years 1..lastOperationYear.
 *
 * OPEX, fuel and energy scale with the number of reactors generating that
 * year; CAPEX follows the construction schedule.
 */
export function buildCashFlowTimeline(project: ProjectParameters, costs: CostParameters): CashFlowYear[] {
  const lastYear = lastOperationYear(project);
  const fuelPerReactor = fuelCycleCostPerYear(project, costs) / project.nReactors;
  const energyPerReactor = annualEnergyMWh(project) / project.nReactors;

  const timeline: CashFlowYear[] = [];
  for (let year = 1; year <= lastYear; year++) {
    const operationalReactors = reactorsOperationalInYear(project, year);
    timeline.push({
      year,
      operationalReactors,
      capexUsd: capexSpendingInYear(project, costs, year),
      opexUsd: operationalReactors * costs.exploitationCostPerYearPerReactorUsd,
      fuelUsd: operationalReactors * fuelPerReactor,
      energyMWh: operationalReactors * energyPerReactor,
      discountFactor: discountFactor(costs.realDiscountRate, year),
    });
  }
  return timeline;
}

/** Each reactor's dismantling cost, discounted from its own last operating year. */
function discountedDismantling(project: ProjectParameters, costs: CostParameters): number {
  return buildConstructionSchedule(project).reduce(
    (acc, r) =>
      acc + costs.dismantlingCostPerReactorUsd * discountFactor(costs.realDiscountRate, r.operationEndYear),
    0,
  );
}

// ─── LCOE ─────────────────────────────────────────────────────────────────────

/**
 * Levelized cost of electricity (USD/MWh):
 *
 *   LCOE = Σ_t (CAPEX_t + OPEX_t + fuel_t)(1 + r)^−t + Σ_reactors D(1 + r)^−end
 *          ─────────────────────────────────────────────────────────────────────
 *                               Σ_t E_t (1 + r)^−t
 *
 * r is the real discount rate, so every cost is in today's money.
 *
 * @throws LcoeEngineError `degenerate_schedule` when discounted energy ≤ 0
 *         (e.g. zero capacity factor).
 */
export function computeLcoe(project: ProjectParameters, costs: CostParameters): number {
  let discountedCost = 0;
  let discountedEnergy = 0;

  for (const y of buildCashFlowTimeline(project, costs)) {
    discountedCost += (y.capexUsd + y.opexUsd + y.fuelUsd) * y.discountFactor;
    discountedEnergy += y.energyMWh * y.discountFactor;
  }
  discountedCost += discountedDismantling(project, costs);

  if (!(discountedEnergy > 0)) {
    throw new LcoeEngineError(
      ERROR_CODES.DEGENERATE_SCHEDULE,
      `computeLcoe: discounted energy is ${discountedEnergy} MWh; LCOE is undefined ` +
      `(netCapacityFactor=${project.netCapacityFactor}, powerElectricPerReactorMWe=${project.powerElectricPerReactorMWe}).`,
    );
  }

  return discountedCost / discountedEnergy;
}

/** Discounted totals per cost category over the project life. Does not throw on zero energy. */
export function computeDiscountedBreakdown(project: ProjectParameters, costs: CostParameters): DiscountedBreakdown {
  const totals: DiscountedBreakdown = { capexUsd: 0, opexUsd: 0, fuelUsd: 0, dismantlingUsd: 0, energyMWh: 0 };

  for (const y of buildCashFlowTimeline(project, costs)) {
    totals.capexUsd += y.capexUsd * y.discountFactor;
    totals.opexUsd += y.opexUsd * y.discountFactor;
    totals.fuelUsd += y.fuelUsd * y.discountFactor;
    totals.energyMWh += y.energyMWh * y.discountFactor;
  }
  totals.dismantlingUsd = discountedDismantling(project, costs);

  return totals;
}

/**
 * Discounted fuel cost per fuel-cycle step.
 *
 * Each step is discounted independently: its plant-level annual cost is split
 * per reactor and scaled by the reactors generating each year. Summed over the
 * steps this matches `computeDiscountedBreakdown(...).fuelUsd`.
 */
export function computeDiscountedFuelBreakdown(project: ProjectParameters, costs: CostParameters): FuelCycleBreakdown {
  const annual = fuelCycleBreakdownPerYear(project, costs);
  const lastYear = lastOperationYear(project);
  const r = costs.realDiscountRate;

  return mapFuelCycleSteps(id => {
    const perReactor = annual[id] / project.nReactors;
    let total = 0;
    for (let year = 1; year <= lastYear; year++) {
      const n = reactorsOperationalInYear(project, year);
      if (n > 0) {
        total += n * perReactor * discountFactor(r, year);
      }
    }
    return total;
  });
}
