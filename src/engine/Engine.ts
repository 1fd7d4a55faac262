import type { CostParameters, LcoeEngineResult, ProjectParameters } from './schema/LcoeInputV1';
import { annualEnergyMWh } from './modules/FuelEnergyModule';
import { runFuelCycleModule } from './modules/FuelCycleModule';
import {
  buildConstructionSchedule,
  computeCapex,
  computeDismantlingTotal,
  computeOpexPerYear,
} from './modules/ConstructionScheduleModule';
import {
  buildCashFlowTimeline,
  computeDiscountedBreakdown,
  computeDiscountedFuelBreakdown,
  computeLcoe,
} from './modules/DiscountedCashFlowModule';
import { buildAnnualizedCostTable } from './modules/AnnualizedCostModule';
import { buildAssumptionsV1 } from './AssumptionsBuilder';

/**
 * Runs every module once for a project and collects the results.
 *
 * Throws whatever the modules throw (LcoeEngineError): an infeasible tails
 * search or a degenerate schedule aborts the whole run.
 */
export function runLcoeEngine(project: ProjectParameters, costs: CostParameters): LcoeEngineResult {
  const energy = annualEnergyMWh(project);
  const fuelCycle = runFuelCycleModule(project, costs);
  const schedule = buildConstructionSchedule(project);
  const timeline = buildCashFlowTimeline(project, costs);
  const lcoeUsdPerMWh = computeLcoe(project, costs);
  const discounted = computeDiscountedBreakdown(project, costs);
  const discountedFuel = computeDiscountedFuelBreakdown(project, costs);
  const annualized = buildAnnualizedCostTable(project, costs);
  const assumptions = buildAssumptionsV1(project, costs);

  const firstOnline = Math.min(...schedule.map(r => r.constructionEndYear + 1));
  const lastYear = timeline.length;

  const notes: string[] = [
    `Schedule: ${project.nReactors} × ${project.reactorType}, first unit online in year ${firstOnline}, ` +
    `last unit retires after year ${lastYear}.`,
    ...fuelCycle.notes,
    `LCOE ≈ ${lcoeUsdPerMWh.toFixed(1)} $/MWh at a ${(costs.realDiscountRate * 100).toFixed(1)}% real discount rate.`,
  ];

  return {
    project,
    costs,
    annualEnergyMWh: energy,
    fuelCycle,
    capexTotalUsd: computeCapex(project, costs),
    dismantlingTotalUsd: computeDismantlingTotal(project, costs),
    opexUsdPerYear: computeOpexPerYear(project, costs),
    schedule,
    timeline,
    lcoeUsdPerMWh,
    discounted,
    discountedFuel,
    annualized,
    assumptions,
    notes,
  };
}
