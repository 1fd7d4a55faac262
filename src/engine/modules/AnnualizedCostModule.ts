import type { AnnualizedCostTable, CostParameters, ProjectParameters } from '../schema/LcoeInputV1';
import { computeCapex, computeDismantlingTotal, computeOpexPerYear } from './ConstructionScheduleModule';
import { fuelCycleBreakdownPerYear, sumBreakdown } from './FuelCycleModule';

/**
 * Capital recovery factor: the constant annual payment, per unit of present
 * value, that repays a sum over `years` at `rate`.
 *
 *   CRF = r(1 + r)^n / ((1 + r)^n − 1)
 *
 * Falls back to straight-line 1/n at r = 0.
 */
export function capitalRecoveryFactor(rate: number, years: number): number {
  if (rate === 0) return 1 / years;
  const growth = Math.pow(1 + rate, years);
  return (rate * growth) / (growth - 1);
}

/**
 * AnnualizedCostModule
 *
 * A steady-state view of one year of plant costs with every reactor running:
 * CAPEX annualised with the CRF over the reactor lifetime, dismantling spread
 * straight-line over the same lifetime, plus OPEX and the fuel cycle.
 *
 * This is a presentation table and not an input to the LCOE, which comes from
 * the discounted cash flow.
 */
export function buildAnnualizedCostTable(project: ProjectParameters, costs: CostParameters): AnnualizedCostTable {
  const crf = capitalRecoveryFactor(costs.realDiscountRate, project.reactorsLifetimeYears);
  const annualizedCapexUsd = computeCapex(project, costs) * crf;
  const annualizedDismantlingUsd = computeDismantlingTotal(project, costs) / project.reactorsLifetimeYears;
  const opexUsd = computeOpexPerYear(project, costs);
  const fuelBreakdownUsd = fuelCycleBreakdownPerYear(project, costs);
  const fuelTotalUsd = sumBreakdown(fuelBreakdownUsd);

  return {
    capitalRecoveryFactor: crf,
    annualizedCapexUsd,
    annualizedDismantlingUsd,
    opexUsd,
    fuelBreakdownUsd,
    fuelTotalUsd,
    totalAnnualCostUsd: annualizedCapexUsd + annualizedDismantlingUsd + opexUsd + fuelTotalUsd,
  };
}
