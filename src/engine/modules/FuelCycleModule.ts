import type {
  CostParameters,
  FrontEndSolution,
  FuelCycleBreakdown,
  FuelCycleResult,
  ProjectParameters,
} from '../schema/LcoeInputV1';
import { FUEL_CYCLE_STEP_IDS, type FuelCycleStepId } from '../../contracts/fuelCycle.stepIds';
import { annualEnrichedUMassKg, annualFreshFuelMassKg } from './FuelEnergyModule';
import { optimizeFrontEndCost } from './FrontEndOptimizerModule';

/** Optimise the front end for the plant's annual enriched-uranium need. */
export function optimizeAnnualFrontEnd(project: ProjectParameters, costs: CostParameters): FrontEndSolution {
  return optimizeFrontEndCost({
    productMassKg: annualEnrichedUMassKg(project),
    xUNat: project.xUNat,
    xUProduct: project.xUProduct,
    priceUNatPerKgUsd: costs.priceUNatPerKgUsd,
    conversionPerKgUUsd: costs.conversionPerKgUUsd,
    priceSwuUsd: costs.priceSwuUsd,
    transportUNatPerKgPerKmUsd: costs.transportUNatPerKgPerKmUsd,
    distanceUNatTransportKm: project.distanceUNatTransportKm,
    transportUConvertedPerKgUPerKmUsd: costs.transportUConvertedPerKgUPerKmUsd,
    distanceUConvertedTransportKm: project.distanceUConvertedTransportKm,
    transportUEnrichedPerKgUPerKmUsd: costs.transportUEnrichedPerKgUPerKmUsd,
    distanceUEnrichedTransportKm: project.distanceUEnrichedTransportKm,
  });
}

function buildBreakdown(
  project: ProjectParameters,
  costs: CostParameters,
  frontEnd: FrontEndSolution,
  freshFuelMassKg: number,
): FuelCycleBreakdown {
  // No burnup model: the discharged mass is taken equal to the loaded mass.
  const spentFuelMassKg = freshFuelMassKg;

  return Object.freeze({
    uNat: frontEnd.costUNatUsd,
    transportUNat: frontEnd.costTransportUNatUsd,
    conversion: frontEnd.costConversionUsd,
    transportUConverted: frontEnd.costTransportUConvertedUsd,
    swu: frontEnd.costEnrichmentUsd,
    transportUEnriched: frontEnd.costTransportUEnrichedUsd,
    fabrication: freshFuelMassKg * costs.fabricationPerKgFreshFuelUsd,
    transportFreshFuel:
      freshFuelMassKg * costs.transportFreshFuelPerKgPerKmUsd * project.distanceFreshFuelTransportKm,
    backEnd: spentFuelMassKg * costs.directDisposalPerKgSpentFuelUsd,
    transportSpentFuel:
      spentFuelMassKg * costs.transportSpentFuelPerKgPerKmUsd * project.distanceSpentFuelTransportKm,
  });
}

/** Build a breakdown by evaluating `fn` once per fuel-cycle step. */
export function mapFuelCycleSteps(fn: (id: FuelCycleStepId) => number): FuelCycleBreakdown {
  return Object.freeze({
    uNat: fn('uNat'),
    transportUNat: fn('transportUNat'),
    conversion: fn('conversion'),
    transportUConverted: fn('transportUConverted'),
    swu: fn('swu'),
    transportUEnriched: fn('transportUEnriched'),
    fabrication: fn('fabrication'),
    transportFreshFuel: fn('transportFreshFuel'),
    backEnd: fn('backEnd'),
    transportSpentFuel: fn('transportSpentFuel'),
  });
}

export function sumBreakdown(breakdown: FuelCycleBreakdown): number {
  return FUEL_CYCLE_STEP_IDS.reduce((acc, id) => acc + breakdown[id], 0);
}

/** Annual plant fuel-cycle cost per step (USD/year). */
export function fuelCycleBreakdownPerYear(project: ProjectParameters, costs: CostParameters): FuelCycleBreakdown {
  return buildBreakdown(project, costs, optimizeAnnualFrontEnd(project, costs), annualFreshFuelMassKg(project));
}

/** Annual plant fuel-cycle cost, all ten steps (USD/year). */
export function fuelCycleCostPerYear(project: ProjectParameters, costs: CostParameters): number {
  return sumBreakdown(fuelCycleBreakdownPerYear(project, costs));
}

// ─── Main Module ──────────────────────────────────────────────────────────────

/**
 * FuelCycleModule
 *
 * Prices one year of the once-through cycle for the whole plant. The front
 * end (mine to fabrication plant) comes from the tails-assay optimizer; the
 * fabrication and back-end legs are fixed unit rates × mass (× distance for
 * transport).
 */
export function runFuelCycleModule(project: ProjectParameters, costs: CostParameters): FuelCycleResult {
  const notes: string[] = [];

  const productMassKg = annualEnrichedUMassKg(project);
  const freshFuelMassKg = annualFreshFuelMassKg(project);
  const frontEnd = optimizeAnnualFrontEnd(project, costs);
  const breakdown = buildBreakdown(project, costs, frontEnd, freshFuelMassKg);
  const totalUsdPerYear = sumBreakdown(breakdown);

  notes.push(
    `Enrichment: ${(frontEnd.feedMassKg / 1e3).toFixed(3)} tU natural → ` +
    `${(productMassKg / 1e3).toFixed(3)} tU at ${(project.xUProduct * 100).toFixed(2)}% ` +
    `with optimal tails ${(frontEnd.xTailsOpt * 100).toFixed(3)}% ` +
    `(${(frontEnd.swuRequired / 1e3).toFixed(1)} kSWU/yr).`
  );
  notes.push(
    `Fuel cycle: ${(totalUsdPerYear / 1e6).toFixed(2)} M$/yr for ` +
    `${(freshFuelMassKg / 1e3).toFixed(3)} tUO2/yr of fresh fuel.`
  );
  if (project.spentFuelBackend === 'reprocessing') {
    notes.push('Back end: reprocessing selected, priced at the direct-disposal rate.');
  }

  return {
    productMassKg,
    freshFuelMassKg,
    spentFuelMassKg: freshFuelMassKg,
    frontEnd,
    breakdown,
    totalUsdPerYear,
    notes,
  };
}
