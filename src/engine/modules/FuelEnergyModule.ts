import type { ProjectParameters } from '../schema/LcoeInputV1';
import { HOURS_PER_YEAR } from '../defaults';
import { uo2ToU } from '../utils/conversion';

// ─── Energy ───────────────────────────────────────────────────────────────────

/**
 * Net annual electricity production of the whole plant (MWh/year), every
 * reactor at its net capacity factor.
 */
export function annualEnergyMWh(project: ProjectParameters): number {
  const totalPowerMW = project.nReactors * project.powerElectricPerReactorMWe;
  return totalPowerMW * HOURS_PER_YEAR * project.netCapacityFactor;
}

// ─── Fuel mass balance ────────────────────────────────────────────────────────
// Oxide masses (kg UO2) unless the name says otherwise.

/** Fuel inventory of one core. */
export function fuelMassPerCoreKg(project: ProjectParameters): number {
  return project.assembliesPerCore * project.fuelMassPerAssemblyKg;
}

/** Fresh fuel loaded into one reactor at each refuelling. */
export function freshFuelMassPerCycleKg(project: ProjectParameters): number {
  return fuelMassPerCoreKg(project) * project.batchFraction;
}

/** Fresh fuel loaded across the plant per year. */
export function annualFreshFuelMassKg(project: ProjectParameters): number {
  return (freshFuelMassPerCycleKg(project) * project.nReactors) / project.cycleLengthYears;
}

/** Enriched uranium metal (kgU/year) contained in the annual fresh fuel. */
export function annualEnrichedUMassKg(project: ProjectParameters): number {
  return uo2ToU(annualFreshFuelMassKg(project));
}
