import type { CostParametersInput, ProjectParametersInput } from './schema/LcoeInputV1';

/** Hours in a (non-leap) year, used for annual energy. */
export const HOURS_PER_YEAR = 8760;

/** Lowest tails assay scanned by the front-end optimizer. */
export const DEFAULT_TAILS_MIN = 0.0005;

/** Grid points between DEFAULT_TAILS_MIN and the natural assay. */
export const DEFAULT_TAILS_STEPS = 500;

/**
 * Reference project: four VVER-1200 units in Serbia, built one year apart.
 *
 * Core data are typical VVER-1200 figures (163 assemblies, 534 kg UO2 each,
 * one-third reload every 18 months).
 */
export const DEFAULT_PROJECT_PARAMETERS: Readonly<ProjectParametersInput> = Object.freeze({
  country: 'Serbia',
  reactorType: 'VVER-1200',
  nReactors: 4,
  powerElectricPerReactorMWe: 1200,
  netCapacityFactor: 0.8,

  firstReactorConstructionTimeYears: 7,
  delayBetweenReactorsYears: 1,
  reactorsLifetimeYears: 60,

  xUNat: 0.00711,
  xUProduct: 0.048,

  assembliesPerCore: 163,
  fuelMassPerAssemblyKg: 534,
  batchFraction: 1 / 3,
  cycleLengthYears: 18 / 12,
  spentFuelBackend: 'direct_disposal',

  distanceUNatTransportKm: 5000,
  distanceUConvertedTransportKm: 1200,
  distanceUEnrichedTransportKm: 100,
  distanceFreshFuelTransportKm: 1000,
  distanceSpentFuelTransportKm: 500,
});

/** Reference costs in real USD (today's money). */
export const DEFAULT_COST_PARAMETERS: Readonly<CostParametersInput> = Object.freeze({
  realDiscountRate: 0.05,

  costPerReactorUsd: 6e9,
  dismantlingCostPerReactorUsd: 0,
  exploitationCostPerYearPerReactorUsd: 200e6, // staff, maintenance, services

  priceUNatPerKgUsd: 190,
  transportUNatPerKgPerKmUsd: 0.04e-3,
  conversionPerKgUUsd: 15,
  transportUConvertedPerKgUPerKmUsd: 0.05e-3,
  priceSwuUsd: 140,
  transportUEnrichedPerKgUPerKmUsd: 1.0e-3,

  fabricationPerKgFreshFuelUsd: 250,
  transportFreshFuelPerKgPerKmUsd: 5.0e-3,

  directDisposalPerKgSpentFuelUsd: 1300,
  transportSpentFuelPerKgPerKmUsd: 6.0e-3,
});
