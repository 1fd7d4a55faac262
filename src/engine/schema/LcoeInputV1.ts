import type { FuelCycleStepId } from '../../contracts/fuelCycle.stepIds';
import type { AssumptionV1 } from '../../contracts/LcoeOutputV1';

export type SpentFuelBackend = 'direct_disposal' | 'reprocessing';

// ─── Inputs ───────────────────────────────────────────────────────────────────

export interface ProjectParametersInput {
  // Project
  country: string;
  reactorType: string;
  nReactors: number;
  powerElectricPerReactorMWe: number; // MWe net
  netCapacityFactor: number;          // fraction 0–1

  // Construction timing
  firstReactorConstructionTimeYears: number;
  /** Delay between construction starts of consecutive reactors. */
  delayBetweenReactorsYears: number;
  reactorsLifetimeYears: number;

  // Enrichment (U-235 mass fractions)
  xUNat: number;
  xUProduct: number;

  // Core & fuel
  assembliesPerCore: number;
  fuelMassPerAssemblyKg: number; // kg UO2 (oxide mass)
  batchFraction: number;         // share of the core reloaded per cycle
  cycleLengthYears: number;
  spentFuelBackend: SpentFuelBackend;

  // Transport distances (km)
  distanceUNatTransportKm: number;      // mine → conversion
  distanceUConvertedTransportKm: number; // conversion → enrichment
  distanceUEnrichedTransportKm: number; // enrichment → fabrication
  distanceFreshFuelTransportKm: number; // fabrication → reactor
  distanceSpentFuelTransportKm: number; // reactor → disposal
}

/**
 * Validated, frozen project configuration.
 * Only produced by `createProjectParameters`.
 */
export interface ProjectParameters extends Readonly<ProjectParametersInput> {
  /** Uranium metal mass per assembly (kgU), derived from the oxide mass. */
  readonly uMassPerAssemblyKg: number;
}

export interface CostParametersInput {
  /** Real discount rate (fraction), net of inflation. */
  realDiscountRate: number;

  // Capital & end of life (per reactor)
  costPerReactorUsd: number; // overnight, no interest during construction
  dismantlingCostPerReactorUsd: number;

  // Non-fuel OPEX
  exploitationCostPerYearPerReactorUsd: number;

  // Front end
  priceUNatPerKgUsd: number;
  transportUNatPerKgPerKmUsd: number;
  conversionPerKgUUsd: number;
  transportUConvertedPerKgUPerKmUsd: number;
  priceSwuUsd: number;
  transportUEnrichedPerKgUPerKmUsd: number;

  // Fabrication
  fabricationPerKgFreshFuelUsd: number;
  transportFreshFuelPerKgPerKmUsd: number;

  // Back end
  directDisposalPerKgSpentFuelUsd: number;
  transportSpentFuelPerKgPerKmUsd: number;
}

export type CostParameters = Readonly<CostParametersInput>;

// ─── Front-end optimizer ──────────────────────────────────────────────────────

export interface FrontEndOptimizerInput {
  /** Required enriched product (kgU). Must be > 0. */
  productMassKg: number;
  xUNat: number;
  xUProduct: number;
  priceUNatPerKgUsd: number;
  conversionPerKgUUsd: number;
  priceSwuUsd: number;
  transportUNatPerKgPerKmUsd?: number;
  distanceUNatTransportKm?: number;
  transportUConvertedPerKgUPerKmUsd?: number;
  distanceUConvertedTransportKm?: number;
  transportUEnrichedPerKgUPerKmUsd?: number;
  distanceUEnrichedTransportKm?: number;
  /** Lowest tails assay scanned (default 0.0005). */
  tailsMin?: number;
  /** Number of grid points between tailsMin and xUNat (default 500). */
  nSteps?: number;
}

export interface FrontEndSolution {
  xTailsOpt: number;
  feedMassKg: number;  // natural uranium, kgU
  tailsMassKg: number; // depleted uranium, kgU
  swuRequired: number;
  costUNatUsd: number;
  costTransportUNatUsd: number;
  costConversionUsd: number;
  costTransportUConvertedUsd: number;
  costEnrichmentUsd: number;
  costTransportUEnrichedUsd: number;
  totalCostUsd: number;
}

/** How many grid candidates each feasibility check rejected. */
export interface FrontEndSkipCounts {
  degenerateDenominator: number;
  nonPositiveFeed: number;
  nonPositiveSwu: number;
}

export type FrontEndSearchFailure = 'invalid_product_mass' | 'invalid_grid' | 'no_feasible_candidate';

export type FrontEndSearchResult =
  | {
      ok: true;
      solution: FrontEndSolution;
      candidatesEvaluated: number;
      skipped: FrontEndSkipCounts;
    }
  | {
      ok: false;
      reason: FrontEndSearchFailure;
      detail: string;
      skipped: FrontEndSkipCounts;
    };

// ─── Fuel cycle ───────────────────────────────────────────────────────────────

/** USD per step; keys follow FUEL_CYCLE_STEP_IDS. */
export type FuelCycleBreakdown = Readonly<Record<FuelCycleStepId, number>>;

export interface FuelCycleResult {
  productMassKg: number;   // enriched U, kgU/year
  freshFuelMassKg: number; // UO2, kg/year
  spentFuelMassKg: number; // taken equal to fresh mass
  frontEnd: FrontEndSolution;
  breakdown: FuelCycleBreakdown;
  totalUsdPerYear: number;
  notes: string[];
}

// ─── Construction & cash flow ─────────────────────────────────────────────────

export interface ReactorScheduleEntry {
  reactorIndex: number;
  constructionStartYear: number; // 1-indexed
  constructionEndYear: number;   // last construction year
  operationEndYear: number;      // last operating year
}

export interface CashFlowYear {
  year: number;
  operationalReactors: number;
  capexUsd: number;
  opexUsd: number;
  fuelUsd: number;
  energyMWh: number;
  discountFactor: number;
}

export interface DiscountedBreakdown {
  capexUsd: number;
  opexUsd: number;
  fuelUsd: number;
  dismantlingUsd: number;
  energyMWh: number;
}

export interface AnnualizedCostTable {
  capitalRecoveryFactor: number;
  annualizedCapexUsd: number;
  annualizedDismantlingUsd: number;
  opexUsd: number;
  fuelBreakdownUsd: FuelCycleBreakdown;
  fuelTotalUsd: number;
  totalAnnualCostUsd: number;
}

// ─── Engine ───────────────────────────────────────────────────────────────────

export interface LcoeEngineResult {
  project: ProjectParameters;
  costs: CostParameters;
  annualEnergyMWh: number;
  fuelCycle: FuelCycleResult;
  capexTotalUsd: number;
  dismantlingTotalUsd: number;
  opexUsdPerYear: number;
  schedule: ReactorScheduleEntry[];
  timeline: CashFlowYear[];
  lcoeUsdPerMWh: number;
  discounted: DiscountedBreakdown;
  discountedFuel: FuelCycleBreakdown;
  annualized: AnnualizedCostTable;
  assumptions: AssumptionV1[];
  notes: string[];
}
