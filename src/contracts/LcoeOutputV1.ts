import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { AssumptionId } from './assumptions.ids';
import type { FuelCycleStepId } from './fuelCycle.stepIds';

export interface AssumptionV1 {
  id: AssumptionId;
  title: string;
  detail: string;
  affects: Array<'lcoe' | 'fuel_cycle' | 'capex' | 'schedule'>;
  severity: 'info' | 'warn';
  improveBy?: string;
}

export interface LcoeMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
  assumptions: AssumptionV1[];
}

export interface LcoeContributionV1 {
  id: 'capex' | 'opex' | 'fuel' | 'dismantling';
  label: string;
  /** Discounted category cost / discounted energy. */
  usdPerMWh: number;
  /** Share of the headline LCOE, 0–100. Zero when LCOE ≤ 0. */
  pctOfLcoe: number;
}

export interface FuelStepContributionV1 {
  id: FuelCycleStepId;
  label: string;
  annualUsd: number;
  discountedUsd: number;
  usdPerMWh: number;
}

export interface ResourceCycleV1 {
  xUNat: number;
  xTails: number;
  xUProduct: number;
  naturalUKgPerYear: number;
  depletedUKgPerYear: number;
  enrichedUKgPerYear: number;
  freshFuelUO2KgPerYear: number;
  swuPerYear: number;
}

export interface AnnualCostRowV1 {
  label: string;
  annualUsd: number;
}

export interface LcoeReportV1 {
  headline: {
    country: string;
    reactorType: string;
    lcoeUsdPerMWh: number;
    annualEnergyTWh: number;
  };
  contributions: LcoeContributionV1[];
  fuelSteps: FuelStepContributionV1[];
  resourceCycle: ResourceCycleV1;
  fixedCosts: {
    capexTotalUsd: number;
    dismantlingTotalUsd: number;
  };
  annualCostTable: AnnualCostRowV1[];
  meta: LcoeMetaV1;
}
