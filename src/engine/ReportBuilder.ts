import type { LcoeEngineResult } from './schema/LcoeInputV1';
import type {
  AnnualCostRowV1,
  FuelStepContributionV1,
  LcoeContributionV1,
  LcoeReportV1,
} from '../contracts/LcoeOutputV1';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';
import { FUEL_CYCLE_STEP_IDS, FUEL_CYCLE_STEP_LABELS } from '../contracts/fuelCycle.stepIds';

function buildContributions(result: LcoeEngineResult): LcoeContributionV1[] {
  const { discounted, lcoeUsdPerMWh } = result;
  const e = discounted.energyMWh;

  const rows: Array<Pick<LcoeContributionV1, 'id' | 'label'> & { discountedUsd: number }> = [
    { id: 'capex', label: 'CAPEX', discountedUsd: discounted.capexUsd },
    { id: 'opex', label: 'OPEX (excluding fuel)', discountedUsd: discounted.opexUsd },
    { id: 'fuel', label: 'Fuel cycle', discountedUsd: discounted.fuelUsd },
    { id: 'dismantling', label: 'Dismantling', discountedUsd: discounted.dismantlingUsd },
  ];

  // Percentages are taken against the headline LCOE, not the sum of rows.
  return rows.map(({ id, label, discountedUsd }) => {
    const usdPerMWh = discountedUsd / e;
    return {
      id,
      label,
      usdPerMWh,
      pctOfLcoe: lcoeUsdPerMWh > 0 ? (usdPerMWh / lcoeUsdPerMWh) * 100 : 0,
    };
  });
}

function buildFuelSteps(result: LcoeEngineResult): FuelStepContributionV1[] {
  const e = result.discounted.energyMWh;
  return FUEL_CYCLE_STEP_IDS.map(id => ({
    id,
    label: FUEL_CYCLE_STEP_LABELS[id],
    annualUsd: result.fuelCycle.breakdown[id],
    discountedUsd: result.discountedFuel[id],
    usdPerMWh: result.discountedFuel[id] / e,
  }));
}

function buildAnnualCostTable(result: LcoeEngineResult): AnnualCostRowV1[] {
  const { annualized } = result;
  return [
    { label: 'CAPEX (annualized)', annualUsd: annualized.annualizedCapexUsd },
    { label: 'Dismantling (annualized)', annualUsd: annualized.annualizedDismantlingUsd },
    { label: 'OPEX (excluding fuel)', annualUsd: annualized.opexUsd },
    ...FUEL_CYCLE_STEP_IDS.map(id => ({
      label: `Fuel cycle – ${FUEL_CYCLE_STEP_LABELS[id]}`,
      annualUsd: annualized.fuelBreakdownUsd[id],
    })),
    { label: 'Fuel cycle – total', annualUsd: annualized.fuelTotalUsd },
    { label: 'Total annual cost', annualUsd: annualized.totalAnnualCostUsd },
  ];
}

/**
 * Shapes an engine run into the LcoeReportV1 presentation contract.
 * Per-MWh figures divide by the discounted energy of the run.
 */
export function buildLcoeReportV1(result: LcoeEngineResult): LcoeReportV1 {
  const { project, fuelCycle } = result;
  const { frontEnd } = fuelCycle;

  return {
    headline: {
      country: project.country,
      reactorType: project.reactorType,
      lcoeUsdPerMWh: result.lcoeUsdPerMWh,
      annualEnergyTWh: result.annualEnergyMWh / 1e6,
    },
    contributions: buildContributions(result),
    fuelSteps: buildFuelSteps(result),
    resourceCycle: {
      xUNat: project.xUNat,
      xTails: frontEnd.xTailsOpt,
      xUProduct: project.xUProduct,
      naturalUKgPerYear: frontEnd.feedMassKg,
      depletedUKgPerYear: frontEnd.tailsMassKg,
      enrichedUKgPerYear: fuelCycle.productMassKg,
      freshFuelUO2KgPerYear: fuelCycle.freshFuelMassKg,
      swuPerYear: frontEnd.swuRequired,
    },
    fixedCosts: {
      capexTotalUsd: result.capexTotalUsd,
      dismantlingTotalUsd: result.dismantlingTotalUsd,
    },
    annualCostTable: buildAnnualCostTable(result),
    meta: {
      engineVersion: ENGINE_VERSION,
      contractVersion: CONTRACT_VERSION,
      assumptions: result.assumptions,
    },
  };
}
