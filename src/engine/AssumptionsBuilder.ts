import type { AssumptionV1 } from '../contracts/LcoeOutputV1';
import type { AssumptionId } from '../contracts/assumptions.ids';
import { ASSUMPTION_IDS } from '../contracts/assumptions.ids';
import type { CostParameters, ProjectParameters } from './schema/LcoeInputV1';
import { ASSUMPTION_CATALOG } from './assumptions.catalog';
import { roundHalfEven } from './utils/rounding';

function fromCatalog(
  id: AssumptionId,
  affects: AssumptionV1['affects'],
  severity: AssumptionV1['severity'],
): AssumptionV1 {
  const { title, detail, improveBy } = ASSUMPTION_CATALOG[id];
  return improveBy === undefined
    ? { id, title, detail, affects, severity }
    : { id, title, detail, affects, severity, improveBy };
}

/**
 * Lists the modelling simplifications that shape this project's LCOE.
 *
 * Rules:
 *  - Always: back-end mass = fresh mass; tails assay from a grid search.
 *  - More than one reactor → CAPEX spread over the first reactor's build time.
 *  - Build time not a whole number of years → warn (spent CAPEX ≠ overnight cost).
 *  - Build time rounding to zero years with a non-zero reactor cost → warn (no CAPEX drawn).
 *  - Reprocessing back end → warn (priced as disposal).
 *  - Zero dismantling cost → info.
 */
export function buildAssumptionsV1(project: ProjectParameters, costs: CostParameters): AssumptionV1[] {
  const assumptions: AssumptionV1[] = [
    fromCatalog(ASSUMPTION_IDS.BACKEND_MASS_EQUALS_FRESH, ['fuel_cycle', 'lcoe'], 'info'),
    fromCatalog(ASSUMPTION_IDS.TAILS_GRID_RESOLUTION, ['fuel_cycle'], 'info'),
  ];

  // ── Fuel cycle ───────────────────────────────────────────────────────────

  if (project.spentFuelBackend === 'reprocessing') {
    assumptions.push(fromCatalog(ASSUMPTION_IDS.REPROCESSING_PRICED_AS_DISPOSAL, ['fuel_cycle', 'lcoe'], 'warn'));
  }

  // ── Construction ─────────────────────────────────────────────────────────

  if (project.nReactors > 1) {
    assumptions.push(fromCatalog(ASSUMPTION_IDS.CAPEX_NOMINAL_DURATION_SPREAD, ['capex', 'schedule'], 'info'));
  }

  if (!Number.isInteger(project.firstReactorConstructionTimeYears)) {
    assumptions.push(fromCatalog(ASSUMPTION_IDS.CAPEX_FRACTIONAL_DURATION, ['capex', 'lcoe'], 'warn'));
  }

  if (roundHalfEven(project.firstReactorConstructionTimeYears) === 0 && costs.costPerReactorUsd > 0) {
    assumptions.push(fromCatalog(ASSUMPTION_IDS.CAPEX_NOT_SPENT, ['capex', 'lcoe'], 'warn'));
  }

  // ── End of life ──────────────────────────────────────────────────────────

  if (costs.dismantlingCostPerReactorUsd === 0) {
    assumptions.push(fromCatalog(ASSUMPTION_IDS.DISMANTLING_NOT_COSTED, ['lcoe'], 'info'));
  }

  return assumptions;
}
