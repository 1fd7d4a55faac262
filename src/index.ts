// Configuration
export {
  DEFAULT_PROJECT_PARAMETERS,
  DEFAULT_COST_PARAMETERS,
  DEFAULT_TAILS_MIN,
  DEFAULT_TAILS_STEPS,
  HOURS_PER_YEAR,
} from './engine/defaults';
export {
  createProjectParameters,
  createCostParameters,
  validateProjectParameters,
  validateCostParameters,
} from './engine/normalizer/ParameterFactory';

// Errors
export { LcoeEngineError, isLcoeEngineError } from './engine/LcoeEngineError';
export { ERROR_CODES, type ErrorCode } from './contracts/errors.ids';

// Unit conversion
export {
  uo2ToU,
  u3o8ToU,
  uToUo2,
  UO2_U_MASS_FRACTION,
  U3O8_U_MASS_FRACTION,
} from './engine/utils/conversion';

// Fuel & energy accounting
export {
  annualEnergyMWh,
  fuelMassPerCoreKg,
  freshFuelMassPerCycleKg,
  annualFreshFuelMassKg,
  annualEnrichedUMassKg,
} from './engine/modules/FuelEnergyModule';

// Front-end optimizer
export {
  optimizeFrontEndCost,
  searchFrontEndCost,
  swuValue,
} from './engine/modules/FrontEndOptimizerModule';

// Fuel cycle
export {
  fuelCycleBreakdownPerYear,
  fuelCycleCostPerYear,
  runFuelCycleModule,
} from './engine/modules/FuelCycleModule';
export { FUEL_CYCLE_STEP_IDS, FUEL_CYCLE_STEP_LABELS, type FuelCycleStepId } from './contracts/fuelCycle.stepIds';

// Construction & cash flow
export {
  buildConstructionSchedule,
  lastOperationYear,
  reactorsOperationalInYear,
  capexSpendingInYear,
  computeCapex,
  computeOpexPerYear,
  computeDismantlingTotal,
} from './engine/modules/ConstructionScheduleModule';
export {
  discountFactor,
  buildCashFlowTimeline,
  computeLcoe,
  computeDiscountedBreakdown,
  computeDiscountedFuelBreakdown,
} from './engine/modules/DiscountedCashFlowModule';
export { capitalRecoveryFactor, buildAnnualizedCostTable } from './engine/modules/AnnualizedCostModule';

// Engine & report
export { runLcoeEngine } from './engine/Engine';
export { buildLcoeReportV1 } from './engine/ReportBuilder';
export { buildAssumptionsV1 } from './engine/AssumptionsBuilder';

export type * from './engine/schema/LcoeInputV1';
export type * from './contracts/LcoeOutputV1';
