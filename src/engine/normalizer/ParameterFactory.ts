import type {
  CostParameters,
  CostParametersInput,
  ProjectParameters,
  ProjectParametersInput,
  SpentFuelBackend,
} from '../schema/LcoeInputV1';
import { DEFAULT_COST_PARAMETERS, DEFAULT_PROJECT_PARAMETERS } from '../defaults';
import { LcoeEngineError } from '../LcoeEngineError';
import { ERROR_CODES } from '../../contracts/errors.ids';
import { uo2ToU } from '../utils/conversion';

type NumericKeys<T> = { [K in keyof T]: T[K] extends number ? K : never }[keyof T];

const SPENT_FUEL_BACKENDS: readonly SpentFuelBackend[] = ['direct_disposal', 'reprocessing'];

// Fields that only need to be finite and ≥ 0. The remaining numeric fields
// have tighter rules checked individually below.
const NON_NEGATIVE_PROJECT_FIELDS: ReadonlyArray<NumericKeys<ProjectParametersInput>> = [
  'powerElectricPerReactorMWe',
  'firstReactorConstructionTimeYears',
  'delayBetweenReactorsYears',
  'assembliesPerCore',
  'fuelMassPerAssemblyKg',
  'distanceUNatTransportKm',
  'distanceUConvertedTransportKm',
  'distanceUEnrichedTransportKm',
  'distanceFreshFuelTransportKm',
  'distanceSpentFuelTransportKm',
];

const COST_FIELDS: ReadonlyArray<NumericKeys<CostParametersInput>> = [
  'realDiscountRate',
  'costPerReactorUsd',
  'dismantlingCostPerReactorUsd',
  'exploitationCostPerYearPerReactorUsd',
  'priceUNatPerKgUsd',
  'transportUNatPerKgPerKmUsd',
  'conversionPerKgUUsd',
  'transportUConvertedPerKgUPerKmUsd',
  'priceSwuUsd',
  'transportUEnrichedPerKgUPerKmUsd',
  'fabricationPerKgFreshFuelUsd',
  'transportFreshFuelPerKgPerKmUsd',
  'directDisposalPerKgSpentFuelUsd',
  'transportSpentFuelPerKgPerKmUsd',
];

function checkNonNegative(issues: string[], name: string, value: number): void {
  if (!Number.isFinite(value)) {
    issues.push(`${name} must be a finite number (got ${value}).`);
  } else if (value < 0) {
    issues.push(`${name} must be ≥ 0 (got ${value}).`);
  }
}

function checkFraction(issues: string[], name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    issues.push(`${name} must lie in [0, 1] (got ${value}).`);
  }
}

function checkPositiveInteger(issues: string[], name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    issues.push(`${name} must be an integer ≥ 1 (got ${value}).`);
  }
}

/**
 * Collect every invariant violation of a raw project configuration.
 * An empty array means the input is accepted.
 */
export function validateProjectParameters(input: ProjectParametersInput): string[] {
  const issues: string[] = [];

  checkPositiveInteger(issues, 'nReactors', input.nReactors);
  checkPositiveInteger(issues, 'reactorsLifetimeYears', input.reactorsLifetimeYears);
  checkFraction(issues, 'netCapacityFactor', input.netCapacityFactor);
  checkFraction(issues, 'batchFraction', input.batchFraction);

  if (!Number.isFinite(input.cycleLengthYears) || input.cycleLengthYears <= 0) {
    issues.push(`cycleLengthYears must be > 0 (got ${input.cycleLengthYears}).`);
  }

  for (const key of NON_NEGATIVE_PROJECT_FIELDS) {
    checkNonNegative(issues, key, input[key]);
  }

  // Assays: 0 < natural < product < 1
  const { xUNat, xUProduct } = input;
  if (!(xUNat > 0 && xUNat < 1)) {
    issues.push(`xUNat must lie strictly between 0 and 1 (got ${xUNat}).`);
  }
  if (!(xUProduct > 0 && xUProduct < 1)) {
    issues.push(`xUProduct must lie strictly between 0 and 1 (got ${xUProduct}).`);
  }
  if (!(xUNat < xUProduct)) {
    issues.push(`xUNat (${xUNat}) must be lower than xUProduct (${xUProduct}).`);
  }

  if (!SPENT_FUEL_BACKENDS.includes(input.spentFuelBackend)) {
    issues.push(
      `spentFuelBackend must be one of ${SPENT_FUEL_BACKENDS.join(', ')} (got ${String(input.spentFuelBackend)}).`,
    );
  }

  return issues;
}

export function validateCostParameters(input: CostParametersInput): string[] {
  const issues: string[] = [];
  for (const key of COST_FIELDS) {
    checkNonNegative(issues, key, input[key]);
  }
  return issues;
}

/**
 * Build a frozen ProjectParameters value.
 *
 * Phase 1 merges `overrides` onto DEFAULT_PROJECT_PARAMETERS and validates the
 * raw fields; phase 2 derives `uMassPerAssemblyKg` from the oxide mass. The
 * returned object is never mutated afterwards.
 *
 * @throws LcoeEngineError `invalid_parameters` listing every violation.
 */
export function createProjectParameters(overrides: Partial<ProjectParametersInput> = {}): ProjectParameters {
  const raw: ProjectParametersInput = { ...DEFAULT_PROJECT_PARAMETERS, ...overrides };

  const issues = validateProjectParameters(raw);
  if (issues.length > 0) {
    throw new LcoeEngineError(
      ERROR_CODES.INVALID_PARAMETERS,
      `Invalid project parameters: ${issues.join(' ')}`,
      issues,
    );
  }

  return Object.freeze({
    ...raw,
    uMassPerAssemblyKg: uo2ToU(raw.fuelMassPerAssemblyKg),
  });
}

/**
 * Build a frozen CostParameters value from DEFAULT_COST_PARAMETERS + overrides.
 *
 * @throws LcoeEngineError `invalid_parameters` listing every violation.
 */
export function createCostParameters(overrides: Partial<CostParametersInput> = {}): CostParameters {
  const raw: CostParametersInput = { ...DEFAULT_COST_PARAMETERS, ...overrides };

  const issues = validateCostParameters(raw);
  if (issues.length > 0) {
    throw new LcoeEngineError(
      ERROR_CODES.INVALID_PARAMETERS,
      `Invalid cost parameters: ${issues.join(' ')}`,
      issues,
    );
  }

  return Object.freeze(raw);
}
