import { describe, it, expect } from 'vitest';
import {
  createCostParameters,
  createProjectParameters,
  validateCostParameters,
  validateProjectParameters,
} from '../normalizer/ParameterFactory';
import { DEFAULT_COST_PARAMETERS, DEFAULT_PROJECT_PARAMETERS } from '../defaults';
import { LcoeEngineError } from '../LcoeEngineError';
import { uo2ToU } from '../utils/conversion';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('createProjectParameters', () => {
  it('defaults validate cleanly', () => {
    expect(validateProjectParameters(DEFAULT_PROJECT_PARAMETERS)).toEqual([]);
    expect(validateCostParameters(DEFAULT_COST_PARAMETERS)).toEqual([]);
  });

  it('returns the defaults when called without overrides', () => {
    const project = createProjectParameters();
    expect(project.nReactors).toBe(4);
    expect(project.reactorType).toBe('VVER-1200');
    expect(project.spentFuelBackend).toBe('direct_disposal');
  });

  it('derives the uranium mass per assembly from the oxide mass', () => {
    const project = createProjectParameters({ fuelMassPerAssemblyKg: 500 });
    expect(project.uMassPerAssemblyKg).toBeCloseTo(uo2ToU(500), 9);
  });

  it('merges overrides over the defaults', () => {
    const project = createProjectParameters({ nReactors: 2, country: 'Testland' });
    expect(project.nReactors).toBe(2);
    expect(project.country).toBe('Testland');
    expect(project.powerElectricPerReactorMWe).toBe(1200);
  });

  it('freezes the result', () => {
    expect(Object.isFrozen(createProjectParameters())).toBe(true);
    expect(Object.isFrozen(createCostParameters())).toBe(true);
  });

  it('rejects a zero reactor count with invalid_parameters', () => {
    const err = captureError(() => createProjectParameters({ nReactors: 0 }));
    expect(err).toBeInstanceOf(LcoeEngineError);
    expect(err).toMatchObject({
      code: 'invalid_parameters',
      issues: ['nReactors must be an integer ≥ 1 (got 0).'],
    });
  });

  it('collects every violation, not just the first', () => {
    const issues = validateProjectParameters({
      ...DEFAULT_PROJECT_PARAMETERS,
      nReactors: 0,
      netCapacityFactor: 1.5,
    });
    expect(issues).toEqual([
      'nReactors must be an integer ≥ 1 (got 0).',
      'netCapacityFactor must lie in [0, 1] (got 1.5).',
    ]);
  });

  it('requires the natural assay to be below the product assay', () => {
    const issues = validateProjectParameters({ ...DEFAULT_PROJECT_PARAMETERS, xUNat: 0.05 });
    expect(issues).toEqual(['xUNat (0.05) must be lower than xUProduct (0.048).']);
  });

  it('rejects a non-integer lifetime', () => {
    const issues = validateProjectParameters({ ...DEFAULT_PROJECT_PARAMETERS, reactorsLifetimeYears: 40.5 });
    expect(issues).toEqual(['reactorsLifetimeYears must be an integer ≥ 1 (got 40.5).']);
  });

  it('rejects a zero cycle length', () => {
    const issues = validateProjectParameters({ ...DEFAULT_PROJECT_PARAMETERS, cycleLengthYears: 0 });
    expect(issues).toEqual(['cycleLengthYears must be > 0 (got 0).']);
  });

  it('accepts a zero capacity factor (rejected later by the LCOE)', () => {
    expect(validateProjectParameters({ ...DEFAULT_PROJECT_PARAMETERS, netCapacityFactor: 0 })).toEqual([]);
  });
});

describe('createCostParameters', () => {
  it('rejects negative prices', () => {
    const err = captureError(() => createCostParameters({ priceSwuUsd: -1 }));
    expect(err).toMatchObject({
      code: 'invalid_parameters',
      issues: ['priceSwuUsd must be ≥ 0 (got -1).'],
    });
  });

  it('rejects non-finite values', () => {
    const issues = validateCostParameters({ ...DEFAULT_COST_PARAMETERS, costPerReactorUsd: Number.NaN });
    expect(issues).toEqual(['costPerReactorUsd must be a finite number (got NaN).']);
  });

  it('accepts a zero discount rate', () => {
    expect(createCostParameters({ realDiscountRate: 0 }).realDiscountRate).toBe(0);
  });
});
