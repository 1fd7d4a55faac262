import { describe, it, expect } from 'vitest';
import {
  annualEnergyMWh,
  annualEnrichedUMassKg,
  annualFreshFuelMassKg,
  freshFuelMassPerCycleKg,
  fuelMassPerCoreKg,
} from '../modules/FuelEnergyModule';
import { createProjectParameters } from '../normalizer/ParameterFactory';
import { uo2ToU } from '../utils/conversion';

// ─── Shared fixtures ──────────────────────────────────────────────────────────

const project = createProjectParameters();

describe('FuelEnergyModule', () => {
  it('annual energy is reactors × MWe × 8760 h × capacity factor', () => {
    // 4 × 1200 × 8760 × 0.8
    expect(annualEnergyMWh(project)).toBeCloseTo(33_638_400, 3);
  });

  it('annual energy is zero at zero capacity factor', () => {
    expect(annualEnergyMWh(createProjectParameters({ netCapacityFactor: 0 }))).toBe(0);
  });

  it('core inventory is assemblies × mass per assembly', () => {
    expect(fuelMassPerCoreKg(project)).toBe(163 * 534);
  });

  it('each reload replaces the batch fraction of the core', () => {
    expect(freshFuelMassPerCycleKg(project)).toBeCloseTo(29_014, 6);
  });

  it('annual fresh fuel scales with reactors over cycle length', () => {
    // 29 014 kg × 4 reactors / 1.5 years
    expect(annualFreshFuelMassKg(project)).toBeCloseTo(77_370.667, 3);
  });

  it('enriched uranium is the metal content of the fresh oxide', () => {
    expect(annualEnrichedUMassKg(project)).toBeCloseTo(uo2ToU(annualFreshFuelMassKg(project)), 9);
  });

  it('fuel need is independent of capacity factor', () => {
    const idle = createProjectParameters({ netCapacityFactor: 0 });
    expect(annualFreshFuelMassKg(idle)).toBe(annualFreshFuelMassKg(project));
  });

  it('is a pure function of its input', () => {
    expect(annualEnrichedUMassKg(project)).toBe(annualEnrichedUMassKg(project));
  });
});
