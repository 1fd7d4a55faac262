import { describe, it, expect } from 'vitest';
import { runLcoeEngine } from '../Engine';
import { buildLcoeReportV1 } from '../ReportBuilder';
import { computeLcoe } from '../modules/DiscountedCashFlowModule';
import { createCostParameters, createProjectParameters } from '../normalizer/ParameterFactory';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../../contracts/versions';

// ─── Shared fixtures ──────────────────────────────────────────────────────────

const project = createProjectParameters();
const costs = createCostParameters({ dismantlingCostPerReactorUsd: 1e9 });
const result = runLcoeEngine(project, costs);

describe('runLcoeEngine', () => {
  it('headline LCOE matches computeLcoe', () => {
    expect(result.lcoeUsdPerMWh).toBe(computeLcoe(project, costs));
  });

  it('collects schedule, fixed costs and timeline', () => {
    expect(result.schedule).toHaveLength(4);
    expect(result.timeline).toHaveLength(70);
    expect(result.capexTotalUsd).toBe(24e9);
    expect(result.dismantlingTotalUsd).toBe(4e9);
    expect(result.opexUsdPerYear).toBe(800e6);
  });

  it('opens the notes with the schedule and closes with the LCOE', () => {
    expect(result.notes[0]).toBe(
      'Schedule: 4 × VVER-1200, first unit online in year 8, last unit retires after year 70.',
    );
    expect(result.notes[result.notes.length - 1]).toBe(
      `LCOE ≈ ${result.lcoeUsdPerMWh.toFixed(1)} $/MWh at a 5.0% real discount rate.`,
    );
  });

  it('propagates a degenerate schedule', () => {
    const idle = createProjectParameters({ netCapacityFactor: 0 });
    expect(() => runLcoeEngine(idle, costs)).toThrow(/^computeLcoe: discounted energy is 0 MWh/);
  });
});

describe('buildLcoeReportV1', () => {
  const report = buildLcoeReportV1(result);

  it('headline carries project identity, LCOE and energy', () => {
    expect(report.headline).toEqual({
      country: 'Serbia',
      reactorType: 'VVER-1200',
      lcoeUsdPerMWh: result.lcoeUsdPerMWh,
      annualEnergyTWh: result.annualEnergyMWh / 1e6,
    });
    expect(report.headline.annualEnergyTWh).toBeCloseTo(33.6384, 6);
  });

  it('category contributions add up to the LCOE and to 100 %', () => {
    expect(report.contributions.map(c => c.id)).toEqual(['capex', 'opex', 'fuel', 'dismantling']);
    const usd = report.contributions.reduce((acc, c) => acc + c.usdPerMWh, 0);
    const pct = report.contributions.reduce((acc, c) => acc + c.pctOfLcoe, 0);
    expect(usd).toBeCloseTo(result.lcoeUsdPerMWh, 9);
    expect(pct).toBeCloseTo(100, 9);
  });

  it('fuel steps add up to the fuel contribution', () => {
    expect(report.fuelSteps).toHaveLength(10);
    const fuelStepsUsd = report.fuelSteps.reduce((acc, s) => acc + s.usdPerMWh, 0);
    const fuel = report.contributions.find(c => c.id === 'fuel');
    expect(fuel).toBeDefined();
    expect(fuelStepsUsd).toBeCloseTo(fuel?.usdPerMWh ?? Number.NaN, 9);
  });

  it('resource cycle follows the optimizer', () => {
    const { frontEnd } = result.fuelCycle;
    expect(report.resourceCycle.xTails).toBe(frontEnd.xTailsOpt);
    expect(report.resourceCycle.naturalUKgPerYear).toBe(frontEnd.feedMassKg);
    expect(report.resourceCycle.depletedUKgPerYear).toBe(frontEnd.tailsMassKg);
    expect(report.resourceCycle.swuPerYear).toBe(frontEnd.swuRequired);
  });

  it('annual cost table ends with the fuel total and the grand total', () => {
    const labels = report.annualCostTable.map(r => r.label);
    expect(labels).toHaveLength(15);
    expect(labels.slice(0, 3)).toEqual(['CAPEX (annualized)', 'Dismantling (annualized)', 'OPEX (excluding fuel)']);
    expect(labels[3]).toBe('Fuel cycle – Natural uranium');
    expect(labels.slice(-2)).toEqual(['Fuel cycle – total', 'Total annual cost']);
    expect(report.annualCostTable[14].annualUsd).toBe(result.annualized.totalAnnualCostUsd);
  });

  it('stamps versions and assumptions', () => {
    expect(report.meta.engineVersion).toBe(ENGINE_VERSION);
    expect(report.meta.contractVersion).toBe(CONTRACT_VERSION);
    expect(report.meta.assumptions.map(a => a.id)).not.toContain('dismantling.not_costed');
  });

  it('zeroes percentages when the LCOE is zero', () => {
    const free = createCostParameters({
      costPerReactorUsd: 0,
      exploitationCostPerYearPerReactorUsd: 0,
      priceUNatPerKgUsd: 0,
      transportUNatPerKgPerKmUsd: 0,
      conversionPerKgUUsd: 0,
      transportUConvertedPerKgUPerKmUsd: 0,
      priceSwuUsd: 0,
      transportUEnrichedPerKgUPerKmUsd: 0,
      fabricationPerKgFreshFuelUsd: 0,
      transportFreshFuelPerKgPerKmUsd: 0,
      directDisposalPerKgSpentFuelUsd: 0,
      transportSpentFuelPerKgPerKmUsd: 0,
    });
    const freeReport = buildLcoeReportV1(runLcoeEngine(project, free));
    expect(freeReport.headline.lcoeUsdPerMWh).toBe(0);
    expect(freeReport.contributions.every(c => c.pctOfLcoe === 0)).toBe(true);
  });
});
