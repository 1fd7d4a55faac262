import { describe, it, expect } from 'vitest';
import {
  U3O8_U_MASS_FRACTION,
  UO2_U_MASS_FRACTION,
  u3o8ToU,
  uToUo2,
  uo2ToU,
} from '../utils/conversion';
import { roundHalfEven } from '../utils/rounding';

describe('oxide ↔ metal conversion', () => {
  it('UO2 uranium mass fraction is 0.238 / 0.270', () => {
    expect(UO2_U_MASS_FRACTION).toBeCloseTo(0.8815, 4);
  });

  it('U3O8 uranium mass fraction is 0.714 / 0.842', () => {
    expect(U3O8_U_MASS_FRACTION).toBeCloseTo(0.8480, 4);
  });

  it('one mole of UO2 holds one mole of U', () => {
    expect(uo2ToU(270)).toBeCloseTo(238, 9);
  });

  it('one mole of U3O8 holds three moles of U', () => {
    expect(u3o8ToU(842)).toBeCloseTo(714, 9);
  });

  it('uToUo2 inverts uo2ToU', () => {
    expect(uToUo2(uo2ToU(1000))).toBeCloseTo(1000, 9);
    expect(uo2ToU(uToUo2(471.2))).toBeCloseTo(471.2, 9);
  });

  it('zero mass converts to zero', () => {
    expect(uo2ToU(0)).toBe(0);
    expect(uToUo2(0)).toBe(0);
  });
});

describe('roundHalfEven', () => {
  it('sends exact halves to the even neighbour', () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
  });

  it('rounds everything else to the nearest integer', () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(7)).toBe(7);
    expect(roundHalfEven(0)).toBe(0);
  });
});
