/**
 * Oxide ↔ metal mass conversions for uranium fuel.
 *
 * Molar masses are rounded to the values used throughout the fuel-cycle
 * model (kg/mol). Every oxide-to-metal conversion in the engine goes through
 * these helpers.
 */

export const U_MOLAR_MASS_KG_PER_MOL = 0.238;
export const O_MOLAR_MASS_KG_PER_MOL = 0.016;

const UO2_MOLAR_MASS_KG_PER_MOL = U_MOLAR_MASS_KG_PER_MOL + 2 * O_MOLAR_MASS_KG_PER_MOL;
const U3O8_MOLAR_MASS_KG_PER_MOL = 3 * U_MOLAR_MASS_KG_PER_MOL + 8 * O_MOLAR_MASS_KG_PER_MOL;

/** Uranium mass fraction of UO2 (≈ 0.8815). */
export const UO2_U_MASS_FRACTION = U_MOLAR_MASS_KG_PER_MOL / UO2_MOLAR_MASS_KG_PER_MOL;

/** Uranium mass fraction of U3O8 (≈ 0.8481). */
export const U3O8_U_MASS_FRACTION = (3 * U_MOLAR_MASS_KG_PER_MOL) / U3O8_MOLAR_MASS_KG_PER_MOL;

export function uo2ToU(uo2MassKg: number): number {
  return uo2MassKg * UO2_U_MASS_FRACTION;
}

export function u3o8ToU(u3o8MassKg: number): number {
  return u3o8MassKg * U3O8_U_MASS_FRACTION;
}

/** Inverse of `uo2ToU`: oxide mass holding the given uranium metal mass. */
export function uToUo2(uMassKg: number): number {
  return uMassKg / UO2_U_MASS_FRACTION;
}
