/**
 * The ten priced steps of the once-through fuel cycle, in the order the
 * material moves: mine → conversion → enrichment → fabrication → reactor → disposal.
 *
 * Iteration order of every FuelCycleBreakdown follows this array.
 */
export const FUEL_CYCLE_STEP_IDS = [
  'uNat',
  'transportUNat',
  'conversion',
  'transportUConverted',
  'swu',
  'transportUEnriched',
  'fabrication',
  'transportFreshFuel',
  'backEnd',
  'transportSpentFuel',
] as const;

export type FuelCycleStepId = typeof FUEL_CYCLE_STEP_IDS[number];

export const FUEL_CYCLE_STEP_LABELS: Record<FuelCycleStepId, string> = {
  uNat: 'Natural uranium',
  transportUNat: 'Natural uranium transport (mine → conversion)',
  conversion: 'Conversion',
  transportUConverted: 'Converted uranium transport (conversion → enrichment)',
  swu: 'Enrichment (SWU)',
  transportUEnriched: 'Enriched uranium transport (enrichment → fabrication)',
  fabrication: 'Fuel fabrication',
  transportFreshFuel: 'Fresh fuel transport (fabrication → reactor)',
  backEnd: 'Back-end disposal',
  transportSpentFuel: 'Spent fuel transport (reactor → disposal)',
};
