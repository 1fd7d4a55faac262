export const ASSUMPTION_IDS = {
  // Fuel cycle
  BACKEND_MASS_EQUALS_FRESH: 'fuel.backend_mass_equals_fresh',
  REPROCESSING_PRICED_AS_DISPOSAL: 'fuel.reprocessing_priced_as_disposal',
  TAILS_GRID_RESOLUTION: 'fuel.tails_grid_resolution',

  // Construction & capital
  CAPEX_NOMINAL_DURATION_SPREAD: 'capex.nominal_duration_spread',
  CAPEX_FRACTIONAL_DURATION: 'capex.fractional_duration',
  CAPEX_NOT_SPENT: 'capex.not_spent',

  // End of life
  DISMANTLING_NOT_COSTED: 'dismantling.not_costed',
} as const;

export type AssumptionId = typeof ASSUMPTION_IDS[keyof typeof ASSUMPTION_IDS];
