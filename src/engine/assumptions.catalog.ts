import type { AssumptionId } from '../contracts/assumptions.ids';

export const ASSUMPTION_CATALOG: Record<AssumptionId, {
  title: string;
  detail: string;
  improveBy?: string;
}> = {
  'fuel.backend_mass_equals_fresh': {
    title: 'Spent fuel mass equals fresh fuel mass',
    detail: 'No burnup or mass-loss model is applied: the back end is priced on the same oxide mass that was loaded.',
  },
  'fuel.reprocessing_priced_as_disposal': {
    title: 'Reprocessing priced as direct disposal',
    detail: 'Reprocessing was selected as the back end, but only a direct-disposal unit rate exists. Recovered uranium and plutonium credits are not modelled.',
    improveBy: 'Enter a disposal rate that reflects the reprocessing contract, net of credits.',
  },
  'fuel.tails_grid_resolution': {
    title: 'Tails assay found by grid search',
    detail: 'The optimal tails assay is the cheapest of an evenly spaced grid of candidates, so it is exact only to one grid step.',
  },
  'capex.nominal_duration_spread': {
    title: 'CAPEX spread over the first reactor\'s build time',
    detail: 'Every reactor spends its overnight cost evenly over the first reactor\'s construction time, whatever its own position in the stagger.',
  },
  'capex.fractional_duration': {
    title: 'Construction time is not a whole number of years',
    detail: 'The schedule rounds the build time to whole years but each year draws cost / (unrounded build time), so the CAPEX actually spent differs from the overnight cost.',
    improveBy: 'Enter the first reactor construction time in whole years.',
  },
  'capex.not_spent': {
    title: 'No construction years in the schedule',
    detail: 'The first reactor construction time rounds to zero years, so no construction year exists to draw the overnight cost and CAPEX drops out of the LCOE.',
    improveBy: 'Enter a first reactor construction time of at least one year.',
  },
  'dismantling.not_costed': {
    title: 'Dismantling not costed',
    detail: 'The dismantling cost per reactor is zero, so end-of-life decommissioning does not contribute to the LCOE.',
    improveBy: 'Enter a dismantling cost per reactor.',
  },
};
