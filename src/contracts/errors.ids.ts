export const ERROR_CODES = {
  // Parameter factories
  INVALID_PARAMETERS: 'invalid_parameters',

  // Front-end optimizer
  INVALID_ARGUMENT: 'invalid_argument',
  INFEASIBLE_SEARCH: 'infeasible_search',

  // Discounted cash flow
  DEGENERATE_SCHEDULE: 'degenerate_schedule',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];
