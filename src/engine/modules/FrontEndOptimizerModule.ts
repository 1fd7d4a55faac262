import type {
  FrontEndOptimizerInput,
  FrontEndSearchResult,
  FrontEndSkipCounts,
  FrontEndSolution,
} from '../schema/LcoeInputV1';
import { DEFAULT_TAILS_MIN, DEFAULT_TAILS_STEPS } from '../defaults';
import { LcoeEngineError } from '../LcoeEngineError';
import { ERROR_CODES } from '../../contracts/errors.ids';

// ─── Constants ────────────────────────────────────────────────────────────────

// Candidates whose tails assay sits this close to the feed assay would divide
// by (almost) zero in the mass balance.
const DEGENERATE_DENOMINATOR_EPS = 1e-8;

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Separative-work value function V(x) = (1 − 2x)·ln((1 − x)/x).
 * Defined for 0 < x < 1.
 */
export function swuValue(x: number): number {
  return (1 - 2 * x) * Math.log((1 - x) / x);
}

/**
 * Feed (natural uranium) needed for `productMassKg` at the given assays,
 * from the U-235 mass balance F·xn = P·xp + (F − P)·xt.
 */
export function feedMassKg(productMassKg: number, xNat: number, xProduct: number, xTails: number): number {
  return (productMassKg * (xProduct - xTails)) / (xNat - xTails);
}

/** SWU needed to split `feed` into `product` and tails. */
export function swuRequired(
  productMassKg: number,
  feedKg: number,
  xNat: number,
  xProduct: number,
  xTails: number,
): number {
  const tailsKg = feedKg - productMassKg;
  return productMassKg * swuValue(xProduct) + tailsKg * swuValue(xTails) - feedKg * swuValue(xNat);
}

function emptySkipCounts(): FrontEndSkipCounts {
  return { degenerateDenominator: 0, nonPositiveFeed: 0, nonPositiveSwu: 0 };
}

// ─── Main Module ──────────────────────────────────────────────────────────────

/**
 * Grid search for the tails assay minimising front-end cost.
 *
 * The interval [tailsMin, xUNat) is cut into `nSteps` equal steps and every
 * grid point is costed:
 *
 *   natural U + its transport + conversion + converted-U transport
 *   + enrichment (SWU) + enriched-U transport
 *
 * Candidates failing a feasibility check (vanishing denominator, feed ≤ 0,
 * SWU ≤ 0) are counted and skipped. The cheapest candidate wins; on exact
 * ties the first one scanned (lowest tails assay) is kept.
 *
 * Never throws: failures come back as `{ ok: false }` with the reason.
 */
export function searchFrontEndCost(input: FrontEndOptimizerInput): FrontEndSearchResult {
  const skipped = emptySkipCounts();
  const {
    productMassKg,
    xUNat,
    xUProduct,
    priceUNatPerKgUsd,
    conversionPerKgUUsd,
    priceSwuUsd,
    transportUNatPerKgPerKmUsd = 0,
    distanceUNatTransportKm = 0,
    transportUConvertedPerKgUPerKmUsd = 0,
    distanceUConvertedTransportKm = 0,
    transportUEnrichedPerKgUPerKmUsd = 0,
    distanceUEnrichedTransportKm = 0,
    tailsMin = DEFAULT_TAILS_MIN,
    nSteps = DEFAULT_TAILS_STEPS,
  } = input;

  if (!(productMassKg > 0)) {
    return {
      ok: false,
      reason: 'invalid_product_mass',
      detail: `Product mass must be strictly positive (got ${productMassKg} kg).`,
      skipped,
    };
  }
  if (!Number.isInteger(nSteps) || nSteps < 1 || !(tailsMin > 0 && tailsMin < 1)) {
    return {
      ok: false,
      reason: 'invalid_grid',
      detail: `Tails grid needs an integer nSteps ≥ 1 and 0 < tailsMin < 1 (got nSteps=${nSteps}, tailsMin=${tailsMin}).`,
      skipped,
    };
  }

  const natTransportPerKg = transportUNatPerKgPerKmUsd * distanceUNatTransportKm;
  const convertedTransportPerKg = transportUConvertedPerKgUPerKmUsd * distanceUConvertedTransportKm;
  // Independent of the tails assay: a constant offset on every candidate.
  const costTransportUEnrichedUsd = productMassKg * transportUEnrichedPerKgUPerKmUsd * distanceUEnrichedTransportKm;

  const step = (xUNat - tailsMin) / nSteps;
  let best: FrontEndSolution | null = null;

  for (let i = 0; i < nSteps; i++) {
    const xTails = tailsMin + i * step;

    if (Math.abs(xUNat - xTails) < DEGENERATE_DENOMINATOR_EPS) {
      skipped.degenerateDenominator++;
      continue;
    }

    const feedKg = feedMassKg(productMassKg, xUNat, xUProduct, xTails);
    if (feedKg <= 0) {
      skipped.nonPositiveFeed++;
      continue;
    }

    const swu = swuRequired(productMassKg, feedKg, xUNat, xUProduct, xTails);
    if (swu <= 0) {
      skipped.nonPositiveSwu++;
      continue;
    }

    const costUNatUsd = feedKg * priceUNatPerKgUsd;
    const costTransportUNatUsd = feedKg * natTransportPerKg;
    const costConversionUsd = feedKg * conversionPerKgUUsd;
    const costTransportUConvertedUsd = feedKg * convertedTransportPerKg;
    const costEnrichmentUsd = swu * priceSwuUsd;

    const totalCostUsd =
      costUNatUsd +
      costTransportUNatUsd +
      costConversionUsd +
      costTransportUConvertedUsd +
      costEnrichmentUsd +
      costTransportUEnrichedUsd;

    if (best === null || totalCostUsd < best.totalCostUsd) {
      best = {
        xTailsOpt: xTails,
        feedMassKg: feedKg,
        tailsMassKg: feedKg - productMassKg,
        swuRequired: swu,
        costUNatUsd,
        costTransportUNatUsd,
        costConversionUsd,
        costTransportUConvertedUsd,
        costEnrichmentUsd,
        costTransportUEnrichedUsd,
        totalCostUsd,
      };
    }
  }

  if (best === null) {
    return {
      ok: false,
      reason: 'no_feasible_candidate',
      detail:
        `No feasible tails assay in [${tailsMin}, ${xUNat}) for xUNat=${xUNat}, xUProduct=${xUProduct}: ` +
        `${skipped.degenerateDenominator} degenerate, ${skipped.nonPositiveFeed} with feed ≤ 0, ` +
        `${skipped.nonPositiveSwu} with SWU ≤ 0.`,
      skipped,
    };
  }

  const skippedTotal = skipped.degenerateDenominator + skipped.nonPositiveFeed + skipped.nonPositiveSwu;
  return {
    ok: true,
    solution: Object.freeze(best),
    candidatesEvaluated: nSteps - skippedTotal,
    skipped,
  };
}

/**
 * Cheapest front-end solution for the required product mass.
 *
 * @throws LcoeEngineError `invalid_argument` when productMassKg ≤ 0 or the grid
 *         settings are unusable; `infeasible_search` when every candidate was skipped.
 */
export function optimizeFrontEndCost(input: FrontEndOptimizerInput): FrontEndSolution {
  const result = searchFrontEndCost(input);
  if (result.ok) return result.solution;

  const code = result.reason === 'no_feasible_candidate'
    ? ERROR_CODES.INFEASIBLE_SEARCH
    : ERROR_CODES.INVALID_ARGUMENT;
  throw new LcoeEngineError(code, `optimizeFrontEndCost: ${result.detail}`);
}
