/**
 * STEMWISE - Filter Policy
 *
 * Builds and resolves the eligibility rules used by the stem selector.
 *
 * Stem bounds are relative to a token's stem tip, so a FilterParams value is
 * token-agnostic until resolved:
 *   minStem = stemTip - maxGrownStalkPerBdv   (older deposits are protected)
 *   maxStem = stemTip - minGrownStalkPerBdv   (newer deposits are low priority)
 */

import {
  FilterParams,
  LowPriorityMode,
  PlanFailure,
  StemBounds,
  WithdrawalPlanError,
} from '../interfaces/types';

/**
 * Default filter for a maximum grown stalk per BDV.
 *
 * Nothing is excluded beyond the grown stalk cap and no deposit is treated
 * as low priority.
 */
export function defaultFilterParams(maxGrownStalkPerBdv: bigint): FilterParams {
  return {
    maxGrownStalkPerBdv,
    minGrownStalkPerBdv: 0n,
    excludeGerminatingDeposits: false,
    excludeBaseAsset: false,
    lowPriorityMode: LowPriorityMode.USE,
  };
}

/**
 * Reject filters that can never be resolved to valid bounds.
 *
 * @throws WithdrawalPlanError with INVALID_ARGUMENT
 */
export function validateFilterParams(filter: FilterParams): void {
  if (filter.maxGrownStalkPerBdv < 0n || filter.minGrownStalkPerBdv < 0n) {
    throw new WithdrawalPlanError(
      PlanFailure.INVALID_ARGUMENT,
      'Grown stalk per BDV thresholds must not be negative',
      {
        maxGrownStalkPerBdv: filter.maxGrownStalkPerBdv.toString(),
        minGrownStalkPerBdv: filter.minGrownStalkPerBdv.toString(),
      }
    );
  }

  if (
    filter.minStem !== undefined &&
    filter.maxStem !== undefined &&
    filter.minStem > filter.maxStem
  ) {
    throw new WithdrawalPlanError(
      PlanFailure.INVALID_ARGUMENT,
      `minStem ${filter.minStem} exceeds maxStem ${filter.maxStem}`
    );
  }
}

/**
 * Resolve the filter's stem bounds for one token.
 *
 * @param filter - Filter to resolve
 * @param stemTip - Token's current stem tip
 * @throws WithdrawalPlanError with INVALID_ARGUMENT if minStem > maxStem
 */
export function resolveStemBounds(filter: FilterParams, stemTip: bigint): StemBounds {
  const minStem = filter.minStem ?? stemTip - filter.maxGrownStalkPerBdv;
  const maxStem = filter.maxStem ?? stemTip - filter.minGrownStalkPerBdv;

  if (minStem > maxStem) {
    throw new WithdrawalPlanError(
      PlanFailure.INVALID_ARGUMENT,
      `Resolved minStem ${minStem} exceeds maxStem ${maxStem}`,
      { stemTip: stemTip.toString() }
    );
  }

  return { minStem, maxStem };
}
