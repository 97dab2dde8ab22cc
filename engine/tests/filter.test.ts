/**
 * STEMWISE - Filter Policy Tests
 */

import {
  defaultFilterParams,
  resolveStemBounds,
  validateFilterParams,
} from '../src/filter/filter_policy';
import { LowPriorityMode, PlanFailure, WithdrawalPlanError } from '../src/interfaces/types';

function failureOf(fn: () => unknown): PlanFailure | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof WithdrawalPlanError) {
      return error.failure;
    }
    throw error;
  }
  return undefined;
}

describe('defaultFilterParams', () => {
  it('should exclude nothing beyond the grown stalk cap', () => {
    expect(defaultFilterParams(100n)).toEqual({
      maxGrownStalkPerBdv: 100n,
      minGrownStalkPerBdv: 0n,
      excludeGerminatingDeposits: false,
      excludeBaseAsset: false,
      lowPriorityMode: LowPriorityMode.USE,
    });
  });

  it('should leave stem overrides unset', () => {
    const filter = defaultFilterParams(100n);

    expect(filter.minStem).toBeUndefined();
    expect(filter.maxStem).toBeUndefined();
  });
});

describe('resolveStemBounds', () => {
  it('should derive bounds from the stem tip', () => {
    expect(resolveStemBounds(defaultFilterParams(100n), 500n)).toEqual({
      minStem: 400n,
      maxStem: 500n,
    });
  });

  it('should derive maxStem from minGrownStalkPerBdv', () => {
    const filter = { ...defaultFilterParams(100n), minGrownStalkPerBdv: 30n };

    expect(resolveStemBounds(filter, 500n)).toEqual({ minStem: 400n, maxStem: 470n });
  });

  it('should allow negative stems', () => {
    expect(resolveStemBounds(defaultFilterParams(1000n), 10n)).toEqual({
      minStem: -990n,
      maxStem: 10n,
    });
  });

  it('should prefer explicit overrides', () => {
    const filter = { ...defaultFilterParams(100n), minStem: 10n, maxStem: 20n };

    expect(resolveStemBounds(filter, 500n)).toEqual({ minStem: 10n, maxStem: 20n });
  });

  it('should reject a minStem override above the derived maxStem', () => {
    const filter = { ...defaultFilterParams(100n), minStem: 600n };

    expect(failureOf(() => resolveStemBounds(filter, 500n))).toBe(PlanFailure.INVALID_ARGUMENT);
  });
});

describe('validateFilterParams', () => {
  it('should accept the default filter', () => {
    expect(failureOf(() => validateFilterParams(defaultFilterParams(100n)))).toBeUndefined();
  });

  it('should reject negative thresholds', () => {
    const filter = { ...defaultFilterParams(100n), minGrownStalkPerBdv: -1n };

    expect(failureOf(() => validateFilterParams(filter))).toBe(PlanFailure.INVALID_ARGUMENT);
  });

  it('should reject explicit minStem above explicit maxStem', () => {
    const filter = { ...defaultFilterParams(100n), minStem: 5n, maxStem: 4n };

    expect(failureOf(() => validateFilterParams(filter))).toBe(PlanFailure.INVALID_ARGUMENT);
  });
});
