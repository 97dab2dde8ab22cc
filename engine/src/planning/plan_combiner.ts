/**
 * STEMWISE - Plan Combiner
 *
 * Tracks how much of each deposit earlier plans already claimed so that a
 * later planning pass in the same call sees only what is left.
 *
 * This is NOT a cross-transaction lock. Two separate calls planning against
 * the same deposits can both succeed or one can fail at the ledger; the
 * combiner only prevents double allocation between plans composed within
 * one call.
 */

import {
  Address,
  DepositInventoryReader,
  PlanFailure,
  PlanSource,
  WithdrawalPlan,
  tokenKey,
} from '../interfaces/types';
import { assertPlan } from '../safety/failure_handler';

/**
 * Amounts already claimed, indexed by (token, stem).
 */
export class ConsumptionIndex {
  private readonly byToken: Map<string, Map<bigint, bigint>> = new Map();

  /**
   * Build an index from every allocation in the given plans.
   */
  static fromPlans(plans: readonly WithdrawalPlan[]): ConsumptionIndex {
    const index = new ConsumptionIndex();
    for (const plan of plans) {
      for (const source of plan.sources) {
        assertAligned(source);
        source.stems.forEach((stem, i) => index.add(source.token, stem, source.amounts[i]));
      }
    }
    return index;
  }

  add(token: Address, stem: bigint, amount: bigint): void {
    const key = tokenKey(token);
    const stems = this.byToken.get(key) || new Map<bigint, bigint>();
    stems.set(stem, (stems.get(stem) || 0n) + amount);
    this.byToken.set(key, stems);
  }

  consumed(token: Address, stem: bigint): bigint {
    return this.byToken.get(tokenKey(token))?.get(stem) || 0n;
  }
}

/**
 * Amount of deposit (token, stem) already claimed across priorPlans.
 */
export function consumedAmount(
  token: Address,
  stem: bigint,
  priorPlans: readonly WithdrawalPlan[]
): bigint {
  return ConsumptionIndex.fromPlans(priorPlans).consumed(token, stem);
}

/**
 * Freeze sources into an immutable plan, computing the total.
 */
export function freezePlan(sources: PlanSource[]): WithdrawalPlan {
  const frozen = sources.map((source) =>
    Object.freeze({
      token: source.token,
      stems: Object.freeze([...source.stems]),
      amounts: Object.freeze([...source.amounts]),
      availableBaseAssetValue: source.availableBaseAssetValue,
    })
  );
  const total = frozen.reduce((sum, source) => sum + source.availableBaseAssetValue, 0n);

  return Object.freeze({
    sources: Object.freeze(frozen),
    totalAvailableBaseAssetValue: total,
  });
}

/**
 * Structural checks every plan must pass before it is combined or executed.
 *
 * @throws WithdrawalPlanError with INVALID_ARGUMENT
 */
export function validatePlan(plan: WithdrawalPlan): void {
  const seen = new Set<string>();
  let total = 0n;

  for (const source of plan.sources) {
    assertAligned(source);

    const key = tokenKey(source.token);
    assertPlan(
      !seen.has(key),
      PlanFailure.INVALID_ARGUMENT,
      `Token ${source.token} appears more than once in plan`
    );
    seen.add(key);

    assertPlan(
      new Set(source.stems).size === source.stems.length,
      PlanFailure.INVALID_ARGUMENT,
      `Duplicate stem for token ${source.token}`
    );
    assertPlan(
      source.amounts.every((amount) => amount > 0n),
      PlanFailure.INVALID_ARGUMENT,
      `Non-positive amount for token ${source.token}`
    );

    total += source.availableBaseAssetValue;
  }

  assertPlan(
    total === plan.totalAvailableBaseAssetValue,
    PlanFailure.INVALID_ARGUMENT,
    `Plan total ${plan.totalAvailableBaseAssetValue} does not match sum of sources ${total}`
  );
}

/**
 * Plan Combiner
 *
 * Merges plans computed against the same snapshot and checks that their
 * combined claims fit inside the owner's deposits.
 */
export class PlanCombiner {
  private inventory: DepositInventoryReader;

  constructor(inventory: DepositInventoryReader) {
    this.inventory = inventory;
  }

  /**
   * Merge plans into one.
   *
   * Per-(token, stem) amounts and per-token values are summed. Sources keep
   * the order in which their token first appears; stems within a source are
   * descending.
   *
   * @param owner - Owner of the deposits the plans allocate
   * @param plans - Plans to merge
   * @returns Merged plan
   * @throws WithdrawalPlanError with INVALID_ARGUMENT on misaligned sources
   * @throws WithdrawalPlanError with LEDGER_INCONSISTENCY if combined claims
   *   on a deposit exceed its amount
   */
  async merge(owner: Address, plans: readonly WithdrawalPlan[]): Promise<WithdrawalPlan> {
    const order: string[] = [];
    const merged = new Map<string, { token: Address; stems: Map<bigint, bigint>; value: bigint }>();

    for (const plan of plans) {
      for (const source of plan.sources) {
        assertAligned(source);

        const key = tokenKey(source.token);
        let entry = merged.get(key);
        if (!entry) {
          entry = { token: source.token, stems: new Map(), value: 0n };
          merged.set(key, entry);
          order.push(key);
        }

        for (let i = 0; i < source.stems.length; i++) {
          const stem = source.stems[i];
          entry.stems.set(stem, (entry.stems.get(stem) || 0n) + source.amounts[i]);
        }
        entry.value += source.availableBaseAssetValue;
      }
    }

    const sources: PlanSource[] = [];
    for (const key of order) {
      const entry = merged.get(key);
      if (!entry) continue;

      await this.assertWithinDeposits(owner, entry.token, entry.stems);

      const stems = [...entry.stems.keys()].sort((a, b) => (a > b ? -1 : a < b ? 1 : 0));
      sources.push({
        token: entry.token,
        stems,
        amounts: stems.map((stem) => entry.stems.get(stem) || 0n),
        availableBaseAssetValue: entry.value,
      });
    }

    return freezePlan(sources);
  }

  private async assertWithinDeposits(
    owner: Address,
    token: Address,
    claims: Map<bigint, bigint>
  ): Promise<void> {
    const deposits = await this.inventory.listDeposits(owner, token);
    const available = new Map<bigint, bigint>();
    for (const deposit of deposits) {
      available.set(deposit.stem, (available.get(deposit.stem) || 0n) + deposit.amount);
    }

    for (const [stem, claimed] of claims) {
      const depositAmount = available.get(stem) || 0n;
      assertPlan(
        claimed <= depositAmount,
        PlanFailure.LEDGER_INCONSISTENCY,
        `Plans claim ${claimed} of deposit ${token}@${stem} holding ${depositAmount}`,
        { token, stem: stem.toString(), claimed: claimed.toString(), depositAmount: depositAmount.toString() }
      );
    }
  }
}

function assertAligned(source: PlanSource): void {
  assertPlan(
    source.stems.length === source.amounts.length,
    PlanFailure.INVALID_ARGUMENT,
    `Source ${source.token} has ${source.stems.length} stems but ${source.amounts.length} amounts`
  );
}
