/**
 * STEMWISE - Stem Selector
 *
 * Picks which deposits of one token to withdraw for a target amount.
 *
 * Withdrawing a deposit forfeits its unrealized grown stalk, so deposits are
 * walked newest first (descending stem): the least grown stalk is spent first.
 *
 * Per deposit, in order:
 * 1. stem < minStem                         -> skip (too much grown stalk)
 * 2. germinating and excluded               -> skip
 * 3. stem > maxStem (low-priority band)     -> SKIP: drop, USE_LAST: buffer, USE: continue
 * 4. remaining = amount - already claimed   -> skip when zero
 * 5. take min(remaining, need)
 * 6. stop when need is zero
 *
 * Buffered low-priority deposits are replayed afterwards in the order they
 * were collected, which is itself descending-stem order.
 */

import {
  Address,
  Deposit,
  DepositInventoryReader,
  FilterParams,
  LowPriorityMode,
  PlanFailure,
  StemSelection,
  WithdrawalPlanError,
} from '../interfaces/types';
import { resolveStemBounds } from '../filter/filter_policy';
import { ConsumptionIndex } from '../planning/plan_combiner';

/**
 * Stem selector options
 */
export interface StemSelectorOptions {
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Stem Selector class
 *
 * Greedy, deterministic deposit selection for a single token.
 */
export class StemSelector {
  private inventory: DepositInventoryReader;
  private options: StemSelectorOptions;

  constructor(inventory: DepositInventoryReader, options: StemSelectorOptions = {}) {
    this.inventory = inventory;
    this.options = options;
  }

  /**
   * Select deposits of token covering as much of targetAmount as possible.
   *
   * An owner without deposits, or with too few eligible ones, is not an
   * error: the result simply reports totalSelected below the target.
   *
   * @param owner - Deposit owner
   * @param token - Token whose deposits are considered
   * @param targetAmount - Amount of token wanted (must be positive)
   * @param filter - Eligibility and priority rules
   * @param priorConsumption - Claims from plans built earlier in the same call
   * @returns Ordered stems and amounts with their total
   * @throws WithdrawalPlanError with INVALID_ARGUMENT if targetAmount <= 0
   */
  async select(
    owner: Address,
    token: Address,
    targetAmount: bigint,
    filter: FilterParams,
    priorConsumption: ConsumptionIndex = new ConsumptionIndex()
  ): Promise<StemSelection> {
    if (targetAmount <= 0n) {
      throw new WithdrawalPlanError(
        PlanFailure.INVALID_ARGUMENT,
        `Target amount must be positive, got ${targetAmount}`,
        { token }
      );
    }

    const selection: StemSelection = { stems: [], amounts: [], totalSelected: 0n };

    const deposits = await this.inventory.listDeposits(owner, token);
    if (deposits.length === 0) {
      return selection;
    }

    const { minStem, maxStem } = resolveStemBounds(filter, await this.inventory.stemTip(token));
    const germinatingStem = filter.excludeGerminatingDeposits
      ? await this.inventory.germinatingStem(token)
      : undefined;

    const lowPriority: Deposit[] = [];
    let remainingNeed = targetAmount;

    for (const deposit of sortByDescendingStem(deposits)) {
      if (remainingNeed === 0n) break;

      if (deposit.stem < minStem) continue;
      if (germinatingStem !== undefined && deposit.stem >= germinatingStem) continue;

      if (deposit.stem > maxStem) {
        if (filter.lowPriorityMode === LowPriorityMode.SKIP) continue;
        if (filter.lowPriorityMode === LowPriorityMode.USE_LAST) {
          lowPriority.push(deposit);
          continue;
        }
      }

      remainingNeed = this.take(token, deposit, remainingNeed, priorConsumption, selection);
    }

    for (const deposit of lowPriority) {
      if (remainingNeed === 0n) break;
      remainingNeed = this.take(token, deposit, remainingNeed, priorConsumption, selection);
    }

    this.log(
      `${token}: selected ${selection.totalSelected}/${targetAmount} from ${selection.stems.length} deposit(s)`
    );

    return selection;
  }

  /**
   * Append up to remainingNeed of deposit to selection.
   *
   * @returns Need left after this deposit
   */
  private take(
    token: Address,
    deposit: Deposit,
    remainingNeed: bigint,
    priorConsumption: ConsumptionIndex,
    selection: StemSelection
  ): bigint {
    const available = deposit.amount - priorConsumption.consumed(token, deposit.stem);
    if (available <= 0n) {
      return remainingNeed;
    }

    const amount = available < remainingNeed ? available : remainingNeed;
    selection.stems.push(deposit.stem);
    selection.amounts.push(amount);
    selection.totalSelected += amount;

    return remainingNeed - amount;
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`[StemSelector] ${message}`);
    }
  }
}

/**
 * Sort deposits newest first. Returns a new array.
 */
export function sortByDescendingStem(deposits: readonly Deposit[]): Deposit[] {
  return [...deposits].sort((a, b) => (a.stem > b.stem ? -1 : a.stem < b.stem ? 1 : 0));
}
