/**
 * STEMWISE - Source Iterator
 *
 * Builds a WithdrawalPlan by walking candidate source tokens in order until
 * the target amount of base asset is covered or the sources run out.
 *
 * Base asset sources are selected directly. Pool-share sources are sized
 * through the pool's own supply function:
 *
 *   poolShareNeeded = supply(reserves) - supply(reserves with base - need)
 *
 * If the owner holds at least that much pool-share the source realizes the
 * full need; otherwise the realizable base asset is quoted from what was
 * actually selected.
 */

import {
  Address,
  AmmValuationAdapter,
  DepositInventoryReader,
  FilterParams,
  PlanFailure,
  PlanSource,
  TokenRegistry,
  TokenSelectionStrategy,
  WithdrawalPlan,
  WithdrawalPlanError,
  sameAddress,
} from '../interfaces/types';
import { validateFilterParams } from '../filter/filter_policy';
import { StemSelector } from '../selection/stem_selector';
import { ConsumptionIndex, freezePlan } from './plan_combiner';
import { resolveSourceTokens, validateStrategy } from './token_strategy';

/**
 * Collaborators the source iterator reads from
 */
export interface SourceIteratorDependencies {
  inventory: DepositInventoryReader;
  amm: AmmValuationAdapter;
  registry: TokenRegistry;
}

/**
 * Source iterator options
 */
export interface SourceIteratorOptions {
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Pool-share requirement for a base asset amount
 */
export interface PoolShareRequirement {
  poolShareNeeded: bigint;
  /** True when the need is at least the pool's entire base reserve */
  exceedsReserve: boolean;
}

/**
 * Source Iterator class
 */
export class SourceIterator {
  private deps: SourceIteratorDependencies;
  private selector: StemSelector;
  private options: SourceIteratorOptions;

  constructor(deps: SourceIteratorDependencies, options: SourceIteratorOptions = {}) {
    this.deps = deps;
    this.options = options;
    this.selector = new StemSelector(deps.inventory, options);
  }

  /**
   * Build a withdrawal plan for targetAmount of base asset.
   *
   * The returned plan may be under-filled; rejecting that is the caller's
   * job (INSUFFICIENT_FUNDS).
   *
   * @param owner - Deposit owner
   * @param sources - Explicit token list or derived ordering
   * @param targetAmount - Base asset wanted
   * @param filter - Deposit eligibility rules
   * @param priorPlan - Allocations made earlier in the same call
   * @returns Frozen plan
   * @throws WithdrawalPlanError with INVALID_ARGUMENT on bad input
   * @throws WithdrawalPlanError with NO_LIQUIDITY_AVAILABLE if no source yields anything
   */
  async buildPlan(
    owner: Address,
    sources: TokenSelectionStrategy,
    targetAmount: bigint,
    filter: FilterParams,
    priorPlan?: WithdrawalPlan
  ): Promise<WithdrawalPlan> {
    // Argument checks come first so nothing is read on bad input
    if (targetAmount <= 0n) {
      throw new WithdrawalPlanError(
        PlanFailure.INVALID_ARGUMENT,
        `Target amount must be positive, got ${targetAmount}`
      );
    }
    validateStrategy(sources);
    validateFilterParams(filter);

    const prior = priorPlan ? ConsumptionIndex.fromPlans([priorPlan]) : new ConsumptionIndex();
    const baseAsset = await this.deps.registry.getBaseAsset();
    const tokens = await resolveSourceTokens(sources, this.deps.registry, filter.excludeBaseAsset);

    const planSources: PlanSource[] = [];
    let remainingNeed = targetAmount;

    for (const token of tokens) {
      if (remainingNeed === 0n) break;

      const source = sameAddress(token, baseAsset)
        ? await this.planBaseAssetSource(owner, token, remainingNeed, filter, prior)
        : await this.planPoolSource(owner, token, baseAsset, remainingNeed, filter, prior);

      if (!source) {
        this.log(`${token}: nothing selected, skipping`);
        continue;
      }

      planSources.push(source);
      remainingNeed = source.availableBaseAssetValue >= remainingNeed
        ? 0n
        : remainingNeed - source.availableBaseAssetValue;
    }

    const plan = freezePlan(planSources);

    if (plan.totalAvailableBaseAssetValue === 0n) {
      throw new WithdrawalPlanError(
        PlanFailure.NO_LIQUIDITY_AVAILABLE,
        `No eligible deposits across ${tokens.length} source token(s)`,
        { owner, targetAmount: targetAmount.toString() }
      );
    }

    this.log(
      `planned ${plan.totalAvailableBaseAssetValue}/${targetAmount} from ${plan.sources.length} source(s)`
    );

    return plan;
  }

  /**
   * Base-asset pool-share needed to redeem baseAmount at current reserves.
   */
  async poolShareForBaseAsset(
    pool: Address,
    baseAsset: Address,
    baseAmount: bigint
  ): Promise<PoolShareRequirement> {
    const { tokens, reserves } = await this.deps.amm.getPoolReserves(pool);
    const baseIndex = tokens.findIndex((token) => sameAddress(token, baseAsset));
    if (baseIndex === -1) {
      throw new WithdrawalPlanError(
        PlanFailure.INVALID_ARGUMENT,
        `Pool ${pool} does not pair the base asset`
      );
    }

    const supplyNow = await this.deps.amm.calcPoolShareSupply(pool, reserves);
    if (baseAmount >= reserves[baseIndex]) {
      return { poolShareNeeded: supplyNow, exceedsReserve: true };
    }

    const reservesAfter = [...reserves];
    reservesAfter[baseIndex] -= baseAmount;
    const supplyAfter = await this.deps.amm.calcPoolShareSupply(pool, reservesAfter);

    // A tiny need can round to zero; one unit always covers it
    const needed = supplyNow - supplyAfter;
    return { poolShareNeeded: needed > 0n ? needed : 1n, exceedsReserve: false };
  }

  // ============================================================
  // Private helper methods
  // ============================================================

  private async planBaseAssetSource(
    owner: Address,
    token: Address,
    need: bigint,
    filter: FilterParams,
    prior: ConsumptionIndex
  ): Promise<PlanSource | undefined> {
    const selection = await this.selector.select(owner, token, need, filter, prior);
    if (selection.totalSelected === 0n) {
      return undefined;
    }

    return {
      token,
      stems: selection.stems,
      amounts: selection.amounts,
      availableBaseAssetValue: selection.totalSelected,
    };
  }

  private async planPoolSource(
    owner: Address,
    pool: Address,
    baseAsset: Address,
    need: bigint,
    filter: FilterParams,
    prior: ConsumptionIndex
  ): Promise<PlanSource | undefined> {
    const requirement = await this.poolShareForBaseAsset(pool, baseAsset, need);
    if (requirement.poolShareNeeded === 0n) {
      return undefined;
    }

    const selection = await this.selector.select(
      owner,
      pool,
      requirement.poolShareNeeded,
      filter,
      prior
    );
    if (selection.totalSelected === 0n) {
      return undefined;
    }

    const fullyCovered =
      selection.totalSelected === requirement.poolShareNeeded && !requirement.exceedsReserve;
    const realizable = fullyCovered
      ? need
      : await this.deps.amm.quoteRemoveLiquidityForBaseAsset(pool, selection.totalSelected);

    if (realizable === 0n) {
      return undefined;
    }

    this.log(
      `${pool}: ${selection.totalSelected} pool-share -> ${realizable} base asset` +
        (fullyCovered ? '' : ' (quoted)')
    );

    return {
      token: pool,
      stems: selection.stems,
      amounts: selection.amounts,
      availableBaseAssetValue: realizable,
    };
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`[SourceIterator] ${message}`);
    }
  }
}
