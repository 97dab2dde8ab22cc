/**
 * STEMWISE - Plan Executor
 *
 * Carries out a finalized WithdrawalPlan against the ledger.
 *
 * For each source, in plan order:
 * - Base asset: withdraw the listed stems straight to the destination.
 * - Pool-share: check the pool price against its manipulation-resistant
 *   reference, withdraw the pool-share to the holding account, remove
 *   liquidity single-sided for the base asset with the plan's recorded value
 *   as minimum output, then forward the proceeds to the destination.
 *
 * The whole plan runs inside one atomic ledger unit: a failure anywhere
 * leaves no trace.
 */

import {
  Address,
  DEFAULT_SLIPPAGE_RATIO,
  ENGINE_CONSTANTS,
  PlanFailure,
  PlanSource,
  PriceGuard,
  TokenRegistry,
  WithdrawalLedger,
  WithdrawalPlan,
  WithdrawalPlanError,
  sameAddress,
} from '../interfaces/types';
import { validatePlan } from '../planning/plan_combiner';

/**
 * Collaborators the executor writes through
 */
export interface PlanExecutorDependencies {
  ledger: WithdrawalLedger;
  priceGuard: PriceGuard;
  registry: TokenRegistry;
}

/**
 * Plan executor configuration
 */
export interface PlanExecutorConfig {
  /** Account that temporarily holds pool-share and conversion proceeds */
  holdingAddress: Address;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Plan Executor class
 */
export class PlanExecutor {
  private deps: PlanExecutorDependencies;
  private config: PlanExecutorConfig;

  constructor(deps: PlanExecutorDependencies, config: PlanExecutorConfig) {
    this.deps = deps;
    this.config = config;
  }

  /**
   * Execute a plan.
   *
   * @param owner - Owner of the deposits
   * @param plan - Plan produced by the source iterator (or a merge)
   * @param slippageRatio - Allowed pool price deviation, SLIPPAGE_PRECISION = 100%
   * @param destination - Receiver of the base asset
   * @returns Total base asset delivered to destination
   * @throws WithdrawalPlanError with PRICE_MANIPULATION_DETECTED if a pool price
   *   is outside the bound
   * @throws WithdrawalPlanError with INVALID_ARGUMENT on a malformed plan
   */
  async execute(
    owner: Address,
    plan: WithdrawalPlan,
    slippageRatio: bigint = DEFAULT_SLIPPAGE_RATIO,
    destination: Address = owner
  ): Promise<bigint> {
    validatePlan(plan);
    if (slippageRatio < 0n || slippageRatio > ENGINE_CONSTANTS.SLIPPAGE_PRECISION) {
      throw new WithdrawalPlanError(
        PlanFailure.INVALID_ARGUMENT,
        `Slippage ratio ${slippageRatio} outside [0, ${ENGINE_CONSTANTS.SLIPPAGE_PRECISION}]`
      );
    }

    return this.deps.ledger.atomically(async () => {
      const baseAsset = await this.deps.registry.getBaseAsset();
      let totalWithdrawn = 0n;

      for (const source of plan.sources) {
        totalWithdrawn += sameAddress(source.token, baseAsset)
          ? await this.executeBaseAssetSource(owner, source, destination)
          : await this.executePoolSource(owner, source, baseAsset, slippageRatio, destination);
      }

      this.log(`delivered ${totalWithdrawn} base asset to ${destination}`);
      return totalWithdrawn;
    });
  }

  // ============================================================
  // Private helper methods
  // ============================================================

  private async executeBaseAssetSource(
    owner: Address,
    source: PlanSource,
    destination: Address
  ): Promise<bigint> {
    await this.deps.ledger.withdrawDeposits(
      owner,
      source.token,
      source.stems,
      source.amounts,
      destination
    );
    return source.availableBaseAssetValue;
  }

  private async executePoolSource(
    owner: Address,
    source: PlanSource,
    baseAsset: Address,
    slippageRatio: bigint,
    destination: Address
  ): Promise<bigint> {
    const acceptable = await this.deps.priceGuard.isSlippageAcceptable(source.token, slippageRatio);
    if (!acceptable) {
      throw new WithdrawalPlanError(
        PlanFailure.PRICE_MANIPULATION_DETECTED,
        `Pool ${source.token} price outside slippage bound`,
        { pool: source.token, slippageRatio: slippageRatio.toString() }
      );
    }

    const holding = this.config.holdingAddress;
    await this.deps.ledger.withdrawDeposits(owner, source.token, source.stems, source.amounts, holding);

    const poolShareAmount = source.amounts.reduce((sum, amount) => sum + amount, 0n);
    const realized = await this.deps.ledger.removeLiquidityForBaseAsset(
      source.token,
      poolShareAmount,
      source.availableBaseAssetValue,
      holding,
      holding
    );
    if (realized < source.availableBaseAssetValue) {
      throw new WithdrawalPlanError(
        PlanFailure.SLIPPAGE_EXCEEDED,
        `Pool ${source.token} returned ${realized}, minimum ${source.availableBaseAssetValue}`
      );
    }

    await this.deps.ledger.transferToDestination(baseAsset, realized, holding, destination);

    this.log(`${source.token}: burned ${poolShareAmount} pool-share for ${realized} base asset`);
    return realized;
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[PlanExecutor] ${message}`);
    }
  }
}
