/**
 * STEMWISE - Withdrawal Engine
 *
 * Single entry point composing planning, the under-fill check, execution
 * and failure logging.
 */

import {
  Address,
  AmmValuationAdapter,
  DEFAULT_SLIPPAGE_RATIO,
  DepositInventoryReader,
  FilterParams,
  PlanFailure,
  PriceGuard,
  TokenRegistry,
  TokenSelectionStrategy,
  WithdrawalLedger,
  WithdrawalPlan,
  WithdrawalPlanError,
} from '../interfaces/types';
import { SourceIterator } from '../planning/source_iterator';
import { PlanExecutor } from '../execution/plan_executor';
import { FailureHandler, assertPlan } from '../safety/failure_handler';
import { InMemorySilo } from '../simulation/in_memory_silo';

// =============================================================================
// Types
// =============================================================================

/**
 * Everything the engine reads from and writes through
 */
export interface EngineCollaborators {
  inventory: DepositInventoryReader;
  amm: AmmValuationAdapter;
  registry: TokenRegistry;
  priceGuard: PriceGuard;
  ledger: WithdrawalLedger;
}

/**
 * Engine configuration
 */
export interface WithdrawalEngineConfig {
  /** Account that temporarily holds pool-share during conversion */
  holdingAddress: Address;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * A withdrawal request
 */
export interface WithdrawalRequest {
  owner: Address;
  sources: TokenSelectionStrategy;
  /** Base asset wanted */
  amount: bigint;
  /** Smallest acceptable total; defaults to amount */
  minAmount?: bigint;
  filter: FilterParams;
  /** Receiver of the base asset; defaults to owner */
  destination?: Address;
  slippageRatio?: bigint;
}

/**
 * Operator tip paid out of the same deposits as the withdrawal
 */
export interface WithdrawalTip {
  amount: bigint;
  recipient: Address;
}

export interface WithdrawalResult {
  plan: WithdrawalPlan;
  totalWithdrawn: bigint;
}

export interface TippedWithdrawalResult extends WithdrawalResult {
  tipPaid: bigint;
}

/**
 * Default engine configuration
 */
export const DEFAULT_ENGINE_CONFIG: WithdrawalEngineConfig = {
  holdingAddress: '0x000000000000000000000000000000000000dEaD',
  verbose: false,
};

// =============================================================================
// Withdrawal Engine
// =============================================================================

/**
 * Withdrawal Engine class
 */
export class WithdrawalEngine {
  private collaborators: EngineCollaborators;
  private config: WithdrawalEngineConfig;
  private iterator: SourceIterator;
  private executor: PlanExecutor;
  private failureHandler: FailureHandler;

  constructor(
    collaborators: EngineCollaborators,
    config: WithdrawalEngineConfig = DEFAULT_ENGINE_CONFIG,
    failureHandler?: FailureHandler
  ) {
    this.collaborators = collaborators;
    this.config = config;
    this.failureHandler = failureHandler || new FailureHandler(config.verbose);
    this.iterator = new SourceIterator(collaborators, { verbose: config.verbose });
    this.executor = new PlanExecutor(collaborators, {
      holdingAddress: config.holdingAddress,
      verbose: config.verbose,
    });
  }

  /**
   * Build the plan a withdrawal would execute, without touching the ledger.
   *
   * The plan may be under-filled.
   */
  async preview(request: WithdrawalRequest): Promise<WithdrawalPlan> {
    return this.tracked(request.owner, () =>
      this.iterator.buildPlan(request.owner, request.sources, request.amount, request.filter)
    );
  }

  /**
   * Plan and execute a withdrawal in one atomic ledger unit.
   *
   * @throws WithdrawalPlanError with INSUFFICIENT_FUNDS if the plan covers
   *   less than request.minAmount
   */
  async withdraw(request: WithdrawalRequest): Promise<WithdrawalResult> {
    return this.tracked(request.owner, () =>
      this.collaborators.ledger.atomically(async () => {
        const plan = await this.iterator.buildPlan(
          request.owner,
          request.sources,
          request.amount,
          request.filter
        );
        this.requireCoverage(plan, request.minAmount ?? request.amount, 'withdrawal');

        const totalWithdrawn = await this.executor.execute(
          request.owner,
          plan,
          request.slippageRatio ?? DEFAULT_SLIPPAGE_RATIO,
          request.destination ?? request.owner
        );
        return { plan, totalWithdrawn };
      })
    );
  }

  /**
   * Pay a tip and a withdrawal from the same deposits.
   *
   * One plan covers both amounts and is executed once into the holding
   * account, which then pays the tip and forwards the rest. The tip must be
   * covered in full on top of request.minAmount.
   */
  async withdrawWithTip(request: WithdrawalRequest, tip: WithdrawalTip): Promise<TippedWithdrawalResult> {
    return this.tracked(request.owner, () =>
      this.collaborators.ledger.atomically(async () => {
        assertPlan(
          tip.amount > 0n,
          PlanFailure.INVALID_ARGUMENT,
          `Tip amount must be positive, got ${tip.amount}`
        );

        const plan = await this.iterator.buildPlan(
          request.owner,
          request.sources,
          request.amount + tip.amount,
          request.filter
        );
        this.requireCoverage(plan, tip.amount + (request.minAmount ?? request.amount), 'withdrawal and tip');

        const holding = this.config.holdingAddress;
        const realized = await this.executor.execute(
          request.owner,
          plan,
          request.slippageRatio ?? DEFAULT_SLIPPAGE_RATIO,
          holding
        );

        // Pool removals may realize more than planned; the surplus goes to the destination
        const baseAsset = await this.collaborators.registry.getBaseAsset();
        const totalWithdrawn = realized - tip.amount;
        await this.collaborators.ledger.transferToDestination(baseAsset, tip.amount, holding, tip.recipient);
        await this.collaborators.ledger.transferToDestination(
          baseAsset,
          totalWithdrawn,
          holding,
          request.destination ?? request.owner
        );
        this.log(`paid tip ${tip.amount} to ${tip.recipient}, forwarded ${totalWithdrawn}`);

        return { plan, totalWithdrawn, tipPaid: tip.amount };
      })
    );
  }

  getFailureHandler(): FailureHandler {
    return this.failureHandler;
  }

  // ============================================================
  // Private helper methods
  // ============================================================

  private requireCoverage(plan: WithdrawalPlan, minimum: bigint, label: string): void {
    if (plan.totalAvailableBaseAssetValue < minimum) {
      throw new WithdrawalPlanError(
        PlanFailure.INSUFFICIENT_FUNDS,
        `Planned ${label} of ${plan.totalAvailableBaseAssetValue} is below minimum ${minimum}`,
        {
          planned: plan.totalAvailableBaseAssetValue.toString(),
          minimum: minimum.toString(),
        }
      );
    }
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[WithdrawalEngine] ${message}`);
    }
  }

  private async tracked<T>(owner: Address, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      this.failureHandler.handleFailure(error, owner);
      throw error;
    }
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an engine backed entirely by an in-memory silo.
 */
export function createInMemoryEngine(
  silo: InMemorySilo,
  config: Partial<WithdrawalEngineConfig> = {}
): WithdrawalEngine {
  return new WithdrawalEngine(
    { inventory: silo, amm: silo, registry: silo, priceGuard: silo, ledger: silo },
    { ...DEFAULT_ENGINE_CONFIG, ...config }
  );
}
