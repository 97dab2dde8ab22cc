/**
 * STEMWISE - Shared Types
 *
 * Data model for withdrawal planning plus the collaborator interfaces the
 * engine reads from and writes through. Collaborators are the only place
 * ledger or pool state lives; everything in this file is a plain value.
 */

// =============================================================================
// Primitive Types
// =============================================================================

/** 0x-prefixed account or token address */
export type Address = string;

/**
 * Canonical map key for an address. Addresses compare case-insensitively.
 */
export function tokenKey(address: Address): string {
  return address.toLowerCase();
}

/**
 * Check whether two addresses refer to the same account or token.
 */
export function sameAddress(a: Address, b: Address): boolean {
  return tokenKey(a) === tokenKey(b);
}

// =============================================================================
// Deposit Types
// =============================================================================

/**
 * A single silo deposit of one token for one owner.
 *
 * A higher stem means a more recent deposit with less grown stalk.
 */
export interface Deposit {
  /** Age marker (int96 on chain) */
  stem: bigint;
  /** Deposited amount in token units */
  amount: bigint;
}

// =============================================================================
// Filter Types
// =============================================================================

/**
 * How deposits in the low-priority band (stem above maxStem) are treated.
 */
export enum LowPriorityMode {
  /** Consume inline, in descending-stem order with everything else */
  USE = 'USE',
  /** Never consume */
  SKIP = 'SKIP',
  /** Consume only after every other eligible deposit is exhausted */
  USE_LAST = 'USE_LAST',
}

/**
 * Eligibility and priority rules for deposit selection.
 */
export interface FilterParams {
  /** Deposits with more grown stalk per BDV than this are never withdrawn */
  maxGrownStalkPerBdv: bigint;
  /** Deposits with less grown stalk per BDV than this are low priority */
  minGrownStalkPerBdv: bigint;
  /** Absolute lower stem bound; overrides maxGrownStalkPerBdv when set */
  minStem?: bigint;
  /** Absolute low-priority stem bound; overrides minGrownStalkPerBdv when set */
  maxStem?: bigint;
  /** Skip deposits that have not finished germinating */
  excludeGerminatingDeposits: boolean;
  /** Drop the base asset from strategy-derived source lists */
  excludeBaseAsset: boolean;
  lowPriorityMode: LowPriorityMode;
}

/**
 * Stem bounds resolved for one token against its current stem tip.
 */
export interface StemBounds {
  minStem: bigint;
  maxStem: bigint;
}

// =============================================================================
// Selection and Plan Types
// =============================================================================

/**
 * Output of the stem selector for one token.
 *
 * Entries must be withdrawn in the returned order.
 */
export interface StemSelection {
  stems: bigint[];
  amounts: bigint[];
  totalSelected: bigint;
}

/**
 * Deposits allocated from one source token.
 */
export interface PlanSource {
  readonly token: Address;
  readonly stems: readonly bigint[];
  /** Token amounts aligned with stems */
  readonly amounts: readonly bigint[];
  /** Base-asset value realizable from this source */
  readonly availableBaseAssetValue: bigint;
}

/**
 * Immutable allocation decision. Does nothing until handed to the executor.
 */
export interface WithdrawalPlan {
  readonly sources: readonly PlanSource[];
  readonly totalAvailableBaseAssetValue: bigint;
}

/**
 * Ordered candidate source tokens for a plan.
 */
export type TokenSelectionStrategy =
  | { kind: 'explicit'; indices: number[] }
  | { kind: 'ascendingPrice' }
  | { kind: 'ascendingSeeds' };

/**
 * Reserves of a constant-function pool, aligned with its token list.
 */
export interface PoolReserves {
  tokens: Address[];
  reserves: bigint[];
}

// =============================================================================
// Collaborator Interfaces (read side)
// =============================================================================

/**
 * Deposit inventory reader
 */
export interface DepositInventoryReader {
  /** Deposits of one token for one owner, in any order */
  listDeposits(owner: Address, token: Address): Promise<Deposit[]>;
  /** Current age frontier ("now") for the token */
  stemTip(token: Address): Promise<bigint>;
  /** Deposits at or above this stem are still germinating */
  germinatingStem(token: Address): Promise<bigint>;
}

/**
 * Converts between pool-share and base-asset amounts at current reserves.
 */
export interface AmmValuationAdapter {
  getPoolReserves(pool: Address): Promise<PoolReserves>;
  /** Pool-share supply implied by the given reserves */
  calcPoolShareSupply(pool: Address, reserves: bigint[]): Promise<bigint>;
  /** Base asset received for burning poolShareAmount, single-sided */
  quoteRemoveLiquidityForBaseAsset(pool: Address, poolShareAmount: bigint): Promise<bigint>;
}

/**
 * Whitelist and per-token ordering data used for strategy resolution.
 */
export interface TokenRegistry {
  /** Whitelisted tokens; explicit strategy indices point into this list */
  getWhitelistedTokens(): Promise<Address[]>;
  getBaseAsset(): Promise<Address>;
  instantaneousPrice(token: Address): Promise<bigint>;
  seedRate(token: Address): Promise<bigint>;
}

/**
 * Price-manipulation guard consulted before converting pool-share.
 */
export interface PriceGuard {
  /**
   * @param slippageRatio - Allowed deviation, SLIPPAGE_PRECISION = 100%
   */
  isSlippageAcceptable(pool: Address, slippageRatio: bigint): Promise<boolean>;
}

// =============================================================================
// Collaborator Interfaces (write side)
// =============================================================================

/**
 * Ledger mutations performed by the plan executor.
 *
 * Any failing call must throw; the engine never inspects partial state.
 */
export interface WithdrawalLedger {
  /** Withdraw deposits positionally and credit destination with the token */
  withdrawDeposits(
    owner: Address,
    token: Address,
    stems: readonly bigint[],
    amounts: readonly bigint[],
    destination: Address
  ): Promise<void>;

  /**
   * Burn pool-share held by holder for the base asset.
   *
   * @returns Base asset amount sent to recipient (never below minBaseAssetOut)
   */
  removeLiquidityForBaseAsset(
    pool: Address,
    poolShareAmount: bigint,
    minBaseAssetOut: bigint,
    holder: Address,
    recipient: Address
  ): Promise<bigint>;

  transferToDestination(
    token: Address,
    amount: bigint,
    from: Address,
    to: Address
  ): Promise<void>;

  /**
   * Run work as one all-or-nothing unit. A throw inside work leaves the
   * ledger exactly as it was before the call. Nested calls join the
   * outermost unit.
   */
  atomically<T>(work: () => Promise<T>): Promise<T>;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Withdrawal planning and execution failure types
 */
export enum PlanFailure {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  NO_LIQUIDITY_AVAILABLE = 'NO_LIQUIDITY_AVAILABLE',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  PRICE_MANIPULATION_DETECTED = 'PRICE_MANIPULATION_DETECTED',
  SLIPPAGE_EXCEEDED = 'SLIPPAGE_EXCEEDED',
  LEDGER_INCONSISTENCY = 'LEDGER_INCONSISTENCY',
}

/**
 * Custom error class for withdrawal planning failures
 */
export class WithdrawalPlanError extends Error {
  constructor(
    public readonly failure: PlanFailure,
    message: string,
    public readonly details?: unknown
  ) {
    super(`[${failure}] ${message}`);
    this.name = 'WithdrawalPlanError';
  }

  /**
   * Check if this error must abort the caller's whole operation rather
   * than be corrected and resubmitted.
   */
  shouldAbort(): boolean {
    const abortConditions = [
      PlanFailure.PRICE_MANIPULATION_DETECTED,
      PlanFailure.LEDGER_INCONSISTENCY,
    ];
    return abortConditions.includes(this.failure);
  }
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Engine constants
 */
export const ENGINE_CONSTANTS = {
  /** Slippage ratios are expressed against this value (100%) */
  SLIPPAGE_PRECISION: 10n ** 18n,
  /** Pool prices are scaled by this value */
  PRICE_PRECISION: 10n ** 18n,
  /** Wire index meaning "ascending instantaneous price" */
  LOWEST_PRICE_STRATEGY: 255,
  /** Wire index meaning "ascending seed rate" */
  LOWEST_SEED_STRATEGY: 254,
} as const;

/** 1% */
export const DEFAULT_SLIPPAGE_RATIO: bigint = ENGINE_CONSTANTS.SLIPPAGE_PRECISION / 100n;
