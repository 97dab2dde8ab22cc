/**
 * STEMWISE - In-Memory Silo
 *
 * In-process implementation of every collaborator the engine talks to:
 * deposit inventory, token registry, pool valuation, price guard and the
 * withdrawal ledger. Used for tests and for simulating a plan before it is
 * submitted on chain.
 *
 * atomically() snapshots deposits, balances and well reserves and restores
 * them if the work throws, which gives the same all-or-nothing behaviour a
 * reverted transaction has on chain.
 */

import {
  Address,
  AmmValuationAdapter,
  Deposit,
  DepositInventoryReader,
  PlanFailure,
  PoolReserves,
  PriceGuard,
  TokenRegistry,
  WithdrawalLedger,
  WithdrawalPlanError,
  tokenKey,
} from '../interfaces/types';
import { constantProductSupply, isWithinSlippage } from '../amm/pool_math';
import { ConstantProductWell } from './constant_product_well';

/**
 * Whitelist settings for a token
 */
export interface WhitelistSettings {
  /** Seed rate used by the ascending-seeds strategy */
  seeds: bigint;
  /** Instantaneous price used by the ascending-price strategy */
  price: bigint;
  /** Current stem tip (default 0) */
  stemTip?: bigint;
  /** First germinating stem (default: nothing germinates) */
  germinatingStem?: bigint;
}

/**
 * In-memory silo configuration
 */
export interface InMemorySiloConfig {
  baseAsset: Address;
  /** Enable verbose logging */
  verbose?: boolean;
}

interface TokenState {
  token: Address;
  seeds: bigint;
  price: bigint;
  stemTip: bigint;
  germinatingStem?: bigint;
}

interface SiloSnapshot {
  deposits: Map<string, Map<bigint, bigint>>;
  balances: Map<string, bigint>;
  reserves: Map<string, [bigint, bigint]>;
}

/**
 * In-Memory Silo class
 */
export class InMemorySilo
  implements DepositInventoryReader, AmmValuationAdapter, TokenRegistry, PriceGuard, WithdrawalLedger
{
  private config: InMemorySiloConfig;
  private whitelist: TokenState[] = [];
  private wells: Map<string, ConstantProductWell> = new Map();
  private referencePrices: Map<string, bigint> = new Map();
  /** owner:token -> stem -> amount */
  private deposits: Map<string, Map<bigint, bigint>> = new Map();
  /** token:account -> balance */
  private balances: Map<string, bigint> = new Map();
  private atomicDepth = 0;

  constructor(config: InMemorySiloConfig) {
    this.config = config;
  }

  // ============================================================
  // Setup
  // ============================================================

  /**
   * Add a token to the whitelist. Order of calls defines whitelist indices.
   */
  whitelistToken(token: Address, settings: WhitelistSettings): void {
    if (this.findToken(token)) {
      throw new Error(`Token ${token} already whitelisted`);
    }
    this.whitelist.push({
      token,
      seeds: settings.seeds,
      price: settings.price,
      stemTip: settings.stemTip ?? 0n,
      germinatingStem: settings.germinatingStem,
    });
  }

  /**
   * Whitelist a well's pool-share token and register the pool.
   *
   * The reference price defaults to the pool's price at registration.
   */
  addWell(well: ConstantProductWell, settings: WhitelistSettings): void {
    this.whitelistToken(well.address, settings);
    this.wells.set(tokenKey(well.address), well);
    this.referencePrices.set(tokenKey(well.address), well.priceIn(this.config.baseAsset));
  }

  getWell(pool: Address): ConstantProductWell {
    const well = this.wells.get(tokenKey(pool));
    if (!well) {
      throw new WithdrawalPlanError(PlanFailure.INVALID_ARGUMENT, `Unknown well ${pool}`);
    }
    return well;
  }

  setReferencePrice(pool: Address, price: bigint): void {
    this.getWell(pool);
    this.referencePrices.set(tokenKey(pool), price);
  }

  setStemTip(token: Address, stemTip: bigint): void {
    this.requireToken(token).stemTip = stemTip;
  }

  setGerminatingStem(token: Address, germinatingStem: bigint): void {
    this.requireToken(token).germinatingStem = germinatingStem;
  }

  setPrice(token: Address, price: bigint): void {
    this.requireToken(token).price = price;
  }

  setSeeds(token: Address, seeds: bigint): void {
    this.requireToken(token).seeds = seeds;
  }

  /**
   * Record a deposit. Depositing again at an existing stem adds to it.
   */
  deposit(owner: Address, token: Address, stem: bigint, amount: bigint): void {
    this.requireToken(token);
    if (amount <= 0n) {
      throw new Error('Deposit amount must be positive');
    }
    const key = this.depositKey(owner, token);
    const stems = this.deposits.get(key) || new Map<bigint, bigint>();
    stems.set(stem, (stems.get(stem) || 0n) + amount);
    this.deposits.set(key, stems);
  }

  /**
   * Credit an external token balance.
   */
  mint(token: Address, account: Address, amount: bigint): void {
    this.credit(token, account, amount);
  }

  balanceOf(token: Address, account: Address): bigint {
    return this.balances.get(this.balanceKey(token, account)) || 0n;
  }

  /**
   * Current amount of one deposit (0 if absent).
   */
  depositAmount(owner: Address, token: Address, stem: bigint): bigint {
    return this.deposits.get(this.depositKey(owner, token))?.get(stem) || 0n;
  }

  // ============================================================
  // DepositInventoryReader
  // ============================================================

  async listDeposits(owner: Address, token: Address): Promise<Deposit[]> {
    const stems = this.deposits.get(this.depositKey(owner, token));
    if (!stems) {
      return [];
    }
    return [...stems.entries()]
      .map(([stem, amount]) => ({ stem, amount }))
      .sort((a, b) => (a.stem < b.stem ? -1 : a.stem > b.stem ? 1 : 0));
  }

  async stemTip(token: Address): Promise<bigint> {
    return this.requireToken(token).stemTip;
  }

  async germinatingStem(token: Address): Promise<bigint> {
    const state = this.requireToken(token);
    return state.germinatingStem ?? state.stemTip + 1n;
  }

  // ============================================================
  // TokenRegistry
  // ============================================================

  async getWhitelistedTokens(): Promise<Address[]> {
    return this.whitelist.map((state) => state.token);
  }

  async getBaseAsset(): Promise<Address> {
    return this.config.baseAsset;
  }

  async instantaneousPrice(token: Address): Promise<bigint> {
    return this.requireToken(token).price;
  }

  async seedRate(token: Address): Promise<bigint> {
    return this.requireToken(token).seeds;
  }

  // ============================================================
  // AmmValuationAdapter
  // ============================================================

  async getPoolReserves(pool: Address): Promise<PoolReserves> {
    const well = this.getWell(pool);
    return { tokens: [...well.tokens], reserves: well.getReserves() };
  }

  async calcPoolShareSupply(pool: Address, reserves: bigint[]): Promise<bigint> {
    this.getWell(pool);
    return constantProductSupply(reserves);
  }

  async quoteRemoveLiquidityForBaseAsset(pool: Address, poolShareAmount: bigint): Promise<bigint> {
    return this.getWell(pool).quoteRemoveLiquidityOneToken(poolShareAmount, this.config.baseAsset);
  }

  // ============================================================
  // PriceGuard
  // ============================================================

  async isSlippageAcceptable(pool: Address, slippageRatio: bigint): Promise<boolean> {
    const well = this.getWell(pool);
    const reference = this.referencePrices.get(tokenKey(pool)) || 0n;
    return isWithinSlippage(well.priceIn(this.config.baseAsset), reference, slippageRatio);
  }

  // ============================================================
  // WithdrawalLedger
  // ============================================================

  async withdrawDeposits(
    owner: Address,
    token: Address,
    stems: readonly bigint[],
    amounts: readonly bigint[],
    destination: Address
  ): Promise<void> {
    if (stems.length !== amounts.length) {
      throw new WithdrawalPlanError(
        PlanFailure.INVALID_ARGUMENT,
        `Got ${stems.length} stems and ${amounts.length} amounts`
      );
    }

    const key = this.depositKey(owner, token);
    const deposits = this.deposits.get(key);
    let total = 0n;

    for (let i = 0; i < stems.length; i++) {
      const current = deposits?.get(stems[i]) || 0n;
      if (!deposits || current < amounts[i]) {
        throw new WithdrawalPlanError(
          PlanFailure.LEDGER_INCONSISTENCY,
          `Insufficient deposit balance for ${token}@${stems[i]}: has ${current}, needs ${amounts[i]}`,
          { owner, token, stem: stems[i].toString() }
        );
      }

      const left = current - amounts[i];
      if (left === 0n) {
        deposits.delete(stems[i]);
      } else {
        deposits.set(stems[i], left);
      }
      total += amounts[i];
    }

    if (deposits && deposits.size === 0) {
      this.deposits.delete(key);
    }

    this.credit(token, destination, total);
    this.log(`withdrew ${total} of ${token} for ${owner} to ${destination}`);
  }

  async removeLiquidityForBaseAsset(
    pool: Address,
    poolShareAmount: bigint,
    minBaseAssetOut: bigint,
    holder: Address,
    recipient: Address
  ): Promise<bigint> {
    const well = this.getWell(pool);
    this.debit(pool, holder, poolShareAmount);
    const amountOut = well.removeLiquidityOneToken(poolShareAmount, this.config.baseAsset, minBaseAssetOut);
    this.credit(this.config.baseAsset, recipient, amountOut);
    this.log(`burned ${poolShareAmount} of ${pool} for ${amountOut} base asset`);
    return amountOut;
  }

  async transferToDestination(
    token: Address,
    amount: bigint,
    from: Address,
    to: Address
  ): Promise<void> {
    this.debit(token, from, amount);
    this.credit(token, to, amount);
  }

  async atomically<T>(work: () => Promise<T>): Promise<T> {
    if (this.atomicDepth > 0) {
      return work();
    }

    const snapshot = this.takeSnapshot();
    this.atomicDepth++;
    try {
      return await work();
    } catch (error) {
      this.restoreSnapshot(snapshot);
      this.log('rolled back atomic unit');
      throw error;
    } finally {
      this.atomicDepth--;
    }
  }

  // ============================================================
  // Private helper methods
  // ============================================================

  private findToken(token: Address): TokenState | undefined {
    return this.whitelist.find((state) => tokenKey(state.token) === tokenKey(token));
  }

  private requireToken(token: Address): TokenState {
    const state = this.findToken(token);
    if (!state) {
      throw new WithdrawalPlanError(PlanFailure.INVALID_ARGUMENT, `Token ${token} is not whitelisted`);
    }
    return state;
  }

  private depositKey(owner: Address, token: Address): string {
    return `${tokenKey(owner)}:${tokenKey(token)}`;
  }

  private balanceKey(token: Address, account: Address): string {
    return `${tokenKey(token)}:${tokenKey(account)}`;
  }

  private credit(token: Address, account: Address, amount: bigint): void {
    const key = this.balanceKey(token, account);
    this.balances.set(key, (this.balances.get(key) || 0n) + amount);
  }

  private debit(token: Address, account: Address, amount: bigint): void {
    const key = this.balanceKey(token, account);
    const balance = this.balances.get(key) || 0n;
    if (balance < amount) {
      throw new WithdrawalPlanError(
        PlanFailure.LEDGER_INCONSISTENCY,
        `Insufficient ${token} balance for ${account}: has ${balance}, needs ${amount}`
      );
    }
    this.balances.set(key, balance - amount);
  }

  private takeSnapshot(): SiloSnapshot {
    const deposits = new Map<string, Map<bigint, bigint>>();
    for (const [key, stems] of this.deposits) {
      deposits.set(key, new Map(stems));
    }
    const reserves = new Map<string, [bigint, bigint]>();
    for (const [key, well] of this.wells) {
      reserves.set(key, well.getReserves());
    }
    return { deposits, balances: new Map(this.balances), reserves };
  }

  private restoreSnapshot(snapshot: SiloSnapshot): void {
    this.deposits = snapshot.deposits;
    this.balances = snapshot.balances;
    for (const [key, reserves] of snapshot.reserves) {
      this.wells.get(key)?.setReserves(reserves);
    }
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[InMemorySilo] ${message}`);
    }
  }
}
