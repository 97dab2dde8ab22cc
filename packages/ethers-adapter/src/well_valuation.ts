/**
 * STEMWISE ethers.js Well Valuation
 *
 * Pool-share valuation against deployed Wells, and the price-manipulation
 * guard consulted before pool-share is converted.
 */

import { Contract, type ContractRunner } from 'ethers';
import {
  PlanFailure,
  WithdrawalPlanError,
  type Address,
  type AmmValuationAdapter,
  type PoolReserves,
  type PriceGuard,
} from '@stemwise/engine';
import { PRICE_MANIPULATION_ABI, WELL_ABI, WELL_FUNCTION_ABI } from './abi';
import { BASE_MAINNET_CONFIG, type SiloNetworkConfig } from './config';
import { toAddress, toArray, toBigInt, toBoolean, toBytes } from './results';

/**
 * Well function a Well computes its supply with
 */
interface WellFunction {
  target: Address;
  data: string;
}

/**
 * Well Valuation
 */
export class EthersWellValuation implements AmmValuationAdapter {
  private readonly runner: ContractRunner;
  private readonly config: SiloNetworkConfig;
  /** A Well's function is fixed at deployment */
  private readonly wellFunctions: Map<string, WellFunction> = new Map();

  constructor(runner: ContractRunner, config: SiloNetworkConfig = BASE_MAINNET_CONFIG) {
    this.runner = runner;
    this.config = config;
  }

  async getPoolReserves(pool: Address): Promise<PoolReserves> {
    const well = this.well(pool);
    const [rawTokens, rawReserves]: unknown[] = await Promise.all([
      well.getFunction('tokens')(),
      well.getFunction('getReserves')(),
    ]);

    const tokens = toArray(rawTokens, 'well tokens').map((token) => toAddress(token, 'well token'));
    const reserves = toArray(rawReserves, 'well reserves').map((reserve) => toBigInt(reserve, 'reserve'));
    if (tokens.length !== reserves.length) {
      throw new WithdrawalPlanError(
        PlanFailure.LEDGER_INCONSISTENCY,
        `Well ${pool} reports ${tokens.length} tokens and ${reserves.length} reserves`
      );
    }

    return { tokens, reserves };
  }

  async calcPoolShareSupply(pool: Address, reserves: bigint[]): Promise<bigint> {
    const wellFunction = await this.wellFunction(pool);
    const contract = new Contract(wellFunction.target, WELL_FUNCTION_ABI, this.runner);
    const result: unknown = await contract.getFunction('calcLpTokenSupply')(reserves, wellFunction.data);
    return toBigInt(result, 'pool-share supply');
  }

  async quoteRemoveLiquidityForBaseAsset(pool: Address, poolShareAmount: bigint): Promise<bigint> {
    const result: unknown = await this.well(pool).getFunction('getRemoveLiquidityOneTokenOut')(
      poolShareAmount,
      this.config.baseAsset
    );
    return toBigInt(result, 'remove liquidity quote');
  }

  // ============================================================
  // Private helper methods
  // ============================================================

  private well(pool: Address): Contract {
    return new Contract(pool, WELL_ABI, this.runner);
  }

  private async wellFunction(pool: Address): Promise<WellFunction> {
    const cached = this.wellFunctions.get(pool.toLowerCase());
    if (cached) {
      return cached;
    }

    const result: unknown = await this.well(pool).getFunction('wellFunction')();
    const [target, data] = toArray(result, 'well function');
    const wellFunction = {
      target: toAddress(target, 'well function target'),
      data: toBytes(data, 'well function data'),
    };
    this.wellFunctions.set(pool.toLowerCase(), wellFunction);
    return wellFunction;
  }
}

/**
 * Price guard backed by an on-chain price-manipulation check that compares
 * a Well's instantaneous price with its pump's capped reserves.
 */
export class EthersPriceGuard implements PriceGuard {
  private readonly contract: Contract;
  private readonly baseAsset: Address;

  constructor(runner: ContractRunner, config: SiloNetworkConfig = BASE_MAINNET_CONFIG) {
    if (!config.priceManipulation) {
      throw new WithdrawalPlanError(
        PlanFailure.INVALID_ARGUMENT,
        `No price manipulation contract configured for ${config.name}`
      );
    }
    this.contract = new Contract(config.priceManipulation, PRICE_MANIPULATION_ABI, runner);
    this.baseAsset = config.baseAsset;
  }

  async isSlippageAcceptable(pool: Address, slippageRatio: bigint): Promise<boolean> {
    const result: unknown = await this.contract.getFunction('isValidSlippage')(
      pool,
      this.baseAsset,
      slippageRatio
    );
    return toBoolean(result, 'slippage check');
  }
}
