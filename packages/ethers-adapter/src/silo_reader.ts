/**
 * STEMWISE ethers.js Silo Reader
 *
 * Reads deposits, stem tips, the germination boundary and whitelist data
 * from the silo diamond, and prices from the protocol price contract.
 * Implements the engine's DepositInventoryReader and TokenRegistry.
 */

import { Contract, type ContractRunner } from 'ethers';
import {
  sameAddress,
  type Address,
  type Deposit,
  type DepositInventoryReader,
  type TokenRegistry,
} from '@stemwise/engine';
import { PRICE_ABI, SILO_ABI } from './abi';
import { BASE_MAINNET_CONFIG, type SiloNetworkConfig } from './config';
import { toAddress, toArray, toBigInt } from './results';

const STEM_BITS = 96n;
const STEM_MASK = (1n << STEM_BITS) - 1n;

/**
 * Pack a token and stem into a deposit id: token in the upper 160 bits,
 * the stem as two's complement int96 in the lower 96.
 */
export function packDepositId(token: Address, stem: bigint): bigint {
  return (BigInt(token) << STEM_BITS) | BigInt.asUintN(Number(STEM_BITS), stem);
}

/**
 * Split a deposit id into its token and stem.
 */
export function unpackDepositId(depositId: bigint): { token: Address; stem: bigint } {
  const token = '0x' + (depositId >> STEM_BITS).toString(16).padStart(40, '0');
  return { token, stem: BigInt.asIntN(Number(STEM_BITS), depositId & STEM_MASK) };
}

/**
 * Silo Reader
 */
export class EthersSiloReader implements DepositInventoryReader, TokenRegistry {
  private readonly diamond: Contract;
  private readonly priceContract: Contract;
  private readonly config: SiloNetworkConfig;

  constructor(runner: ContractRunner, config: SiloNetworkConfig = BASE_MAINNET_CONFIG) {
    this.diamond = new Contract(config.diamond, SILO_ABI, runner);
    this.priceContract = new Contract(config.priceContract, PRICE_ABI, runner);
    this.config = config;
  }

  // ============================================================
  // DepositInventoryReader
  // ============================================================

  async listDeposits(owner: Address, token: Address): Promise<Deposit[]> {
    const result: unknown = await this.diamond.getFunction('getTokenDepositsForAccount')(owner, token);
    const [, rawIds, rawDeposits] = toArray(result, 'token deposits');
    const depositIds = toArray(rawIds, 'deposit ids');
    const deposits = toArray(rawDeposits, 'deposit list');

    return depositIds.map((rawId, i) => {
      const { stem } = unpackDepositId(toBigInt(rawId, 'deposit id'));
      const [amount] = toArray(deposits[i], 'deposit');
      return { stem, amount: toBigInt(amount, 'deposit amount') };
    });
  }

  async stemTip(token: Address): Promise<bigint> {
    const result: unknown = await this.diamond.getFunction('stemTipForToken')(token);
    return toBigInt(result, 'stem tip');
  }

  async germinatingStem(token: Address): Promise<bigint> {
    const result: unknown = await this.diamond.getFunction('getGerminatingStem')(token);
    return toBigInt(result, 'germinating stem');
  }

  // ============================================================
  // TokenRegistry
  // ============================================================

  async getWhitelistedTokens(): Promise<Address[]> {
    const result: unknown = await this.diamond.getFunction('getWhitelistedTokens')();
    return toArray(result, 'whitelist').map((token) => toAddress(token, 'whitelisted token'));
  }

  async getBaseAsset(): Promise<Address> {
    return this.config.baseAsset;
  }

  /**
   * Base-asset price: the protocol-wide price for the base asset itself,
   * the Well's own price for a pool-share token.
   */
  async instantaneousPrice(token: Address): Promise<bigint> {
    if (sameAddress(token, this.config.baseAsset)) {
      const result: unknown = await this.priceContract.getFunction('price')();
      const [price] = toArray(result, 'prices');
      return toBigInt(price, 'base asset price');
    }

    const result: unknown = await this.priceContract.getFunction('getWell')(token);
    const [, , , price] = toArray(result, 'well price');
    return toBigInt(price, 'well price');
  }

  /**
   * Seeds are the stalk a deposit earns per season per BDV.
   */
  async seedRate(token: Address): Promise<bigint> {
    const result: unknown = await this.diamond.getFunction('tokenSettings')(token);
    const [, stalkEarnedPerSeason] = toArray(result, 'token settings');
    return toBigInt(stalkEarnedPerSeason, 'stalk earned per season');
  }
}
