/**
 * STEMWISE - Constant Product Well
 *
 * In-process two-token pool with supply = floor(sqrt(x * y)). Pool-share
 * supply is derived from reserves, never stored, so the pool is fully
 * described by its reserves.
 */

import { Address, PlanFailure, WithdrawalPlanError, sameAddress } from '../interfaces/types';
import { constantProductReserve, constantProductSupply, poolPrice } from '../amm/pool_math';

/**
 * Constant Product Well class
 */
export class ConstantProductWell {
  readonly address: Address;
  readonly tokens: [Address, Address];
  private reserves: [bigint, bigint];

  constructor(address: Address, tokens: [Address, Address], reserves: [bigint, bigint]) {
    if (reserves[0] <= 0n || reserves[1] <= 0n) {
      throw new Error('Well reserves must be positive');
    }
    this.address = address;
    this.tokens = tokens;
    this.reserves = [reserves[0], reserves[1]];
  }

  getReserves(): [bigint, bigint] {
    return [this.reserves[0], this.reserves[1]];
  }

  setReserves(reserves: [bigint, bigint]): void {
    this.reserves = [reserves[0], reserves[1]];
  }

  totalSupply(): bigint {
    return constantProductSupply(this.reserves);
  }

  indexOf(token: Address): number {
    const index = this.tokens.findIndex((t) => sameAddress(t, token));
    if (index === -1) {
      throw new WithdrawalPlanError(
        PlanFailure.INVALID_ARGUMENT,
        `Token ${token} is not in well ${this.address}`
      );
    }
    return index;
  }

  /**
   * Amount of tokenOut received for burning lpAmountIn.
   */
  quoteRemoveLiquidityOneToken(lpAmountIn: bigint, tokenOut: Address): bigint {
    return this.removal(lpAmountIn, this.indexOf(tokenOut)).amountOut;
  }

  /**
   * Burn lpAmountIn for tokenOut and update reserves.
   *
   * @throws WithdrawalPlanError with SLIPPAGE_EXCEEDED below minAmountOut
   */
  removeLiquidityOneToken(lpAmountIn: bigint, tokenOut: Address, minAmountOut: bigint): bigint {
    const j = this.indexOf(tokenOut);
    const { amountOut, newReserve } = this.removal(lpAmountIn, j);

    if (amountOut < minAmountOut) {
      throw new WithdrawalPlanError(
        PlanFailure.SLIPPAGE_EXCEEDED,
        `Well ${this.address} would pay ${amountOut}, minimum ${minAmountOut}`
      );
    }

    this.reserves[j] = newReserve;
    return amountOut;
  }

  /**
   * Price of the other token in units of token, scaled by PRICE_PRECISION.
   */
  priceIn(token: Address): bigint {
    const j = this.indexOf(token);
    return poolPrice(this.reserves[j], this.reserves[1 - j]);
  }

  private removal(lpAmountIn: bigint, j: number): { amountOut: bigint; newReserve: bigint } {
    const supply = this.totalSupply();
    if (lpAmountIn <= 0n || lpAmountIn >= supply) {
      throw new WithdrawalPlanError(
        PlanFailure.INVALID_ARGUMENT,
        `Cannot remove ${lpAmountIn} of ${supply} pool-share from well ${this.address}`
      );
    }

    const newReserve = constantProductReserve(this.reserves, j, supply - lpAmountIn);
    const amountOut = this.reserves[j] > newReserve ? this.reserves[j] - newReserve : 0n;
    return { amountOut, newReserve: this.reserves[j] - amountOut };
  }
}
