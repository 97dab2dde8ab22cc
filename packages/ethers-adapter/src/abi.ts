/**
 * Human-readable ABI fragments for the contracts the adapter reads.
 */

export const SILO_ABI = [
  'function getTokenDepositsForAccount(address account, address token) view returns (tuple(address token, uint256[] depositIds, tuple(uint128 amount, uint128 bdv)[] tokenDeposits))',
  'function stemTipForToken(address token) view returns (int96)',
  'function getGerminatingStem(address token) view returns (int96)',
  'function getWhitelistedTokens() view returns (address[])',
  'function tokenSettings(address token) view returns (tuple(bytes4 selector, uint48 stalkEarnedPerSeason, uint48 stalkIssuedPerBdv, uint32 milestoneSeason, int96 milestoneStem, bytes1 encodeType, int40 deltaStalkEarnedPerSeason, uint128 gaugePoints, uint64 optimalPercentDepositedBdv, tuple(address target, bytes4 selector, bytes1 encodeType, bytes data) gaugePointImplementation, tuple(address target, bytes4 selector, bytes1 encodeType, bytes data) liquidityWeightImplementation))',
] as const;

export const WELL_ABI = [
  'function tokens() view returns (address[])',
  'function getReserves() view returns (uint256[])',
  'function wellFunction() view returns (tuple(address target, bytes data))',
  'function getRemoveLiquidityOneTokenOut(uint256 lpAmountIn, address tokenOut) view returns (uint256)',
] as const;

export const WELL_FUNCTION_ABI = [
  'function calcLpTokenSupply(uint256[] reserves, bytes data) view returns (uint256)',
] as const;

export const PRICE_MANIPULATION_ABI = [
  'function isValidSlippage(address well, address token, uint256 slippageRatio) view returns (bool)',
] as const;

const POOL_PRICE_TUPLE =
  'tuple(address pool, address[2] tokens, uint256[2] balances, uint256 price, uint256 liquidity, uint256 beanLiquidity, uint256 nonBeanLiquidity, int256 deltaB, uint256 lpUsd, uint256 lpBdv)';

/**
 * Protocol price contract: overall base-asset price and per-Well prices.
 */
export const PRICE_ABI = [
  `function price() view returns (tuple(uint256 price, uint256 liquidity, int256 deltaB, ${POOL_PRICE_TUPLE}[] ps))`,
  `function getWell(address well) view returns (${POOL_PRICE_TUPLE})`,
] as const;
