/**
 * STEMWISE ethers.js Network Configuration
 *
 * Addresses and provider setup for reading silo state from chain.
 */

import { JsonRpcProvider, Network } from 'ethers';

/**
 * Deployment addresses for one network
 */
export interface SiloNetworkConfig {
  name: string;
  chainId: number;
  /** Default public RPC endpoint */
  rpcUrl: string;
  /** Silo diamond proxy */
  diamond: string;
  /** Base asset token; pool-share is redeemed into it */
  baseAsset: string;
  /** Price contract exposing price() and getWell(well) */
  priceContract: string;
  /** Contract exposing isValidSlippage(well, token, ratio), if deployed */
  priceManipulation?: string;
}

/**
 * Base mainnet deployment
 */
export const BASE_MAINNET_CONFIG: SiloNetworkConfig = {
  name: 'base',
  chainId: 8453,
  rpcUrl: 'https://mainnet.base.org',
  diamond: '0xD1A0D188E861ed9d15773a2F3574a2e94134bA8f',
  baseAsset: '0xb170000aeeFa790fa61D6e837d1035906839a3c8',
  priceContract: '0x13D25ABCB6a19948d35654715c729c6501230b49',
};

/**
 * Provider options
 */
export interface SiloProviderOptions {
  /** Override the config's RPC URL */
  rpcUrl?: string;
  /** Polling interval in milliseconds (default: 2000 for Base's ~2s blocks) */
  pollingInterval?: number;
}

/**
 * Creates a JSON-RPC provider pinned to the config's network, skipping
 * network detection.
 */
export function createSiloProvider(
  config: SiloNetworkConfig = BASE_MAINNET_CONFIG,
  options: SiloProviderOptions = {}
): JsonRpcProvider {
  const network = new Network(config.name, config.chainId);
  return new JsonRpcProvider(options.rpcUrl || config.rpcUrl, network, {
    staticNetwork: network,
    pollingInterval: options.pollingInterval || 2000,
  });
}
