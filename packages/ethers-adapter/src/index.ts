/**
 * STEMWISE ethers.js Adapter
 *
 * Read-side engine collaborators backed by a silo diamond and its Wells,
 * through ethers.js v6.
 *
 * @packageDocumentation
 */

// Network
export {
  BASE_MAINNET_CONFIG,
  createSiloProvider,
  type SiloNetworkConfig,
  type SiloProviderOptions,
} from './config';

// Readers
export { EthersSiloReader, packDepositId, unpackDepositId } from './silo_reader';
export { EthersWellValuation, EthersPriceGuard } from './well_valuation';

// ABIs
export { SILO_ABI, WELL_ABI, WELL_FUNCTION_ABI, PRICE_MANIPULATION_ABI, PRICE_ABI } from './abi';
