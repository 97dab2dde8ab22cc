/**
 * STEMWISE ethers.js Adapter Tests
 *
 * Contracts are served by an in-process ContractRunner that decodes the
 * calldata ethers produces and answers with canned, ABI-encoded results.
 */

import { Interface, type ContractRunner, type Result, type TransactionRequest } from 'ethers';
import { PlanFailure } from '@stemwise/engine';
import {
  EthersPriceGuard,
  EthersSiloReader,
  EthersWellValuation,
  PRICE_ABI,
  PRICE_MANIPULATION_ABI,
  SILO_ABI,
  WELL_ABI,
  WELL_FUNCTION_ABI,
  packDepositId,
  unpackDepositId,
  type SiloNetworkConfig,
} from '../src';

const DIAMOND = '0x1111111111111111111111111111111111111111';
const BASE = '0x2222222222222222222222222222222222222222';
const WELL = '0x3333333333333333333333333333333333333333';
const WELL_FUNCTION = '0x4444444444444444444444444444444444444444';
const GUARD = '0x5555555555555555555555555555555555555555';
const WETH = '0x6666666666666666666666666666666666666666';
const OWNER = '0x7777777777777777777777777777777777777777';
const PRICE = '0x8888888888888888888888888888888888888888';

const CONFIG: SiloNetworkConfig = {
  name: 'test',
  chainId: 31337,
  rpcUrl: 'http://localhost:8545',
  diamond: DIAMOND,
  baseAsset: BASE,
  priceContract: PRICE,
  priceManipulation: GUARD,
};

type Handler = (args: Result) => unknown[];

/**
 * ContractRunner answering eth_call from registered handlers.
 */
class FakeChain implements ContractRunner {
  readonly provider = null;
  readonly calls: string[] = [];
  private contracts: Map<string, { iface: Interface; handlers: Record<string, Handler> }> = new Map();

  register(address: string, abi: readonly string[], handlers: Record<string, Handler>): void {
    this.contracts.set(address.toLowerCase(), { iface: new Interface(abi), handlers });
  }

  async call(tx: TransactionRequest): Promise<string> {
    const to = typeof tx.to === 'string' ? tx.to.toLowerCase() : '';
    const contract = this.contracts.get(to);
    if (!contract || typeof tx.data !== 'string') {
      throw new Error(`No contract at ${to}`);
    }

    const parsed = contract.iface.parseTransaction({ data: tx.data });
    if (!parsed) {
      throw new Error(`Unknown calldata for ${to}`);
    }
    const handler = contract.handlers[parsed.name];
    if (!handler) {
      throw new Error(`No handler for ${parsed.name}`);
    }

    this.calls.push(parsed.name);
    return contract.iface.encodeFunctionResult(parsed.fragment, handler(parsed.args));
  }
}

const NO_IMPLEMENTATION = [WETH, '0x00000000', '0x00', '0x'];

function tokenSettings(stalkEarnedPerSeason: bigint): unknown[] {
  return [
    [
      '0x00000000',
      stalkEarnedPerSeason,
      10_000n,
      0n,
      0n,
      '0x00',
      0n,
      0n,
      0n,
      NO_IMPLEMENTATION,
      NO_IMPLEMENTATION,
    ],
  ];
}

function wellPrice(price: bigint): unknown[] {
  return [
    WELL,
    [BASE, WETH],
    [10_000n, 10_000n],
    price,
    20_000n,
    10_000n,
    10_000n,
    0n,
    2_000_000n,
    2_000_000n,
  ];
}

describe('deposit ids', () => {
  it('should round-trip a negative stem', () => {
    const id = packDepositId(BASE, -5n);

    expect(unpackDepositId(id)).toEqual({ token: BASE, stem: -5n });
  });

  it('should keep the stem in the low 96 bits', () => {
    expect(packDepositId(BASE, 7n)).toBe((BigInt(BASE) << 96n) | 7n);
  });
});

describe('EthersSiloReader', () => {
  let chain: FakeChain;
  let reader: EthersSiloReader;

  beforeEach(() => {
    chain = new FakeChain();
    chain.register(DIAMOND, SILO_ABI, {
      getTokenDepositsForAccount: (args) => [
        [
          args[1],
          [packDepositId(BASE, -2n), packDepositId(BASE, 9n)],
          [
            [1_000n, 900n],
            [250n, 240n],
          ],
        ],
      ],
      stemTipForToken: () => [12n],
      getGerminatingStem: () => [11n],
      getWhitelistedTokens: () => [[BASE, WELL]],
      tokenSettings: () => tokenSettings(4_000_000n),
    });
    chain.register(PRICE, PRICE_ABI, {
      price: () => [[1_000_000n, 50_000n, -20n, [wellPrice(998_000n)]]],
      getWell: (args) => [wellPrice(String(args[0]).toLowerCase() === WELL ? 1_020_000n : 0n)],
    });
    reader = new EthersSiloReader(chain, CONFIG);
  });

  it('should decode deposits with their stems', async () => {
    expect(await reader.listDeposits(OWNER, BASE)).toEqual([
      { stem: -2n, amount: 1_000n },
      { stem: 9n, amount: 250n },
    ]);
  });

  it('should read stem tip and germinating stem', async () => {
    expect(await reader.stemTip(BASE)).toBe(12n);
    expect(await reader.germinatingStem(BASE)).toBe(11n);
  });

  it('should read the whitelist', async () => {
    expect(await reader.getWhitelistedTokens()).toEqual([BASE, WELL]);
  });

  it('should report the configured base asset without a call', async () => {
    expect(await reader.getBaseAsset()).toBe(BASE);
    expect(chain.calls).toEqual([]);
  });

  it('should read the overall price for the base asset', async () => {
    expect(await reader.instantaneousPrice(BASE)).toBe(1_000_000n);
    expect(chain.calls).toEqual(['price']);
  });

  it('should read the well price for a pool-share token', async () => {
    expect(await reader.instantaneousPrice(WELL)).toBe(1_020_000n);
    expect(chain.calls).toEqual(['getWell']);
  });

  it('should read seeds from token settings', async () => {
    expect(await reader.seedRate(WELL)).toBe(4_000_000n);
  });
});

describe('EthersWellValuation', () => {
  let chain: FakeChain;
  let valuation: EthersWellValuation;

  beforeEach(() => {
    chain = new FakeChain();
    chain.register(WELL, WELL_ABI, {
      tokens: () => [[BASE, WETH]],
      getReserves: () => [[10_000n, 10_000n]],
      wellFunction: () => [[WELL_FUNCTION, '0x']],
      getRemoveLiquidityOneTokenOut: (args) => [args[0] === 500n ? 975n : 0n],
    });
    chain.register(WELL_FUNCTION, WELL_FUNCTION_ABI, {
      calcLpTokenSupply: (args) => {
        const reserves = args[0];
        return [reserves[0] === 8_100n && reserves[1] === 10_000n ? 9_000n : 10_000n];
      },
    });
    valuation = new EthersWellValuation(chain, CONFIG);
  });

  it('should read tokens and reserves', async () => {
    expect(await valuation.getPoolReserves(WELL)).toEqual({
      tokens: [BASE, WETH],
      reserves: [10_000n, 10_000n],
    });
  });

  it('should compute supply through the well function', async () => {
    expect(await valuation.calcPoolShareSupply(WELL, [8_100n, 10_000n])).toBe(9_000n);
  });

  it('should look up the well function once', async () => {
    await valuation.calcPoolShareSupply(WELL, [10_000n, 10_000n]);
    await valuation.calcPoolShareSupply(WELL, [8_100n, 10_000n]);

    expect(chain.calls.filter((name) => name === 'wellFunction')).toHaveLength(1);
  });

  it('should quote removal into the base asset', async () => {
    expect(await valuation.quoteRemoveLiquidityForBaseAsset(WELL, 500n)).toBe(975n);
  });
});

describe('EthersPriceGuard', () => {
  it('should ask the price manipulation contract', async () => {
    const chain = new FakeChain();
    chain.register(GUARD, PRICE_MANIPULATION_ABI, {
      isValidSlippage: (args) => [args[2] >= 10n ** 16n],
    });
    const guard = new EthersPriceGuard(chain, CONFIG);

    expect(await guard.isSlippageAcceptable(WELL, 10n ** 16n)).toBe(true);
    expect(await guard.isSlippageAcceptable(WELL, 10n ** 15n)).toBe(false);
  });

  it('should require a configured contract', () => {
    const { priceManipulation: _unused, ...withoutGuard } = CONFIG;

    expect(() => new EthersPriceGuard(new FakeChain(), withoutGuard)).toThrow(
      `[${PlanFailure.INVALID_ARGUMENT}] No price manipulation contract configured for test`
    );
  });
});
