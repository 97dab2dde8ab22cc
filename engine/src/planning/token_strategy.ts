/**
 * STEMWISE - Token Selection Strategy
 *
 * Turns a TokenSelectionStrategy into a concrete, ordered list of source
 * tokens. Derived orderings are read fresh from the registry on every call
 * because price and seed rate are mutable protocol state.
 */

import {
  Address,
  ENGINE_CONSTANTS,
  PlanFailure,
  TokenRegistry,
  TokenSelectionStrategy,
  WithdrawalPlanError,
  sameAddress,
  tokenKey,
} from '../interfaces/types';

/**
 * Decode the wire form of source token indices used by blueprint parameters.
 *
 * A single 255 means ascending price, a single 254 ascending seeds; anything
 * else is an explicit list of whitelist indices.
 */
export function decodeSourceTokenIndices(indices: readonly number[]): TokenSelectionStrategy {
  if (indices.length === 1 && indices[0] === ENGINE_CONSTANTS.LOWEST_PRICE_STRATEGY) {
    return { kind: 'ascendingPrice' };
  }
  if (indices.length === 1 && indices[0] === ENGINE_CONSTANTS.LOWEST_SEED_STRATEGY) {
    return { kind: 'ascendingSeeds' };
  }
  return { kind: 'explicit', indices: [...indices] };
}

/**
 * Encode a strategy back to its wire form.
 */
export function encodeSourceTokenIndices(strategy: TokenSelectionStrategy): number[] {
  switch (strategy.kind) {
    case 'ascendingPrice':
      return [ENGINE_CONSTANTS.LOWEST_PRICE_STRATEGY];
    case 'ascendingSeeds':
      return [ENGINE_CONSTANTS.LOWEST_SEED_STRATEGY];
    case 'explicit':
      return [...strategy.indices];
  }
}

/**
 * Reject strategies that are invalid before anything is read.
 *
 * @throws WithdrawalPlanError with INVALID_ARGUMENT
 */
export function validateStrategy(strategy: TokenSelectionStrategy): void {
  if (strategy.kind !== 'explicit') {
    return;
  }
  if (strategy.indices.length === 0) {
    throw new WithdrawalPlanError(PlanFailure.INVALID_ARGUMENT, 'Source token list is empty');
  }
  for (const index of strategy.indices) {
    if (!Number.isInteger(index) || index < 0) {
      throw new WithdrawalPlanError(
        PlanFailure.INVALID_ARGUMENT,
        `Invalid source token index ${index}`
      );
    }
  }
}

/**
 * Resolve a strategy to an ordered list of distinct tokens.
 *
 * Explicit lists are taken as given (first occurrence wins on duplicates).
 * Derived orderings sort the whitelist ascending by price or seed rate,
 * breaking ties by whitelist position, and drop the base asset when
 * excludeBaseAsset is set.
 *
 * @throws WithdrawalPlanError with INVALID_ARGUMENT on an out-of-range index
 */
export async function resolveSourceTokens(
  strategy: TokenSelectionStrategy,
  registry: TokenRegistry,
  excludeBaseAsset: boolean
): Promise<Address[]> {
  validateStrategy(strategy);
  const whitelist = await registry.getWhitelistedTokens();

  if (strategy.kind === 'explicit') {
    const tokens = strategy.indices.map((index) => {
      if (index >= whitelist.length) {
        throw new WithdrawalPlanError(
          PlanFailure.INVALID_ARGUMENT,
          `Source token index ${index} out of range (whitelist has ${whitelist.length} tokens)`
        );
      }
      return whitelist[index];
    });
    return dedupe(tokens);
  }

  const baseAsset = await registry.getBaseAsset();
  const candidates = dedupe(whitelist).filter(
    (token) => !(excludeBaseAsset && sameAddress(token, baseAsset))
  );

  const keyed: Array<{ token: Address; position: number; key: bigint }> = [];
  for (let position = 0; position < candidates.length; position++) {
    const token = candidates[position];
    const key = strategy.kind === 'ascendingPrice'
      ? await registry.instantaneousPrice(token)
      : await registry.seedRate(token);
    keyed.push({ token, position, key });
  }

  keyed.sort((a, b) => {
    if (a.key < b.key) return -1;
    if (a.key > b.key) return 1;
    return a.position - b.position;
  });

  return keyed.map((entry) => entry.token);
}

function dedupe(tokens: readonly Address[]): Address[] {
  const seen = new Set<string>();
  const out: Address[] = [];
  for (const token of tokens) {
    const key = tokenKey(token);
    if (!seen.has(key)) {
      seen.add(key);
      out.push(token);
    }
  }
  return out;
}
