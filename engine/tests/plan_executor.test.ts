/**
 * STEMWISE - Plan Executor Tests
 *
 * Well starts at 10,000/10,000. Planning 1,900 from [base, well] with 1,000
 * base deposited yields 1,000 from base and 461 pool-share worth 900.
 */

import { PlanExecutor } from '../src/execution/plan_executor';
import { SourceIterator } from '../src/planning/source_iterator';
import { freezePlan } from '../src/planning/plan_combiner';
import { defaultFilterParams } from '../src/filter/filter_policy';
import { ConstantProductWell } from '../src/simulation/constant_product_well';
import { InMemorySilo } from '../src/simulation/in_memory_silo';
import { ENGINE_CONSTANTS, PlanFailure, WithdrawalPlan } from '../src/interfaces/types';

const BASE = '0x1000000000000000000000000000000000000001';
const WELL = '0x2000000000000000000000000000000000000002';
const WETH = '0x3000000000000000000000000000000000000003';
const OWNER = '0xa00000000000000000000000000000000000000a';
const HOLDING = '0xd00000000000000000000000000000000000000d';
const DEST = '0xe00000000000000000000000000000000000000e';

describe('PlanExecutor', () => {
  let silo: InMemorySilo;
  let well: ConstantProductWell;
  let executor: PlanExecutor;
  let plan: WithdrawalPlan;

  beforeEach(async () => {
    silo = new InMemorySilo({ baseAsset: BASE });
    well = new ConstantProductWell(WELL, [BASE, WETH], [10_000n, 10_000n]);
    silo.whitelistToken(BASE, { seeds: 2n, price: 1_000_000n, stemTip: 10n });
    silo.addWell(well, { seeds: 4n, price: 2_000_000n, stemTip: 10n });
    silo.deposit(OWNER, BASE, 4n, 1_000n);
    silo.deposit(OWNER, WELL, 2n, 1_500n);

    const iterator = new SourceIterator({ inventory: silo, amm: silo, registry: silo });
    plan = await iterator.buildPlan(
      OWNER,
      { kind: 'explicit', indices: [0, 1] },
      1_900n,
      defaultFilterParams(1000n)
    );
    executor = new PlanExecutor(
      { ledger: silo, priceGuard: silo, registry: silo },
      { holdingAddress: HOLDING }
    );
  });

  it('should deliver the planned base asset to the destination', async () => {
    const total = await executor.execute(OWNER, plan, undefined, DEST);

    expect(total).toBe(1_900n);
    expect(silo.balanceOf(BASE, DEST)).toBe(1_900n);
    expect(silo.depositAmount(OWNER, BASE, 4n)).toBe(0n);
    expect(silo.depositAmount(OWNER, WELL, 2n)).toBe(1_039n);
    expect(well.getReserves()).toEqual([9_100n, 10_000n]);
  });

  it('should leave nothing in the holding account', async () => {
    await executor.execute(OWNER, plan, undefined, DEST);

    expect(silo.balanceOf(WELL, HOLDING)).toBe(0n);
    expect(silo.balanceOf(BASE, HOLDING)).toBe(0n);
  });

  it('should default the destination to the owner', async () => {
    await executor.execute(OWNER, plan);

    expect(silo.balanceOf(BASE, OWNER)).toBe(1_900n);
  });

  it('should roll everything back when the pool price is manipulated', async () => {
    well.setReserves([12_000n, 10_000n]);

    await expect(executor.execute(OWNER, plan, undefined, DEST)).rejects.toMatchObject({
      failure: PlanFailure.PRICE_MANIPULATION_DETECTED,
    });
    // The base source ran before the pool check failed
    expect(silo.depositAmount(OWNER, BASE, 4n)).toBe(1_000n);
    expect(silo.balanceOf(BASE, DEST)).toBe(0n);
    expect(silo.depositAmount(OWNER, WELL, 2n)).toBe(1_500n);
  });

  it('should roll back when the pool pays less than planned', async () => {
    // Price moves exactly 1%: the guard passes, the payout drops to 897
    well.setReserves([9_900n, 10_000n]);

    await expect(executor.execute(OWNER, plan, undefined, DEST)).rejects.toMatchObject({
      failure: PlanFailure.SLIPPAGE_EXCEEDED,
    });
    expect(silo.balanceOf(BASE, DEST)).toBe(0n);
    expect(silo.depositAmount(OWNER, WELL, 2n)).toBe(1_500n);
    expect(well.getReserves()).toEqual([9_900n, 10_000n]);
  });

  it('should fail a stale plan at the ledger without side effects', async () => {
    await executor.execute(OWNER, plan, undefined, DEST);

    await expect(executor.execute(OWNER, plan, undefined, DEST)).rejects.toMatchObject({
      failure: PlanFailure.LEDGER_INCONSISTENCY,
    });
    expect(silo.balanceOf(BASE, DEST)).toBe(1_900n);
    expect(silo.depositAmount(OWNER, WELL, 2n)).toBe(1_039n);
  });

  it('should reject a slippage ratio above 100%', async () => {
    await expect(
      executor.execute(OWNER, plan, ENGINE_CONSTANTS.SLIPPAGE_PRECISION + 1n)
    ).rejects.toMatchObject({ failure: PlanFailure.INVALID_ARGUMENT });
  });

  it('should reject a malformed plan before touching the ledger', async () => {
    const withdraw = jest.spyOn(silo, 'withdrawDeposits');
    const malformed = freezePlan([
      { token: BASE, stems: [4n, 4n], amounts: [1n, 1n], availableBaseAssetValue: 2n },
    ]);

    await expect(executor.execute(OWNER, malformed)).rejects.toMatchObject({
      failure: PlanFailure.INVALID_ARGUMENT,
    });
    expect(withdraw).not.toHaveBeenCalled();
  });
});
