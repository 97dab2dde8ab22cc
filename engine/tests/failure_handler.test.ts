/**
 * STEMWISE - Failure Handler Tests
 */

import {
  FailureHandler,
  FailureSeverity,
  RecoveryAction,
  assertPlan,
  createFailureHandler,
} from '../src/safety/failure_handler';
import { PlanFailure, WithdrawalPlanError } from '../src/interfaces/types';

describe('FailureHandler', () => {
  let handler: FailureHandler;

  beforeEach(() => {
    handler = createFailureHandler();
  });

  describe('classifyFailure', () => {
    it('should abort on price manipulation', () => {
      const classification = handler.classifyFailure(PlanFailure.PRICE_MANIPULATION_DETECTED);

      expect(classification.severity).toBe(FailureSeverity.CRITICAL);
      expect(classification.action).toBe(RecoveryAction.ABORT);
    });

    it('should replan on ledger inconsistency and slippage', () => {
      expect(handler.classifyFailure(PlanFailure.LEDGER_INCONSISTENCY)).toMatchObject({
        severity: FailureSeverity.CRITICAL,
        action: RecoveryAction.REPLAN,
      });
      expect(handler.classifyFailure(PlanFailure.SLIPPAGE_EXCEEDED)).toEqual({
        severity: FailureSeverity.ERROR,
        action: RecoveryAction.REPLAN,
      });
    });

    it('should ask for new input when funds or arguments are wrong', () => {
      expect(handler.classifyFailure(PlanFailure.INSUFFICIENT_FUNDS)).toEqual({
        severity: FailureSeverity.WARNING,
        action: RecoveryAction.FIX_INPUT,
      });
      expect(handler.classifyFailure(PlanFailure.NO_LIQUIDITY_AVAILABLE)).toEqual({
        severity: FailureSeverity.WARNING,
        action: RecoveryAction.FIX_INPUT,
      });
      expect(handler.classifyFailure(PlanFailure.INVALID_ARGUMENT)).toEqual({
        severity: FailureSeverity.ERROR,
        action: RecoveryAction.FIX_INPUT,
      });
    });
  });

  describe('handleFailure', () => {
    it('should classify plan errors', () => {
      const context = handler.handleFailure(
        new WithdrawalPlanError(PlanFailure.SLIPPAGE_EXCEEDED, 'paid 897, minimum 900'),
        '0xowner'
      );

      expect(context.failure).toBe(PlanFailure.SLIPPAGE_EXCEEDED);
      expect(context.severity).toBe(FailureSeverity.ERROR);
      expect(context.message).toBe('[SLIPPAGE_EXCEEDED] paid 897, minimum 900');
      expect(context.owner).toBe('0xowner');
      expect(context.context).toEqual({
        action: RecoveryAction.REPLAN,
        errorType: 'WithdrawalPlanError',
      });
    });

    it('should mark other errors as unknown', () => {
      const context = handler.handleFailure(new TypeError('bad'));

      expect(context.failure).toBe('UNKNOWN');
      expect(context.context).toEqual({ action: RecoveryAction.MANUAL, errorType: 'TypeError' });
    });

    it('should handle thrown non-errors', () => {
      const context = handler.handleFailure('plain string');

      expect(context.message).toBe('plain string');
      expect(context.context).toEqual({ action: RecoveryAction.MANUAL, errorType: 'string' });
    });
  });

  describe('failure log', () => {
    beforeEach(() => {
      handler.handleFailure(new WithdrawalPlanError(PlanFailure.INSUFFICIENT_FUNDS, 'short'));
      handler.handleFailure(new WithdrawalPlanError(PlanFailure.INVALID_ARGUMENT, 'bad'));
      handler.handleFailure(
        new WithdrawalPlanError(PlanFailure.PRICE_MANIPULATION_DETECTED, 'moved')
      );
    });

    it('should filter by minimum severity', () => {
      const failures = handler.getFailuresBySeverity(FailureSeverity.ERROR);

      expect(failures.map((failure) => failure.failure)).toEqual([
        PlanFailure.INVALID_ARGUMENT,
        PlanFailure.PRICE_MANIPULATION_DETECTED,
      ]);
    });

    it('should count failures', () => {
      const stats = handler.getStats();

      expect(stats.total).toBe(3);
      expect(stats.bySeverity).toEqual({
        [FailureSeverity.INFO]: 0,
        [FailureSeverity.WARNING]: 1,
        [FailureSeverity.ERROR]: 1,
        [FailureSeverity.CRITICAL]: 1,
      });
      expect(stats.byFailure[PlanFailure.INSUFFICIENT_FUNDS]).toBe(1);
    });

    it('should report critical failures until cleared', () => {
      expect(handler.hasCriticalFailures()).toBe(true);

      handler.clearFailureLog();

      expect(handler.hasCriticalFailures()).toBe(false);
      expect(handler.getFailureLog()).toEqual([]);
    });
  });
});

describe('WithdrawalPlanError', () => {
  it('should abort the caller only on manipulation or inconsistency', () => {
    expect(new WithdrawalPlanError(PlanFailure.PRICE_MANIPULATION_DETECTED, 'x').shouldAbort()).toBe(true);
    expect(new WithdrawalPlanError(PlanFailure.LEDGER_INCONSISTENCY, 'x').shouldAbort()).toBe(true);
    expect(new WithdrawalPlanError(PlanFailure.INSUFFICIENT_FUNDS, 'x').shouldAbort()).toBe(false);
  });
});

describe('assertPlan', () => {
  it('should throw the given failure when the condition is false', () => {
    expect(() => assertPlan(false, PlanFailure.LEDGER_INCONSISTENCY, 'broken')).toThrow(
      '[LEDGER_INCONSISTENCY] broken'
    );
  });

  it('should pass when the condition holds', () => {
    expect(() => assertPlan(true, PlanFailure.LEDGER_INCONSISTENCY, 'broken')).not.toThrow();
  });
});
