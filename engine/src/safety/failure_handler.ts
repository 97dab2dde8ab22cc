/**
 * STEMWISE - Failure Handler
 *
 * Classifies withdrawal failures and keeps an audit log of them.
 *
 * Nothing here retries. Every engine call is all-or-nothing, so the only
 * question after a failure is what the caller should do next: fix its
 * input, replan against fresh state, or give up on this attempt.
 */

import {
  PlanFailure,
  WithdrawalPlanError,
} from '../interfaces/types';

/**
 * Failure severity levels
 */
export enum FailureSeverity {
  /** Informational - no action required */
  INFO = 'INFO',
  /** Warning - the request cannot be served as asked */
  WARNING = 'WARNING',
  /** Error - operation failed, state unchanged */
  ERROR = 'ERROR',
  /** Critical - possible market manipulation or stale state */
  CRITICAL = 'CRITICAL',
}

/**
 * Recommended next step for the caller
 */
export enum RecoveryAction {
  NONE = 'NONE',
  /** Correct the request; resubmitting it unchanged fails again */
  FIX_INPUT = 'FIX_INPUT',
  /** Build a new plan from current ledger state */
  REPLAN = 'REPLAN',
  /** Abandon this attempt; resubmitting blindly may lose to the same attacker */
  ABORT = 'ABORT',
  /** Manual intervention required */
  MANUAL = 'MANUAL',
}

/**
 * Failure context for logging and analysis
 */
export interface FailureContext {
  failure: PlanFailure | 'UNKNOWN';
  severity: FailureSeverity;
  message: string;
  timestamp: Date;
  /** Deposit owner if applicable */
  owner?: string;
  context?: Record<string, unknown>;
}

/**
 * Failure classification result
 */
export interface FailureClassification {
  severity: FailureSeverity;
  action: RecoveryAction;
  abortReason?: string;
}

/**
 * Failure Handler class
 */
export class FailureHandler {
  private failureLog: FailureContext[] = [];
  private verbose: boolean;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  /**
   * Classify a failure and determine the recommended action.
   */
  classifyFailure(failure: PlanFailure): FailureClassification {
    switch (failure) {
      case PlanFailure.PRICE_MANIPULATION_DETECTED:
        return {
          severity: FailureSeverity.CRITICAL,
          action: RecoveryAction.ABORT,
          abortReason: 'Pool price deviates from its reference beyond the slippage bound.',
        };

      case PlanFailure.LEDGER_INCONSISTENCY:
        return {
          severity: FailureSeverity.CRITICAL,
          action: RecoveryAction.REPLAN,
          abortReason: 'Plan references deposits or balances that no longer exist.',
        };

      case PlanFailure.SLIPPAGE_EXCEEDED:
        return {
          severity: FailureSeverity.ERROR,
          action: RecoveryAction.REPLAN,
        };

      case PlanFailure.INSUFFICIENT_FUNDS:
      case PlanFailure.NO_LIQUIDITY_AVAILABLE:
        return {
          severity: FailureSeverity.WARNING,
          action: RecoveryAction.FIX_INPUT,
        };

      case PlanFailure.INVALID_ARGUMENT:
        return {
          severity: FailureSeverity.ERROR,
          action: RecoveryAction.FIX_INPUT,
        };

      default:
        return {
          severity: FailureSeverity.ERROR,
          action: RecoveryAction.MANUAL,
        };
    }
  }

  /**
   * Record a failure and classify it.
   *
   * @param error - The thrown value
   * @param owner - Deposit owner if applicable
   * @returns Failure context with classification
   */
  handleFailure(error: unknown, owner?: string): FailureContext {
    const message = error instanceof Error ? error.message : String(error);
    const errorType = error instanceof Error ? error.constructor.name : typeof error;

    let context: FailureContext;
    if (error instanceof WithdrawalPlanError) {
      const classification = this.classifyFailure(error.failure);
      context = {
        failure: error.failure,
        severity: classification.severity,
        message,
        timestamp: new Date(),
        owner,
        context: { action: classification.action, errorType },
      };
    } else {
      context = {
        failure: 'UNKNOWN',
        severity: FailureSeverity.ERROR,
        message,
        timestamp: new Date(),
        owner,
        context: { action: RecoveryAction.MANUAL, errorType },
      };
    }

    this.logFailure(context);
    return context;
  }

  /**
   * Log a failure for audit trail.
   */
  logFailure(context: FailureContext): void {
    this.failureLog.push(context);

    if (this.verbose) {
      const logLevel = this.getLogLevel(context.severity);
      console[logLevel](
        `[${context.severity}] ${context.failure}: ${context.message}`,
        context.context
      );
    }
  }

  /**
   * Get all logged failures.
   */
  getFailureLog(): FailureContext[] {
    return [...this.failureLog];
  }

  /**
   * Get failures at or above a severity level.
   */
  getFailuresBySeverity(severity: FailureSeverity): FailureContext[] {
    const severityOrder = [
      FailureSeverity.INFO,
      FailureSeverity.WARNING,
      FailureSeverity.ERROR,
      FailureSeverity.CRITICAL,
    ];

    const minIndex = severityOrder.indexOf(severity);

    return this.failureLog.filter((ctx) =>
      severityOrder.indexOf(ctx.severity) >= minIndex
    );
  }

  clearFailureLog(): void {
    this.failureLog = [];
  }

  /**
   * Get failure statistics.
   */
  getStats(): {
    total: number;
    bySeverity: Record<FailureSeverity, number>;
    byFailure: Record<string, number>;
  } {
    const bySeverity: Record<FailureSeverity, number> = {
      [FailureSeverity.INFO]: 0,
      [FailureSeverity.WARNING]: 0,
      [FailureSeverity.ERROR]: 0,
      [FailureSeverity.CRITICAL]: 0,
    };

    const byFailure: Record<string, number> = {};

    for (const ctx of this.failureLog) {
      bySeverity[ctx.severity]++;
      byFailure[ctx.failure] = (byFailure[ctx.failure] || 0) + 1;
    }

    return {
      total: this.failureLog.length,
      bySeverity,
      byFailure,
    };
  }

  hasCriticalFailures(): boolean {
    return this.failureLog.some(
      (ctx) => ctx.severity === FailureSeverity.CRITICAL
    );
  }

  private getLogLevel(severity: FailureSeverity): 'log' | 'warn' | 'error' {
    switch (severity) {
      case FailureSeverity.INFO:
        return 'log';
      case FailureSeverity.WARNING:
        return 'warn';
      case FailureSeverity.ERROR:
      case FailureSeverity.CRITICAL:
        return 'error';
    }
  }
}

/**
 * Create a FailureHandler
 */
export function createFailureHandler(verbose: boolean = false): FailureHandler {
  return new FailureHandler(verbose);
}

/**
 * Assert that a plan invariant holds.
 *
 * @throws WithdrawalPlanError with the given failure if condition is false
 */
export function assertPlan(
  condition: boolean,
  failure: PlanFailure,
  message: string,
  details?: unknown
): asserts condition {
  if (!condition) {
    throw new WithdrawalPlanError(failure, message, details);
  }
}
