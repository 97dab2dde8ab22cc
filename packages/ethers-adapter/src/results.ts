/**
 * Narrowing helpers for decoded contract results.
 *
 * ethers hands decoded values back untyped; everything the adapter returns
 * goes through one of these first.
 */

import { WithdrawalPlanError, PlanFailure } from '@stemwise/engine';

function malformed(label: string, value: unknown): WithdrawalPlanError {
  return new WithdrawalPlanError(
    PlanFailure.LEDGER_INCONSISTENCY,
    `Unexpected ${label} in contract result: ${String(value)}`
  );
}

export function toBigInt(value: unknown, label: string): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  throw malformed(label, value);
}

export function toAddress(value: unknown, label: string): string {
  if (typeof value === 'string' && /^0x[0-9a-fA-F]{40}$/.test(value)) {
    return value;
  }
  throw malformed(label, value);
}

export function toBytes(value: unknown, label: string): string {
  if (typeof value === 'string' && /^0x([0-9a-fA-F]{2})*$/.test(value)) {
    return value;
  }
  throw malformed(label, value);
}

export function toBoolean(value: unknown, label: string): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  throw malformed(label, value);
}

/**
 * Decoded arrays and structs are both ethers Results, which are arrays.
 */
export function toArray(value: unknown, label: string): unknown[] {
  if (Array.isArray(value)) {
    const items: unknown[] = [];
    for (let i = 0; i < value.length; i++) {
      items.push(value[i]);
    }
    return items;
  }
  throw malformed(label, value);
}
