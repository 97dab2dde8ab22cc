/**
 * STEMWISE - Engine Module Exports
 *
 * Withdrawal planning and execution over stem-tagged silo deposits.
 *
 * This module provides:
 * - Filter policy (stem bounds, germination, low-priority band)
 * - Stem selection for a single token
 * - Multi-source planning with pool-share valuation
 * - Plan merging and double-allocation checks
 * - Atomic plan execution with a price-manipulation guard
 * - An in-memory silo for tests and simulation
 */

// =============================================================================
// Types and Interfaces
// =============================================================================
export * from './interfaces/types';

// =============================================================================
// Filter Policy
// =============================================================================
export {
  defaultFilterParams,
  validateFilterParams,
  resolveStemBounds,
} from './filter/filter_policy';

// =============================================================================
// Stem Selection
// =============================================================================
export { StemSelector, sortByDescendingStem } from './selection/stem_selector';
export type { StemSelectorOptions } from './selection/stem_selector';

// =============================================================================
// Planning
// =============================================================================
export {
  decodeSourceTokenIndices,
  encodeSourceTokenIndices,
  validateStrategy,
  resolveSourceTokens,
} from './planning/token_strategy';
export { SourceIterator } from './planning/source_iterator';
export type { SourceIteratorDependencies, SourceIteratorOptions, PoolShareRequirement } from './planning/source_iterator';
export {
  ConsumptionIndex,
  PlanCombiner,
  consumedAmount,
  freezePlan,
  validatePlan,
} from './planning/plan_combiner';

// =============================================================================
// Pool Math
// =============================================================================
export {
  isqrt,
  ceilDiv,
  constantProductSupply,
  constantProductReserve,
  poolPrice,
  isWithinSlippage,
} from './amm/pool_math';

// =============================================================================
// Execution
// =============================================================================
export { PlanExecutor } from './execution/plan_executor';
export type { PlanExecutorDependencies, PlanExecutorConfig } from './execution/plan_executor';

// =============================================================================
// Failure Handling
// =============================================================================
export {
  FailureHandler,
  FailureSeverity,
  RecoveryAction,
  createFailureHandler,
  assertPlan,
} from './safety/failure_handler';
export type { FailureContext, FailureClassification } from './safety/failure_handler';

// =============================================================================
// Simulation
// =============================================================================
export { ConstantProductWell } from './simulation/constant_product_well';
export { InMemorySilo } from './simulation/in_memory_silo';
export type { InMemorySiloConfig, WhitelistSettings } from './simulation/in_memory_silo';

// =============================================================================
// Engine
// =============================================================================
export {
  WithdrawalEngine,
  DEFAULT_ENGINE_CONFIG,
  createInMemoryEngine,
} from './engine/withdrawal_engine';
export type {
  EngineCollaborators,
  WithdrawalEngineConfig,
  WithdrawalRequest,
  WithdrawalTip,
  WithdrawalResult,
  TippedWithdrawalResult,
} from './engine/withdrawal_engine';
