export * from './hooks/types.js';
export * from './hooks/errors.js';
export { createHookParams, withOutcome, selectorOf, normalizeAddress } from './hooks/params.js';
export type { HookParamsInput, IntegerLike } from './hooks/params.js';
export { BaseHookPolicy } from './hooks/base.js';
export { BeforeOnlyHook, AfterOnlyHook, FullHook } from './hooks/variants.js';
export { HookEngine, dispatchPhase } from './hooks/engine.js';
export type { ExecutionResult, HookEngineOptions, TargetCall } from './hooks/engine.js';
export { buildHooks, hookEntries } from './hooks/registry.js';
export type { BuiltHooks, BuildHooksOptions } from './hooks/registry.js';
export { WhitelistHook } from './hooks/policies/whitelist.js';
export { SpendingLimitHook, SECONDS_PER_DAY } from './hooks/policies/spending-limit.js';
export { RewardDistributionHook } from './hooks/policies/reward.js';
export { ExecutionLoggerHook } from './hooks/policies/logger.js';
export {
  LedgerRewardTransport,
  Erc20RewardTransport,
  ERC20_ABI,
} from './core/rewards/transport.js';
export type { RewardTransport, Erc20Transferable, Erc20Factory } from './core/rewards/transport.js';
export { ExecutionJournal } from './core/journal.js';
export type { ExecutionRecord, JournalEntry } from './core/journal.js';
export type { WhitelistEvents } from './hooks/policies/whitelist.js';
export type { SpendingLimit, SpendingLimitEvents, SpendingLimitOptions } from './hooks/policies/spending-limit.js';
export type { RewardConfig, RewardEvents } from './hooks/policies/reward.js';
export type { LoggerEvents, ExecutionLoggerOptions } from './hooks/policies/logger.js';
