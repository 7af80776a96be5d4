import { ExecutionJournal } from '../core/journal.js';
import type { RewardTransport } from '../core/rewards/transport.js';
import type { HooksConfig } from '../settings/manager.js';
import { ExecutionLoggerHook } from './policies/logger.js';
import { RewardDistributionHook } from './policies/reward.js';
import { SpendingLimitHook } from './policies/spending-limit.js';
import { WhitelistHook } from './policies/whitelist.js';
import type { Clock, HookContract } from './types.js';

export interface BuiltHooks {
  whitelist?: WhitelistHook;
  spendingLimit?: SpendingLimitHook;
  reward?: RewardDistributionHook;
  logger?: ExecutionLoggerHook;
}

export interface BuildHooksOptions {
  authority: string;
  /** Required when the reward hook is enabled. */
  transport?: RewardTransport;
  journalPath?: string;
  clock?: Clock;
  /** Day length for the spending limit, taking precedence over hooks.yaml. */
  secondsPerDay?: number;
}

/** Instantiates the enabled reference hooks and seeds them from hooks.yaml. */
export function buildHooks(config: HooksConfig, options: BuildHooksOptions): BuiltHooks {
  const built: BuiltHooks = {};
  const { hooks } = config;

  if (hooks.whitelist.enabled) {
    const whitelist = new WhitelistHook(options.authority);
    for (const [tokenId, targets] of Object.entries(hooks.whitelist.tokens)) {
      whitelist.batchWhitelist(BigInt(tokenId), targets);
    }
    built.whitelist = whitelist;
  }

  if (hooks['spending-limit'].enabled) {
    const spendingLimit = new SpendingLimitHook(options.authority, {
      clock: options.clock,
      secondsPerDay: options.secondsPerDay ?? hooks['spending-limit']['seconds-per-day'],
    });
    for (const [tokenId, limit] of Object.entries(hooks['spending-limit'].limits)) {
      spendingLimit.setDailyLimit(BigInt(tokenId), BigInt(limit));
    }
    built.spendingLimit = spendingLimit;
  }

  if (hooks.reward.enabled) {
    if (!options.transport) {
      throw new Error('Reward hook enabled but no reward transport configured');
    }
    built.reward = new RewardDistributionHook(
      options.authority,
      { rewardToken: hooks.reward.token, rewardAmount: BigInt(hooks.reward.amount) },
      options.transport,
    );
  }

  if (hooks.logger.enabled) {
    built.logger = new ExecutionLoggerHook(options.authority, {
      clock: options.clock,
      journal: hooks.logger.journal && options.journalPath ? new ExecutionJournal(options.journalPath) : undefined,
    });
  }

  return built;
}

/** Built hooks in dispatch order, keyed by their hooks.yaml section name. */
export function hookEntries(built: BuiltHooks): Array<[string, HookContract]> {
  const entries: Array<[string, HookContract | undefined]> = [
    ['spending-limit', built.spendingLimit],
    ['whitelist', built.whitelist],
    ['logger', built.logger],
    ['reward', built.reward],
  ];
  return entries.filter((entry): entry is [string, HookContract] => entry[1] !== undefined);
}
