import type { RewardTransport } from '../../core/rewards/transport.js';
import { normalizeAddress } from '../params.js';
import type { Checkpointable, HookParams } from '../types.js';
import { AfterOnlyHook } from '../variants.js';

export type RewardEvents = {
  'reward-distributed': { tokenId: bigint; recipient: string; token: string; amount: bigint };
  'reward-failed': { tokenId: bigint; recipient: string; token: string; amount: bigint; reason: string };
};

export interface RewardConfig {
  rewardToken: string;
  rewardAmount: bigint;
}

/**
 * Pays the caller a fixed reward after every successful execution. A failed
 * payout never vetoes the execution it follows.
 */
export class RewardDistributionHook extends AfterOnlyHook<RewardEvents> implements Checkpointable {
  private rewardToken: string;
  private rewardAmount: bigint;
  private transport: RewardTransport;
  private totalRewards: Map<bigint, bigint> = new Map();

  constructor(authority: string, config: RewardConfig, transport: RewardTransport) {
    super(authority);
    this.rewardToken = normalizeAddress('rewardToken', config.rewardToken);
    this.rewardAmount = config.rewardAmount;
    this.transport = transport;
  }

  protected async handleAfter(params: HookParams): Promise<void> {
    if (!params.success || this.rewardAmount === 0n) return;

    const payout = {
      tokenId: params.tokenId,
      recipient: params.caller,
      token: this.rewardToken,
      amount: this.rewardAmount,
    };

    let paid = false;
    let reason = 'transfer returned false';
    try {
      paid = await this.transport.transfer(payout.token, payout.recipient, payout.amount);
    } catch (e) {
      reason = e instanceof Error ? e.message : String(e);
    }

    if (paid) {
      this.totalRewards.set(params.tokenId, this.getTotalRewards(params.tokenId) + payout.amount);
      this.emit('reward-distributed', payout);
      return;
    }

    console.warn(`[hook] reward to ${payout.recipient} for token ${payout.tokenId} failed: ${reason}`);
    this.emit('reward-failed', { ...payout, reason });
  }

  setRewardConfig(config: RewardConfig): void {
    this.rewardToken = normalizeAddress('rewardToken', config.rewardToken);
    this.rewardAmount = config.rewardAmount;
  }

  getRewardConfig(): RewardConfig {
    return { rewardToken: this.rewardToken, rewardAmount: this.rewardAmount };
  }

  getTotalRewards(tokenId: bigint): bigint {
    return this.totalRewards.get(tokenId) ?? 0n;
  }

  checkpoint(): () => void {
    const saved = new Map(this.totalRewards);
    return () => {
      this.totalRewards = saved;
    };
  }
}
