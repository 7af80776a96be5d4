import { ExceedsDailyLimit, LimitNotConfigured } from '../errors.js';
import { systemClock, type Checkpointable, type Clock, type HookParams } from '../types.js';
import { BeforeOnlyHook } from '../variants.js';

export const SECONDS_PER_DAY = 86_400;

export interface SpendingLimit {
  dailyLimit: bigint;
  spentToday: bigint;
  lastResetDay: bigint;
}

export type SpendingLimitEvents = {
  'limit-set': { tokenId: bigint; dailyLimit: bigint };
  'spending-recorded': { tokenId: bigint; amount: bigint; remaining: bigint };
};

export interface SpendingLimitOptions {
  clock?: Clock;
  secondsPerDay?: number;
}

/**
 * Caps the native value an account may send per UTC day. The debit is taken
 * in the before phase; a failed execution is undone by the orchestrator's
 * rollback, not here.
 */
export class SpendingLimitHook extends BeforeOnlyHook<SpendingLimitEvents> implements Checkpointable {
  private limits: Map<bigint, SpendingLimit> = new Map();
  private clock: Clock;
  private secondsPerDay: bigint;

  constructor(authority: string, options: SpendingLimitOptions = {}) {
    super(authority);
    this.clock = options.clock ?? systemClock;
    const secondsPerDay = options.secondsPerDay ?? SECONDS_PER_DAY;
    if (!Number.isInteger(secondsPerDay) || secondsPerDay <= 0) {
      throw new RangeError(`day length must be a positive integer: ${secondsPerDay}`);
    }
    this.secondsPerDay = BigInt(secondsPerDay);
  }

  protected async checkBefore(params: HookParams): Promise<void> {
    if (params.value === 0n) return;

    const limit = this.limits.get(params.tokenId);
    if (!limit || limit.dailyLimit === 0n) {
      throw new LimitNotConfigured(params.tokenId);
    }

    const today = this.today();
    if (today > limit.lastResetDay) {
      limit.spentToday = 0n;
      limit.lastResetDay = today;
    }

    const remaining = limit.dailyLimit - limit.spentToday;
    if (params.value > remaining) {
      throw new ExceedsDailyLimit(params.value, remaining);
    }

    limit.spentToday += params.value;
    this.emit('spending-recorded', {
      tokenId: params.tokenId,
      amount: params.value,
      remaining: remaining - params.value,
    });
  }

  // Open to any caller, like WhitelistHook's mutators.
  setDailyLimit(tokenId: bigint, dailyLimit: bigint): void {
    if (dailyLimit < 0n) {
      throw new RangeError(`daily limit must not be negative: ${dailyLimit}`);
    }
    const current = this.limits.get(tokenId);
    if (current) {
      current.dailyLimit = dailyLimit;
    } else {
      this.limits.set(tokenId, { dailyLimit, spentToday: 0n, lastResetDay: 0n });
    }
    this.emit('limit-set', { tokenId, dailyLimit });
  }

  getLimit(tokenId: bigint): SpendingLimit {
    const limit = this.limits.get(tokenId);
    return limit ? { ...limit } : { dailyLimit: 0n, spentToday: 0n, lastResetDay: 0n };
  }

  /** What is left today, counting a reset that has not been applied yet. Never negative. */
  getRemaining(tokenId: bigint): bigint {
    const limit = this.getLimit(tokenId);
    const spent = this.today() > limit.lastResetDay ? 0n : limit.spentToday;
    return limit.dailyLimit > spent ? limit.dailyLimit - spent : 0n;
  }

  checkpoint(): () => void {
    const saved = new Map([...this.limits].map(([id, limit]) => [id, { ...limit }] as const));
    return () => {
      this.limits = saved;
    };
  }

  private today(): bigint {
    return BigInt(Math.floor(this.clock())) / this.secondsPerDay;
  }
}
