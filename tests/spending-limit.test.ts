import { SpendingLimitHook, SECONDS_PER_DAY } from '../src/hooks/policies/spending-limit.js';
import { ExceedsDailyLimit, LimitNotConfigured } from '../src/hooks/errors.js';
import { createHookParams } from '../src/hooks/params.js';
import { HOOK_MAGIC_VALUE } from '../src/hooks/types.js';
import { addr, assert, fakeClock, rejection, summary } from './utils.js';

console.log('Spending Limit Hook Tests\n');

const ORCHESTRATOR = addr(0xa);
const DAY_10 = 10 * SECONDS_PER_DAY;
const clock = fakeClock(DAY_10 + 3600);

const spend = (tokenId: bigint, value: bigint) =>
  createHookParams({ tokenId, account: addr(1), caller: addr(2), to: addr(3), value });

// --- Not configured ---

const unconfigured = new SpendingLimitHook(ORCHESTRATOR, { clock: clock.now });
let err = await rejection(unconfigured.beforeExecute(spend(1n, 1n), ORCHESTRATOR));
assert(err instanceof LimitNotConfigured, 'value without limit is LimitNotConfigured');
assert(err instanceof LimitNotConfigured && err.tokenId === 1n, 'error names the token');
assert(
  (await unconfigured.beforeExecute(spend(1n, 0n), ORCHESTRATOR)) === HOOK_MAGIC_VALUE,
  'zero value passes without a limit',
);

unconfigured.setDailyLimit(1n, 0n);
err = await rejection(unconfigured.beforeExecute(spend(1n, 5n), ORCHESTRATOR));
assert(err instanceof LimitNotConfigured, 'zero limit counts as not configured');

// --- Prefix sums within one day ---

const hook = new SpendingLimitHook(ORCHESTRATOR, { clock: clock.now });
const recorded: bigint[] = [];
hook.on('spending-recorded', (e) => recorded.push(e.remaining));
hook.setDailyLimit(1n, 100n);

assert((await hook.beforeExecute(spend(1n, 30n), ORCHESTRATOR)) === HOOK_MAGIC_VALUE, '30 of 100 allowed');
assert((await hook.beforeExecute(spend(1n, 50n), ORCHESTRATOR)) === HOOK_MAGIC_VALUE, '80 of 100 allowed');
assert(hook.getLimit(1n).spentToday === 80n, 'spentToday is 80');
assert(recorded.join(',') === '70,20', 'events report remaining after each debit');

err = await rejection(hook.beforeExecute(spend(1n, 25n), ORCHESTRATOR));
assert(err instanceof ExceedsDailyLimit, 'prefix sum over limit rejected');
assert(
  err instanceof ExceedsDailyLimit && err.requested === 25n && err.remaining === 20n,
  'error reports requested 25 and remaining 20',
);
assert(
  err instanceof Error && err.message === 'exceeds daily limit: requested 25, remaining 20',
  'error message carries both amounts',
);
assert(hook.getLimit(1n).spentToday === 80n, 'rejected call does not debit');

assert((await hook.beforeExecute(spend(1n, 20n), ORCHESTRATOR)) === HOOK_MAGIC_VALUE, 'exact remainder allowed');
assert(hook.getRemaining(1n) === 0n, 'nothing left today');
assert((await hook.beforeExecute(spend(1n, 0n), ORCHESTRATOR)) === HOOK_MAGIC_VALUE, 'zero value passes at the cap');

err = await rejection(hook.beforeExecute(spend(1n, 1n), ORCHESTRATOR));
assert(err instanceof ExceedsDailyLimit && err.remaining === 0n, 'one wei over is rejected');

// --- Generic prefix property ---

const values = [10n, 40n, 5n, 30n, 20n, 1n];
const limit = 90n;
const prop = new SpendingLimitHook(ORCHESTRATOR, { clock: clock.now });
prop.setDailyLimit(9n, limit);
let sum = 0n;
let firstFailure = -1;
let reportedRemaining = -1n;
for (let i = 0; i < values.length; i++) {
  const failure = await rejection(prop.beforeExecute(spend(9n, values[i]), ORCHESTRATOR));
  if (failure instanceof ExceedsDailyLimit) {
    firstFailure = i;
    reportedRemaining = failure.remaining;
    break;
  }
  sum += values[i];
}
assert(firstFailure === 4, 'first failure where prefix sum exceeds limit (85 + 20 > 90)');
assert(reportedRemaining === limit - sum && reportedRemaining === 5n, 'remaining at failure is 5');

// --- Day rollover ---

assert(hook.getRemaining(1n) === 0n, 'still capped late on day 10');
clock.set(DAY_10 + SECONDS_PER_DAY + 1);
assert(hook.getRemaining(1n) === 100n, 'pending reset visible on day 11');
assert(hook.getLimit(1n).spentToday === 100n, 'query does not apply the reset');

assert((await hook.beforeExecute(spend(1n, 100n), ORCHESTRATOR)) === HOOK_MAGIC_VALUE, 'full limit available next day');
assert(hook.getLimit(1n).lastResetDay === 11n, 'reset day recorded');
assert(hook.getLimit(1n).spentToday === 100n, 'new day spend tracked');

// Same day, later second: no reset
clock.set(DAY_10 + 2 * SECONDS_PER_DAY - 1);
err = await rejection(hook.beforeExecute(spend(1n, 1n), ORCHESTRATOR));
assert(err instanceof ExceedsDailyLimit, 'no reset within the same day bucket');

// --- Raising the limit keeps today's spend ---

hook.setDailyLimit(1n, 150n);
assert(hook.getRemaining(1n) === 50n, 'raised limit leaves 50 today');

// --- Invalid configuration ---

let negative: unknown;
try {
  hook.setDailyLimit(1n, -1n);
} catch (e) {
  negative = e;
}
assert(negative instanceof RangeError, 'negative limit rejected');
assert(hook.getLimit(1n).dailyLimit === 150n, 'rejected limit leaves the old one');

let badDay: unknown;
try {
  new SpendingLimitHook(ORCHESTRATOR, { secondsPerDay: 0 });
} catch (e) {
  badDay = e;
}
assert(badDay instanceof RangeError, 'zero day length rejected');

// --- Custom day length ---

const short = new SpendingLimitHook(ORCHESTRATOR, { clock: clock.now, secondsPerDay: 60 });
short.setDailyLimit(3n, 10n);
clock.set(600);
await short.beforeExecute(spend(3n, 10n), ORCHESTRATOR);
clock.set(659);
err = await rejection(short.beforeExecute(spend(3n, 1n), ORCHESTRATOR));
assert(err instanceof ExceedsDailyLimit, 'same 60s bucket stays capped');
clock.set(660);
assert((await short.beforeExecute(spend(3n, 10n), ORCHESTRATOR)) === HOOK_MAGIC_VALUE, 'next 60s bucket resets');

// --- Checkpoint ---

const restore = short.checkpoint();
clock.set(720);
await short.beforeExecute(spend(3n, 4n), ORCHESTRATOR);
restore();
assert(short.getLimit(3n).spentToday === 10n && short.getLimit(3n).lastResetDay === 11n, 'restore undoes debit and reset');

summary();
