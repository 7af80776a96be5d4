import { ethers } from 'ethers';
import { createHookParams, withOutcome, selectorOf } from '../src/hooks/params.js';
import { InvalidHookParams } from '../src/hooks/errors.js';
import { EMPTY_SELECTOR, HOOK_MAGIC_VALUE } from '../src/hooks/types.js';
import { addr, assert, summary } from './utils.js';

console.log('Hook Params Tests\n');

// --- Magic value ---

assert(ethers.dataLength(HOOK_MAGIC_VALUE) === 4, 'magic value is 4 bytes');
assert(HOOK_MAGIC_VALUE !== EMPTY_SELECTOR, 'magic value is not zero');

// --- Selector extraction ---

const transferData = '0xa9059cbb' + '00'.repeat(64);
assert(selectorOf(transferData) === '0xa9059cbb', 'selector is first four bytes');
assert(selectorOf('0x1234') === EMPTY_SELECTOR, 'short payload yields zero selector');
assert(selectorOf('0x') === EMPTY_SELECTOR, 'empty payload yields zero selector');

// --- createHookParams ---

const params = createHookParams({
  tokenId: '7',
  account: addr(1),
  caller: addr(2),
  to: addr(3).toLowerCase(),
  value: 1000,
  hookData: transferData,
});

assert(params.tokenId === 7n, 'tokenId parsed from string');
assert(params.value === 1000n, 'value parsed from number');
assert(params.to === addr(3), 'target is checksummed');
assert(params.selector === '0xa9059cbb', 'selector derived from hookData');
assert(params.success === undefined, 'success unset before execution');
assert(params.returnData === undefined, 'returnData unset before execution');
assert(Object.isFrozen(params), 'params are frozen');

const explicit = createHookParams({
  tokenId: 1n,
  account: addr(1),
  caller: addr(2),
  to: addr(3),
  selector: '0xA9059CBB',
});
assert(explicit.selector === '0xa9059cbb', 'explicit selector is lowercased');
assert(explicit.value === 0n, 'value defaults to zero');
assert(explicit.hookData === '0x', 'hookData defaults to empty');

let err: unknown;
try {
  createHookParams({ tokenId: 1n, account: addr(1), caller: addr(2), to: 'not-an-address' });
} catch (e) {
  err = e;
}
assert(err instanceof InvalidHookParams && err.field === 'to', 'bad target rejected');

err = undefined;
try {
  createHookParams({ tokenId: 1n, account: addr(1), caller: addr(2), to: addr(3), value: -1n });
} catch (e) {
  err = e;
}
assert(err instanceof InvalidHookParams && err.field === 'value', 'negative value rejected');

err = undefined;
try {
  createHookParams({ tokenId: 1n, account: addr(1), caller: addr(2), to: addr(3), hookData: '0xabc' });
} catch (e) {
  err = e;
}
assert(err instanceof InvalidHookParams && err.field === 'hookData', 'odd-length payload rejected');

err = undefined;
try {
  createHookParams({ tokenId: 1n, account: addr(1), caller: addr(2), to: addr(3), selector: '0x1234' });
} catch (e) {
  err = e;
}
assert(err instanceof InvalidHookParams && err.field === 'selector', 'two-byte selector rejected');

// --- withOutcome ---

const after = withOutcome(params, { success: true, returnData: '0x01' });
assert(after.success === true, 'outcome success set');
assert(after.returnData === '0x01', 'outcome returnData set');
assert(after.tokenId === params.tokenId && after.to === params.to, 'other fields carried over');
assert(params.success === undefined, 'original params untouched');

summary();
