import { ethers } from 'ethers';
import { InvalidHookParams } from './errors.js';
import { EMPTY_SELECTOR, type ExecutionOutcome, type HookParams } from './types.js';

export type IntegerLike = bigint | number | string;

export interface HookParamsInput {
  tokenId: IntegerLike;
  account: string;
  caller: string;
  to: string;
  value?: IntegerLike;
  hookData?: string;
  selector?: string;
}

export function normalizeAddress(field: string, value: string): string {
  try {
    return ethers.getAddress(value);
  } catch {
    throw new InvalidHookParams(field, `not an address: ${value}`);
  }
}

function toUint(field: string, value: IntegerLike): bigint {
  let parsed: bigint;
  try {
    parsed = BigInt(value);
  } catch {
    throw new InvalidHookParams(field, `not an integer: ${value}`);
  }
  if (parsed < 0n) throw new InvalidHookParams(field, 'must not be negative');
  return parsed;
}

/** First four bytes of the payload, or the zero selector for short payloads. */
export function selectorOf(hookData: string): string {
  return ethers.dataLength(hookData) >= 4 ? ethers.dataSlice(hookData, 0, 4) : EMPTY_SELECTOR;
}

export function createHookParams(input: HookParamsInput): HookParams {
  const hookData = input.hookData ?? '0x';
  if (!ethers.isHexString(hookData, true)) {
    throw new InvalidHookParams('hookData', 'must be a 0x-prefixed even-length hex string');
  }

  let selector = selectorOf(hookData);
  if (input.selector !== undefined) {
    if (!ethers.isHexString(input.selector, 4)) {
      throw new InvalidHookParams('selector', `expected 4 bytes, got ${input.selector}`);
    }
    selector = input.selector.toLowerCase();
  }

  return Object.freeze({
    tokenId: toUint('tokenId', input.tokenId),
    account: normalizeAddress('account', input.account),
    caller: normalizeAddress('caller', input.caller),
    to: normalizeAddress('to', input.to),
    value: toUint('value', input.value ?? 0n),
    selector,
    hookData: hookData.toLowerCase(),
  });
}

export function withOutcome(params: HookParams, outcome: ExecutionOutcome): HookParams {
  return Object.freeze({ ...params, success: outcome.success, returnData: outcome.returnData });
}
