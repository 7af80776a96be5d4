import { ethers } from 'ethers';

export type HookPhase = 'beforeExecute' | 'afterExecute';

/** Which phases a hook takes part in. Must match the phases it really implements. */
export interface PermissionSet {
  readonly beforeExecute: boolean;
  readonly afterExecute: boolean;
}

export const NONE: PermissionSet = Object.freeze({ beforeExecute: false, afterExecute: false });
export const BEFORE_ONLY: PermissionSet = Object.freeze({ beforeExecute: true, afterExecute: false });
export const AFTER_ONLY: PermissionSet = Object.freeze({ beforeExecute: false, afterExecute: true });
export const FULL: PermissionSet = Object.freeze({ beforeExecute: true, afterExecute: true });

/**
 * Returned by every successful hook invocation. Anything else, including an
 * empty or zero value, means the callee is not a conforming hook.
 */
export const HOOK_MAGIC_VALUE: string = ethers.dataSlice(ethers.id('tokenBoundHookExecuted()'), 0, 4);

export const EMPTY_SELECTOR = '0x00000000';

/**
 * Snapshot of one execution as seen by a hook. `success` and `returnData`
 * are only set in the after phase.
 */
export interface HookParams {
  readonly tokenId: bigint;
  readonly account: string;
  readonly caller: string;
  readonly to: string;
  readonly value: bigint;
  readonly selector: string;
  readonly hookData: string;
  readonly success?: boolean;
  readonly returnData?: string;
}

export interface ExecutionOutcome {
  success: boolean;
  returnData: string;
}

/**
 * The contract an orchestrator calls into. `sender` is the identity of the
 * party invoking the hook; only the hook's bound authority may do so.
 */
export interface HookContract {
  getHookPermissions(): PermissionSet;
  beforeExecute(params: HookParams, sender: string): Promise<string>;
  afterExecute(params: HookParams, sender: string): Promise<string>;
}

/** Unix time in seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * State holders that can be rolled back. `checkpoint` captures the current
 * state and returns a function restoring it. Side effects that cannot be
 * restored (files, network) are held until `commit`, which the orchestrator
 * calls once the whole sequence has succeeded.
 */
export interface Checkpointable {
  checkpoint(): () => void;
  commit?(): void;
}

export function isCheckpointable(value: unknown): value is Checkpointable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'checkpoint' in value &&
    typeof value.checkpoint === 'function'
  );
}
