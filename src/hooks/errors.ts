import type { HookPhase } from './types.js';

export type HookErrorCode =
  | 'UNAUTHORIZED'
  | 'NOT_IMPLEMENTED'
  | 'TARGET_NOT_WHITELISTED'
  | 'EXCEEDS_DAILY_LIMIT'
  | 'LIMIT_NOT_CONFIGURED'
  | 'INVALID_HOOK_PARAMS'
  | 'INVALID_HOOK_RESPONSE'
  | 'PHASE_NOT_PERMITTED';

export class HookError extends Error {
  readonly code: HookErrorCode;

  constructor(code: HookErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class Unauthorized extends HookError {
  constructor(readonly sender: string, readonly authority: string) {
    super('UNAUTHORIZED', `unauthorized: ${sender} is not the hook authority`);
  }
}

export class NotImplemented extends HookError {
  constructor(readonly phase: HookPhase) {
    super('NOT_IMPLEMENTED', `not implemented: ${phase}`);
  }
}

export class TargetNotWhitelisted extends HookError {
  constructor(readonly target: string) {
    super('TARGET_NOT_WHITELISTED', `target not whitelisted: ${target}`);
  }
}

export class ExceedsDailyLimit extends HookError {
  constructor(readonly requested: bigint, readonly remaining: bigint) {
    super('EXCEEDS_DAILY_LIMIT', `exceeds daily limit: requested ${requested}, remaining ${remaining}`);
  }
}

export class LimitNotConfigured extends HookError {
  constructor(readonly tokenId: bigint) {
    super('LIMIT_NOT_CONFIGURED', `no daily limit configured for token ${tokenId}`);
  }
}

export class InvalidHookParams extends HookError {
  constructor(readonly field: string, reason: string) {
    super('INVALID_HOOK_PARAMS', `invalid ${field}: ${reason}`);
  }
}

export class InvalidHookResponse extends HookError {
  constructor(readonly hook: string, readonly phase: HookPhase, readonly value: unknown) {
    super('INVALID_HOOK_RESPONSE', `${hook}.${phase} returned ${String(value)} instead of the magic value`);
  }
}

export class PhaseNotPermitted extends HookError {
  constructor(readonly hook: string, readonly phase: HookPhase) {
    super('PHASE_NOT_PERMITTED', `${hook} does not declare ${phase}`);
  }
}

export type PolicyViolation = TargetNotWhitelisted | ExceedsDailyLimit | LimitNotConfigured;

export function isPolicyViolation(err: unknown): err is PolicyViolation {
  return (
    err instanceof TargetNotWhitelisted ||
    err instanceof ExceedsDailyLimit ||
    err instanceof LimitNotConfigured
  );
}
