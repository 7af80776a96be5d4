import { EventEmitter } from 'events';
import { NotImplemented, Unauthorized } from './errors.js';
import { normalizeAddress } from './params.js';
import {
  HOOK_MAGIC_VALUE,
  type HookContract,
  type HookParams,
  type HookPhase,
  type PermissionSet,
} from './types.js';

type Listener<T> = (payload: T) => void;

/**
 * Shared scaffolding for hooks: the authority gate, the permission check and
 * the magic return value. Phase bodies fail with NotImplemented unless a
 * subclass overrides them.
 *
 * `Events` maps event names to payload types for `on`/`emit`.
 */
export abstract class BaseHookPolicy<Events extends object = Record<never, never>> implements HookContract {
  readonly authority: string;
  private readonly emitter = new EventEmitter();

  constructor(authority: string) {
    this.authority = normalizeAddress('authority', authority);
  }

  abstract getHookPermissions(): PermissionSet;

  async beforeExecute(params: HookParams, sender: string): Promise<string> {
    this.gate('beforeExecute', sender);
    await this.onBeforeExecute(params);
    return HOOK_MAGIC_VALUE;
  }

  async afterExecute(params: HookParams, sender: string): Promise<string> {
    this.gate('afterExecute', sender);
    await this.onAfterExecute(params);
    return HOOK_MAGIC_VALUE;
  }

  protected async onBeforeExecute(_params: HookParams): Promise<void> {
    throw new NotImplemented('beforeExecute');
  }

  protected async onAfterExecute(_params: HookParams): Promise<void> {
    throw new NotImplemented('afterExecute');
  }

  on<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): this {
    this.emitter.off(event, listener);
    return this;
  }

  protected emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
    this.emitter.emit(event, payload);
  }

  private gate(phase: HookPhase, sender: string): void {
    if (!this.isAuthority(sender)) {
      throw new Unauthorized(sender, this.authority);
    }
    if (!this.getHookPermissions()[phase]) {
      throw new NotImplemented(phase);
    }
  }

  private isAuthority(sender: string): boolean {
    try {
      return normalizeAddress('sender', sender) === this.authority;
    } catch {
      return false;
    }
  }
}
