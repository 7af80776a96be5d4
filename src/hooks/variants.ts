import { BaseHookPolicy } from './base.js';
import { NotImplemented } from './errors.js';
import { AFTER_ONLY, BEFORE_ONLY, FULL, type HookParams, type PermissionSet } from './types.js';

// Each shape pins its permissions. The base gate rejects an undeclared phase
// before any body runs, so overriding it in a subclass has no effect.

export abstract class BeforeOnlyHook<Events extends object = Record<never, never>> extends BaseHookPolicy<Events> {
  getHookPermissions(): PermissionSet {
    return BEFORE_ONLY;
  }

  protected abstract checkBefore(params: HookParams): Promise<void>;

  protected override onBeforeExecute(params: HookParams): Promise<void> {
    return this.checkBefore(params);
  }

  protected override async onAfterExecute(_params: HookParams): Promise<void> {
    throw new NotImplemented('afterExecute');
  }
}

export abstract class AfterOnlyHook<Events extends object = Record<never, never>> extends BaseHookPolicy<Events> {
  getHookPermissions(): PermissionSet {
    return AFTER_ONLY;
  }

  protected abstract handleAfter(params: HookParams): Promise<void>;

  protected override async onBeforeExecute(_params: HookParams): Promise<void> {
    throw new NotImplemented('beforeExecute');
  }

  protected override onAfterExecute(params: HookParams): Promise<void> {
    return this.handleAfter(params);
  }
}

export abstract class FullHook<Events extends object = Record<never, never>> extends BaseHookPolicy<Events> {
  getHookPermissions(): PermissionSet {
    return FULL;
  }

  protected abstract checkBefore(params: HookParams): Promise<void>;
  protected abstract handleAfter(params: HookParams): Promise<void>;

  protected override onBeforeExecute(params: HookParams): Promise<void> {
    return this.checkBefore(params);
  }

  protected override onAfterExecute(params: HookParams): Promise<void> {
    return this.handleAfter(params);
  }
}
