import { TargetNotWhitelisted } from '../errors.js';
import { normalizeAddress } from '../params.js';
import type { Checkpointable, HookParams } from '../types.js';
import { BeforeOnlyHook } from '../variants.js';

export type WhitelistEvents = {
  'whitelist-updated': { tokenId: bigint; target: string; allowed: boolean };
};

/** Blocks calls to any target not whitelisted for the account's token. */
export class WhitelistHook extends BeforeOnlyHook<WhitelistEvents> implements Checkpointable {
  private whitelist: Map<bigint, Set<string>> = new Map();

  protected async checkBefore(params: HookParams): Promise<void> {
    if (!this.isWhitelisted(params.tokenId, params.to)) {
      throw new TargetNotWhitelisted(params.to);
    }
  }

  // Admin mutators are open to any caller, matching the reference policy.
  setWhitelist(tokenId: bigint, target: string, allowed: boolean): void {
    const address = normalizeAddress('target', target);
    const targets = this.whitelist.get(tokenId) ?? new Set<string>();
    if (allowed) targets.add(address);
    else targets.delete(address);
    this.whitelist.set(tokenId, targets);

    this.emit('whitelist-updated', { tokenId, target: address, allowed });
  }

  batchWhitelist(tokenId: bigint, targets: string[]): void {
    for (const target of targets) {
      this.setWhitelist(tokenId, target, true);
    }
  }

  isWhitelisted(tokenId: bigint, target: string): boolean {
    return this.whitelist.get(tokenId)?.has(normalizeAddress('target', target)) ?? false;
  }

  getWhitelist(tokenId: bigint): string[] {
    return [...(this.whitelist.get(tokenId) ?? [])];
  }

  checkpoint(): () => void {
    const saved = new Map([...this.whitelist].map(([id, set]) => [id, new Set(set)] as const));
    return () => {
      this.whitelist = saved;
    };
  }
}
