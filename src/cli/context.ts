import fs from 'fs';
import { ethers } from 'ethers';
import { TBA_HOOKS_HOME, config } from '../config.js';
import { SettingsManager } from '../settings/manager.js';

/**
 * Shared CLI context. The orchestrator address is the identity every hook is
 * bound to, so nothing runs without one.
 */
export interface HooksContext {
  home: string;
  settings: SettingsManager;
  orchestrator: string;
}

export function ensureInit(): void {
  if (!fs.existsSync(config.hooksPath)) {
    console.error(`tba-hooks not initialized. Run:\n\n  tba-hooks init --gen\n`);
    process.exit(1);
  }
}

export function loadContext(): HooksContext {
  ensureInit();
  const settings = new SettingsManager(config.hooksPath);
  const orchestrator = settings.getAll().orchestrator || config.orchestratorAddress;

  if (!ethers.isAddress(orchestrator)) {
    console.error('No orchestrator address configured. Run: tba-hooks init --orchestrator <address>');
    process.exit(1);
  }

  return { home: TBA_HOOKS_HOME, settings, orchestrator: ethers.getAddress(orchestrator) };
}

/** Parses a decimal token id, exiting with a message on bad input. */
export function parseTokenId(raw: string): bigint {
  if (!/^\d+$/.test(raw)) {
    console.error(`Invalid token id: ${raw}`);
    process.exit(1);
  }
  return BigInt(raw);
}
