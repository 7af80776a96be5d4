import dotenv from 'dotenv';
import path from 'path';
import os from 'os';

// tba-hooks stores config in ~/.tba-hooks/
export const TBA_HOOKS_HOME = process.env.TBA_HOOKS_HOME || path.join(os.homedir(), '.tba-hooks');

// Load .env from the home directory or project root
dotenv.config({ path: path.join(TBA_HOOKS_HOME, '.env') });
dotenv.config(); // fallback to cwd

export const config = {
  // Paths
  home: TBA_HOOKS_HOME,
  hooksPath: path.join(TBA_HOOKS_HOME, 'hooks.yaml'),
  journalPath: process.env.JOURNAL_PATH || path.join(TBA_HOOKS_HOME, 'executions.jsonl'),

  // Network
  network: process.env.NETWORK === 'mainnet' ? 'mainnet' : 'testnet',
  baseRpcUrl: process.env.BASE_RPC_URL || 'https://mainnet.base.org',
  baseSepoliaRpcUrl: process.env.BASE_SEPOLIA_RPC_URL || 'https://sepolia.base.org',

  get rpcUrl() {
    return this.network === 'mainnet' ? this.baseRpcUrl : this.baseSepoliaRpcUrl;
  },

  get chainId() {
    return this.network === 'mainnet' ? 8453 : 84532;
  },

  // Signer used for on-chain reward payouts
  privateKey: process.env.PRIVATE_KEY || '',

  // Orchestrator identity hooks are bound to; hooks.yaml may override it
  orchestratorAddress: process.env.ORCHESTRATOR_ADDRESS || '',

  // Spending limit day bucket; overrides hooks.yaml when set
  secondsPerDay: process.env.SECONDS_PER_DAY ? parseInt(process.env.SECONDS_PER_DAY, 10) : undefined,
};
