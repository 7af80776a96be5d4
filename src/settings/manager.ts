import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ethers } from 'ethers';
import { TBA_HOOKS_HOME } from '../config.js';

export interface HooksConfig {
  /** Orchestrator address; empty falls back to ORCHESTRATOR_ADDRESS. */
  orchestrator: string;
  hooks: {
    whitelist: {
      enabled: boolean;
      /** tokenId -> allowed targets */
      tokens: Record<string, string[]>;
    };
    'spending-limit': {
      enabled: boolean;
      'seconds-per-day': number;
      /** tokenId -> daily limit in wei */
      limits: Record<string, string>;
    };
    reward: {
      enabled: boolean;
      token: string;
      amount: string;
      transport: 'ledger' | 'erc20';
    };
    logger: {
      enabled: boolean;
      journal: boolean;
    };
  };
}

type Tree = Record<string, unknown>;

const DEFAULT_CONFIG: HooksConfig = {
  orchestrator: '',
  hooks: {
    whitelist: {
      enabled: true,
      tokens: {},
    },
    'spending-limit': {
      enabled: true,
      'seconds-per-day': 86400,
      limits: {},
    },
    reward: {
      enabled: false,
      token: '0x0000000000000000000000000000000000000000',
      amount: '0',
      transport: 'ledger',
    },
    logger: {
      enabled: true,
      journal: true,
    },
  },
};

export type SettingKind = 'address' | 'boolean' | 'seconds' | 'amount' | 'targets' | 'transport';

const TOKEN_PLACEHOLDER = '<tokenId>';

// Per-token maps are listed once, with the token id as a placeholder
const SETTINGS: ReadonlyMap<string, SettingKind> = new Map<string, SettingKind>([
  ['orchestrator', 'address'],
  ['hooks.whitelist.enabled', 'boolean'],
  [`hooks.whitelist.tokens.${TOKEN_PLACEHOLDER}`, 'targets'],
  ['hooks.spending-limit.enabled', 'boolean'],
  ['hooks.spending-limit.seconds-per-day', 'seconds'],
  [`hooks.spending-limit.limits.${TOKEN_PLACEHOLDER}`, 'amount'],
  ['hooks.reward.enabled', 'boolean'],
  ['hooks.reward.token', 'address'],
  ['hooks.reward.amount', 'amount'],
  ['hooks.reward.transport', 'transport'],
  ['hooks.logger.enabled', 'boolean'],
  ['hooks.logger.journal', 'boolean'],
]);

const TOKEN_MAP_KEY = /^(hooks\.whitelist\.tokens|hooks\.spending-limit\.limits)\.(0|[1-9]\d*)$/;

/** Every settable key with its value kind. */
export function settingKeys(): Array<[string, SettingKind]> {
  return [...SETTINGS];
}

function settingKind(key: string): SettingKind | undefined {
  const match = TOKEN_MAP_KEY.exec(key);
  return SETTINGS.get(match ? `${match[1]}.${TOKEN_PLACEHOLDER}` : key);
}

function parseSetting(key: string, kind: SettingKind, raw: string): string | boolean | number | string[] {
  const invalid = (expected: string) => new Error(`Invalid value for ${key}: "${raw}" (expected ${expected})`);

  switch (kind) {
    case 'address':
      if (key === 'orchestrator' && raw === '') return '';
      if (!ethers.isAddress(raw)) throw invalid('an address');
      return ethers.getAddress(raw);
    case 'boolean':
      if (raw !== 'true' && raw !== 'false') throw invalid('true or false');
      return raw === 'true';
    case 'seconds': {
      const seconds = Number(raw);
      if (!/^\d+$/.test(raw) || seconds <= 0) throw invalid('a positive whole number of seconds');
      return seconds;
    }
    case 'amount':
      // Kept as a string so wei values keep their precision
      if (!/^\d+$/.test(raw)) throw invalid('a whole amount in wei');
      return BigInt(raw).toString();
    case 'targets': {
      const targets = raw.split(',').map((t) => t.trim()).filter(Boolean);
      const bad = targets.find((t) => !ethers.isAddress(t));
      if (bad !== undefined) throw invalid('comma-separated addresses');
      return targets.map((t) => ethers.getAddress(t));
    }
    case 'transport':
      if (raw !== 'ledger' && raw !== 'erc20') throw invalid('ledger or erc20');
      return raw;
  }
}

function isTree(value: unknown): value is Tree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

function merge(defaults: Tree, overrides: Tree): Tree {
  const result: Tree = { ...defaults };
  for (const key of Object.keys(overrides)) {
    const base = defaults[key];
    const override = overrides[key];
    result[key] = isTree(base) && isTree(override) ? merge(base, override) : override;
  }
  return result;
}

function str(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : typeof value === 'number' ? String(value) : fallback;
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function num(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function section(tree: Tree, key: string): Tree {
  const value = tree[key];
  return isTree(value) ? value : {};
}

/** Reads a merged tree back into the typed shape, dropping values of the wrong type. */
function toHooksConfig(tree: Tree): HooksConfig {
  const hooks = section(tree, 'hooks');
  const whitelist = section(hooks, 'whitelist');
  const limit = section(hooks, 'spending-limit');
  const reward = section(hooks, 'reward');
  const logger = section(hooks, 'logger');
  const defaults = DEFAULT_CONFIG.hooks;

  const tokens: Record<string, string[]> = {};
  for (const [id, targets] of Object.entries(section(whitelist, 'tokens'))) {
    if (Array.isArray(targets)) {
      tokens[id] = targets.filter((t): t is string => typeof t === 'string');
    }
  }

  const limits: Record<string, string> = {};
  for (const [id, amount] of Object.entries(section(limit, 'limits'))) {
    limits[id] = str(amount, '0');
  }

  return {
    orchestrator: str(tree.orchestrator, ''),
    hooks: {
      whitelist: { enabled: bool(whitelist.enabled, defaults.whitelist.enabled), tokens },
      'spending-limit': {
        enabled: bool(limit.enabled, defaults['spending-limit'].enabled),
        'seconds-per-day': num(limit['seconds-per-day'], defaults['spending-limit']['seconds-per-day']),
        limits,
      },
      reward: {
        enabled: bool(reward.enabled, defaults.reward.enabled),
        token: str(reward.token, defaults.reward.token),
        amount: str(reward.amount, defaults.reward.amount),
        transport: reward.transport === 'erc20' ? 'erc20' : 'ledger',
      },
      logger: {
        enabled: bool(logger.enabled, defaults.logger.enabled),
        journal: bool(logger.journal, defaults.logger.journal),
      },
    },
  };
}

function toTree(config: HooksConfig): Tree {
  const copy: unknown = JSON.parse(JSON.stringify(config));
  return isTree(copy) ? copy : {};
}

export class SettingsManager {
  private hooksPath: string;
  private config: HooksConfig;

  constructor(hooksPath?: string) {
    this.hooksPath = hooksPath || path.join(TBA_HOOKS_HOME, 'hooks.yaml');
    this.config = this.load();
  }

  private load(): HooksConfig {
    if (!fs.existsSync(this.hooksPath)) return clone(DEFAULT_CONFIG);
    const parsed = yaml.load(fs.readFileSync(this.hooksPath, 'utf8'));
    return toHooksConfig(merge(toTree(DEFAULT_CONFIG), isTree(parsed) ? parsed : {}));
  }

  get(key: string): unknown {
    let current: unknown = this.config;
    for (const part of key.split('.')) {
      if (!isTree(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  /** Sets one key from its command-line form. Unknown keys and malformed values throw. */
  set(key: string, raw: string): void {
    const kind = settingKind(key);
    if (!kind) throw new Error(`Unknown setting: ${key}`);
    const value = parseSetting(key, kind, raw);

    const parts = key.split('.');
    const tree = toTree(this.config);
    let current = tree;
    for (const part of parts.slice(0, -1)) {
      const next = current[part];
      if (!isTree(next)) {
        const created: Tree = {};
        current[part] = created;
        current = created;
      } else {
        current = next;
      }
    }

    current[parts[parts.length - 1]] = value;
    this.config = toHooksConfig(tree);
    this.save();
  }

  /** Drops one per-token entry, e.g. hooks.whitelist.tokens.1. Returns false if it was not set. */
  unset(key: string): boolean {
    const match = TOKEN_MAP_KEY.exec(key);
    if (!match) throw new Error(`Only per-token entries can be removed: ${key}`);
    const tokenId = match[2];
    const { whitelist } = this.config.hooks;
    const limit = this.config.hooks['spending-limit'];

    const entries = match[1] === 'hooks.whitelist.tokens' ? whitelist.tokens : limit.limits;
    if (!(tokenId in entries)) return false;
    delete entries[tokenId];
    this.save();
    return true;
  }

  getAll(): HooksConfig {
    return clone(this.config);
  }

  update(mutate: (config: HooksConfig) => void): void {
    mutate(this.config);
    this.save();
  }

  save(): void {
    const dir = path.dirname(this.hooksPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(this.hooksPath, yaml.dump(this.config, { lineWidth: -1 }));
  }

  // Initialize with defaults
  static initDefaults(home: string): void {
    const hooksPath = path.join(home, 'hooks.yaml');
    if (!fs.existsSync(hooksPath)) {
      fs.mkdirSync(home, { recursive: true });
      fs.writeFileSync(hooksPath, yaml.dump(DEFAULT_CONFIG, { lineWidth: -1 }));
    }
  }
}
