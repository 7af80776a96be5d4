import { Command } from 'commander';
import yaml from 'js-yaml';
import { config } from '../config.js';
import { SettingsManager, settingKeys } from '../settings/manager.js';

function fail(e: unknown): void {
  console.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
}

function show(value: unknown): string {
  if (Array.isArray(value)) return value.join(',');
  return typeof value === 'object' && value !== null ? yaml.dump(value, { lineWidth: -1 }) : String(value);
}

export function registerConfigCommand(program: Command) {
  const cmd = program
    .command('config')
    .description(`Manage hook settings in ${config.hooksPath}`);

  cmd
    .command('list')
    .description('Show all settings')
    .action(() => {
      const settings = new SettingsManager(config.hooksPath);
      console.log(yaml.dump(settings.getAll(), { lineWidth: -1 }));
    });

  cmd
    .command('keys')
    .description('Show the settable keys and the values they take')
    .action(() => {
      for (const [key, kind] of settingKeys()) {
        console.log(`  ${key.padEnd(42)} ${kind}`);
      }
    });

  cmd
    .command('get <key>')
    .description('Get a value or section (dot notation: hooks.spending-limit)')
    .action((key: string) => {
      const settings = new SettingsManager(config.hooksPath);
      const value = settings.get(key);
      if (value === undefined) {
        fail(new Error(`Key not found: ${key}`));
        return;
      }
      console.log(show(value));
    });

  cmd
    .command('set <key> <value>')
    .description('Set a value; whitelist targets are comma-separated')
    .action((key: string, value: string) => {
      const settings = new SettingsManager(config.hooksPath);
      try {
        settings.set(key, value);
      } catch (e) {
        fail(e);
        return;
      }
      console.log(`${key} = ${show(settings.get(key))}`);
    });

  cmd
    .command('unset <key>')
    .description('Remove a per-token entry (hooks.whitelist.tokens.<id>, hooks.spending-limit.limits.<id>)')
    .action((key: string) => {
      const settings = new SettingsManager(config.hooksPath);
      try {
        console.log(settings.unset(key) ? `Removed ${key}` : `${key} was not set`);
      } catch (e) {
        fail(e);
      }
    });
}
