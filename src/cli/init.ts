import { Command } from 'commander';
import fs from 'fs';
import { ethers } from 'ethers';
import { TBA_HOOKS_HOME, config } from '../config.js';
import { SettingsManager } from '../settings/manager.js';

interface InitOptions {
  orchestrator?: string;
  gen?: boolean;
  force?: boolean;
}

export function registerInitCommand(program: Command) {
  program
    .command('init')
    .description('Create hooks.yaml and bind hooks to an orchestrator address')
    .option('--orchestrator <address>', 'Address of the orchestrator hooks trust')
    .option('--gen', 'Generate a fresh orchestrator address')
    .option('--force', 'Overwrite an existing orchestrator binding')
    .action((opts: InitOptions) => {
      if (!opts.orchestrator && !opts.gen && !fs.existsSync(config.hooksPath)) {
        console.log('Initialize with an orchestrator address:\n');
        console.log('  tba-hooks init --gen                      Generate a fresh address');
        console.log('  tba-hooks init --orchestrator 0xabc...    Use an existing one\n');
        return;
      }

      SettingsManager.initDefaults(TBA_HOOKS_HOME);
      const settings = new SettingsManager(config.hooksPath);
      const current = settings.getAll().orchestrator;

      if ((opts.orchestrator || opts.gen) && current && !opts.force) {
        console.error(`Hooks are already bound to ${current}`);
        console.error('Rebinding changes who may invoke them. Use --force to overwrite.');
        process.exitCode = 1;
        return;
      }

      let orchestrator = current;
      if (opts.orchestrator) {
        if (!ethers.isAddress(opts.orchestrator)) {
          console.error(`Not an address: ${opts.orchestrator}`);
          process.exitCode = 1;
          return;
        }
        orchestrator = ethers.getAddress(opts.orchestrator);
      } else if (opts.gen) {
        orchestrator = ethers.Wallet.createRandom().address;
      }

      settings.set('orchestrator', orchestrator);
      console.log(`  Hooks:        ${config.hooksPath}`);
      console.log(`  Orchestrator: ${orchestrator || '(unset)'}`);
    });
}
