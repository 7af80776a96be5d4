import { Command } from 'commander';
import { ethers } from 'ethers';
import { LedgerRewardTransport } from '../core/rewards/transport.js';
import { buildHooks, hookEntries } from '../hooks/registry.js';
import type { PermissionSet } from '../hooks/types.js';
import { loadContext, parseTokenId } from './context.js';

function describePermissions(permissions: PermissionSet): string {
  const phases = [
    permissions.beforeExecute ? 'before' : '',
    permissions.afterExecute ? 'after' : '',
  ].filter(Boolean);
  return phases.length > 0 ? phases.join(' + ') : 'none';
}

export function registerHooksCommand(program: Command) {
  const cmd = program
    .command('hooks')
    .description('Manage the reference hooks (whitelist, spending limit, reward, logger)');

  cmd
    .command('list')
    .description('Show enabled hooks and the phases they declare')
    .action(() => {
      const ctx = loadContext();
      const hooks = buildHooks(ctx.settings.getAll(), {
        authority: ctx.orchestrator,
        transport: new LedgerRewardTransport(ctx.orchestrator),
      });

      console.log(`Orchestrator: ${ctx.orchestrator}\n`);
      for (const [name, hook] of hookEntries(hooks)) {
        console.log(`  ${name.padEnd(16)} ${describePermissions(hook.getHookPermissions())}`);
      }
    });

  cmd
    .command('whitelist <tokenId> <targets...>')
    .description('Allow calls from a token-bound account to the given targets')
    .option('--remove', 'Remove the targets instead')
    .action((rawId: string, targets: string[], opts: { remove?: boolean }) => {
      const ctx = loadContext();
      const tokenId = parseTokenId(rawId).toString();

      const invalid = targets.filter((t) => !ethers.isAddress(t));
      if (invalid.length > 0) {
        console.error(`Not an address: ${invalid.join(', ')}`);
        process.exitCode = 1;
        return;
      }

      ctx.settings.update((config) => {
        const current = new Set(config.hooks.whitelist.tokens[tokenId] ?? []);
        for (const target of targets.map((t) => ethers.getAddress(t))) {
          if (opts.remove) current.delete(target);
          else current.add(target);
        }
        config.hooks.whitelist.tokens[tokenId] = [...current];
      });

      const verb = opts.remove ? 'Removed' : 'Whitelisted';
      console.log(`${verb} ${targets.length} target(s) for token ${tokenId}`);
    });

  cmd
    .command('limit <tokenId> <amount>')
    .description('Set the daily spending limit (in ETH) for a token-bound account')
    .action((rawId: string, amount: string) => {
      const ctx = loadContext();
      const tokenId = parseTokenId(rawId).toString();
      const wei = ethers.parseEther(amount);

      ctx.settings.update((config) => {
        config.hooks['spending-limit'].limits[tokenId] = wei.toString();
      });
      console.log(`Daily limit for token ${tokenId}: ${ethers.formatEther(wei)} ETH`);
    });

  cmd
    .command('reward <token> <amount>')
    .description('Configure and enable the reward paid per successful execution')
    .action((token: string, amount: string) => {
      const ctx = loadContext();
      if (!ethers.isAddress(token)) {
        console.error(`Not an address: ${token}`);
        process.exitCode = 1;
        return;
      }

      ctx.settings.update((config) => {
        config.hooks.reward.enabled = true;
        config.hooks.reward.token = ethers.getAddress(token);
        config.hooks.reward.amount = BigInt(amount).toString();
      });
      console.log(`Reward: ${amount} of ${ethers.getAddress(token)} per successful execution`);
    });
}
