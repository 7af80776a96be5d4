import { Command } from 'commander';
import { ethers } from 'ethers';
import { config } from '../config.js';
import {
  Erc20RewardTransport,
  LedgerRewardTransport,
  type RewardTransport,
} from '../core/rewards/transport.js';
import { createEthersSigner } from '../core/wallet/provider.js';
import { HookEngine } from '../hooks/engine.js';
import { HookError } from '../hooks/errors.js';
import { buildHooks, hookEntries } from '../hooks/registry.js';
import type { Checkpointable } from '../hooks/types.js';
import { loadContext, parseTokenId } from './context.js';

interface SimulateOptions {
  tokenId: string;
  to: string;
  account?: string;
  caller?: string;
  value: string;
  data: string;
  fail?: boolean;
  repeat: string;
  fund?: string;
}

export function registerSimulateCommand(program: Command) {
  program
    .command('simulate')
    .description('Run executions through the configured hooks against a stub target')
    .requiredOption('--token-id <id>', 'Token id owning the account')
    .requiredOption('--to <address>', 'Call target')
    .option('--account <address>', 'Token-bound account address', ethers.ZeroAddress)
    .option('--caller <address>', 'Who requests the execution')
    .option('--value <eth>', 'Native value attached, in ETH', '0')
    .option('--data <hex>', 'Call payload', '0x')
    .option('--fail', 'Make the target call report failure')
    .option('--repeat <n>', 'Number of executions to run', '1')
    .option('--fund <amount>', 'Reward tokens credited to the orchestrator on the in-memory ledger')
    .action(async (opts: SimulateOptions) => {
      const ctx = loadContext();
      const settings = ctx.settings.getAll();
      const tokenId = parseTokenId(opts.tokenId);
      const repeat = Math.max(1, parseInt(opts.repeat, 10) || 1);
      const caller = opts.caller ?? ctx.orchestrator;

      let transport: RewardTransport;
      const participants: Checkpointable[] = [];
      if (settings.hooks.reward.transport === 'erc20') {
        if (!config.privateKey) {
          console.error('PRIVATE_KEY is required for the erc20 reward transport');
          process.exitCode = 1;
          return;
        }
        transport = Erc20RewardTransport.fromSigner(createEthersSigner(config.privateKey));
      } else {
        const ledger = new LedgerRewardTransport(ctx.orchestrator);
        const perRun = BigInt(settings.hooks.reward.amount);
        ledger.mint(settings.hooks.reward.token, ctx.orchestrator, opts.fund ? BigInt(opts.fund) : perRun * BigInt(repeat));
        transport = ledger;
        participants.push(ledger);
      }

      const hooks = buildHooks(settings, {
        authority: ctx.orchestrator,
        transport,
        journalPath: config.journalPath,
        secondsPerDay: config.secondsPerDay,
      });
      const engine = new HookEngine({
        address: ctx.orchestrator,
        hooks: hookEntries(hooks).map(([, hook]) => hook),
        participants,
      });

      hooks.spendingLimit?.on('spending-recorded', (e) => {
        console.log(`  [spending-limit] spent ${ethers.formatEther(e.amount)} ETH, ${ethers.formatEther(e.remaining)} ETH left today`);
      });
      hooks.reward?.on('reward-distributed', (e) => {
        console.log(`  [reward] paid ${e.amount} to ${e.recipient}`);
      });
      hooks.logger?.on('execution-logged', (e) => {
        console.log(`  [logger] record #${e.index} for token ${e.tokenId}`);
      });

      const value = ethers.parseEther(opts.value);
      for (let run = 1; run <= repeat; run++) {
        console.log(`Execution ${run}/${repeat}: ${opts.to} value=${opts.value} ETH`);
        try {
          const result = await engine.execute(
            { tokenId, account: opts.account ?? ethers.ZeroAddress, caller, to: opts.to, value, hookData: opts.data },
            async () => ({ success: !opts.fail, returnData: '0x' }),
          );
          console.log(`  -> ${result.success ? 'executed' : 'target call failed'} (selector ${result.params.selector})\n`);
        } catch (e) {
          if (!(e instanceof HookError)) throw e;
          console.log(`  -> rejected: ${e.message}\n`);
          process.exitCode = 1;
        }
      }
    });
}
