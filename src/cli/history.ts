import { Command } from 'commander';
import { ethers } from 'ethers';
import { config } from '../config.js';
import { ExecutionJournal } from '../core/journal.js';
import { parseTokenId } from './context.js';

export function registerHistoryCommand(program: Command) {
  program
    .command('history')
    .description('Show logged executions from the journal')
    .option('--token-id <id>', 'Only executions of this token')
    .option('--offset <n>', 'Skip the first n records', '0')
    .option('--limit <n>', 'Show at most n records', '20')
    .action((opts: { tokenId?: string; offset: string; limit: string }) => {
      const journal = new ExecutionJournal(config.journalPath);
      const tokenId = opts.tokenId !== undefined ? parseTokenId(opts.tokenId) : undefined;
      const entries = journal.read({ tokenId });

      const offset = Math.max(0, parseInt(opts.offset, 10) || 0);
      const limit = Math.max(0, parseInt(opts.limit, 10) || 0);
      const page = entries.slice(offset, offset + limit);

      if (page.length === 0) {
        console.log('No executions logged.');
        return;
      }

      console.log(`Executions ${offset + 1}-${offset + page.length} of ${entries.length}:\n`);
      for (const e of page) {
        const date = new Date(e.timestamp * 1000).toISOString().substring(0, 19);
        const status = e.success ? 'ok  ' : 'fail';
        console.log(`  ${date}  #${e.tokenId}  ${status}  ${e.selector}  ${e.to}  ${ethers.formatEther(e.value)} ETH`);
      }
    });
}
