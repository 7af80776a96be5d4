import type { ExecutionJournal, ExecutionRecord } from '../../core/journal.js';
import { systemClock, type Checkpointable, type Clock, type HookParams } from '../types.js';
import { FullHook } from '../variants.js';

export type LoggerEvents = {
  'execution-logged': { tokenId: bigint; index: number; record: ExecutionRecord };
};

export interface ExecutionLoggerOptions {
  clock?: Clock;
  journal?: ExecutionJournal;
}

/**
 * Audit trail of executions per token. The log has no cap and grows with
 * every logged execution. Journal lines are buffered until `commit`, so a
 * rolled-back execution never reaches the file.
 */
export class ExecutionLoggerHook extends FullHook<LoggerEvents> implements Checkpointable {
  private logs: Map<bigint, ExecutionRecord[]> = new Map();
  private counts: Map<bigint, number> = new Map();
  private clock: Clock;
  private journal?: ExecutionJournal;
  private pending: Array<[bigint, ExecutionRecord]> = [];

  constructor(authority: string, options: ExecutionLoggerOptions = {}) {
    super(authority);
    this.clock = options.clock ?? systemClock;
    this.journal = options.journal;
  }

  // Reserved: nothing is checked before execution.
  protected async checkBefore(_params: HookParams): Promise<void> {}

  protected async handleAfter(params: HookParams): Promise<void> {
    const record: ExecutionRecord = Object.freeze({
      timestamp: this.clock(),
      caller: params.caller,
      to: params.to,
      value: params.value,
      selector: params.selector,
      success: params.success ?? false,
    });

    const log = this.logs.get(params.tokenId) ?? [];
    log.push(record);
    this.logs.set(params.tokenId, log);
    const count = this.getExecutionCount(params.tokenId) + 1;
    this.counts.set(params.tokenId, count);

    if (this.journal) this.pending.push([params.tokenId, record]);
    this.emit('execution-logged', { tokenId: params.tokenId, index: count - 1, record });
  }

  getExecutionCount(tokenId: bigint): number {
    return this.counts.get(tokenId) ?? 0;
  }

  getHistory(tokenId: bigint, offset: number, limit: number): ExecutionRecord[] {
    const log = this.logs.get(tokenId) ?? [];
    if (offset < 0 || !Number.isInteger(offset) || !Number.isInteger(limit)) {
      throw new RangeError(`invalid page: offset ${offset}, limit ${limit}`);
    }
    if (offset >= log.length || limit <= 0) return [];
    return log.slice(offset, Math.min(offset + limit, log.length));
  }

  checkpoint(): () => void {
    const logs = new Map([...this.logs].map(([id, log]): [bigint, ExecutionRecord[]] => [id, [...log]]));
    const counts = new Map(this.counts);
    const pending = [...this.pending];
    return () => {
      this.logs = logs;
      this.counts = counts;
      this.pending = pending;
    };
  }

  /** Writes buffered records to the journal. */
  commit(): void {
    const lines = this.pending;
    this.pending = [];
    for (const [tokenId, record] of lines) this.journal?.append(tokenId, record);
  }
}
