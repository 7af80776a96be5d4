import fs from 'fs';
import path from 'path';

export interface ExecutionRecord {
  readonly timestamp: number;
  readonly caller: string;
  readonly to: string;
  readonly value: bigint;
  readonly selector: string;
  readonly success: boolean;
}

export interface JournalEntry extends ExecutionRecord {
  readonly tokenId: bigint;
}

interface JournalLine {
  tokenId: string;
  timestamp: number;
  caller: string;
  to: string;
  value: string;
  selector: string;
  success: boolean;
}

/** Append-only JSONL copy of logged executions. Amounts are stored as decimal strings. */
export class ExecutionJournal {
  readonly filePath: string;

  constructor(filePath?: string) {
    this.filePath = filePath || path.join(process.cwd(), 'executions.jsonl');
  }

  append(tokenId: bigint, record: ExecutionRecord): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

    const line: JournalLine = {
      tokenId: tokenId.toString(),
      timestamp: record.timestamp,
      caller: record.caller,
      to: record.to,
      value: record.value.toString(),
      selector: record.selector,
      success: record.success,
    };
    fs.appendFileSync(this.filePath, JSON.stringify(line) + '\n');
  }

  read(filters?: { tokenId?: bigint; since?: number }): JournalEntry[] {
    if (!fs.existsSync(this.filePath)) return [];

    const lines = fs.readFileSync(this.filePath, 'utf8').trim().split('\n').filter(Boolean);
    let entries = lines.map((line, i) => {
      const parsed: unknown = JSON.parse(line);
      if (!isJournalLine(parsed)) throw new Error(`Malformed journal line ${i + 1} in ${this.filePath}`);
      return parseLine(parsed);
    });

    if (filters?.tokenId !== undefined) {
      const tokenId = filters.tokenId;
      entries = entries.filter((e) => e.tokenId === tokenId);
    }
    if (filters?.since !== undefined) {
      const since = filters.since;
      entries = entries.filter((e) => e.timestamp >= since);
    }

    return entries;
  }
}

function isJournalLine(value: unknown): value is JournalLine {
  if (typeof value !== 'object' || value === null) return false;
  const line: Record<string, unknown> = { ...value };
  return (
    typeof line.tokenId === 'string' &&
    typeof line.timestamp === 'number' &&
    typeof line.caller === 'string' &&
    typeof line.to === 'string' &&
    typeof line.value === 'string' &&
    typeof line.selector === 'string' &&
    typeof line.success === 'boolean'
  );
}

function parseLine(line: JournalLine): JournalEntry {
  return {
    tokenId: BigInt(line.tokenId),
    timestamp: line.timestamp,
    caller: line.caller,
    to: line.to,
    value: BigInt(line.value),
    selector: line.selector,
    success: line.success,
  };
}
