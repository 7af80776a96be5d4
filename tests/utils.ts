import fs from 'fs';
import path from 'path';
import os from 'os';
import { ethers } from 'ethers';

let passed = 0;
let failed = 0;

export function assert(condition: boolean, message: string) {
  if (condition) {
    passed++;
    console.log(`  PASS: ${message}`);
  } else {
    failed++;
    console.error(`  FAIL: ${message}`);
  }
}

export function results(): { passed: number; failed: number } {
  return { passed, failed };
}

export function summary(): void {
  console.log(`\n${passed} passed, ${failed} failed`);
  if (failed > 0) process.exit(1);
}

export function tmpDir(prefix: string): string {
  const dir = path.join(os.tmpdir(), `tba-hooks-${prefix}-${Date.now()}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function cleanup(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true });
  }
}

/** Resolves to the rejection reason, or undefined when the promise fulfils. */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
    return undefined;
  } catch (e) {
    return e;
  }
}

/** Deterministic checksummed address for small integers. */
export function addr(n: number): string {
  return ethers.getAddress(ethers.zeroPadValue(ethers.toBeHex(n), 20));
}

/** A clock tests can move forward. */
export function fakeClock(start: number): { now: () => number; set: (t: number) => void } {
  let current = start;
  return {
    now: () => current,
    set: (t: number) => {
      current = t;
    },
  };
}
