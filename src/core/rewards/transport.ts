import { ethers } from 'ethers';
import type { Checkpointable } from '../../hooks/types.js';

/** Moves reward tokens. Resolves false (or rejects) when nothing was sent. */
export interface RewardTransport {
  transfer(token: string, recipient: string, amount: bigint): Promise<boolean>;
}

/**
 * In-process token balances. Stands in for a token contract in tests and in
 * `tba-hooks simulate`.
 */
export class LedgerRewardTransport implements RewardTransport, Checkpointable {
  private balances: Map<string, bigint> = new Map();
  private source: string;

  constructor(source: string) {
    this.source = ethers.getAddress(source);
  }

  private key(token: string, holder: string): string {
    return `${ethers.getAddress(token)}:${ethers.getAddress(holder)}`;
  }

  mint(token: string, holder: string, amount: bigint): void {
    const key = this.key(token, holder);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  balanceOf(token: string, holder: string): bigint {
    return this.balances.get(this.key(token, holder)) ?? 0n;
  }

  async transfer(token: string, recipient: string, amount: bigint): Promise<boolean> {
    const from = this.key(token, this.source);
    const balance = this.balances.get(from) ?? 0n;
    if (balance < amount) return false;

    this.balances.set(from, balance - amount);
    this.mint(token, recipient, amount);
    return true;
  }

  checkpoint(): () => void {
    const saved = new Map(this.balances);
    return () => {
      this.balances = new Map(saved);
    };
  }
}

export const ERC20_ABI = [
  'function transfer(address to, uint256 amount) returns (bool)',
  'function balanceOf(address owner) view returns (uint256)',
];

interface TransferReceipt {
  status: number | null;
}

interface TransferResponse {
  hash: string;
  wait(): Promise<TransferReceipt | null>;
}

/** The slice of an ERC-20 contract the transport calls. */
export interface Erc20Transferable {
  transfer(to: string, amount: bigint): Promise<TransferResponse>;
}

export type Erc20Factory = (token: string) => Erc20Transferable;

/**
 * Sends rewards with ERC-20 `transfer` from the signer's own balance and
 * reports success once the receipt is mined with status 1.
 */
export class Erc20RewardTransport implements RewardTransport {
  private factory: Erc20Factory;

  constructor(factory: Erc20Factory) {
    this.factory = factory;
  }

  static fromSigner(signer: ethers.Signer): Erc20RewardTransport {
    return new Erc20RewardTransport((token) => {
      const contract = new ethers.Contract(token, ERC20_ABI, signer);
      const transfer = contract.getFunction('transfer');
      return {
        transfer: (to, amount) => transfer(to, amount),
      };
    });
  }

  async transfer(token: string, recipient: string, amount: bigint): Promise<boolean> {
    const tx = await this.factory(token).transfer(recipient, amount);
    const receipt = await tx.wait();
    return receipt?.status === 1;
  }
}
