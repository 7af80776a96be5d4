import { ethers } from 'ethers';
import { config } from '../../config.js';

export function createEthersProvider(rpcUrl?: string): ethers.JsonRpcProvider {
  return new ethers.JsonRpcProvider(rpcUrl || config.rpcUrl, config.chainId);
}

export function createEthersSigner(privateKey: string, rpcUrl?: string): ethers.Wallet {
  const provider = createEthersProvider(rpcUrl);
  return new ethers.Wallet(privateKey, provider);
}
