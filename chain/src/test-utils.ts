import type { Block, ChainResponse, PeerAddress } from './types.js';
import type { ChainSource } from './consensus.js';
import { Ledger } from './ledger.js';
import { formatAddress } from './registry.js';
import { solve } from './pow.js';

export async function mineBlocks(ledger: Ledger, count: number): Promise<Block[]> {
  const mined: Block[] = [];
  for (let i = 0; i < count; i++) {
    const proof = await solve(ledger.lastBlock().proof);
    mined.push(await ledger.mineBlock(proof));
  }
  return mined;
}

/** Serves chains for peers of an in-process network, keyed by `host:port`. */
export class InMemoryChainSource implements ChainSource {
  private peers = new Map<string, () => ChainResponse>();
  readonly requested: string[] = [];

  serveLedger(address: string, ledger: Ledger) {
    this.peers.set(address, () => {
      const chain = ledger.chain();
      return { chain, length: chain.length };
    });
  }

  serveChain(address: string, chain: Block[]) {
    this.peers.set(address, () => ({ chain: structuredClone(chain), length: chain.length }));
  }

  async fetchChain(peer: PeerAddress): Promise<ChainResponse> {
    const address = formatAddress(peer);
    this.requested.push(address);
    const serve = this.peers.get(address);
    if (!serve) throw new Error(`connect ECONNREFUSED ${address}`);
    return serve();
  }
}
