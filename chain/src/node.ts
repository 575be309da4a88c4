import type { Block } from './types.js';
import type { Ledger } from './ledger.js';
import { StaleTipError } from './ledger.js';
import type { ConsensusResolver } from './consensus.js';
import { formatAddress, type PeerRegistry } from './registry.js';
import type { Broadcaster } from './p2p.js';
import { solve } from './pow.js';
import { validateTransaction } from './validation.js';
import { log } from './log.js';

/** Sender of the transaction that pays a miner for a new block. */
export const REWARD_SENDER = '0';
export const MINING_REWARD = 1;

export interface ResolveResult {
  replaced: boolean;
  chain: Block[];
}

/**
 * One node: the ledger and peer set it owns plus the operations the control
 * surface exposes. Outbound propagation goes through `broadcaster` when one is
 * attached.
 */
export class LedgerNode {
  broadcaster?: Broadcaster;

  constructor(
    readonly nodeId: string,
    readonly ledger: Ledger,
    readonly registry: PeerRegistry,
    readonly resolver: ConsensusResolver
  ) {}

  /**
   * Searches a proof for the current tip, pays the reward and appends the
   * block. When the tip changes during the search the proof is stale and the
   * search starts over on the new tip.
   */
  async mine(signal?: AbortSignal): Promise<Block> {
    let rewarded = false;
    for (;;) {
      const last = this.ledger.lastBlock();
      const tipHash = this.ledger.hash(last);
      const proof = await solve(last.proof, { signal });

      if (this.ledger.hash(this.ledger.lastBlock()) !== tipHash) {
        log.info('[Miner] ⏭  Tip moved during proof search, retrying');
        continue;
      }

      // A retry keeps the reward already queued by the first attempt.
      if (!rewarded) {
        this.ledger.recordTransaction(REWARD_SENDER, this.nodeId, MINING_REWARD);
        rewarded = true;
      }
      let block: Block;
      try {
        block = await this.ledger.mineBlock(proof, tipHash);
      } catch (err) {
        if (!(err instanceof StaleTipError)) throw err;
        log.info('[Miner] ⏭  Tip moved before append, retrying');
        continue;
      }

      log.info(`[Miner] 🔨 Forged block #${block.index} (${this.ledger.hash(block).slice(0, 10)}…)`);
      await this.broadcaster?.broadcast({ type: 'NEW_BLOCK', payload: block });
      return block;
    }
  }

  /**
   * Records a transaction submitted through the control surface.
   * @throws ValidationError if a field is missing
   * @returns index of the block the transaction is expected to land in
   */
  async submitTransaction(input: unknown): Promise<number> {
    validateTransaction(input);
    const { sender, recipient, amount } = input;
    const index = this.ledger.recordTransaction(sender, recipient, amount);
    await this.broadcaster?.broadcast({ type: 'NEW_TRANSACTION', payload: { sender, recipient, amount } });
    return index;
  }

  /**
   * Registers every address; stops at the first invalid one.
   * @throws InvalidPeerAddressError
   */
  registerNodes(addresses: readonly string[]): string[] {
    for (const address of addresses) this.registry.register(address);
    return this.peers();
  }

  peers(): string[] {
    return this.registry.list().map(formatAddress);
  }

  async resolve(): Promise<ResolveResult> {
    const replaced = await this.resolver.resolve();
    return { replaced, chain: this.ledger.chain() };
  }
}
