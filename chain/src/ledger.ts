import type { Block, Hash, Transaction } from './types.js';
import { hashBlock } from './block.js';
import { createGenesisBlock } from './genesis.js';
import { Mempool } from './mempool.js';
import { Mutex } from './lock.js';
import type { ChainStore } from './store.js';
import { verify } from './pow.js';
import { isValidChain, ValidationError } from './validation.js';
import { describeError, log } from './log.js';

export class StaleTipError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StaleTipError';
  }
}

/**
 * The local chain and the transactions waiting for the next block.
 *
 * Reads are synchronous. Appends and replacements go through one lock so that
 * the in-memory chain and the store are always updated in the same order.
 */
export class Ledger {
  private blocks: Block[];
  private readonly mempool = new Mempool();
  private readonly lock = new Mutex();

  constructor(private readonly store?: ChainStore, chain?: Block[]) {
    this.blocks = chain ?? [createGenesisBlock()];
  }

  /**
   * Restores the chain kept in `store`. When nothing usable is stored the
   * store is seeded with genesis.
   */
  static async open(store: ChainStore): Promise<Ledger> {
    let stored: Block[] | undefined;
    try {
      stored = await store.loadChain();
    } catch (err) {
      log.warn(`Stored chain could not be read, starting again from genesis: ${describeError(err)}`);
    }
    if (stored && isValidChain(stored)) {
      log.info(`💾 Resuming from block #${stored.length} (${hashBlock(stored[stored.length - 1]).slice(0, 10)}…)`);
      return new Ledger(store, stored);
    }
    if (stored) log.warn('Stored chain failed validation, starting again from genesis');
    const ledger = new Ledger(store);
    await store.replaceChain(ledger.blocks);
    return ledger;
  }

  get length() {
    return this.blocks.length;
  }

  lastBlock(): Block {
    return this.blocks[this.blocks.length - 1];
  }

  hash(block: Block): Hash {
    return hashBlock(block);
  }

  chain(): Block[] {
    return structuredClone(this.blocks);
  }

  pending(): Transaction[] {
    return this.mempool.snapshot();
  }

  /** Queues a transaction and returns the index of the block it will land in. */
  recordTransaction(sender: string, recipient: string, amount: number): number {
    this.mempool.add({ sender, recipient, amount });
    return this.lastBlock().index + 1;
  }

  /**
   * Appends a block holding every pending transaction.
   * @param previousHash - tip the proof was searched against; defaults to the current tip
   * @throws StaleTipError if `previousHash` is no longer the hash of the last block
   * @throws ValidationError if `proof` does not solve the last block's proof
   */
  mineBlock(proof: number, previousHash?: Hash): Promise<Block> {
    return this.lock.runExclusive(async () => {
      const last = this.lastBlock();
      const tipHash = hashBlock(last);
      if (previousHash !== undefined && previousHash !== tipHash) {
        throw new StaleTipError(`Tip moved: expected ${previousHash.slice(0, 10)}…, chain ends at ${tipHash.slice(0, 10)}…`);
      }
      if (!verify(last.proof, proof)) {
        throw new ValidationError(`Proof ${proof} does not solve last proof ${last.proof}`);
      }

      const block: Block = {
        index: this.blocks.length + 1,
        timestamp: Date.now(),
        transactions: this.mempool.drain(),
        proof,
        previousHash: tipHash,
      };
      this.blocks.push(block);
      await this.store?.commitBlock(block);
      return block;
    });
  }

  /**
   * Swaps the whole chain for `candidate` when it is strictly longer than the
   * local chain at the moment the lock is taken and passes full validation.
   * Pending transactions are left as they are.
   */
  replaceChain(candidate: readonly Block[]): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      if (candidate.length <= this.blocks.length) return false;
      if (!isValidChain(candidate)) return false;
      this.blocks = structuredClone(candidate.slice());
      await this.store?.replaceChain(this.blocks);
      return true;
    });
  }
}
