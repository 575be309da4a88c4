import type { Block, ChainResponse, Transaction } from './types.js';
import { hashBlock } from './block.js';
import { verify } from './pow.js';
import { GENESIS_BLOCK } from './genesis.js';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Checks that an untrusted value carries the three transaction fields.
 * Transactions are opaque to the ledger, so only presence and primitive types
 * are checked.
 */
export function validateTransaction(tx: unknown): asserts tx is Transaction {
  if (!isRecord(tx)) {
    throw new ValidationError('Transaction is not an object');
  }
  if (typeof tx.sender !== 'string' || !tx.sender) {
    throw new ValidationError('Missing or invalid transaction.sender');
  }
  if (typeof tx.recipient !== 'string' || !tx.recipient) {
    throw new ValidationError('Missing or invalid transaction.recipient');
  }
  if (typeof tx.amount !== 'number' || !Number.isFinite(tx.amount)) {
    throw new ValidationError(`Invalid transaction.amount: expected number, got ${typeof tx.amount}`);
  }
}

/**
 * Validates the shape of a block received from a peer.
 * @throws ValidationError if a field is missing or of the wrong type
 */
export function validateBlock(block: unknown): asserts block is Block {
  if (!isRecord(block)) {
    throw new ValidationError('Block is not an object');
  }

  if (typeof block.index !== 'number' || block.index < 1 || !Number.isInteger(block.index)) {
    throw new ValidationError(`Invalid block.index: expected positive integer, got ${String(block.index)}`);
  }

  if (typeof block.timestamp !== 'number' || block.timestamp < 0) {
    throw new ValidationError(`Invalid block.timestamp: expected non-negative number, got ${String(block.timestamp)}`);
  }

  if (typeof block.proof !== 'number' || !Number.isInteger(block.proof)) {
    throw new ValidationError(`Invalid block.proof: expected integer, got ${String(block.proof)}`);
  }

  if (typeof block.previousHash !== 'string' || !block.previousHash) {
    throw new ValidationError(`Invalid block.previousHash: expected non-empty string, got ${typeof block.previousHash}`);
  }

  const txs: unknown = block.transactions;
  if (!Array.isArray(txs)) {
    throw new ValidationError('Block missing or invalid transactions array');
  }

  for (const tx of txs) {
    try {
      validateTransaction(tx);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError(`Invalid transaction in block ${String(block.index)}: ${reason}`);
    }
  }
}

export function validateChain(chain: unknown): asserts chain is Block[] {
  if (!Array.isArray(chain)) {
    throw new ValidationError('Chain is not an array');
  }
  chain.forEach((block: unknown) => validateBlock(block));
}

/**
 * Decodes a `{ chain, length }` body served by a peer. The advertised length
 * must agree with the chain it accompanies.
 */
export function validateChainResponse(body: unknown): asserts body is ChainResponse {
  if (!isRecord(body)) {
    throw new ValidationError('Chain response is not an object');
  }
  const chain: unknown = body.chain;
  validateChain(chain);
  if (typeof body.length !== 'number' || body.length !== chain.length) {
    throw new ValidationError(`Chain response length ${String(body.length)} does not match chain of ${chain.length} blocks`);
  }
}

/**
 * Longest-chain gate for chains of untrusted origin. Never mutates its input.
 *
 * A chain is valid when it is non-empty, starts with a block hashing to the
 * local genesis, and every later block sits at the next index, links to the
 * hash of its predecessor and carries a proof that verifies against the
 * predecessor's proof.
 */
export function isValidChain(chain: readonly Block[], genesis: Readonly<Block> = GENESIS_BLOCK): boolean {
  if (chain.length === 0) return false;

  if (hashBlock(chain[0]) !== hashBlock(genesis)) return false;

  for (let i = 1; i < chain.length; i++) {
    const prior = chain[i - 1];
    const block = chain[i];
    if (block.index !== prior.index + 1) return false;
    if (block.previousHash !== hashBlock(prior)) return false;
    if (!verify(prior.proof, block.proof)) return false;
  }
  return true;
}
