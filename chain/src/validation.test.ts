import { describe, it, expect, beforeAll } from 'vitest';
import {
  isValidChain,
  validateBlock,
  validateChain,
  validateChainResponse,
  validateTransaction,
  ValidationError,
} from './validation.js';
import type { Block } from './types.js';
import { hashBlock } from './block.js';
import { createGenesisBlock } from './genesis.js';
import { Ledger } from './ledger.js';
import { verify } from './pow.js';
import { mineBlocks } from './test-utils.js';

describe('Block Validation', () => {
  const createValidBlock = (): Block => ({
    index: 2,
    timestamp: 1735689600000,
    transactions: [{ sender: 'addr1', recipient: 'addr2', amount: 100 }],
    proof: 35293,
    previousHash: hashBlock(createGenesisBlock()),
  });

  describe('Structure Validation', () => {
    it('should accept a well-formed block', () => {
      expect(() => validateBlock(createValidBlock())).not.toThrow();
    });

    it('should reject non-object block', () => {
      expect(() => validateBlock(null)).toThrow(ValidationError);
      expect(() => validateBlock(undefined)).toThrow(ValidationError);
      expect(() => validateBlock('string')).toThrow(ValidationError);
      expect(() => validateBlock([])).toThrow(ValidationError);
    });

    it('should reject block with invalid index', () => {
      expect(() => validateBlock({ ...createValidBlock(), index: '2' })).toThrow(ValidationError);
      expect(() => validateBlock({ ...createValidBlock(), index: 0 })).toThrow(ValidationError);
      expect(() => validateBlock({ ...createValidBlock(), index: 1.5 })).toThrow(ValidationError);
    });

    it('should reject block with invalid timestamp', () => {
      expect(() => validateBlock({ ...createValidBlock(), timestamp: -1 })).toThrow(ValidationError);
      expect(() => validateBlock({ ...createValidBlock(), timestamp: 'now' })).toThrow(ValidationError);
    });

    it('should reject block with non-integer proof', () => {
      expect(() => validateBlock({ ...createValidBlock(), proof: 1.5 })).toThrow(ValidationError);
    });

    it('should reject block with missing previousHash', () => {
      const { previousHash: _omitted, ...block } = createValidBlock();
      expect(() => validateBlock(block)).toThrow('Invalid block.previousHash');
    });

    it('should reject block without transactions array', () => {
      expect(() => validateBlock({ ...createValidBlock(), transactions: null })).toThrow(
        'Block missing or invalid transactions array'
      );
    });

    it('should reject block carrying a malformed transaction', () => {
      const block = { ...createValidBlock(), transactions: [{ sender: 'a', recipient: 'b' }] };
      expect(() => validateBlock(block)).toThrow(
        'Invalid transaction in block 2: Invalid transaction.amount: expected number, got undefined'
      );
    });
  });

  describe('Transaction Validation', () => {
    it('should accept the three fields', () => {
      expect(() => validateTransaction({ sender: '0', recipient: 'node', amount: 1 })).not.toThrow();
    });

    it('should reject missing fields', () => {
      expect(() => validateTransaction({ recipient: 'b', amount: 1 })).toThrow('Missing or invalid transaction.sender');
      expect(() => validateTransaction({ sender: 'a', amount: 1 })).toThrow('Missing or invalid transaction.recipient');
      expect(() => validateTransaction({ sender: 'a', recipient: 'b' })).toThrow(ValidationError);
      expect(() => validateTransaction({ sender: 'a', recipient: 'b', amount: '1' })).toThrow(ValidationError);
    });
  });

  describe('Chain responses', () => {
    it('should accept a chain with its length', () => {
      const chain = [createGenesisBlock()];
      expect(() => validateChainResponse({ chain, length: 1 })).not.toThrow();
    });

    it('should reject a length that disagrees with the chain', () => {
      const chain = [createGenesisBlock()];
      expect(() => validateChainResponse({ chain, length: 5 })).toThrow(
        'Chain response length 5 does not match chain of 1 blocks'
      );
    });

    it('should reject a chain that is not an array of blocks', () => {
      expect(() => validateChain({})).toThrow('Chain is not an array');
      expect(() => validateChain([createGenesisBlock(), { index: 2 }])).toThrow(ValidationError);
    });
  });
});

describe('isValidChain', () => {
  let valid: Block[];

  const invalidProofFor = (prior: Block, from: number) => {
    let proof = from + 1;
    while (verify(prior.proof, proof)) proof++;
    return proof;
  };

  beforeAll(async () => {
    const ledger = new Ledger();
    ledger.recordTransaction('alice', 'bob', 5);
    await mineBlocks(ledger, 2);
    ledger.recordTransaction('bob', 'carol', 3);
    await mineBlocks(ledger, 2);
    valid = ledger.chain();
  });

  it('should accept a mined chain', () => {
    expect(valid).toHaveLength(5);
    expect(isValidChain(valid)).toBe(true);
  });

  it('should accept genesis on its own', () => {
    expect(isValidChain([createGenesisBlock()])).toBe(true);
  });

  it('should reject an empty chain', () => {
    expect(isValidChain([])).toBe(false);
  });

  it('should reject a chain rooted at a different genesis', () => {
    const chain = structuredClone(valid);
    chain[0].timestamp = 1;
    expect(isValidChain(chain)).toBe(false);
  });

  it('should not mutate its input', () => {
    const copy = structuredClone(valid);
    isValidChain(copy);
    expect(copy).toEqual(valid);
  });

  for (const position of [1, 2, 3]) {
    describe(`corruption of block #${position + 1}`, () => {
      it('should reject a changed previousHash', () => {
        const chain = structuredClone(valid);
        chain[position].previousHash = '0'.repeat(64);
        expect(isValidChain(chain)).toBe(false);
        expect(isValidChain(chain.slice(0, position))).toBe(true);
      });

      it('should reject a changed proof', () => {
        const chain = structuredClone(valid);
        chain[position].proof = invalidProofFor(chain[position - 1], chain[position].proof);
        expect(isValidChain(chain)).toBe(false);
        expect(isValidChain(chain.slice(0, position))).toBe(true);
      });

      it('should reject changed transactions once a later block commits to them', () => {
        const chain = structuredClone(valid);
        chain[position].transactions.push({ sender: 'mallory', recipient: 'mallory', amount: 1000 });
        expect(isValidChain(chain)).toBe(false);
        expect(isValidChain(chain.slice(0, position))).toBe(true);
      });
    });
  }

  it('should reject an invalid proof on the last block', () => {
    const chain = structuredClone(valid);
    const last = chain.length - 1;
    chain[last].proof = invalidProofFor(chain[last - 1], chain[last].proof);
    expect(isValidChain(chain)).toBe(false);
  });

  it('should reject a gap in the index sequence', () => {
    const chain = structuredClone(valid);
    chain[1].index = 3;
    chain[2].previousHash = hashBlock(chain[1]);
    expect(isValidChain(chain.slice(0, 3))).toBe(false);
  });
});
