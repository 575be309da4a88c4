import type { Block } from './types.js';

// Fixed content so every node derives the same genesis hash.
export const GENESIS_BLOCK: Readonly<Block> = Object.freeze({
  index: 1,
  timestamp: 0,
  transactions: [],
  proof: 100,
  previousHash: '1',
});

export function createGenesisBlock(): Block {
  return { ...GENESIS_BLOCK, transactions: [] };
}
