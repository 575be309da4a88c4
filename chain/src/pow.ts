import { setImmediate as yieldToLoop } from 'timers/promises';
import { sha256Hex } from './block.js';

export const DIFFICULTY_PREFIX = '0000';

export class MiningAbortedError extends Error {
  constructor(message = 'Mining aborted') {
    super(message);
    this.name = 'MiningAbortedError';
  }
}

export interface SolveOptions {
  signal?: AbortSignal;
  /** Candidates tried between two yields to the event loop. */
  batchSize?: number;
}

export function verify(lastProof: number, proof: number): boolean {
  return sha256Hex(`${lastProof}${proof}`).startsWith(DIFFICULTY_PREFIX);
}

/**
 * Finds the smallest non-negative proof whose digest, combined with
 * `lastProof`, starts with {@link DIFFICULTY_PREFIX}. The search is sequential
 * and unbounded; it only stops early when `signal` aborts.
 */
export async function solve(lastProof: number, options: SolveOptions = {}): Promise<number> {
  const { signal, batchSize = 5000 } = options;
  let candidate = 0;
  for (;;) {
    if (signal?.aborted) throw new MiningAbortedError();
    const end = candidate + batchSize;
    for (; candidate < end; candidate++) {
      if (verify(lastProof, candidate)) return candidate;
    }
    await yieldToLoop();
  }
}
