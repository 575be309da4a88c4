import type { Transaction } from './types.js';

export class Mempool {
  private buf: Transaction[] = [];

  add(tx: Transaction) { this.buf.push(tx); }

  // Hands the whole buffer over and starts a fresh one in the same step.
  drain(): Transaction[] {
    const out = this.buf;
    this.buf = [];
    return out;
  }

  snapshot(): Transaction[] { return this.buf.slice(); }
}
