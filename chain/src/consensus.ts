import type { Block, ChainResponse, PeerAddress } from './types.js';
import type { Ledger } from './ledger.js';
import type { PeerRegistry } from './registry.js';
import { formatAddress } from './registry.js';
import { isValidChain, validateChainResponse } from './validation.js';
import { describeError, log } from './log.js';

/** Where the resolver reads a peer's chain from. */
export interface ChainSource {
  fetchChain(peer: PeerAddress): Promise<ChainResponse>;
}

export class PeerRequestError extends Error {
  constructor(readonly peer: string, message: string) {
    super(message);
    this.name = 'PeerRequestError';
  }
}

/** Reads `GET /chain` from a peer's control surface. */
export class HttpChainSource implements ChainSource {
  constructor(private readonly timeoutMs = 5000) {}

  async fetchChain(peer: PeerAddress): Promise<ChainResponse> {
    const address = formatAddress(peer);
    const res = await fetch(`http://${address}/chain`, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) {
      await res.body?.cancel();
      throw new PeerRequestError(address, `Failed to get chain from ${address}. Status code: ${res.status}`);
    }
    const body: unknown = await res.json();
    validateChainResponse(body);
    return body;
  }
}

/**
 * Longest-valid-chain rule over the registered peers. Only a strictly longer
 * chain replaces the local one, so two equally long chains never flap.
 */
export class ConsensusResolver {
  constructor(
    private ledger: Ledger,
    private registry: PeerRegistry,
    private source: ChainSource = new HttpChainSource()
  ) {}

  /**
   * Polls every peer and adopts the longest valid chain found. Unreachable
   * peers and failed responses are logged and skipped.
   * @returns whether the local chain was replaced
   */
  async resolve(): Promise<boolean> {
    let bestLength = this.ledger.length;
    let bestChain: Block[] | undefined;

    for (const peer of this.registry.list()) {
      const address = formatAddress(peer);
      let candidate: ChainResponse;
      try {
        candidate = await this.source.fetchChain(peer);
      } catch (err) {
        log.warn(`Could not fetch chain from ${address}: ${describeError(err)}`);
        continue;
      }

      log.info(`[Consensus] 🔎 Checking chain from ${address}: length=${candidate.length}, best=${bestLength}`);
      if (candidate.length > bestLength && isValidChain(candidate.chain)) {
        bestLength = candidate.length;
        bestChain = candidate.chain;
      }
    }

    if (bestChain && (await this.ledger.replaceChain(bestChain))) {
      log.info(`[Consensus] 🔁 Chain replaced by a longer valid chain (#${bestLength})`);
      return true;
    }

    log.info('[Consensus] 💤 Our chain is already the longest');
    return false;
  }
}
