// chain/src/p2p.ts
import { createLibp2p, type Libp2p } from "libp2p";
import { tcp } from "@libp2p/tcp";
import { noise } from "@chainsafe/libp2p-noise";
import { yamux } from "@chainsafe/libp2p-yamux";
import { identify, type Identify } from "@libp2p/identify";
import { multiaddr, type Multiaddr } from "@multiformats/multiaddr";
import * as lp from "it-length-prefixed";
import type { Uint8ArrayList } from "uint8arraylist";
import { isIPv4, isIPv6 } from "net";
import type { PeerAddress, PeerMessage } from "./types.js";
import type { Ledger } from "./ledger.js";
import type { ConsensusResolver } from "./consensus.js";
import { formatAddress, toP2PEndpoint, type PeerRegistry } from "./registry.js";
import { decodeMessage, encodeMessage, MAX_MESSAGE_BYTES } from "./messages.js";
import { ValidationError } from "./validation.js";
import { describeError, log } from "./log.js";

export const MESSAGE_PROTOCOL = "/powchain/message/1.0.0";

/** Fan-out used by the node facade to propagate what it produces locally. */
export interface Broadcaster {
  broadcast(message: PeerMessage, exclude?: PeerAddress): Promise<number>;
}

export interface TransportOptions {
  host: string;
  port: number;
  /** Bound on dialing a peer and writing one message, and on reading one. */
  timeoutMs?: number;
}

interface InboundStream {
  source: AsyncIterable<Uint8ArrayList>;
  close(): Promise<void>;
  abort(err: Error): void;
}

export function toMultiaddr({ host, port }: PeerAddress): Multiaddr {
  const bare = host.replace(/^\[|\]$/g, "");
  const proto = isIPv4(bare) ? "ip4" : isIPv6(bare) ? "ip6" : "dns4";
  return multiaddr(`/${proto}/${bare}/tcp/${port}`);
}

/** Settles with `task`, or rejects once `signal` fires, whichever comes first. */
function withDeadline<T>(task: Promise<T>, signal: AbortSignal, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error(`timed out after ${timeoutMs}ms`));
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
    void task.then(
      value => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

function isLoopback(host: string): boolean {
  const bare = host.replace(/^\[|\]$/g, "");
  return bare === "localhost" || bare === "::1" || bare.startsWith("127.");
}

async function readFrame(source: AsyncIterable<Uint8ArrayList>): Promise<Uint8Array | undefined> {
  for await (const frame of lp.decode(source, { maxDataLength: MAX_MESSAGE_BYTES })) {
    return frame.subarray();
  }
  return undefined;
}

/**
 * One message per stream: the listener reads a single length-prefixed JSON
 * frame and dispatches it, the sender dials, writes one frame and closes.
 */
export class PeerTransport implements Broadcaster {
  node?: Libp2p<{ identify: Identify }>;
  private stopping = false;
  private readonly timeoutMs: number;

  constructor(
    private ledger: Ledger,
    private registry: PeerRegistry,
    private resolver: ConsensusResolver,
    private options: TransportOptions
  ) {
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  get endpoint(): PeerAddress {
    return { host: this.options.host, port: this.options.port };
  }

  async start() {
    this.stopping = false;
    this.node = await createLibp2p({
      start: false,
      addresses: { listen: [toMultiaddr(this.endpoint).toString()] },
      transports: [tcp()],
      connectionEncrypters: [noise()],
      streamMuxers: [yamux()],
      services: {
        identify: identify(),
      },
    });

    await this.node.handle(MESSAGE_PROTOCOL, ({ stream, connection }) => {
      void this.receive(stream, connection.remoteAddr.toString());
    });

    await this.node.start();
    log.info(`🏁 P2P listening on ${formatAddress(this.endpoint)} (${this.node.peerId.toString()})`);
  }

  async stop() {
    this.stopping = true;
    if (this.node) await this.node.stop();
    log.info(`🛑 P2P on ${formatAddress(this.endpoint)} stopped`);
  }

  private async receive(stream: InboundStream, from: string): Promise<void> {
    let bytes: Uint8Array | undefined;
    try {
      bytes = await withDeadline(readFrame(stream.source), AbortSignal.timeout(this.timeoutMs), this.timeoutMs);
    } catch (err) {
      stream.abort(err instanceof Error ? err : new Error(describeError(err)));
      log.warn(`[P2P] Dropped stream from ${from}: ${describeError(err)}`);
      return;
    }

    try {
      if (!bytes) return;
      await this.handleMessage(decodeMessage(bytes));
    } catch (err) {
      if (err instanceof ValidationError) {
        log.warn(`[P2P] Dropped malformed message from ${from}: ${err.message}`);
      } else {
        log.error(`[P2P] Error handling message from ${from}`, err);
      }
    } finally {
      await withDeadline(stream.close(), AbortSignal.timeout(this.timeoutMs), this.timeoutMs).catch((err: unknown) => {
        stream.abort(err instanceof Error ? err : new Error(describeError(err)));
        log.warn(`[P2P] Could not close stream from ${from}: ${describeError(err)}`);
      });
    }
  }

  async handleMessage(message: PeerMessage): Promise<void> {
    switch (message.type) {
      case "NEW_BLOCK": {
        log.info(`[P2P] 📦 Received block #${message.payload.index}, resolving against peers`);
        await this.resolver.resolve();
        break;
      }
      case "NEW_TRANSACTION": {
        const { sender, recipient, amount } = message.payload;
        const index = this.ledger.recordTransaction(sender, recipient, amount);
        log.info(`[P2P] 💸 Recorded transaction from peer for block #${index}`);
        if (!message.relayed) {
          await this.broadcast({ type: "NEW_TRANSACTION", payload: message.payload, relayed: true }, senderOf(message));
        }
        break;
      }
      case "REQUEST_CHAIN": {
        const chain = this.ledger.chain();
        await this.send(
          { host: message.senderHost, port: message.senderPort },
          { type: "RESPOND_CHAIN", payload: { chain, length: chain.length } }
        );
        break;
      }
      case "RESPOND_CHAIN": {
        const replaced = await this.ledger.replaceChain(message.payload.chain);
        if (replaced) log.info(`[P2P] 🔁 Updated chain from peer response (#${message.payload.length})`);
        break;
      }
      case "UNKNOWN":
        log.warn(`[P2P] Unknown message type: ${message.rawType}`);
        break;
    }
  }

  /**
   * Delivers one message to a P2P endpoint. Failures are logged and reported
   * as `false`, never thrown.
   */
  async send(endpoint: PeerAddress, message: PeerMessage): Promise<boolean> {
    const target = formatAddress(endpoint);
    if (!this.node || this.stopping) return false;
    try {
      const signal = AbortSignal.timeout(this.timeoutMs);
      const stream = await this.node.dialProtocol(toMultiaddr(endpoint), MESSAGE_PROTOCOL, { signal });
      try {
        await withDeadline(stream.sink(lp.encode([encodeMessage(this.stamp(message))])), signal, this.timeoutMs);
        await withDeadline(stream.close(), signal, this.timeoutMs);
      } catch (err) {
        stream.abort(err instanceof Error ? err : new Error(describeError(err)));
        throw err;
      }
      log.info(`[P2P] 📤 Sent ${message.type} to ${target}`);
      return true;
    } catch (err) {
      log.warn(`[P2P] Could not deliver ${message.type} to ${target}: ${describeError(err)}`);
      return false;
    }
  }

  /**
   * Sends `message` to the P2P endpoint of every registered peer except
   * `exclude` and this node. Each peer is tried independently.
   *
   * This node is recognized by its P2P port on a loopback host or on the
   * configured host, however its entry was spelled at registration.
   * @returns number of peers the message reached
   */
  async broadcast(message: PeerMessage, exclude?: PeerAddress): Promise<number> {
    const skip = exclude ? formatAddress(exclude) : undefined;
    const targets = this.registry
      .list()
      .map(toP2PEndpoint)
      .filter(endpoint => !this.isSelf(endpoint) && formatAddress(endpoint) !== skip);
    const delivered = await Promise.all(targets.map(endpoint => this.send(endpoint, message)));
    return delivered.filter(Boolean).length;
  }

  private isSelf({ host, port }: PeerAddress): boolean {
    return port === this.options.port && (host === this.options.host || isLoopback(host));
  }

  requestChain(endpoint: PeerAddress): Promise<boolean> {
    return this.send(endpoint, { type: "REQUEST_CHAIN", ...this.endpointFields() });
  }

  private endpointFields() {
    return { senderHost: this.options.host, senderPort: this.options.port };
  }

  private stamp(message: PeerMessage): PeerMessage {
    return { ...message, ...this.endpointFields() };
  }

  getMultiaddrs(): string[] {
    return this.node ? this.node.getMultiaddrs().map(ma => ma.toString()) : [];
  }
}

function senderOf(message: PeerMessage): PeerAddress | undefined {
  return message.senderHost !== undefined && message.senderPort !== undefined
    ? { host: message.senderHost, port: message.senderPort }
    : undefined;
}
