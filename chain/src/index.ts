import 'dotenv/config';
import os from 'os';
import path from 'path';
import { loadConfig } from './config.js';
import { Ledger } from './ledger.js';
import { ChainStore } from './store.js';
import { PeerRegistry, toP2PEndpoint } from './registry.js';
import { ConsensusResolver, HttpChainSource } from './consensus.js';
import { PeerTransport } from './p2p.js';
import { LedgerNode } from './node.js';
import { startRpc } from './rpc.js';
import { hashBlock } from './block.js';
import { describeError, log } from './log.js';

(async () => {
  const config = loadConfig();

  log.info(`Powchain node`);
  log.info(`✌️  version 0.1.0`);
  log.info(`🏷  Node identifier: ${config.nodeId}`);
  log.info(`💻 Operating system: ${os.type().toLowerCase()} ${os.arch()}`);

  const store = config.dataDir ? new ChainStore(config.dataDir) : undefined;
  if (config.dataDir) log.info(`💾 Database: LevelDB at ${path.resolve(config.dataDir)}`);
  const ledger = store ? await Ledger.open(store) : new Ledger();
  const tip = ledger.lastBlock();
  log.info(`📋 Best: #${tip.index} (${hashBlock(tip).slice(0, 10)}…)`);

  const registry = new PeerRegistry();
  for (const peer of config.peers) {
    try {
      registry.register(peer);
    } catch (err) {
      log.warn(`Skipping configured peer: ${describeError(err)}`);
    }
  }

  const resolver = new ConsensusResolver(ledger, registry, new HttpChainSource(config.peerTimeoutMs));
  const transport = new PeerTransport(ledger, registry, resolver, {
    host: config.host,
    port: config.p2pPort,
    timeoutMs: config.peerTimeoutMs,
  });
  const node = new LedgerNode(config.nodeId, ledger, registry, resolver);
  node.broadcaster = transport;

  await transport.start();
  const server = await startRpc(node, config.rpcPort);

  // Ask every configured peer for its chain; longer valid answers replace ours.
  await Promise.all(registry.list().map(peer => transport.requestChain(toP2PEndpoint(peer))));

  const shutdown = async () => {
    log.info('👋 Shutting down');
    server.close();
    await transport.stop();
    await store?.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      log.error('Shutdown failed', err);
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
})().catch((err: unknown) => {
  log.error('Node failed to start', err);
  process.exit(1);
});
