import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'http';
import express, { type Express } from 'express';
import { createRpcApp } from './rpc.js';
import { LedgerNode } from './node.js';
import { Ledger } from './ledger.js';
import { PeerRegistry } from './registry.js';
import { ConsensusResolver, HttpChainSource, PeerRequestError } from './consensus.js';
import { hashBlock } from './block.js';
import { InMemoryChainSource, mineBlocks } from './test-utils.js';
import type { PeerMessage } from './types.js';
import { ValidationError } from './validation.js';

const listen = (app: Express) =>
  new Promise<{ server: Server; port: number }>((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') reject(new Error('server has no port'));
      else resolve({ server, port: address.port });
    });
  });

const close = (server: Server) =>
  new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));

describe('Control surface', () => {
  let server: Server;
  let base: string;
  let port: number;
  let node: LedgerNode;
  let source: InMemoryChainSource;
  let sent: PeerMessage[];

  beforeEach(async () => {
    const ledger = new Ledger();
    const registry = new PeerRegistry();
    source = new InMemoryChainSource();
    node = new LedgerNode('node-a', ledger, registry, new ConsensusResolver(ledger, registry, source));
    sent = [];
    node.broadcaster = {
      broadcast: async (message) => {
        sent.push(message);
        return 0;
      },
    };
    vi.spyOn(console, 'error').mockImplementation(() => { });

    ({ server, port } = await listen(createRpcApp(node)));
    base = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await close(server);
  });

  const post = (path: string, body: unknown) =>
    fetch(`${base}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  it('GET /chain returns the chain and its length', async () => {
    const res = await fetch(`${base}/chain`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      chain: [{ index: 1, timestamp: 0, transactions: [], proof: 100, previousHash: '1' }],
      length: 1,
    });
  });

  it('POST /transactions/new records and broadcasts the transaction', async () => {
    const res = await post('/transactions/new', { sender: 'alice', recipient: 'bob', amount: 5 });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ message: 'Transaction will be added to Block 2' });
    expect(node.ledger.pending()).toEqual([{ sender: 'alice', recipient: 'bob', amount: 5 }]);
    expect(sent).toEqual([{ type: 'NEW_TRANSACTION', payload: { sender: 'alice', recipient: 'bob', amount: 5 } }]);
  });

  it('POST /transactions/new rejects missing fields', async () => {
    const res = await post('/transactions/new', { sender: 'alice', amount: 5 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Missing or invalid transaction.recipient' });
    expect(node.ledger.pending()).toEqual([]);
    expect(sent).toEqual([]);
  });

  it('rejects a malformed JSON body', async () => {
    const res = await fetch(`${base}/transactions/new`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"sender":',
    });
    expect(res.status).toBe(400);
  });

  it('GET /mine forges a block paying this node', async () => {
    const genesisHash = hashBlock(node.ledger.lastBlock());
    const res = await fetch(`${base}/mine`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: 'New Block Forged',
      index: 2,
      transactions: [{ sender: '0', recipient: 'node-a', amount: 1 }],
      proof: 35293,
      previousHash: genesisHash,
    });
    expect(sent.map(m => m.type)).toEqual(['NEW_BLOCK']);
  });

  it('POST /nodes/register normalizes and deduplicates', async () => {
    const res = await post('/nodes/register', { nodes: ['http://127.0.0.1:5001', '127.0.0.1:5001', '127.0.0.1:5002'] });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      message: 'New nodes have been added',
      totalNodes: ['127.0.0.1:5001', '127.0.0.1:5002'],
    });
  });

  it('POST /nodes/register requires a list of nodes', async () => {
    const res = await post('/nodes/register', { peers: [] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Please supply a valid list of nodes' });
  });

  it('POST /nodes/register rejects an address without a port', async () => {
    const res = await post('/nodes/register', { nodes: ['10.0.0.1'] });
    expect(res.status).toBe(400);
    expect(node.peers()).toEqual([]);
  });

  it('GET /nodes/resolve reports an authoritative chain', async () => {
    const res = await fetch(`${base}/nodes/resolve`);
    expect(await res.json()).toEqual({
      message: 'Our chain is authoritative',
      chain: node.ledger.chain(),
    });
  });

  it('GET /nodes/resolve reports a replacement', async () => {
    const peer = new Ledger();
    await mineBlocks(peer, 1);
    source.serveLedger('127.0.0.1:5001', peer);
    node.registry.register('127.0.0.1:5001');

    const res = await fetch(`${base}/nodes/resolve`);
    expect(await res.json()).toEqual({
      message: 'Our chain was replaced',
      newChain: peer.chain(),
    });
  });

  describe('HttpChainSource', () => {
    it('reads a peer chain from GET /chain', async () => {
      await mineBlocks(node.ledger, 1);
      const response = await new HttpChainSource(2000).fetchChain({ host: '127.0.0.1', port });
      expect(response).toEqual({ chain: node.ledger.chain(), length: 2 });
    });

    it('fails on a non-success status', async () => {
      const app = express();
      app.get('/chain', (_req, res) => { res.status(503).end(); });
      const broken = await listen(app);
      try {
        await expect(new HttpChainSource(2000).fetchChain({ host: '127.0.0.1', port: broken.port })).rejects.toThrow(
          new PeerRequestError(`127.0.0.1:${broken.port}`, `Failed to get chain from 127.0.0.1:${broken.port}. Status code: 503`)
        );
      } finally {
        await close(broken.server);
      }
    });

    it('releases the response body before failing on a bad status', async () => {
      const cancel = vi.fn();
      const body = new ReadableStream<Uint8Array>({ cancel });
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response(body, { status: 500 }));

      await expect(new HttpChainSource(2000).fetchChain({ host: '10.0.0.7', port: 5000 })).rejects.toThrow(
        'Failed to get chain from 10.0.0.7:5000. Status code: 500'
      );
      expect(cancel).toHaveBeenCalledTimes(1);
    });

    it('fails on a body that is not a chain', async () => {
      const app = express();
      app.get('/chain', (_req, res) => { res.json({ chain: [{ index: 1 }], length: 1 }); });
      const broken = await listen(app);
      try {
        await expect(new HttpChainSource(2000).fetchChain({ host: '127.0.0.1', port: broken.port }))
          .rejects.toBeInstanceOf(ValidationError);
      } finally {
        await close(broken.server);
      }
    });
  });
});
