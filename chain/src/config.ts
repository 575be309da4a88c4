import crypto from 'crypto';
import { P2P_PORT_OFFSET } from './registry.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface NodeConfig {
  nodeId: string;
  host: string;
  rpcPort: number;
  p2pPort: number;
  /** `undefined` keeps the chain in memory only. */
  dataDir?: string;
  peers: string[];
  peerTimeoutMs: number;
}

function parsePort(name: string, value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`${name} must be a port number, got '${value}'`);
  }
  return port;
}

/**
 * Reads the node configuration. Positional arguments `<rpcPort> [p2pPort]`
 * take precedence over `RPC_PORT` and `P2P_PORT`; the P2P port defaults to the
 * control port plus {@link P2P_PORT_OFFSET}, which is where peers look for it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = process.argv.slice(2)): NodeConfig {
  const rpcPort = parsePort('RPC_PORT', argv[0] ?? env.RPC_PORT ?? '5000');
  const p2pPort = parsePort('P2P_PORT', argv[1] ?? env.P2P_PORT ?? String(rpcPort + P2P_PORT_OFFSET));

  const timeout = Number(env.PEER_TIMEOUT_MS ?? 5000);
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigError(`PEER_TIMEOUT_MS must be a positive number, got '${env.PEER_TIMEOUT_MS}'`);
  }

  const persist = env.PERSIST !== 'false';

  return {
    nodeId: env.NODE_ID || crypto.randomUUID().replace(/-/g, ''),
    host: env.HOST || '127.0.0.1',
    rpcPort,
    p2pPort,
    dataDir: persist ? env.DATA_DIR || `./data/${rpcPort}` : undefined,
    peers: (env.PEERS || '').split(',').map(p => p.trim()).filter(p => p.length > 0),
    peerTimeoutMs: timeout,
  };
}
