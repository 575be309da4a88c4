import type { PeerAddress } from './types.js';

/** A peer's transport listens this far above its control-surface port. */
export const P2P_PORT_OFFSET = 1000;

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

export class InvalidPeerAddressError extends Error {
  constructor(readonly address: string) {
    super(`Invalid peer address: could not parse host and port from '${address}'. Ensure it includes host:port.`);
    this.name = 'InvalidPeerAddressError';
  }
}

export function formatAddress(address: PeerAddress): string {
  return `${address.host}:${address.port}`;
}

/**
 * Parses `host:port` or a scheme-qualified URL such as `http://10.0.0.5:5000/`
 * into a host/port pair. The port must be given explicitly.
 * @throws InvalidPeerAddressError
 */
export function parsePeerAddress(raw: string): PeerAddress {
  const trimmed = raw.trim();
  const withScheme = SCHEME.test(trimmed) ? trimmed : `http://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new InvalidPeerAddressError(raw);
  }

  // URL drops a port equal to the scheme default, so read it back from the authority.
  const authority = withScheme.slice(withScheme.indexOf('//') + 2).split(/[/?#]/, 1)[0];
  const explicitPort = /:(\d+)$/.exec(authority)?.[1];
  const port = Number(url.port || explicitPort);

  if (!url.hostname || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidPeerAddressError(raw);
  }
  return { host: url.hostname, port };
}

export function toP2PEndpoint(address: PeerAddress): PeerAddress {
  return { host: address.host, port: address.port + P2P_PORT_OFFSET };
}

/** Known peers keyed by their normalized control-surface address. */
export class PeerRegistry {
  private peers = new Map<string, PeerAddress>();

  register(raw: string): PeerAddress {
    const address = parsePeerAddress(raw);
    const key = formatAddress(address);
    if (!this.peers.has(key)) this.peers.set(key, address);
    return address;
  }

  has(raw: string): boolean {
    return this.peers.has(formatAddress(parsePeerAddress(raw)));
  }

  list(): PeerAddress[] {
    return Array.from(this.peers.values(), p => ({ ...p }));
  }

  get size() {
    return this.peers.size;
  }
}
