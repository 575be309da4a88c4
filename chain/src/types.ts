export type Hash = string;

export interface Transaction {
  sender: string;
  recipient: string;
  amount: number;
}

export interface Block {
  index: number;
  timestamp: number;
  transactions: Transaction[];
  proof: number;
  previousHash: Hash;
}

export type Chain = Block[];

export interface PeerAddress {
  host: string;
  port: number;
}

export interface ChainResponse {
  chain: Chain;
  length: number;
}

interface MessageEnvelope {
  senderHost?: string;
  senderPort?: number;
  relayed?: boolean;
}

export type PeerMessage =
  | (MessageEnvelope & { type: 'NEW_BLOCK'; payload: Block })
  | (MessageEnvelope & { type: 'NEW_TRANSACTION'; payload: Transaction })
  | (MessageEnvelope & { type: 'REQUEST_CHAIN'; senderHost: string; senderPort: number })
  | (MessageEnvelope & { type: 'RESPOND_CHAIN'; payload: ChainResponse })
  | (MessageEnvelope & { type: 'UNKNOWN'; rawType: string });
