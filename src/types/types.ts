export interface Message {
  id: string;
  text: string;
  user: string;
  originNode: string;
  version: number;
  acceptedAt: number;
}

export interface MessageInput {
  text: string;
  user?: string;
}

export enum ConsistencyMode {
  QUORUM = "quorum",
  GOSSIP = "gossip"
}

export interface NodeInfo {
  id: string;
  address: string;
}

/** Versions held per origin node, ascending. */
export type Digest = Record<string, number[]>;

export interface ReplicateAck {
  nodeId: string;
  duplicate: boolean;
}

export interface ExchangeRequest {
  from: string;
  digest: Digest;
  messages?: Message[];
}

export interface ExchangeResponse {
  from: string;
  digest: Digest;
  messages: Message[];
}

export interface PeerLiveness {
  peerId: string;
  reachable: boolean;
  lastSeenAt?: number;
  lastFailure?: string;
}

export interface CommittedWrite {
  status: "committed";
  message: Message;
  acks: number;
  required: number;
  total: number;
  ackedBy: string[];
}

export interface AcceptedWrite {
  status: "accepted";
  message: Message;
}

export interface RejectedWrite {
  status: "rejected";
  message: Message;
  acks: number;
  required: number;
  total: number;
  ackedBy: string[];
}

export type WriteOutcome = CommittedWrite | AcceptedWrite | RejectedWrite;

export interface NodeConfiguration {
  id: string;
  host: string;
  port: number;
  mode: ConsistencyMode;
  peers: NodeInfo[];
  gossipIntervalMs: number;
  gossipJitterMs: number;
  gossipFanout: number;
  requestTimeoutMs: number;
}

export interface NodeStatus {
  nodeId: string;
  mode: ConsistencyMode;
  clusterSize: number;
  quorumSize: number;
  messages: number;
  peers: PeerLiveness[];
}
