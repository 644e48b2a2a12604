import {
  AcceptedWrite,
  ConsistencyMode,
  ExchangeRequest,
  ExchangeResponse,
  Message,
  NodeInfo
} from '../../types/types';
import { MessageStore } from '../1storage/messageStore';
import { ClusterView } from '../2cluster/clusterView';
import { Transport } from '../3transport/transport';
import { ReplicationStrategy } from '../4quorum/quorumStrategy';
import { logDebug, logInfo } from '../../utils/logger';

/** Serialized message bytes per push, kept well under the peer's body limit. */
export const DEFAULT_MAX_PUSH_BYTES = 512 * 1024;

export interface GossipStrategyOptions {
  maxPushBytes?: number;
}

export interface ExchangeSummary {
  peerId: string;
  received: number;
  sent: number;
}

/**
 * Local-first writes with push-pull anti-entropy.
 *
 * Each side summarises what it holds as the versions it has per origin. An
 * exchange pulls whatever our summary lacks from the peer, then pushes back
 * whatever the peer's summary lacks, in batches bounded by `maxPushBytes`.
 */
export class GossipStrategy implements ReplicationStrategy {
  public readonly mode = ConsistencyMode.GOSSIP;

  private store: MessageStore;
  private cluster: ClusterView;
  private transport: Transport;
  private maxPushBytes: number;

  constructor(
    store: MessageStore,
    cluster: ClusterView,
    transport: Transport,
    options: GossipStrategyOptions = {}
  ) {
    this.store = store;
    this.cluster = cluster;
    this.transport = transport;
    this.maxPushBytes = options.maxPushBytes ?? DEFAULT_MAX_PUSH_BYTES;
  }

  public async write(message: Message): Promise<AcceptedWrite> {
    this.store.append(message);
    logDebug(`Node ${this.cluster.self.id} accepted ${message.id} locally, propagation deferred`);
    return { status: 'accepted', message };
  }

  public async syncWith(peer: NodeInfo): Promise<ExchangeSummary> {
    const selfId = this.cluster.self.id;

    const pulled = await this.transport.exchange(peer, {
      from: selfId,
      digest: this.store.digest()
    });
    let received = this.store.merge(pulled.messages);

    const toPush = this.store.missingFrom(pulled.digest);
    for (const batch of batchBySize(toPush, this.maxPushBytes)) {
      const pushed = await this.transport.exchange(peer, {
        from: selfId,
        digest: this.store.digest(),
        messages: batch
      });
      received += this.store.merge(pushed.messages);
    }

    if (received > 0 || toPush.length > 0) {
      logInfo(`Gossip with ${peer.id}: merged ${received} messages, pushed ${toPush.length}`);
    }

    return { peerId: peer.id, received, sent: toPush.length };
  }

  public handleExchange(request: ExchangeRequest): ExchangeResponse {
    if (request.messages && request.messages.length > 0) {
      const merged = this.store.merge(request.messages);
      if (merged > 0) {
        logInfo(`Gossip merged ${merged} messages pushed by ${request.from}`);
      }
    }

    return {
      from: this.cluster.self.id,
      digest: this.store.digest(),
      messages: this.store.missingFrom(request.digest)
    };
  }
}

/**
 * Splits messages into consecutive batches whose JSON size stays within
 * `maxBytes`. A message larger than that travels alone.
 */
export function batchBySize(messages: Message[], maxBytes: number): Message[][] {
  const batches: Message[][] = [];
  let current: Message[] = [];
  let currentBytes = 0;

  for (const message of messages) {
    const bytes = Buffer.byteLength(JSON.stringify(message));
    if (current.length > 0 && currentBytes + bytes > maxBytes) {
      batches.push(current);
      current = [];
      currentBytes = 0;
    }
    current.push(message);
    currentBytes += bytes;
  }

  if (current.length > 0) {
    batches.push(current);
  }
  return batches;
}
