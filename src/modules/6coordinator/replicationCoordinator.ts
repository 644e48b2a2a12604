import { v5 as uuidv5 } from 'uuid';
import {
  AcceptedWrite,
  CommittedWrite,
  ConsistencyMode,
  ExchangeRequest,
  ExchangeResponse,
  Message,
  MessageInput,
  NodeStatus,
  ReplicateAck
} from '../../types/types';
import { messageInputSchema, parseWith } from '../../types/schemas';
import { MessageStore } from '../1storage/messageStore';
import { VersionClock } from '../1storage/versionClock';
import { ClusterView } from '../2cluster/clusterView';
import { PeerLivenessTracker } from '../2cluster/peerLiveness';
import { PeerRequestHandler, Transport } from '../3transport/transport';
import { QuorumStrategy, ReplicationStrategy } from '../4quorum/quorumStrategy';
import { GossipStrategy } from '../5gossip/gossipStrategy';
import { GossipScheduler, GossipSchedulerOptions } from '../5gossip/gossipScheduler';
import { QuorumNotReachedError, ReplicationError } from '../../utils/errors';
import { logDebug, logInfo } from '../../utils/logger';

export const DEFAULT_USER = 'anonymous';

/** Namespace for name-based message ids. */
export const MESSAGE_ID_NAMESPACE = '3b0f8a52-6c1e-4f7a-9d2b-8e41c5a7f690';

export function messageIdFor(originNode: string, version: number): string {
  return uuidv5(`${originNode}:${version}`, MESSAGE_ID_NAMESPACE);
}

export interface CoordinatorOptions {
  mode: ConsistencyMode;
  store: MessageStore;
  cluster: ClusterView;
  transport: Transport;
  liveness: PeerLivenessTracker;
  gossip: GossipSchedulerOptions;
  clock?: VersionClock;
  now?: () => number;
}

/**
 * Entry point for client writes and inbound peer calls on one node.
 */
export class ReplicationCoordinator implements PeerRequestHandler {
  public readonly mode: ConsistencyMode;
  private store: MessageStore;
  private cluster: ClusterView;
  private liveness: PeerLivenessTracker;
  private clock: VersionClock;
  private now: () => number;
  private strategy: ReplicationStrategy;
  private gossip: GossipStrategy | null = null;
  private scheduler: GossipScheduler | null = null;

  constructor(options: CoordinatorOptions) {
    this.mode = options.mode;
    this.store = options.store;
    this.cluster = options.cluster;
    this.liveness = options.liveness;
    this.now = options.now ?? Date.now;
    this.clock = options.clock ?? new VersionClock(this.now);

    if (options.mode === ConsistencyMode.GOSSIP) {
      this.gossip = new GossipStrategy(this.store, this.cluster, options.transport);
      this.scheduler = new GossipScheduler(this.gossip, this.cluster, options.gossip);
      this.strategy = this.gossip;
    } else {
      this.strategy = new QuorumStrategy(this.store, this.cluster, options.transport);
    }
  }

  public get nodeId(): string {
    return this.cluster.self.id;
  }

  public get gossipScheduler(): GossipScheduler | null {
    return this.scheduler;
  }

  public start() {
    logInfo(`Node ${this.nodeId} running in ${this.mode} mode with ${this.cluster.size} nodes (quorum ${this.cluster.quorumSize})`);
    this.scheduler?.start();
  }

  public stop() {
    this.scheduler?.stop();
  }

  /**
   * Validates and writes a client message.
   *
   * @throws ValidationError when the input is malformed
   * @throws QuorumNotReachedError when a quorum write is rejected
   */
  public async submit(input: unknown): Promise<CommittedWrite | AcceptedWrite> {
    const payload = parseWith(messageInputSchema, input);
    const message = this.createMessage(payload);

    const outcome = await this.strategy.write(message);
    if (outcome.status === 'rejected') {
      throw new QuorumNotReachedError(message.id, outcome.acks, outcome.required, outcome.total);
    }
    return outcome;
  }

  /** This node's view only; other nodes may hold more or fewer messages. */
  public listMessages(): Message[] {
    return this.store.listAll();
  }

  public status(): NodeStatus {
    return {
      nodeId: this.nodeId,
      mode: this.mode,
      clusterSize: this.cluster.size,
      quorumSize: this.cluster.quorumSize,
      messages: this.store.size,
      peers: this.liveness.snapshot()
    };
  }

  public handleReplicate(message: Message): ReplicateAck {
    const added = this.store.append(message);
    logDebug(`Node ${this.nodeId} ${added ? 'stored' : 'already had'} replicated message ${message.id}`);
    return { nodeId: this.nodeId, duplicate: !added };
  }

  public handleExchange(request: ExchangeRequest): ExchangeResponse {
    if (!this.gossip) {
      throw new ReplicationError(
        'MODE_MISMATCH',
        `Node ${this.nodeId} runs in ${this.mode} mode and does not gossip`
      );
    }
    return this.gossip.handleExchange(request);
  }

  private createMessage(payload: MessageInput): Message {
    const originNode = this.nodeId;
    const version = this.clock.next();
    return {
      id: messageIdFor(originNode, version),
      text: payload.text,
      user: payload.user ?? DEFAULT_USER,
      originNode,
      version,
      acceptedAt: this.now()
    };
  }
}
