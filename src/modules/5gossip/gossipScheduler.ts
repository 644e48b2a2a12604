import { NodeInfo } from '../../types/types';
import { ClusterView } from '../2cluster/clusterView';
import { GossipStrategy } from './gossipStrategy';
import { describeError } from '../../utils/errors';
import { logDebug, logError, logInfo, logWarning } from '../../utils/logger';

export interface GossipSchedulerOptions {
  intervalMs: number;
  /** Extra random delay in [0, jitterMs) added to every round. */
  jitterMs?: number;
  /** Peers contacted per round; 0 means all of them. */
  fanout?: number;
  random?: () => number;
}

export interface GossipRoundResult {
  round: number;
  peers: string[];
  succeeded: string[];
  failed: { peerId: string; error: string }[];
  received: number;
  sent: number;
}

export interface GossipMetrics {
  roundsCompleted: number;
  exchangesSucceeded: number;
  exchangesFailed: number;
  messagesReceived: number;
  messagesSent: number;
  lastRoundAt?: number;
}

export class GossipScheduler {
  private strategy: GossipStrategy;
  private cluster: ClusterView;
  private intervalMs: number;
  private jitterMs: number;
  private fanout: number;
  private random: () => number;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  /** Bumped on every start so ticks from an earlier run stop rescheduling. */
  private generation = 0;
  private currentRound: Promise<GossipRoundResult> | null = null;
  private metrics: GossipMetrics = {
    roundsCompleted: 0,
    exchangesSucceeded: 0,
    exchangesFailed: 0,
    messagesReceived: 0,
    messagesSent: 0
  };

  constructor(strategy: GossipStrategy, cluster: ClusterView, options: GossipSchedulerOptions) {
    this.strategy = strategy;
    this.cluster = cluster;
    this.intervalMs = options.intervalMs;
    this.jitterMs = options.jitterMs ?? 0;
    this.fanout = options.fanout ?? 0;
    this.random = options.random ?? Math.random;
  }

  public start() {
    if (this.running) {
      logWarning(`Gossip scheduler on ${this.cluster.self.id} is already running`);
      return;
    }

    logInfo(`Starting gossip scheduler with interval of ${this.intervalMs}ms`);
    this.running = true;
    this.generation++;
    this.scheduleNext();
  }

  public stop() {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      this.running = false;
      logInfo('Gossip scheduler stopped');
    }
  }

  public isRunning(): boolean {
    return this.running;
  }

  public getMetrics(): GossipMetrics {
    return { ...this.metrics };
  }

  /**
   * Runs one round now. A call made while a round is in flight joins that round.
   */
  public runRound(): Promise<GossipRoundResult> {
    if (this.currentRound) {
      logDebug(`Gossip round already in progress on ${this.cluster.self.id}`);
      return this.currentRound;
    }

    const round = this.exchangeWithPeers().finally(() => {
      this.currentRound = null;
    });
    this.currentRound = round;
    return round;
  }

  public selectPeers(): NodeInfo[] {
    const peers = this.cluster.peers();
    if (this.fanout <= 0 || this.fanout >= peers.length) {
      return peers;
    }

    // partial Fisher-Yates
    for (let i = 0; i < this.fanout; i++) {
      const j = i + Math.floor(this.random() * (peers.length - i));
      [peers[i], peers[j]] = [peers[j], peers[i]];
    }
    return peers.slice(0, this.fanout);
  }

  private scheduleNext() {
    const generation = this.generation;
    const delay = this.intervalMs + Math.floor(this.random() * this.jitterMs);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick(generation);
    }, delay);
  }

  private async tick(generation: number) {
    try {
      await this.runRound();
    } catch (error) {
      logError(`Gossip round failed on ${this.cluster.self.id}: ${describeError(error)}`);
    } finally {
      if (this.running && generation === this.generation) {
        this.scheduleNext();
      }
    }
  }

  private async exchangeWithPeers(): Promise<GossipRoundResult> {
    const peers = this.selectPeers();
    const round = this.metrics.roundsCompleted + 1;
    const result: GossipRoundResult = {
      round,
      peers: peers.map((peer) => peer.id),
      succeeded: [],
      failed: [],
      received: 0,
      sent: 0
    };

    const outcomes = await Promise.allSettled(peers.map((peer) => this.strategy.syncWith(peer)));

    outcomes.forEach((outcome, index) => {
      const peerId = peers[index].id;
      if (outcome.status === 'fulfilled') {
        result.succeeded.push(peerId);
        result.received += outcome.value.received;
        result.sent += outcome.value.sent;
      } else {
        const error = describeError(outcome.reason);
        result.failed.push({ peerId, error });
        logWarning(`Gossip sync failed with ${peerId}: ${error}`);
      }
    });

    this.metrics.roundsCompleted = round;
    this.metrics.exchangesSucceeded += result.succeeded.length;
    this.metrics.exchangesFailed += result.failed.length;
    this.metrics.messagesReceived += result.received;
    this.metrics.messagesSent += result.sent;
    this.metrics.lastRoundAt = Date.now();

    logDebug(`Gossip round ${round} on ${this.cluster.self.id}: ${result.succeeded.length}/${peers.length} peers synced`);
    return result;
  }
}
