import {
  CommittedWrite,
  ConsistencyMode,
  Message,
  NodeInfo,
  RejectedWrite,
  WriteOutcome
} from '../../types/types';
import { MessageStore } from '../1storage/messageStore';
import { ClusterView } from '../2cluster/clusterView';
import { Transport } from '../3transport/transport';
import { describeError } from '../../utils/errors';
import { logDebug, logInfo, logWarning } from '../../utils/logger';

export interface ReplicationStrategy {
  readonly mode: ConsistencyMode;
  write(message: Message): Promise<WriteOutcome>;
}

export type QuorumPhase = 'proposing' | 'collecting' | 'committed' | 'rejected';

interface Ballot {
  message: Message;
  phase: QuorumPhase;
  acks: number;
  outstanding: number;
  required: number;
  total: number;
  ackedBy: string[];
}

/**
 * Majority-acknowledged writes.
 *
 * The origin votes for its own write, then replicates to every peer at once.
 * The write commits as soon as `quorumSize` votes are in and is rejected as
 * soon as the remaining peers can no longer make up the difference, so it
 * never waits on more peers than it needs. Calls already sent are left to
 * finish on their own.
 *
 * A rejected write is never appended locally. Peers that did acknowledge it
 * keep their copy.
 */
export class QuorumStrategy implements ReplicationStrategy {
  public readonly mode = ConsistencyMode.QUORUM;

  private store: MessageStore;
  private cluster: ClusterView;
  private transport: Transport;
  private pending: Map<string, Ballot> = new Map();

  constructor(store: MessageStore, cluster: ClusterView, transport: Transport) {
    this.store = store;
    this.cluster = cluster;
    this.transport = transport;
  }

  public get pendingWrites(): number {
    return this.pending.size;
  }

  public write(message: Message): Promise<CommittedWrite | RejectedWrite> {
    const peers = this.cluster.peers();
    const ballot: Ballot = {
      message,
      phase: 'proposing',
      acks: 1,
      outstanding: peers.length,
      required: this.cluster.quorumSize,
      total: this.cluster.size,
      ackedBy: [this.cluster.self.id]
    };

    logDebug(`Node ${this.cluster.self.id} proposing ${message.id} to ${peers.length} peers (quorum ${ballot.required}/${ballot.total})`);

    return new Promise((resolve) => {
      const settle = () => {
        const outcome = this.decide(ballot);
        if (outcome) {
          this.pending.delete(message.id);
          resolve(outcome);
        }
      };

      this.pending.set(message.id, ballot);
      ballot.phase = 'collecting';
      settle();

      for (const peer of peers) {
        void this.requestVote(ballot, peer, settle);
      }
    });
  }

  /**
   * Counts one peer's vote and lets `settle` decide before any other vote is
   * counted, so a commit reports exactly the votes that formed the quorum.
   */
  private async requestVote(ballot: Ballot, peer: NodeInfo, settle: () => void): Promise<void> {
    try {
      const ack = await this.transport.replicate(peer, ballot.message);
      ballot.outstanding--;
      ballot.acks++;
      ballot.ackedBy.push(peer.id);
      logInfo(`Peer ACK from ${peer.id}${ack.duplicate ? ' (duplicate)' : ''}. votes = ${ballot.acks}/${ballot.total}`);
    } catch (error) {
      ballot.outstanding--;
      logInfo(`Peer NACK/FAIL from ${peer.id}: ${describeError(error)}. votes = ${ballot.acks}/${ballot.total}`);
    }
    settle();
  }

  /**
   * Moves a collecting ballot to its final phase once the result is certain.
   * Votes arriving after that point are counted but change nothing.
   */
  private decide(ballot: Ballot): CommittedWrite | RejectedWrite | null {
    if (ballot.phase !== 'collecting') {
      return null;
    }

    if (ballot.acks >= ballot.required) {
      ballot.phase = 'committed';
      this.store.append(ballot.message);
      logInfo(
        `Quorum achieved for ${ballot.message.id}: votes=${ballot.acks}, majority_needed=${ballot.required}, (N=${ballot.total})`
      );
      return { status: 'committed', ...this.tally(ballot) };
    }

    if (ballot.acks + ballot.outstanding < ballot.required) {
      ballot.phase = 'rejected';
      logWarning(
        `Quorum FAILED for ${ballot.message.id}: votes=${ballot.acks}, majority_needed=${ballot.required}, (N=${ballot.total})`
      );
      return { status: 'rejected', ...this.tally(ballot) };
    }

    return null;
  }

  private tally(ballot: Ballot) {
    return {
      message: ballot.message,
      acks: ballot.acks,
      required: ballot.required,
      total: ballot.total,
      ackedBy: [...ballot.ackedBy]
    };
  }
}
