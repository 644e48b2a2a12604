import { PeerLiveness } from '../../types/types';
import { logInfo, logWarning } from '../../utils/logger';

/**
 * Last observed reachability of each peer. Only transports write here; the
 * data is informational and never travels with messages.
 */
export class PeerLivenessTracker {
  private nodeId: string;
  private states: Map<string, PeerLiveness> = new Map();
  private now: () => number;

  constructor(nodeId: string, peerIds: string[], now: () => number = Date.now) {
    this.nodeId = nodeId;
    this.now = now;
    for (const peerId of peerIds) {
      this.states.set(peerId, { peerId, reachable: true });
    }
  }

  public markReachable(peerId: string) {
    const previous = this.states.get(peerId);
    if (previous && !previous.reachable) {
      logInfo(`Node ${this.nodeId} sees peer ${peerId} again`);
    }
    this.states.set(peerId, { peerId, reachable: true, lastSeenAt: this.now() });
  }

  public markUnreachable(peerId: string, reason: string) {
    const previous = this.states.get(peerId);
    if (!previous || previous.reachable) {
      logWarning(`Node ${this.nodeId} lost contact with peer ${peerId}: ${reason}`);
    }
    this.states.set(peerId, {
      peerId,
      reachable: false,
      lastSeenAt: previous?.lastSeenAt,
      lastFailure: reason
    });
  }

  public get(peerId: string): PeerLiveness | undefined {
    const state = this.states.get(peerId);
    return state ? { ...state } : undefined;
  }

  public snapshot(): PeerLiveness[] {
    return Array.from(this.states.values()).map((state) => ({ ...state }));
  }
}
