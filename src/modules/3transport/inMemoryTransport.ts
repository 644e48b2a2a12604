import {
  ExchangeRequest,
  ExchangeResponse,
  Message,
  NodeInfo,
  ReplicateAck
} from '../../types/types';
import { PeerLivenessTracker } from '../2cluster/peerLiveness';
import { BoundedTransport, PeerRequestHandler } from './transport';
import { PeerUnreachableError } from '../../utils/errors';
import { logInfo } from '../../utils/logger';

/**
 * A simulated network connecting nodes that live in the same process.
 *
 * Payloads are deep-copied on delivery, so nodes never share message objects.
 * Links can be cut with partitions, slowed with latency, or made to hang.
 */
export class InMemoryNetwork {
  private handlers: Map<string, PeerRequestHandler> = new Map();
  private groupOf: Map<string, number> | null = null;
  private latencies: Map<string, number> = new Map();
  private hung: Set<string> = new Set();
  private stalled: Map<string, Set<() => void>> = new Map();

  public register(nodeId: string, handler: PeerRequestHandler) {
    this.handlers.set(nodeId, handler);
  }

  public unregister(nodeId: string) {
    this.handlers.delete(nodeId);
  }

  /**
   * Only nodes in the same group can talk. Nodes not listed are cut off from everyone.
   */
  public partition(...groups: string[][]) {
    const groupOf = new Map<string, number>();
    groups.forEach((group, index) => {
      group.forEach((nodeId) => groupOf.set(nodeId, index));
    });
    this.groupOf = groupOf;
    logInfo(`Network partitioned into ${groups.map((g) => `[${g.join(', ')}]`).join(' ')}`);
  }

  public isolate(nodeId: string) {
    const others = Array.from(this.handlers.keys()).filter((id) => id !== nodeId);
    this.partition([nodeId], others);
  }

  public heal() {
    this.groupOf = null;
    Array.from(this.hung).forEach((nodeId) => this.setHung(nodeId, false));
    logInfo('Network healed');
  }

  public setLatency(nodeId: string, ms: number) {
    this.latencies.set(nodeId, ms);
  }

  /**
   * A hung node accepts connections but never answers. Un-hanging it resets
   * the calls that were stuck on it.
   */
  public setHung(nodeId: string, hung: boolean) {
    if (hung) {
      this.hung.add(nodeId);
      return;
    }
    this.hung.delete(nodeId);
    const stuck = this.stalled.get(nodeId);
    this.stalled.delete(nodeId);
    stuck?.forEach((reset) => reset());
  }

  public canReach(from: string, to: string): boolean {
    if (!this.handlers.has(to)) {
      return false;
    }
    if (this.groupOf === null) {
      return true;
    }
    const fromGroup = this.groupOf.get(from);
    return fromGroup !== undefined && fromGroup === this.groupOf.get(to);
  }

  public transportFor(nodeId: string, timeoutMs: number, liveness?: PeerLivenessTracker): InMemoryTransport {
    return new InMemoryTransport(this, nodeId, timeoutMs, liveness);
  }

  public async deliver<T>(
    from: string,
    to: string,
    signal: AbortSignal,
    handle: (handler: PeerRequestHandler) => T
  ): Promise<T> {
    if (!this.canReach(from, to)) {
      throw new PeerUnreachableError(to, 'connection refused');
    }

    if (this.hung.has(to)) {
      await this.stall(to, signal);
    }

    const latency = this.latencies.get(to) ?? 0;
    if (latency > 0) {
      await delay(latency, signal);
    }

    // the link may have been cut while the call was in flight
    const handler = this.handlers.get(to);
    if (!handler || !this.canReach(from, to)) {
      throw new PeerUnreachableError(to, 'connection reset');
    }

    return structuredClone(handle(handler));
  }

  private stall(nodeId: string, signal: AbortSignal): Promise<never> {
    return new Promise((_, reject) => {
      if (signal.aborted) {
        reject(new Error('aborted'));
        return;
      }

      const calls = this.stalled.get(nodeId) ?? new Set<() => void>();
      this.stalled.set(nodeId, calls);

      const onAbort = () => {
        calls.delete(reset);
        reject(new Error('aborted'));
      };
      const reset = () => {
        signal.removeEventListener('abort', onAbort);
        reject(new PeerUnreachableError(nodeId, 'connection reset'));
      };

      calls.add(reset);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export class InMemoryTransport extends BoundedTransport {
  private network: InMemoryNetwork;

  constructor(network: InMemoryNetwork, nodeId: string, timeoutMs: number, liveness?: PeerLivenessTracker) {
    super(nodeId, timeoutMs, liveness);
    this.network = network;
  }

  protected sendReplicate(peer: NodeInfo, message: Message, signal: AbortSignal): Promise<ReplicateAck> {
    const copy = structuredClone(message);
    return this.network.deliver(this.nodeId, peer.id, signal, (handler) => handler.handleReplicate(copy));
  }

  protected sendExchange(
    peer: NodeInfo,
    request: ExchangeRequest,
    signal: AbortSignal
  ): Promise<ExchangeResponse> {
    const copy = structuredClone(request);
    return this.network.deliver(this.nodeId, peer.id, signal, (handler) => handler.handleExchange(copy));
  }
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('aborted'));
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
