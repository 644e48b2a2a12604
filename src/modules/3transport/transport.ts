import {
  ExchangeRequest,
  ExchangeResponse,
  Message,
  NodeInfo,
  ReplicateAck
} from '../../types/types';
import { PeerLivenessTracker } from '../2cluster/peerLiveness';
import {
  PeerResponseError,
  PeerTimeoutError,
  TransportError,
  describeError
} from '../../utils/errors';
import { logDebug } from '../../utils/logger';

/**
 * Node-to-node calls. Every call either resolves with the peer's answer or
 * rejects with a TransportError subclass.
 */
export interface Transport {
  replicate(peer: NodeInfo, message: Message): Promise<ReplicateAck>;
  exchange(peer: NodeInfo, request: ExchangeRequest): Promise<ExchangeResponse>;
}

/** What a node answers when a peer calls it. */
export interface PeerRequestHandler {
  handleReplicate(message: Message): ReplicateAck;
  handleExchange(request: ExchangeRequest): ExchangeResponse;
}

export async function callWithTimeout<T>(
  peerId: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new PeerTimeoutError(peerId, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Applies the per-call timeout, normalises failures to TransportError and
 * records peer liveness. Subclasses only move bytes.
 */
export abstract class BoundedTransport implements Transport {
  protected readonly nodeId: string;
  protected readonly timeoutMs: number;
  private readonly liveness?: PeerLivenessTracker;

  constructor(nodeId: string, timeoutMs: number, liveness?: PeerLivenessTracker) {
    this.nodeId = nodeId;
    this.timeoutMs = timeoutMs;
    this.liveness = liveness;
  }

  public replicate(peer: NodeInfo, message: Message): Promise<ReplicateAck> {
    return this.call(peer, 'replicate', (signal) => this.sendReplicate(peer, message, signal));
  }

  public exchange(peer: NodeInfo, request: ExchangeRequest): Promise<ExchangeResponse> {
    return this.call(peer, 'exchange', (signal) => this.sendExchange(peer, request, signal));
  }

  protected abstract sendReplicate(
    peer: NodeInfo,
    message: Message,
    signal: AbortSignal
  ): Promise<ReplicateAck>;

  protected abstract sendExchange(
    peer: NodeInfo,
    request: ExchangeRequest,
    signal: AbortSignal
  ): Promise<ExchangeResponse>;

  private async call<T>(
    peer: NodeInfo,
    operation: string,
    send: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    try {
      const result = await callWithTimeout(peer.id, this.timeoutMs, send);
      this.liveness?.markReachable(peer.id);
      return result;
    } catch (error) {
      const failure = error instanceof TransportError
        ? error
        : new TransportError(peer.id, `${operation} to ${peer.id} failed: ${describeError(error)}`);

      if (failure instanceof PeerResponseError) {
        this.liveness?.markReachable(peer.id);
      } else {
        this.liveness?.markUnreachable(peer.id, failure.message);
      }

      logDebug(`Node ${this.nodeId} ${operation} -> ${peer.id} failed: ${failure.message}`);
      throw failure;
    }
  }
}
