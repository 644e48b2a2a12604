import { z } from 'zod';
import {
  ExchangeRequest,
  ExchangeResponse,
  Message,
  NodeInfo,
  ReplicateAck
} from '../../types/types';
import {
  exchangeResponseSchema,
  replicateAckSchema
} from '../../types/schemas';
import { BoundedTransport } from './transport';
import {
  PeerResponseError,
  PeerUnreachableError,
  describeError
} from '../../utils/errors';

export const INTERNAL_WRITE_PATH = '/internal/write';
export const INTERNAL_EXCHANGE_PATH = '/internal/exchange';

/**
 * Talks to peers through their internal HTTP routes.
 */
export class HttpTransport extends BoundedTransport {
  protected sendReplicate(peer: NodeInfo, message: Message, signal: AbortSignal): Promise<ReplicateAck> {
    return this.post(peer, INTERNAL_WRITE_PATH, message, replicateAckSchema, signal);
  }

  protected sendExchange(
    peer: NodeInfo,
    request: ExchangeRequest,
    signal: AbortSignal
  ): Promise<ExchangeResponse> {
    return this.post(peer, INTERNAL_EXCHANGE_PATH, request, exchangeResponseSchema, signal);
  }

  private async post<T>(
    peer: NodeInfo,
    path: string,
    body: unknown,
    schema: z.ZodType<T>,
    signal: AbortSignal
  ): Promise<T> {
    let response: Response;
    try {
      response = await fetch(`${peer.address}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Node-Id': this.nodeId },
        body: JSON.stringify(body),
        signal
      });
    } catch (error) {
      throw new PeerUnreachableError(peer.id, connectionFailureReason(error));
    }

    const text = await response.text();
    if (!response.ok) {
      throw new PeerResponseError(peer.id, response.status, text.slice(0, 200));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new PeerResponseError(peer.id, response.status, `invalid JSON: ${describeError(error)}`);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new PeerResponseError(peer.id, response.status, `unexpected body: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

function connectionFailureReason(error: unknown): string {
  // undici reports socket errors as `TypeError: fetch failed` with the errno in `cause`
  if (error instanceof Error && error.cause instanceof Error) {
    const code = 'code' in error.cause ? String(error.cause.code) : undefined;
    return code ?? error.cause.message;
  }
  return describeError(error);
}
