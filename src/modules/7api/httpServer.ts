import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { AddressInfo } from 'net';
import { ConsistencyMode } from '../../types/types';
import { exchangeRequestSchema, messageSchema, parseWith } from '../../types/schemas';
import { ReplicationCoordinator } from '../6coordinator/replicationCoordinator';
import { INTERNAL_EXCHANGE_PATH, INTERNAL_WRITE_PATH } from '../3transport/httpTransport';
import {
  QuorumNotReachedError,
  ReplicationError,
  ValidationError,
  describeError
} from '../../utils/errors';
import { logDebug, logError, logInfo } from '../../utils/logger';

export const MAX_BODY_BYTES = 1024 * 1024;

export const HTTP_OK = 200;
export const HTTP_ACCEPTED = 202;
export const HTTP_BAD_REQUEST = 400;
export const HTTP_NOT_FOUND = 404;
export const HTTP_CONFLICT = 409;
export const HTTP_PAYLOAD_TOO_LARGE = 413;
export const HTTP_INTERNAL_SERVER_ERROR = 500;

class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

interface JsonReply {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
}

/**
 * Client routes (`/message`, `/messages`, `/`) plus the internal routes peers
 * call through HttpTransport.
 */
export class ChatHttpServer {
  private coordinator: ReplicationCoordinator;
  private server: Server | null = null;

  constructor(coordinator: ReplicationCoordinator) {
    this.coordinator = coordinator;
  }

  public async start(port: number, host: string): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('HTTP server is already running');
    }

    const server = createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = this.address();
    logInfo(`Node ${this.coordinator.nodeId} listening on ${address.address}:${address.port}`);
    return address;
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    });
    logInfo(`Node ${this.coordinator.nodeId} HTTP server stopped`);
  }

  public address(): AddressInfo {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('HTTP server is not listening on a TCP port');
    }
    return address;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse) {
    let reply: JsonReply;
    try {
      reply = await this.route(req);
    } catch (error) {
      reply = this.errorReply(req, error);
    }

    res.writeHead(reply.status, { 'Content-Type': 'application/json', ...reply.headers });
    res.end(JSON.stringify(reply.body));
  }

  private async route(req: IncomingMessage): Promise<JsonReply> {
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    logDebug(`Node ${this.coordinator.nodeId} ${method} ${path}`);

    if (method === 'GET' && path === '/') {
      return { status: HTTP_OK, body: { status: 'up', ...this.coordinator.status() } };
    }

    if (method === 'GET' && path === '/messages') {
      const messages = this.coordinator.listMessages();
      return {
        status: HTTP_OK,
        headers: { 'X-Consistency': 'local' },
        body: {
          nodeId: this.coordinator.nodeId,
          consistency: 'local',
          count: messages.length,
          messages
        }
      };
    }

    if (method === 'POST' && path === '/message') {
      const result = await this.coordinator.submit(await readJson(req));
      if (result.status === 'committed') {
        return {
          status: HTTP_OK,
          body: {
            status: 'committed',
            mode: ConsistencyMode.QUORUM,
            replicas: result.acks,
            message: result.message
          }
        };
      }
      return {
        status: HTTP_ACCEPTED,
        body: {
          status: 'accepted',
          mode: ConsistencyMode.GOSSIP,
          replicas: 'propagation in progress',
          message: result.message
        }
      };
    }

    if (method === 'POST' && path === INTERNAL_WRITE_PATH) {
      const message = parseWith(messageSchema, await readJson(req));
      const ack = this.coordinator.handleReplicate(message);
      return { status: HTTP_OK, body: { status: 'ack', ...ack } };
    }

    if (method === 'POST' && path === INTERNAL_EXCHANGE_PATH) {
      const request = parseWith(exchangeRequestSchema, await readJson(req));
      return { status: HTTP_OK, body: this.coordinator.handleExchange(request) };
    }

    throw new HttpError(HTTP_NOT_FOUND, 'not found');
  }

  private errorReply(req: IncomingMessage, error: unknown): JsonReply {
    if (error instanceof HttpError) {
      return { status: error.status, body: { error: error.message } };
    }
    if (error instanceof ValidationError) {
      return { status: HTTP_BAD_REQUEST, body: { error: 'invalid payload', issues: error.issues } };
    }
    if (error instanceof QuorumNotReachedError) {
      return {
        status: HTTP_INTERNAL_SERVER_ERROR,
        body: { error: 'write quorum failed', details: error.message }
      };
    }
    if (error instanceof ReplicationError && error.code === 'MODE_MISMATCH') {
      return { status: HTTP_CONFLICT, body: { error: error.message } };
    }

    logError(`Unhandled error on ${req.method} ${req.url}: ${describeError(error)}`);
    return { status: HTTP_INTERNAL_SERVER_ERROR, body: { error: 'internal error' } };
  }
}

async function readJson(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  // past the limit the rest is read and discarded so the client gets the 413
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size <= MAX_BODY_BYTES) {
      chunks.push(buffer);
    }
  }

  if (size > MAX_BODY_BYTES) {
    throw new HttpError(HTTP_PAYLOAD_TOO_LARGE, 'payload too large');
  }

  const text = Buffer.concat(chunks).toString('utf-8');
  if (text.trim().length === 0) {
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new HttpError(HTTP_BAD_REQUEST, 'invalid JSON');
  }
}
