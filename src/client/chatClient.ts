import { z } from 'zod';
import { ConsistencyMode, Message, NodeStatus } from '../types/types';
import { messageSchema } from '../types/schemas';
import { describeError } from '../utils/errors';

export type PostResult =
  | { status: 'committed'; replicas: number; message: Message }
  | { status: 'accepted'; message: Message }
  | { status: 'rejected'; details: string }
  | { status: 'invalid'; details: string };

export interface MessageListing {
  nodeId: string;
  consistency: string;
  count: number;
  messages: Message[];
}

const committedSchema = z.object({
  status: z.literal('committed'),
  replicas: z.number(),
  message: messageSchema
});

const acceptedSchema = z.object({
  status: z.literal('accepted'),
  message: messageSchema
});

const errorSchema = z.object({
  error: z.string(),
  details: z.string().optional(),
  issues: z.array(z.object({ path: z.string(), message: z.string() })).optional()
});

const listingSchema: z.ZodType<MessageListing> = z.object({
  nodeId: z.string(),
  consistency: z.string(),
  count: z.number(),
  messages: z.array(messageSchema)
});

const statusSchema: z.ZodType<NodeStatus> = z.object({
  nodeId: z.string(),
  mode: z.nativeEnum(ConsistencyMode),
  clusterSize: z.number(),
  quorumSize: z.number(),
  messages: z.number(),
  peers: z.array(
    z.object({
      peerId: z.string(),
      reachable: z.boolean(),
      lastSeenAt: z.number().optional(),
      lastFailure: z.string().optional()
    })
  )
});

export class ChatClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChatClientError';
  }
}

/**
 * Thin client for a node's public HTTP routes.
 */
export class ChatClient {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(baseUrl: string, timeoutMs: number = 10_000) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = timeoutMs;
  }

  public get url(): string {
    return this.baseUrl;
  }

  public async post(text: string, user?: string): Promise<PostResult> {
    const { status, body } = await this.request('/message', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text, user })
    });

    const committed = committedSchema.safeParse(body);
    if (committed.success) {
      return committed.data;
    }
    const accepted = acceptedSchema.safeParse(body);
    if (accepted.success) {
      return accepted.data;
    }

    const failure = errorSchema.safeParse(body);
    if (failure.success && status === 400) {
      const issues = failure.data.issues?.map((issue) => issue.message).join('; ');
      return { status: 'invalid', details: issues || failure.data.error };
    }
    if (failure.success && status === 500 && failure.data.details) {
      return { status: 'rejected', details: failure.data.details };
    }
    throw new ChatClientError(`Unexpected response ${status} from ${this.baseUrl}`);
  }

  public async list(): Promise<MessageListing> {
    const { body } = await this.request('/messages', { method: 'GET' });
    return this.expect(listingSchema, body);
  }

  public async status(): Promise<NodeStatus> {
    const { body } = await this.request('/', { method: 'GET' });
    return this.expect(statusSchema, body);
  }

  private expect<T>(schema: z.ZodType<T>, body: unknown): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ChatClientError(`Unexpected response from ${this.baseUrl}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async request(path: string, init: RequestInit): Promise<{ status: number; body: unknown }> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new ChatClientError(`Cannot reach ${this.baseUrl}: ${describeError(error)}`);
    }

    try {
      return { status: response.status, body: await response.json() };
    } catch (error) {
      throw new ChatClientError(`Invalid JSON from ${this.baseUrl}: ${describeError(error)}`);
    }
  }
}
