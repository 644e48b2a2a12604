import { z } from 'zod';
import {
  ExchangeRequest,
  ExchangeResponse,
  Message,
  MessageInput,
  ReplicateAck
} from './types';
import { ValidationError } from '../utils/errors';

export const MAX_TEXT_LENGTH = 4000;
export const MAX_USER_LENGTH = 64;

const nodeIdSchema = z.string().min(1).max(256);

export const messageInputSchema: z.ZodType<MessageInput> = z.object({
  text: z.string().trim().min(1, 'text must not be empty').max(MAX_TEXT_LENGTH),
  user: z.string().trim().min(1, 'user must not be empty').max(MAX_USER_LENGTH).optional()
});

export const messageSchema: z.ZodType<Message> = z.object({
  id: z.string().uuid(),
  text: z.string().min(1).max(MAX_TEXT_LENGTH),
  user: z.string().min(1).max(MAX_USER_LENGTH),
  originNode: nodeIdSchema,
  version: z.number().int().positive(),
  acceptedAt: z.number().int().nonnegative()
});

export const digestSchema = z.record(nodeIdSchema, z.array(z.number().int().positive()));

export const exchangeRequestSchema: z.ZodType<ExchangeRequest> = z.object({
  from: nodeIdSchema,
  digest: digestSchema,
  messages: z.array(messageSchema).optional()
});

export const exchangeResponseSchema: z.ZodType<ExchangeResponse> = z.object({
  from: nodeIdSchema,
  digest: digestSchema,
  messages: z.array(messageSchema)
});

export const replicateAckSchema: z.ZodType<ReplicateAck> = z.object({
  nodeId: nodeIdSchema,
  duplicate: z.boolean()
});

/**
 * Parses `value` or throws a ValidationError listing every issue.
 */
export function parseWith<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    );
  }
  return result.data;
}
