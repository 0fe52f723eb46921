import { z } from 'zod';

export const toolCallRecordSchema = z.object({
  callId: z.string(),
  toolName: z.string(),
  payload: z.unknown(),
  status: z.enum(['started', 'completed']),
  timestamp: z.string(),
  success: z.boolean().optional(),
});

export const sessionMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
  toolLog: z.array(toolCallRecordSchema).optional(),
  status: z.enum(['completed', 'stopped', 'failed']).optional(),
});

export const sessionMetadataSchema = z.object({
  messageCount: z.number().int().min(0),
  toolCallCount: z.number().int().min(0),
  interruptionCount: z.number().int().min(0),
});

export const chatSessionSchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  messages: z.array(sessionMessageSchema),
  metadata: sessionMetadataSchema,
});
