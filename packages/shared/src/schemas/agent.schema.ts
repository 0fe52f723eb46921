import { z } from 'zod';

/** One entry of a model's `tool_calls` array. */
export const toolCallRequestSchema = z.object({
  toolName: z.string().min(1),
  toolArgs: z.record(z.unknown()).default({}),
});

/** The JSON envelope the agent asks the model to answer with. */
export const modelReplySchema = z.object({
  answer: z.unknown().optional(),
  tool_calls: z.array(z.unknown()).optional(),
}).passthrough();
