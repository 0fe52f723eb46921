import { z } from 'zod';

export const modelProviderNameSchema = z.enum(['anthropic', 'openai']);
