import { z } from 'zod';

export const ChatInput = z.object({
  message: z.string().max(2000),
  sessionId: z.string().min(1).max(64).optional(),
});
export type ChatInputT = z.infer<typeof ChatInput>;
