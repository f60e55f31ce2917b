import { z } from 'zod';

/**
 * Payload published on the left/right channel topics.
 */
export const ChannelMessageSchema = z.object({
  state: z.union([z.literal(0), z.literal(1)]).describe('1 while the level is above the threshold'),
  level: z.number().nonnegative().describe('Mean absolute sample amplitude'),
  timestamp: z.number().describe('Unix epoch seconds'),
});

export type ChannelMessage = z.infer<typeof ChannelMessageSchema>;

export const buildChannelMessage = (active: boolean, level: number, timestamp: number): ChannelMessage => ({
  state: active ? 1 : 0,
  level,
  timestamp,
});

/**
 * Parse a channel payload as consumers receive it. Throws on malformed JSON or shape.
 */
export const parseChannelMessage = (payload: string): ChannelMessage =>
  ChannelMessageSchema.parse(JSON.parse(payload));
