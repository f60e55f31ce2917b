import { z } from 'zod';

export const optionsSchema = z.object({
  mqtt: z
    .object({
      broker: z.string().min(1).default('localhost'),
      port: z.number().int().min(1).max(65535).default(1883),
      client_id: z.string().min(1).default('mic_monitor'),
      username: z.string().optional(),
      password: z.string().optional(),
      topics: z
        .object({
          left: z.string().min(1).default('microphones/left'),
          right: z.string().min(1).default('microphones/right'),
        })
        .default({}),
    })
    .default({}),
  audio: z
    .object({
      chunk_size: z.number().int().positive().default(1024),
      channels: z.number().int().min(1).max(2).default(1),
      rate: z.number().int().positive().default(44100),
      threshold: z.number().nonnegative().default(500),
      check_interval: z.number().positive().default(0.2),
    })
    .default({}),
  ui: z
    .object({
      refresh_rate: z.number().positive().default(0.1),
    })
    .default({}),
  microphones: z
    .object({
      left_index: z.number().int().nonnegative().optional(),
      right_index: z.number().int().nonnegative().optional(),
    })
    .default({}),
});

export type Options = z.infer<typeof optionsSchema>;
