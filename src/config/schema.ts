// config/schema.ts
import { z } from 'zod';
import {
  DEFAULT_KEY_PREFIX,
  DEFAULT_PORT,
  DEFAULT_REDIS_URL,
  DEFAULT_STATE_KEY,
} from '../constants.ts';

export const RelayerSchema = z.object({
  name: z.string().min(1, 'relayer name cannot be empty'),
  apiKey: z.string().min(1, 'relayer apiKey cannot be empty'),
});

export const AppConfig = z
  .object({
    port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
    redisUrl: z
      .string()
      .url('redisUrl must be a valid URL')
      .refine(
        (val) => val.startsWith('redis://') || val.startsWith('rediss://'),
        'redisUrl must use redis:// or rediss://',
      )
      .default(DEFAULT_REDIS_URL),
    keyPrefix: z.string().default(DEFAULT_KEY_PREFIX),
    stateKey: z.string().min(1, 'stateKey cannot be empty').default(DEFAULT_STATE_KEY),
    // empty = anyone may relay
    relayers: z.array(RelayerSchema).default([]),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.relayers.forEach((relayer, i) => {
      if (seen.has(relayer.apiKey)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['relayers', i, 'apiKey'],
          message: `duplicate apiKey for relayer ${relayer.name}`,
        });
      }
      seen.add(relayer.apiKey);
    });
  });

export type AppConfig = z.output<typeof AppConfig>;
export type Relayer = z.output<typeof RelayerSchema>;
