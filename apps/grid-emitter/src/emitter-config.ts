import { z } from 'zod';
import { ConfigError } from '@grid-stream/domain';

const emitterSchema = z.object({
  host: z.string().trim().min(1).default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(12345),
  format: z.preprocess(
    (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
    z.enum(['binary', 'json']).default('binary'),
  ),
  intervalMs: z.coerce.number().int().positive().default(100),
  durationSec: z.coerce.number().min(0).default(0),
  seed: z.coerce.number().int().default(42),
  faultProbability: z.coerce.number().min(0).max(1).default(0.05),
});

export type EmitterConfig = z.infer<typeof emitterSchema>;

export function loadEmitterConfig(env: Record<string, string | undefined> = process.env): EmitterConfig {
  const parsed = emitterSchema.safeParse({
    host: env['UDP_HOST'],
    port: env['UDP_PORT'],
    format: env['DATA_FORMAT'],
    intervalMs: env['EMIT_INTERVAL_MS'],
    durationSec: env['EMIT_DURATION_S'],
    seed: env['EMIT_SEED'],
    faultProbability: env['FAULT_PROBABILITY'],
  });
  if (!parsed.success) {
    throw new ConfigError(
      'invalid emitter configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}
