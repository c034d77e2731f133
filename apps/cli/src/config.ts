// apps/cli/src/config.ts
//
// Runtime configuration for the CLI, read from the environment (and `.env`
// via dotenv in the entry point).
//
//   LOG_LEVEL        pino level for diagnostics on stderr (default "warn")
//   CIPHERMIND_SEED  optional seed; each game uses `${seed}:${gameNumber}`
//
// Code length, alphabet and attempt limit are fixed at the protocol defaults.

import { z } from 'zod';
import {
  DEFAULT_ALPHABET,
  DEFAULT_ATTEMPT_LIMIT,
  DEFAULT_CODE_LENGTH,
  type SessionConfig,
} from '@ciphermind/protocol';

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn'),
  CIPHERMIND_SEED: z.string().min(1).optional(),
});

export interface CliConfig {
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  seed?: string;
  session: Omit<SessionConfig, 'seed'>;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return {
    logLevel: parsed.data.LOG_LEVEL,
    seed: parsed.data.CIPHERMIND_SEED,
    session: {
      length: DEFAULT_CODE_LENGTH,
      alphabet: [...DEFAULT_ALPHABET],
      attemptLimit: DEFAULT_ATTEMPT_LIMIT,
    },
  };
}
