import { z } from 'zod';

import { ConfigurationError } from '@labyrinth/core';

const cliEnv = z.object({
  LABYRINTH_SAVE_FILE: z.string().min(1).default('game_save.json'),
  LABYRINTH_SEED: z.coerce.number().int().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn')
});

export type CliConfig = z.infer<typeof cliEnv>;

export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = cliEnv.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  return parsed.data;
}
