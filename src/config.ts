import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || undefined });

const flag = z
  .string()
  .optional()
  .default('true')
  .transform((v) => ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase()));

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('production'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional().default('info'),
  // Human-readable, colorized output. Disable to get newline-delimited JSON (e.g. when piping to a collector).
  LOG_PRETTY: flag,

  // The Postgres template mounts its volume here; pgdata lives underneath it and
  // everything we persist (repmgr config, runtime files) goes next to it.
  PROVISION_VOLUME_ROOT: z.string().min(1).optional().default('/var/lib/postgresql/data'),
  PROVISION_RUNTIME_DIR: z.string().min(1).optional().default('railway-runtime'),

  // Files we create are handed over to this account and repmgr runs as it.
  PROVISION_SERVICE_ACCOUNT: z.string().min(1).optional().default('postgres'),

  // Applies to helper commands (chown, pg_config). repmgr register/clone always run to completion.
  COMMAND_TIMEOUT_MS: z.coerce.number().int().min(1000).optional().default(30_000)
});

export type ProvisionConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProvisionConfig {
  return schema.parse(env);
}
