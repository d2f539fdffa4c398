import { z } from 'zod';
import { ConfigurationError } from '@rackpower/core';

export const DEFAULT_CONTROLLER = '/usr/bin/cobbler';

/** Server config key holding the cobbler binary path on provisioning hosts. */
export const CONTROLLER_COMMAND_KEY = 'cobbler.command';

export const SshSettings = z.object({
  username: z.string().min(1).default('root'),
  port: z.number().int().min(1).max(65535).default(22),
  privateKeyPath: z.string().optional(),
  password: z.string().optional(),
  readyTimeout: z.number().int().min(1000).default(20000),
});
export type SshSettings = z.infer<typeof SshSettings>;

export const ProvisioningConfig = z.object({
  ssh: SshSettings.default({}),
  // Used when the server config has no `cobbler.command` entry
  defaultController: z.string().min(1).default(DEFAULT_CONTROLLER),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});
export type ProvisioningConfig = z.infer<typeof ProvisioningConfig>;

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

export function loadProvisioningConfig(env: NodeJS.ProcessEnv = process.env): ProvisioningConfig {
  const parsed = ProvisioningConfig.safeParse({
    ssh: {
      username: env.RACKPOWER_SSH_USER || undefined,
      port: optionalNumber(env.RACKPOWER_SSH_PORT),
      privateKeyPath: env.RACKPOWER_SSH_KEY || undefined,
      password: env.RACKPOWER_SSH_PASSWORD || undefined,
      readyTimeout: optionalNumber(env.RACKPOWER_SSH_TIMEOUT),
    },
    defaultController: env.RACKPOWER_COBBLER_COMMAND || undefined,
    logLevel: env.LOG_LEVEL || undefined,
  });

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}
