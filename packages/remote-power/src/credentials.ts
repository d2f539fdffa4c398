import { CredentialError, HardwareType, IConfigStore } from '@rackpower/core';

export interface PowerCredentials {
  password: string;
  username?: string;
}

async function lookup(
  config: IConfigStore,
  hardwareType: HardwareType | undefined,
  field: 'password' | 'username',
): Promise<string | undefined> {
  if (hardwareType !== undefined) {
    const specific = await config.byKey(`remotepower.${hardwareType}.${field}`);
    if (specific) return specific;
  }
  const fallback = await config.byKey(`remotepower.default.${field}`);
  return fallback || undefined;
}

/**
 * Login for a power device: `remotepower.<type>.*` first, then
 * `remotepower.default.*`. Resolved on every call.
 */
export async function resolveCredentials(
  config: IConfigStore,
  hardwareType?: HardwareType,
  passwordOnly = false,
): Promise<PowerCredentials> {
  const label = (hardwareType ?? 'default').toUpperCase();

  const password = await lookup(config, hardwareType, 'password');
  if (!password) {
    throw new CredentialError(`No login password available for ${label}`);
  }

  if (passwordOnly) {
    return { password };
  }

  const username = await lookup(config, hardwareType, 'username');
  if (!username) {
    throw new CredentialError(`No login user available for ${label}`);
  }

  return { password, username };
}
