export class RackPowerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RackPowerError';
  }
}

/** Invalid or missing power device fields, missing default profile, bad settings. */
export class ConfigurationError extends RackPowerError {
  readonly name = 'ConfigurationError' as const;
  readonly issues: string[];

  constructor(issues: string | string[]) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(list.join('; '));
    this.issues = list;
  }
}

export class CredentialError extends RackPowerError {
  readonly name = 'CredentialError' as const;
}

/** The controller binary is missing on the host or its daemon does not answer. */
export class ServiceUnavailableError extends RackPowerError {
  readonly name = 'ServiceUnavailableError' as const;

  constructor(message: string, readonly host: string) {
    super(message);
  }
}

export class SyncError extends RackPowerError {
  readonly name = 'SyncError' as const;

  constructor(message: string, readonly host: string) {
    super(message);
  }
}

export class UnsupportedOperationError extends RackPowerError {
  readonly name = 'UnsupportedOperationError' as const;
}

export class InvalidActionError extends RackPowerError {
  readonly name = 'InvalidActionError' as const;

  constructor(readonly action: string, fqdn: string) {
    super(`Invalid power action '${action}' for machine ${fqdn}`);
  }
}

export class CommandFailedError extends RackPowerError {
  readonly name = 'CommandFailedError' as const;

  constructor(
    readonly command: string,
    readonly host: string,
    readonly exitStatus: number,
    readonly stderr: string,
  ) {
    super(`'${command}' failed on ${host} with exit status ${exitStatus}: ${stderr.trim()}`);
  }
}
