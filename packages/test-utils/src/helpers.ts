/**
 * In-process stand-ins for the collaborators rackpower talks to
 */

import pino from 'pino';
import type {
  Domain,
  ExecResult,
  IConfigStore,
  IHostResolver,
  IInventory,
  IRemoteSession,
  Logger,
  Machine,
  PowerDevice,
} from '@rackpower/core';

export function ok(stdout = ''): ExecResult {
  return { stdout, stderr: '', exitStatus: 0 };
}

export function fail(stderr: string, exitStatus = 1): ExecResult {
  return { stdout: '', stderr, exitStatus };
}

export type CommandHandler = (command: string) => ExecResult;

export interface FakeControllerOptions {
  controller?: string;
  /** Names returned by `system list`. */
  systems?: string[];
  versionExit?: number;
  listExit?: number;
  /** Exact command → canned result; checked before everything else. */
  responses?: Record<string, ExecResult>;
}

/**
 * Answers like a Cobbler CLI: `version`, `system list`, and success for
 * anything else unless a canned response says otherwise.
 */
export function fakeController(options: FakeControllerOptions = {}): CommandHandler {
  const controller = options.controller ?? '/usr/bin/cobbler';
  const systems = options.systems ?? [];

  return (command) => {
    const canned = options.responses?.[command];
    if (canned) return canned;

    if (command === `${controller} version`) {
      const exit = options.versionExit ?? 0;
      return exit === 0 ? ok('Cobbler 3.3.3\n') : fail('cobblerd does not appear to be running', exit);
    }
    if (command === `${controller} system list`) {
      const exit = options.listExit ?? 0;
      return exit === 0 ? ok(systems.map((name) => `   ${name}\n`).join('')) : fail('listing failed', exit);
    }
    return ok();
  };
}

export interface FakeSessionOptions {
  respond?: CommandHandler;
  executables?: string[];
  connectError?: Error;
}

export class FakeRemoteSession implements IRemoteSession {
  readonly commands: string[] = [];
  connectCalls = 0;
  closeCalls = 0;
  private readonly respond: CommandHandler;

  constructor(
    readonly host: string,
    private readonly options: FakeSessionOptions = {},
  ) {
    this.respond = options.respond ?? fakeController();
  }

  get isOpen(): boolean {
    return this.connectCalls > this.closeCalls;
  }

  async connect(): Promise<void> {
    if (this.options.connectError) {
      throw this.options.connectError;
    }
    this.connectCalls++;
  }

  async execute(command: string): Promise<ExecResult> {
    this.commands.push(command);
    return this.respond(command);
  }

  async checkPath(path: string, flag: string): Promise<boolean> {
    if (flag !== '-x') return false;
    return (this.options.executables ?? ['/usr/bin/cobbler']).includes(path);
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

export class MapConfigStore implements IConfigStore {
  private readonly values: Map<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = new Map(Object.entries(values));
  }

  async byKey(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }
}

export class StaticResolver implements IHostResolver {
  readonly lookups: string[] = [];

  constructor(private readonly table: Record<string, string> = {}) {}

  async resolveIPv4(hostname: string): Promise<string | undefined> {
    this.lookups.push(hostname);
    return this.table[hostname];
  }
}

export class InMemoryInventory implements IInventory {
  readonly domains = new Map<string, Domain>();
  readonly machines: Machine[] = [];
  readonly devices = new Map<string, PowerDevice>();

  constructor(seed: { domains?: Domain[]; machines?: Machine[]; devices?: PowerDevice[] } = {}) {
    for (const domain of seed.domains ?? []) this.domains.set(domain.name, domain);
    this.machines.push(...(seed.machines ?? []));
    for (const device of seed.devices ?? []) this.devices.set(device.machine.id, device);
  }

  async getDomain(name: string): Promise<Domain | undefined> {
    return this.domains.get(name);
  }

  async listActiveMachines(domain: string): Promise<Machine[]> {
    return this.machines.filter((machine) => machine.active && machine.fqdn.endsWith(`.${domain}`));
  }

  async getPowerDevice(machineId: string): Promise<PowerDevice | undefined> {
    return this.devices.get(machineId);
  }

  async savePowerDevice(device: PowerDevice): Promise<void> {
    this.devices.set(device.machine.id, device);
  }

  async deletePowerDevice(machineId: string): Promise<boolean> {
    return this.devices.delete(machineId);
  }
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
