import type {
  Domain,
  ExecResult,
  Machine,
  PowerAction,
  PowerActionOutcome,
  PowerDevice,
} from './types';

/** Key/value server configuration (`remotepower.default.password`, `cobbler.command`, ...). */
export interface IConfigStore {
  byKey(key: string): Promise<string | undefined>;
}

export interface IInventory {
  getDomain(name: string): Promise<Domain | undefined>;
  listActiveMachines(domain: string): Promise<Machine[]>;
  getPowerDevice(machineId: string): Promise<PowerDevice | undefined>;
  savePowerDevice(device: PowerDevice): Promise<void>;
  deletePowerDevice(machineId: string): Promise<boolean>;
}

export interface IRemoteSession {
  connect(): Promise<void>;
  execute(command: string): Promise<ExecResult>;
  /** Runs `test <flag> <path>` on the remote side. */
  checkPath(path: string, flag: string): Promise<boolean>;
  close(): Promise<void>;
}

export type SessionFactory = (host: string) => IRemoteSession;

export interface IHostResolver {
  /** Resolves a hostname to an IPv4 address, or undefined when it cannot be resolved. */
  resolveIPv4(hostname: string): Promise<string | undefined>;
}

export interface IPowerSwitch {
  performPowerAction(machine: Machine, action: PowerAction): Promise<PowerActionOutcome>;
}
