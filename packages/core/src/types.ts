import { z } from 'zod';

export const HardwareType = z.enum([
  'telnet',
  'sentry',
  'ilo',
  'ipmi',
  'dominionpx',
  'libvirt-qemu',
  'libvirt-lxc',
  'webcurl',
  's390',
]);
export type HardwareType = z.infer<typeof HardwareType>;

export const PowerAction = z.enum([
  'on',
  'off',
  'off-ssh',
  'off-remotepower',
  'reboot',
  'reboot-ssh',
  'reboot-remotepower',
  'status',
]);
export type PowerAction = z.infer<typeof PowerAction>;

export const SystemType = z.enum(['bare-metal', 'virtual', 'remote-power', 'bmc', 'hypervisor', 'switch']);
export type SystemType = z.infer<typeof SystemType>;

export const PowerStatus = {
  UNKNOWN: 0,
  ON: 1,
  OFF: 2,
  BOOT: 3,
  SHUTDOWN: 4,
  PAUSED: 5,
} as const;
export type PowerStatus = (typeof PowerStatus)[keyof typeof PowerStatus];

const POWER_STATUS_LABELS: Record<PowerStatus, string> = {
  [PowerStatus.UNKNOWN]: 'unknown',
  [PowerStatus.ON]: 'on',
  [PowerStatus.OFF]: 'off',
  [PowerStatus.BOOT]: 'boot',
  [PowerStatus.SHUTDOWN]: 'shut down',
  [PowerStatus.PAUSED]: 'paused',
};

export function isPowerStatus(value: number): value is PowerStatus {
  return Object.prototype.hasOwnProperty.call(POWER_STATUS_LABELS, value);
}

export function powerStatusToString(index: number): string {
  return isPowerStatus(index) ? POWER_STATUS_LABELS[index] : 'undefined';
}

// Inventory records. These are owned by the inventory layer and only read here.

export interface ServerRef {
  fqdn: string;
}

export interface MachineRef {
  id: string;
  fqdn: string;
  systemType: SystemType;
}

export interface Bmc {
  fqdn: string;
  mac: string;
}

export interface Architecture {
  name: string;
  dhcpFilename?: string;
  defaultProfile?: string;
}

export interface MachineGroup {
  name: string;
  dhcpFilename?: string;
  tftpServer?: ServerRef;
}

export interface Machine extends MachineRef {
  ipv4?: string;
  ipv6?: string;
  mac?: string;
  active: boolean;
  architecture: Architecture;
  group?: MachineGroup;
  dhcpFilename?: string;
  tftpServer?: ServerRef;
  bmc?: Bmc;
  hypervisor?: MachineRef;
  comment?: string;
}

export interface Domain {
  name: string;
  tftpServer?: ServerRef;
  /** Cobbler hosts serving this domain, in failover order. */
  provisioningHosts: ServerRef[];
}

export interface PowerDevice {
  machine: Machine;
  hardwareType?: HardwareType;
  managementController?: MachineRef | null;
  controlDevice?: MachineRef | null;
  port?: number | null;
  deviceIndex?: number | null;
  comment?: string;
  createdAt?: Date;
  updatedAt?: Date;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitStatus: number;
}

export interface PowerAttempt {
  host: string;
  error?: string;
}

export type PowerActionOutcome =
  | { status: 'succeeded'; action: PowerAction; host: string; output: string; attempts: PowerAttempt[] }
  | { status: 'failed'; action: PowerAction; attempts: PowerAttempt[] }
  | { status: 'unsupported'; action: PowerAction };

/** `node1.lab.example.net` belongs to `lab.example.net`. */
export function domainOf(fqdn: string): string {
  const dot = fqdn.indexOf('.');
  return dot === -1 ? '' : fqdn.slice(dot + 1);
}
