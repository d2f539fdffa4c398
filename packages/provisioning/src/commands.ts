import {
  ConfigurationError,
  Domain,
  HardwareType,
  IConfigStore,
  IHostResolver,
  Machine,
  MachineRef,
  PowerAction,
  PowerDevice,
  UnsupportedOperationError,
} from '@rackpower/core';
import { hardwareLabel, resolveCredentials } from '@rackpower/remote-power';
import { normalizeProfileName } from './profile';
import { shellOption } from './shell';
import { renderMachineTemplate } from './template';

export interface CommandContext {
  /** Path of the cobbler binary on the provisioning host. */
  controller: string;
  domain: Domain;
  config: IConfigStore;
  resolver: IHostResolver;
}

export const POWER_VERBS: Record<PowerAction, string> = {
  on: 'poweron',
  off: 'poweroff',
  'off-ssh': 'poweroff',
  'off-remotepower': 'poweroff',
  reboot: 'reboot',
  'reboot-ssh': 'reboot',
  'reboot-remotepower': 'reboot',
  status: 'powerstatus',
};

/**
 * DHCP filename: machine > group > architecture. Group and architecture
 * values are patterns rendered against the machine.
 */
export function resolveFilename(machine: Machine): string | undefined {
  if (machine.dhcpFilename) {
    return machine.dhcpFilename;
  }
  if (machine.group?.dhcpFilename) {
    return renderMachineTemplate(machine.group.dhcpFilename, machine);
  }
  if (machine.architecture.dhcpFilename) {
    return renderMachineTemplate(machine.architecture.dhcpFilename, machine);
  }
  return undefined;
}

/** TFTP server fqdn: machine > group > domain. */
export function resolveTftpServer(machine: Machine, domain: Domain): string | undefined {
  const server = machine.tftpServer ?? machine.group?.tftpServer ?? domain.tftpServer;
  return server?.fqdn;
}

export async function resolveNextServer(machine: Machine, ctx: CommandContext): Promise<string | undefined> {
  const tftpServer = resolveTftpServer(machine, ctx.domain);
  if (!tftpServer) return undefined;
  return ctx.resolver.resolveIPv4(tftpServer);
}

export function resolveDefaultProfile(machine: Machine): string {
  const profile = machine.architecture.defaultProfile;
  if (!profile) {
    throw new ConfigurationError(`Machine ${machine.fqdn} has no default profile`);
  }
  return normalizeProfileName(profile);
}

function requireRef(device: PowerDevice, ref: MachineRef | null | undefined, what: string): MachineRef {
  if (!ref) {
    throw new ConfigurationError(`${device.machine.fqdn}: power device has no ${what}`);
  }
  return ref;
}

type PowerOptionBuilder = (device: PowerDevice) => string;

const POWER_OPTION_BUILDERS: Partial<Record<HardwareType, PowerOptionBuilder>> = {
  ipmi: (device) => {
    const bmc = requireRef(device, device.managementController, 'management controller');
    return ` --power-type=ipmilan${shellOption('power-address', bmc.fqdn)}`;
  },
  dominionpx: (device) => {
    const pdu = requireRef(device, device.controlDevice, 'remote power device');
    if (device.port === null || device.port === undefined) {
      throw new ConfigurationError(`${device.machine.fqdn}: power device has no port`);
    }
    return ` --power-type=raritan${shellOption('power-address', pdu.fqdn)}${shellOption('power-id', device.port)}`;
  },
};

/** Whether Cobbler power options can be derived for the hardware type. */
export function supportsPowerOptions(type: HardwareType | undefined): boolean {
  return type !== undefined && POWER_OPTION_BUILDERS[type] !== undefined;
}

export async function buildPowerOptions(device: PowerDevice, config: IConfigStore): Promise<string> {
  const type = device.hardwareType;
  if (type === undefined) {
    throw new ConfigurationError(`No remote power type set for ${device.machine.fqdn}`);
  }

  const builder = POWER_OPTION_BUILDERS[type];
  if (!builder) {
    throw new UnsupportedOperationError(`Power options for ${hardwareLabel(type)} are not supported`);
  }

  const options = builder(device);
  const { username, password } = await resolveCredentials(config, type);
  return `${options}${shellOption('power-user', username ?? '')}${shellOption('power-pass', password)}`;
}

export async function buildSystemOptions(
  machine: Machine,
  device: PowerDevice | undefined,
  ctx: CommandContext,
): Promise<string> {
  if (!machine.ipv4) {
    throw new ConfigurationError(`Machine ${machine.fqdn} has no IPv4 address`);
  }

  let options = shellOption('name', machine.fqdn) + shellOption('ip-address', machine.ipv4);
  if (machine.ipv6) {
    options += shellOption('ipv6-address', machine.ipv6);
  }
  options += ' --interface=default --management=True --interface-master=True';

  const filename = resolveFilename(machine);
  if (filename) {
    options += shellOption('filename', filename);
  }

  const nextServer = await resolveNextServer(machine, ctx);
  if (nextServer) {
    options += shellOption('next-server', nextServer);
  }

  // Hardware without a Cobbler fence agent is synced without power settings
  if (device && supportsPowerOptions(device.hardwareType)) {
    options += await buildPowerOptions(device, ctx.config);
  }
  return options;
}

/** Secondary `bmc` interface for machines that have one. */
export async function buildBmcInterfaceOptions(
  machine: Machine,
  resolver: IHostResolver,
): Promise<string | undefined> {
  if (!machine.bmc) return undefined;

  let options = ' --interface=bmc';
  const address = await resolver.resolveIPv4(machine.bmc.fqdn);
  if (address) {
    options += shellOption('ip-address', address);
  }
  options += shellOption('mac', machine.bmc.mac) + shellOption('dns-name', machine.bmc.fqdn);
  return options;
}

export async function buildAddCommand(
  machine: Machine,
  device: PowerDevice | undefined,
  ctx: CommandContext,
): Promise<string> {
  const profile = resolveDefaultProfile(machine);
  const options = await buildSystemOptions(machine, device, ctx);
  return `${ctx.controller} system add${options} --netboot-enabled=False${shellOption('profile', profile)}`;
}

export async function buildUpdateCommand(
  machine: Machine,
  device: PowerDevice | undefined,
  ctx: CommandContext,
): Promise<string> {
  const options = await buildSystemOptions(machine, device, ctx);
  return `${ctx.controller} system edit${options}`;
}

export async function buildBmcCommand(machine: Machine, ctx: CommandContext): Promise<string | undefined> {
  const options = await buildBmcInterfaceOptions(machine, ctx.resolver);
  if (!options) return undefined;
  return `${ctx.controller} system edit${shellOption('name', machine.fqdn)}${options}`;
}

export function buildPowerCommand(controller: string, machine: Machine, action: PowerAction): string {
  return `${controller} system ${POWER_VERBS[action]}${shellOption('name', machine.fqdn)}`;
}

export function buildSetupCommand(controller: string, machine: Machine, choice: string): string {
  const profile = normalizeProfileName(`${machine.architecture.name}:${choice}`);
  return `${controller} system edit${shellOption('name', machine.fqdn)}${shellOption('profile', profile)} --netboot-enabled=True`;
}

/** Masks power passwords before a command reaches a log line or an error. */
export function redactCommand(command: string): string {
  return command.replace(/--power-pass=(?:'[^']*'(?:\\''[^']*')*|\S+)/g, '--power-pass=********');
}
