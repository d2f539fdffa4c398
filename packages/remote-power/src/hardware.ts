import { ConfigurationError, HardwareType } from '@rackpower/core';

export type PowerDeviceField = 'managementController' | 'controlDevice' | 'port' | 'deviceIndex';

/** Which inventory association the owning machine must have. */
export type MachineRequirement = 'bmc' | 'hypervisor';

export interface HardwareRule {
  label: string;
  /** Position in the historical numeric type column. */
  legacyId: number;
  required: PowerDeviceField[];
  machineRequires?: MachineRequirement;
}

const ALL_FIELDS: PowerDeviceField[] = ['managementController', 'controlDevice', 'port', 'deviceIndex'];

export const HARDWARE_RULES: Record<HardwareType, HardwareRule> = {
  telnet: { label: 'Telnet', legacyId: 0, required: ['controlDevice', 'port'] },
  sentry: { label: 'Sentry', legacyId: 1, required: ['controlDevice'] },
  ilo: { label: 'ILO', legacyId: 2, required: ['managementController'], machineRequires: 'bmc' },
  ipmi: { label: 'IPMI', legacyId: 3, required: ['managementController'], machineRequires: 'bmc' },
  dominionpx: { label: 'Dominion PX', legacyId: 4, required: ['controlDevice', 'port'] },
  'libvirt-qemu': { label: 'libvirt/qemu', legacyId: 5, required: [], machineRequires: 'hypervisor' },
  'libvirt-lxc': { label: 'libvirt/lxc', legacyId: 6, required: [], machineRequires: 'hypervisor' },
  webcurl: { label: 'WEBcurl', legacyId: 7, required: ['managementController'], machineRequires: 'bmc' },
  s390: { label: 's390', legacyId: 8, required: ['controlDevice'] },
};

export function hardwareLabel(type: HardwareType): string {
  return HARDWARE_RULES[type].label;
}

/** Fields that are cleared on save for the given type. */
export function clearedFields(type: HardwareType): PowerDeviceField[] {
  const required = HARDWARE_RULES[type].required;
  return ALL_FIELDS.filter((field) => !required.includes(field));
}

export function hardwareTypeFromId(id: number): HardwareType {
  const match = HardwareType.options.find((type) => HARDWARE_RULES[type].legacyId === id);
  if (match === undefined) {
    throw new ConfigurationError(`Remote power type with ID '${id}' doesn't exist`);
  }
  return match;
}

/** Accepts either the display label (`Dominion PX`) or the enum value (`dominionpx`). */
export function hardwareTypeFromName(name: string): HardwareType {
  const needle = name.trim().toLowerCase();
  const match = HardwareType.options.find(
    (type) => type === needle || HARDWARE_RULES[type].label.toLowerCase() === needle,
  );
  if (match === undefined) {
    throw new ConfigurationError(`Remote power type '${name}' not found`);
  }
  return match;
}
