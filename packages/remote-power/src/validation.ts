import { ConfigurationError, PowerDevice } from '@rackpower/core';
import { clearedFields, HARDWARE_RULES, hardwareLabel, PowerDeviceField } from './hardware';

const MISSING_FIELD_MESSAGES: Record<PowerDeviceField, string> = {
  controlDevice: 'Please provide a remote power device',
  port: 'Please provide a port',
  managementController: 'Please select a management BMC',
  deviceIndex: 'Please provide a device index',
};

function isSet(device: PowerDevice, field: PowerDeviceField): boolean {
  const value = device[field];
  return value !== null && value !== undefined;
}

/**
 * Checks a power device against the rules of its hardware type and returns a
 * copy with every parameter the type does not use cleared.
 *
 * All violated rules are reported together in one ConfigurationError. A device
 * without a hardware type is rejected before any rule is looked at.
 */
export function validateAndNormalize(device: PowerDevice): PowerDevice {
  const type = device.hardwareType;
  if (type === undefined) {
    throw new ConfigurationError(`No remote power type set for ${device.machine.fqdn}`);
  }

  const rule = HARDWARE_RULES[type];
  const issues: string[] = [];

  for (const field of rule.required) {
    if (!isSet(device, field)) {
      issues.push(MISSING_FIELD_MESSAGES[field]);
    }
  }

  if (rule.machineRequires === 'bmc' && !device.machine.bmc) {
    issues.push('Please add at least one BMC to the enclosure');
  }
  if (rule.machineRequires === 'hypervisor' && !device.machine.hypervisor) {
    issues.push('No hypervisor found');
  }

  const normalized: PowerDevice = { ...device };
  for (const field of clearedFields(type)) {
    normalized[field] = null;
  }

  const controlDevice = normalized.controlDevice;
  if (controlDevice && controlDevice.systemType !== 'remote-power') {
    issues.push(`Remote power device '${controlDevice.fqdn}' must have system type 'remote-power'`);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues.map((issue) => `${hardwareLabel(type)}: ${issue}`));
  }

  return normalized;
}

export function displayName(device: Pick<PowerDevice, 'hardwareType'>): string {
  return device.hardwareType === undefined ? 'none' : hardwareLabel(device.hardwareType);
}

export function describePowerDevice(device: PowerDevice): string {
  if (device.hardwareType === undefined) {
    return 'none';
  }
  return `${hardwareLabel(device.hardwareType)}@${device.machine.fqdn}`;
}
