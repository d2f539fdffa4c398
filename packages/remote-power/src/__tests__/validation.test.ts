import { describe, it, expect } from 'vitest';
import { ConfigurationError, HardwareType, PowerDevice } from '@rackpower/core';
import { buildMachine, buildPowerDevice, refs } from '@rackpower/test-utils';
import {
  clearedFields,
  describePowerDevice,
  displayName,
  hardwareTypeFromId,
  hardwareTypeFromName,
  validateAndNormalize,
} from '..';

function fullyPopulated(hardwareType: HardwareType): PowerDevice {
  const machine = buildMachine('node1', {
    bmc: { fqdn: 'node1-sp.lab.example.test', mac: '52:54:00:aa:bb:01' },
    hypervisor: refs.hypervisor,
  });
  return buildPowerDevice(machine, {
    hardwareType,
    managementController: refs.bmc,
    controlDevice: refs.pdu,
    port: 3,
    deviceIndex: 7,
  });
}

function captureIssues(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('validateAndNormalize', () => {
  describe('field normalization', () => {
    const expectations: Array<[HardwareType, Partial<PowerDevice>]> = [
      ['telnet', { controlDevice: refs.pdu, port: 3, managementController: null, deviceIndex: null }],
      ['dominionpx', { controlDevice: refs.pdu, port: 3, managementController: null, deviceIndex: null }],
      ['sentry', { controlDevice: refs.pdu, port: null, managementController: null, deviceIndex: null }],
      ['s390', { controlDevice: refs.pdu, port: null, managementController: null, deviceIndex: null }],
      ['ilo', { managementController: refs.bmc, controlDevice: null, port: null, deviceIndex: null }],
      ['ipmi', { managementController: refs.bmc, controlDevice: null, port: null, deviceIndex: null }],
      ['webcurl', { managementController: refs.bmc, controlDevice: null, port: null, deviceIndex: null }],
      ['libvirt-qemu', { managementController: null, controlDevice: null, port: null, deviceIndex: null }],
      ['libvirt-lxc', { managementController: null, controlDevice: null, port: null, deviceIndex: null }],
    ];

    for (const [type, expected] of expectations) {
      it(`should keep only the ${type} parameters`, () => {
        const normalized = validateAndNormalize(fullyPopulated(type));

        expect(normalized.managementController).toEqual(expected.managementController);
        expect(normalized.controlDevice).toEqual(expected.controlDevice);
        expect(normalized.port).toEqual(expected.port);
        expect(normalized.deviceIndex).toEqual(expected.deviceIndex);
        expect(normalized.hardwareType).toBe(type);
      });
    }

    it('should not modify the input device', () => {
      const device = fullyPopulated('sentry');
      validateAndNormalize(device);

      expect(device.port).toBe(3);
      expect(device.managementController).toEqual(refs.bmc);
    });

    it('should clear the device index for every type', () => {
      for (const type of HardwareType.options) {
        expect(clearedFields(type)).toContain('deviceIndex');
      }
    });

    it('should accept port 0 as a configured port', () => {
      const device = buildPowerDevice(buildMachine('node1'), {
        hardwareType: 'dominionpx',
        controlDevice: refs.pdu,
        port: 0,
      });

      expect(validateAndNormalize(device).port).toBe(0);
    });
  });

  describe('required fields', () => {
    it('should report every missing telnet field at once', () => {
      const device = buildPowerDevice(buildMachine('node1'), { hardwareType: 'telnet' });

      expect(captureIssues(() => validateAndNormalize(device))).toEqual([
        'Telnet: Please provide a remote power device',
        'Telnet: Please provide a port',
      ]);
    });

    it('should require a remote power device for sentry', () => {
      const device = buildPowerDevice(buildMachine('node1'), { hardwareType: 'sentry', port: 5 });

      expect(captureIssues(() => validateAndNormalize(device))).toEqual([
        'Sentry: Please provide a remote power device',
      ]);
    });

    it('should require a BMC and a management controller for IPMI', () => {
      const device = buildPowerDevice(buildMachine('node1'), { hardwareType: 'ipmi' });

      expect(captureIssues(() => validateAndNormalize(device))).toEqual([
        'IPMI: Please select a management BMC',
        'IPMI: Please add at least one BMC to the enclosure',
      ]);
    });

    it('should require a hypervisor for libvirt types', () => {
      const device = buildPowerDevice(buildMachine('vm1'), { hardwareType: 'libvirt-qemu' });

      expect(captureIssues(() => validateAndNormalize(device))).toEqual(['libvirt/qemu: No hypervisor found']);
    });
  });

  describe('remote power device type', () => {
    it('should reject a control device that is not a remote power device', () => {
      const device = buildPowerDevice(buildMachine('node1'), {
        hardwareType: 'sentry',
        controlDevice: refs.switch,
      });

      expect(captureIssues(() => validateAndNormalize(device))).toEqual([
        "Sentry: Remote power device 'sw1.lab.example.test' must have system type 'remote-power'",
      ]);
    });

    it('should ignore a wrong control device the type clears anyway', () => {
      const machine = buildMachine('node1', { bmc: { fqdn: 'node1-sp.lab.example.test', mac: '52:54:00:aa:bb:01' } });
      const device = buildPowerDevice(machine, {
        hardwareType: 'ipmi',
        managementController: refs.bmc,
        controlDevice: refs.switch,
      });

      expect(validateAndNormalize(device).controlDevice).toBeNull();
    });
  });

  it('should refuse a device without a hardware type', () => {
    const device = buildPowerDevice(buildMachine('node1'), { controlDevice: refs.pdu, port: 1 });

    expect(() => validateAndNormalize(device)).toThrow(ConfigurationError);
    expect(() => validateAndNormalize(device)).toThrow('No remote power type set for node1.lab.example.test');
  });
});

describe('display names', () => {
  it('should return the hardware label', () => {
    expect(displayName({ hardwareType: 'dominionpx' })).toBe('Dominion PX');
    expect(displayName({ hardwareType: 'libvirt-lxc' })).toBe('libvirt/lxc');
  });

  it('should return none when no type is set', () => {
    expect(displayName({})).toBe('none');
    expect(describePowerDevice(buildPowerDevice(buildMachine('node1')))).toBe('none');
  });

  it('should describe a device with its machine', () => {
    const device = buildPowerDevice(buildMachine('node1'), { hardwareType: 'ipmi' });
    expect(describePowerDevice(device)).toBe('IPMI@node1.lab.example.test');
  });
});

describe('hardware type lookup', () => {
  it('should map legacy numeric ids', () => {
    expect(hardwareTypeFromId(0)).toBe('telnet');
    expect(hardwareTypeFromId(4)).toBe('dominionpx');
    expect(hardwareTypeFromId(8)).toBe('s390');
  });

  it('should match labels and values case-insensitively', () => {
    expect(hardwareTypeFromName('libvirt/QEMU')).toBe('libvirt-qemu');
    expect(hardwareTypeFromName('Dominion PX')).toBe('dominionpx');
    expect(hardwareTypeFromName('webcurl')).toBe('webcurl');
  });

  it('should reject unknown types', () => {
    expect(() => hardwareTypeFromId(9)).toThrow("Remote power type with ID '9' doesn't exist");
    expect(() => hardwareTypeFromName('smoke-signal')).toThrow(ConfigurationError);
  });
});
