/**
 * Shared test fixtures for rackpower tests.
 * Hostnames live under example.test; nothing here resolves for real.
 */

import type { Domain, Machine, MachineRef, PowerDevice } from '@rackpower/core';

export const DOMAIN_NAME = 'lab.example.test';

/**
 * Machines referenced by power devices
 */
export const refs: Record<'pdu' | 'bmc' | 'hypervisor' | 'switch', MachineRef> = {
  pdu: {
    id: 'm-pdu',
    fqdn: `pdu1.${DOMAIN_NAME}`,
    systemType: 'remote-power',
  },

  bmc: {
    id: 'm-bmc',
    fqdn: `node1-sp.${DOMAIN_NAME}`,
    systemType: 'bmc',
  },

  hypervisor: {
    id: 'm-hv',
    fqdn: `kvm1.${DOMAIN_NAME}`,
    systemType: 'hypervisor',
  },

  switch: {
    id: 'm-switch',
    fqdn: `sw1.${DOMAIN_NAME}`,
    systemType: 'switch',
  },
};

/**
 * Builds an active x86_64 machine in the lab domain. The short name becomes
 * the first label of the fqdn.
 */
export function buildMachine(name: string, overrides: Partial<Machine> = {}): Machine {
  return {
    id: `m-${name}`,
    fqdn: `${name}.${DOMAIN_NAME}`,
    systemType: 'bare-metal',
    ipv4: '10.0.0.10',
    active: true,
    architecture: {
      name: 'x86_64',
      defaultProfile: 'x86_64:SLE-15-SP5-Server-LATEST:install',
    },
    ...overrides,
  };
}

export function buildDomain(overrides: Partial<Domain> = {}): Domain {
  return {
    name: DOMAIN_NAME,
    provisioningHosts: [{ fqdn: `cobbler1.${DOMAIN_NAME}` }],
    ...overrides,
  };
}

export function buildPowerDevice(machine: Machine, overrides: Partial<PowerDevice> = {}): PowerDevice {
  return {
    machine,
    ...overrides,
  };
}

/**
 * Machine with a BMC and an IPMI power device pointing at it
 */
export function ipmiMachine(name: string): { machine: Machine; device: PowerDevice } {
  const machine = buildMachine(name, {
    bmc: { fqdn: `${name}-sp.${DOMAIN_NAME}`, mac: '52:54:00:aa:bb:01' },
  });
  const device = buildPowerDevice(machine, {
    hardwareType: 'ipmi',
    managementController: { id: `m-${name}-sp`, fqdn: `${name}-sp.${DOMAIN_NAME}`, systemType: 'bmc' },
  });
  return { machine, device };
}
