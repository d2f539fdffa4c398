import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError } from '@rackpower/core';
import { buildMachine, buildPowerDevice, InMemoryInventory, refs, silentLogger } from '@rackpower/test-utils';
import { PowerDeviceRepository } from '../repository';

describe('PowerDeviceRepository', () => {
  const created = new Date('2026-01-05T08:00:00Z');
  const later = new Date('2026-02-01T12:30:00Z');
  let inventory: InMemoryInventory;
  let clock: Date;
  let repository: PowerDeviceRepository;

  beforeEach(() => {
    inventory = new InMemoryInventory();
    clock = created;
    repository = new PowerDeviceRepository(inventory, { logger: silentLogger(), now: () => clock });
  });

  it('should persist the normalized device with timestamps', async () => {
    const device = buildPowerDevice(buildMachine('node1'), {
      hardwareType: 'sentry',
      controlDevice: refs.pdu,
      port: 9,
      deviceIndex: 2,
    });

    const saved = await repository.save(device);

    expect(saved.port).toBeNull();
    expect(saved.deviceIndex).toBeNull();
    expect(saved.createdAt).toEqual(created);
    expect(saved.updatedAt).toEqual(created);
    expect(await repository.get('m-node1')).toEqual(saved);
  });

  it('should keep the creation time on later saves', async () => {
    const first = await repository.save(
      buildPowerDevice(buildMachine('node1'), { hardwareType: 'sentry', controlDevice: refs.pdu }),
    );
    clock = later;

    const second = await repository.save({ ...first, comment: 'moved to rack 4' });

    expect(second.createdAt).toEqual(created);
    expect(second.updatedAt).toEqual(later);
  });

  it('should not persist an invalid device', async () => {
    const device = buildPowerDevice(buildMachine('node1'), { hardwareType: 'telnet' });

    await expect(repository.save(device)).rejects.toThrow(ConfigurationError);
    expect(inventory.devices.size).toBe(0);
  });

  it('should never persist a device without a hardware type', async () => {
    const device = buildPowerDevice(buildMachine('node1'));

    await expect(repository.save(device)).rejects.toThrow('No remote power type set');
    expect(inventory.devices.has('m-node1')).toBe(false);
  });

  it('should remove the device with its machine', async () => {
    await repository.save(buildPowerDevice(buildMachine('node1'), { hardwareType: 'sentry', controlDevice: refs.pdu }));

    expect(await repository.removeForMachine('m-node1')).toBe(true);
    expect(await repository.removeForMachine('m-node1')).toBe(false);
    expect(await repository.get('m-node1')).toBeUndefined();
  });
});
