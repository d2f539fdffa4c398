import { createLogger, IInventory, Logger, PowerDevice } from '@rackpower/core';
import { validateAndNormalize, describePowerDevice } from './validation';

export interface PowerDeviceRepositoryOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * Persistence gate for power devices. Every save is validated and normalized
 * here, whoever the caller is.
 */
export class PowerDeviceRepository {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly inventory: IInventory,
    options: PowerDeviceRepositoryOptions = {},
  ) {
    this.logger = (options.logger ?? createLogger('remote-power')).child({ component: 'power-device-repository' });
    this.now = options.now ?? (() => new Date());
  }

  async get(machineId: string): Promise<PowerDevice | undefined> {
    return this.inventory.getPowerDevice(machineId);
  }

  async save(device: PowerDevice): Promise<PowerDevice> {
    const normalized = validateAndNormalize(device);
    const timestamp = this.now();
    const record: PowerDevice = {
      ...normalized,
      createdAt: normalized.createdAt ?? timestamp,
      updatedAt: timestamp,
    };

    await this.inventory.savePowerDevice(record);
    this.logger.info({ machine: device.machine.fqdn }, `Saved remote power ${describePowerDevice(record)}`);
    return record;
  }

  /** Cascade for a deleted machine. */
  async removeForMachine(machineId: string): Promise<boolean> {
    const removed = await this.inventory.deletePowerDevice(machineId);
    if (removed) {
      this.logger.info({ machineId }, 'Removed remote power with its machine');
    }
    return removed;
  }
}
