import {
  createLogger,
  IPowerSwitch,
  Logger,
  PowerActionOutcome,
  PowerDevice,
  PowerStatus,
} from '@rackpower/core';
import { classifyPowerStatus } from './status';
import { describePowerDevice } from './validation';

/**
 * Power intents for a single device. Execution is delegated to the power
 * switch, which picks a provisioning host for the machine's domain.
 */
export class RemotePowerService {
  private readonly logger: Logger;

  constructor(
    private readonly powerSwitch: IPowerSwitch,
    logger?: Logger,
  ) {
    this.logger = (logger ?? createLogger('remote-power')).child({ component: 'remote-power' });
  }

  async powerOn(device: PowerDevice): Promise<PowerActionOutcome> {
    return this.powerSwitch.performPowerAction(device.machine, 'on');
  }

  async powerOff(device: PowerDevice): Promise<PowerActionOutcome> {
    return this.powerSwitch.performPowerAction(device.machine, 'off');
  }

  /** Reboot is not offered through remote power; callers get an `unsupported` outcome. */
  async reboot(device: PowerDevice): Promise<PowerActionOutcome> {
    this.logger.warn({ machine: device.machine.fqdn }, `Reboot not implemented: ${describePowerDevice(device)}`);
    return { status: 'unsupported', action: 'reboot' };
  }

  async getStatus(device: PowerDevice): Promise<PowerStatus> {
    const outcome = await this.powerSwitch.performPowerAction(device.machine, 'status');
    if (outcome.status !== 'succeeded') {
      return PowerStatus.UNKNOWN;
    }
    return classifyPowerStatus(outcome.output);
  }
}
