import {
  createLogger,
  domainOf,
  IPowerSwitch,
  Logger,
  Machine,
  PowerAction,
  PowerActionOutcome,
  PowerAttempt,
} from '@rackpower/core';
import { OrchestratorDeps, ProvisioningOrchestrator } from './orchestrator';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Executes power actions through the Cobbler hosts of the machine's domain,
 * trying them in order until one succeeds.
 *
 * Total failure is logged and reported in the outcome; nothing is thrown, so
 * callers that need confirmation have to poll the status afterwards.
 */
export class PowerSwitch implements IPowerSwitch {
  private readonly logger: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = (deps.logger ?? createLogger('provisioning')).child({ component: 'power-switch' });
  }

  async performPowerAction(machine: Machine, action: PowerAction): Promise<PowerActionOutcome> {
    this.logger.info({ machine: machine.fqdn, action }, 'Performing powerswitch');

    const domainName = domainOf(machine.fqdn);
    const domain = await this.deps.inventory.getDomain(domainName);
    if (!domain) {
      this.logger.error({ machine: machine.fqdn, domain: domainName }, 'No domain found for machine');
      return { status: 'failed', action, attempts: [] };
    }

    const attempts: PowerAttempt[] = [];
    for (const server of domain.provisioningHosts) {
      const orchestrator = new ProvisioningOrchestrator(server.fqdn, domain, this.deps);
      try {
        this.logger.debug({ host: server.fqdn }, 'Trying provisioning host');
        const output = await orchestrator.withSession((cobbler) => cobbler.powerswitch(machine, action));
        attempts.push({ host: server.fqdn });
        return { status: 'succeeded', action, host: server.fqdn, output, attempts };
      } catch (error) {
        this.logger.warn(
          { machine: machine.fqdn, host: server.fqdn, err: error },
          `Powerswitching of ${machine.fqdn} on ${server.fqdn} failed`,
        );
        attempts.push({ host: server.fqdn, error: errorMessage(error) });
      }
    }

    this.logger.error(
      { machine: machine.fqdn, attempts: attempts.length },
      `Powerswitching of ${machine.fqdn} failed on all provisioning hosts`,
    );
    return { status: 'failed', action, attempts };
  }
}
