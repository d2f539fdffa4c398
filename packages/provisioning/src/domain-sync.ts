import { ConfigurationError, createLogger, Logger } from '@rackpower/core';
import { OrchestratorDeps, ProvisioningOrchestrator, SyncReport } from './orchestrator';

export type HostSyncResult =
  | { host: string; ok: true; report: SyncReport }
  | { host: string; ok: false; error: string };

/** Runs a deploy pass against every Cobbler host serving a domain. */
export class DomainSync {
  private readonly logger: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = (deps.logger ?? createLogger('provisioning')).child({ component: 'domain-sync' });
  }

  async syncDomain(domainName: string): Promise<HostSyncResult[]> {
    const domain = await this.deps.inventory.getDomain(domainName);
    if (!domain) {
      throw new ConfigurationError(`Unknown domain ${domainName}`);
    }

    const results: HostSyncResult[] = [];
    for (const server of domain.provisioningHosts) {
      const orchestrator = new ProvisioningOrchestrator(server.fqdn, domain, this.deps);
      try {
        results.push({ host: server.fqdn, ok: true, report: await orchestrator.deploy() });
      } catch (error) {
        this.logger.error({ domain: domainName, host: server.fqdn, err: error }, 'Domain sync failed');
        results.push({ host: server.fqdn, ok: false, error: error instanceof Error ? error.message : String(error) });
      }
    }
    return results;
  }
}
