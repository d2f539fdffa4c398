import {
  createLogger,
  IConfigStore,
  IHostResolver,
  IInventory,
  Logger,
  SessionFactory,
} from '@rackpower/core';
import { PowerDeviceRepository, RemotePowerService } from '@rackpower/remote-power';
import { loadProvisioningConfig, ProvisioningConfig } from './config';
import { DomainSync } from './domain-sync';
import { OrchestratorDeps } from './orchestrator';
import { PowerSwitch } from './power-switch';
import { DnsResolver } from './resolver';
import { SshSession } from './ssh-session';

export interface CreateRackPowerOptions {
  config: IConfigStore;
  inventory: IInventory;
  settings?: ProvisioningConfig;
  sessionFactory?: SessionFactory;
  resolver?: IHostResolver;
  logger?: Logger;
}

export interface RackPower {
  powerSwitch: PowerSwitch;
  remotePower: RemotePowerService;
  powerDevices: PowerDeviceRepository;
  domainSync: DomainSync;
}

export function createOrchestratorDeps(options: CreateRackPowerOptions): OrchestratorDeps {
  const settings = options.settings ?? loadProvisioningConfig();
  const logger = options.logger ?? createLogger('rackpower', settings.logLevel);

  return {
    config: options.config,
    inventory: options.inventory,
    logger,
    defaultController: settings.defaultController,
    resolver: options.resolver ?? new DnsResolver(logger),
    sessionFactory: options.sessionFactory ?? ((host) => new SshSession(host, settings.ssh)),
  };
}

export function createRackPower(options: CreateRackPowerOptions): RackPower {
  const deps = createOrchestratorDeps(options);
  const powerSwitch = new PowerSwitch(deps);

  return {
    powerSwitch,
    remotePower: new RemotePowerService(powerSwitch, deps.logger),
    powerDevices: new PowerDeviceRepository(options.inventory, { logger: deps.logger }),
    domainSync: new DomainSync(deps),
  };
}
