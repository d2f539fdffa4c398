import { v4 as uuidv4 } from 'uuid';
import {
  CommandFailedError,
  createLogger,
  Domain,
  IConfigStore,
  IHostResolver,
  IInventory,
  InvalidActionError,
  IRemoteSession,
  Logger,
  Machine,
  PowerAction,
  ServiceUnavailableError,
  SessionFactory,
  SyncError,
} from '@rackpower/core';
import {
  buildAddCommand,
  buildBmcCommand,
  buildPowerCommand,
  buildSetupCommand,
  buildUpdateCommand,
  CommandContext,
  redactCommand,
} from './commands';
import { CONTROLLER_COMMAND_KEY, DEFAULT_CONTROLLER } from './config';

export interface OrchestratorDeps {
  sessionFactory: SessionFactory;
  config: IConfigStore;
  inventory: IInventory;
  resolver: IHostResolver;
  logger?: Logger;
  /** Cobbler path used when the server config has no `cobbler.command`. */
  defaultController?: string;
}

export interface SyncFailure {
  command: string;
  exitStatus: number;
  stderr: string;
}

export interface SkippedMachine {
  machine: string;
  error: string;
}

export interface SyncReport {
  passId: string;
  host: string;
  domain: string;
  added: string[];
  updated: string[];
  executed: number;
  failures: SyncFailure[];
  /** Machines whose commands could not be built; nothing was sent for them. */
  skipped: SkippedMachine[];
}

/**
 * Drives one Cobbler host on behalf of one domain. The SSH session is opened
 * on first use and must be closed by the caller, or scoped with withSession().
 */
export class ProvisioningOrchestrator {
  private session?: IRemoteSession;
  private controller?: string;
  private readonly logger: Logger;

  constructor(
    readonly fqdn: string,
    readonly domain: Domain,
    private readonly deps: OrchestratorDeps,
  ) {
    this.logger = (deps.logger ?? createLogger('provisioning')).child({ host: fqdn, domain: domain.name });
  }

  async connect(): Promise<IRemoteSession> {
    if (this.session) {
      return this.session;
    }
    const session = this.deps.sessionFactory(this.fqdn);
    await session.connect();
    this.session = session;
    return session;
  }

  async close(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = undefined;
    await session.close();
  }

  get connected(): boolean {
    return this.session !== undefined;
  }

  async withSession<T>(work: (orchestrator: ProvisioningOrchestrator) => Promise<T>): Promise<T> {
    try {
      await this.connect();
      return await work(this);
    } finally {
      await this.close();
    }
  }

  async controllerPath(): Promise<string> {
    if (this.controller === undefined) {
      const configured = await this.deps.config.byKey(CONTROLLER_COMMAND_KEY);
      this.controller = configured || this.deps.defaultController || DEFAULT_CONTROLLER;
    }
    return this.controller;
  }

  async isInstalled(): Promise<boolean> {
    const session = await this.connect();
    return session.checkPath(await this.controllerPath(), '-x');
  }

  async isRunning(): Promise<boolean> {
    const session = await this.connect();
    const { exitStatus } = await session.execute(`${await this.controllerPath()} version`);
    return exitStatus === 0;
  }

  /** Names of the systems Cobbler already knows. */
  async getMachines(): Promise<string[]> {
    const session = await this.connect();
    const { stdout, stderr, exitStatus } = await session.execute(`${await this.controllerPath()} system list`);
    if (exitStatus !== 0) {
      this.logger.warn({ exitStatus, stderr }, `system list failed on ${this.fqdn}`);
      throw new SyncError(`system list failed on ${this.fqdn}`, this.fqdn);
    }
    return stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /**
   * Pushes every active machine of the domain to Cobbler: `system edit` for
   * known names, `system add` plus a BMC interface for the rest. A machine
   * whose commands cannot be built is skipped, and a failing command is
   * recorded; either way the pass carries on with the next one.
   */
  async deploy(): Promise<SyncReport> {
    const passId = uuidv4();
    const log = this.logger.child({ passId });

    return this.withSession(async () => {
      if (!(await this.isInstalled())) {
        throw new ServiceUnavailableError(`No Cobbler service found: ${this.fqdn}`, this.fqdn);
      }
      if (!(await this.isRunning())) {
        throw new ServiceUnavailableError(`Cobbler server is not running: ${this.fqdn}`, this.fqdn);
      }

      const known = new Set(await this.getMachines());
      const machines = await this.deps.inventory.listActiveMachines(this.domain.name);
      const ctx = await this.commandContext();

      const commands: string[] = [];
      const added: string[] = [];
      const updated: string[] = [];
      const skipped: SkippedMachine[] = [];

      for (const machine of machines) {
        try {
          const device = await this.deps.inventory.getPowerDevice(machine.id);
          if (known.has(machine.fqdn)) {
            commands.push(await buildUpdateCommand(machine, device, ctx));
            updated.push(machine.fqdn);
            continue;
          }

          const addCommand = await buildAddCommand(machine, device, ctx);
          const bmcCommand = await buildBmcCommand(machine, ctx);
          commands.push(addCommand);
          if (bmcCommand) {
            commands.push(bmcCommand);
          }
          added.push(machine.fqdn);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          log.warn({ machine: machine.fqdn, err: error }, `Skipping ${machine.fqdn}: ${message}`);
          skipped.push({ machine: machine.fqdn, error: message });
        }
      }

      const session = await this.connect();
      const failures: SyncFailure[] = [];
      // TODO: batch these into a single remote shell invocation
      for (const command of commands) {
        const { stderr, exitStatus } = await session.execute(command);
        if (exitStatus !== 0) {
          const failure = { command: redactCommand(command), exitStatus, stderr };
          log.error(failure, 'Cobbler command failed');
          failures.push(failure);
        }
      }

      log.info(
        { added: added.length, updated: updated.length, skipped: skipped.length, failed: failures.length },
        `Synced domain ${this.domain.name} to ${this.fqdn}`,
      );

      return {
        passId,
        host: this.fqdn,
        domain: this.domain.name,
        added,
        updated,
        executed: commands.length,
        failures,
        skipped,
      };
    });
  }

  /** Runs a power verb for the machine and returns Cobbler's output. */
  async powerswitch(machine: Machine, action: string): Promise<string> {
    this.logger.info({ machine: machine.fqdn, action }, 'powerswitch called');

    const parsed = PowerAction.safeParse(action);
    if (!parsed.success) {
      throw new InvalidActionError(action, machine.fqdn);
    }

    if (!(await this.getMachines()).includes(machine.fqdn)) {
      this.logger.error({ machine: machine.fqdn }, 'Machine is not on the Cobbler server, aborting powerswitch');
      throw new SyncError(
        `machine ${machine.fqdn} is not on cobbler server ${this.fqdn}, aborting powerswitch`,
        this.fqdn,
      );
    }

    const command = buildPowerCommand(await this.controllerPath(), machine, parsed.data);
    return this.run(command);
  }

  /** Points the machine at `<arch>:<choice>` and enables netboot. */
  async setup(machine: Machine, choice: string): Promise<void> {
    const command = buildSetupCommand(await this.controllerPath(), machine, choice);
    this.logger.info({ machine: machine.fqdn, choice }, 'Setting up netboot');
    await this.run(command);
  }

  private async run(command: string): Promise<string> {
    const session = await this.connect();
    this.logger.debug({ command: redactCommand(command) }, 'Executing');
    const { stdout, stderr, exitStatus } = await session.execute(command);
    if (exitStatus !== 0) {
      this.logger.warn({ command: redactCommand(command), exitStatus, stderr }, 'Cobbler command failed');
      throw new CommandFailedError(redactCommand(command), this.fqdn, exitStatus, stderr);
    }
    return stdout;
  }

  private async commandContext(): Promise<CommandContext> {
    return {
      controller: await this.controllerPath(),
      domain: this.domain,
      config: this.deps.config,
      resolver: this.deps.resolver,
    };
  }
}
