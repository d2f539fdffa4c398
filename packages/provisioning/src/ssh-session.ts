import { NodeSSH } from 'node-ssh';
import type { ExecResult, IRemoteSession } from '@rackpower/core';
import type { SshSettings } from './config';
import { shellQuote } from './shell';

export class SshSession implements IRemoteSession {
  private readonly ssh = new NodeSSH();

  constructor(
    readonly host: string,
    private readonly settings: SshSettings,
  ) {}

  async connect(): Promise<void> {
    await this.ssh.connect({
      host: this.host,
      username: this.settings.username,
      port: this.settings.port,
      privateKeyPath: this.settings.privateKeyPath,
      password: this.settings.password,
      readyTimeout: this.settings.readyTimeout,
    });
  }

  async execute(command: string): Promise<ExecResult> {
    const result = await this.ssh.execCommand(command);
    return {
      stdout: result.stdout,
      stderr: result.stderr,
      // A null code means the remote process was killed by a signal
      exitStatus: result.code ?? (result.signal ? 255 : 0),
    };
  }

  async checkPath(path: string, flag: string): Promise<boolean> {
    const result = await this.execute(`test ${flag} ${shellQuote(path)}`);
    return result.exitStatus === 0;
  }

  async close(): Promise<void> {
    this.ssh.dispose();
  }
}
