import { lookup } from 'dns/promises';
import type { IHostResolver, Logger } from '@rackpower/core';

export class DnsResolver implements IHostResolver {
  constructor(private readonly logger?: Logger) {}

  async resolveIPv4(hostname: string): Promise<string | undefined> {
    try {
      const { address } = await lookup(hostname, { family: 4 });
      return address;
    } catch (error) {
      this.logger?.debug({ hostname, err: error }, 'IPv4 lookup failed');
      return undefined;
    }
  }
}
