import dns from 'dns';
import { isIP, type LookupFunction } from 'net';
import debugFactory from 'debug';
import { ConfigError } from './errors';

const debug = debugFactory('rpc-conform:resolver');

export type HostTable = Record<string, string | string[]>;

/**
 * Static hostname table consulted before the system resolver, so the runner
 * rather than the OS decides which backend a logical hostname reaches.
 */
export class HostResolver {
  private readonly hosts = new Map<string, string[]>();
  private readonly strict: boolean;

  constructor(table: HostTable = {}, options: { strict?: boolean } = {}) {
    this.strict = !!options.strict;
    const issues: string[] = [];
    Object.entries(table).forEach(([host, value]) => {
      const addresses = Array.isArray(value) ? value : [value];
      const invalid = addresses.filter((a) => isIP(a) === 0);
      if (addresses.length === 0 || invalid.length > 0) {
        issues.push(`${host}: expected IP addresses, got ${JSON.stringify(value)}`);
        return;
      }
      this.hosts.set(host.toLowerCase(), addresses);
    });
    if (issues.length > 0) {
      throw new ConfigError('invalid dns table', issues);
    }
  }

  get size(): number {
    return this.hosts.size;
  }

  resolve(hostname: string): string[] | undefined {
    return this.hosts.get(hostname.toLowerCase());
  }

  lookup: LookupFunction = (hostname, options, callback) => {
    const addresses = this.resolve(hostname);
    if (!addresses) {
      if (this.strict) {
        const err: NodeJS.ErrnoException = new Error(`${hostname} is not in the dns table`);
        err.code = 'ENOTFOUND';
        callback(err, '');
        return;
      }
      dns.lookup(hostname, options, callback);
      return;
    }
    const entries = addresses.map((address) => ({ address, family: isIP(address) }));
    debug('%s -> %o', hostname, addresses);
    if (options.all) {
      callback(null, entries);
    } else {
      callback(null, entries[0].address, entries[0].family);
    }
  };
}
