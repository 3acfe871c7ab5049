import { promises as dns } from 'dns';
import { logger, sleep } from '@cfupdater/utils';

export type Resolve4 = (hostname: string) => Promise<string>;

const systemResolve4: Resolve4 = async (hostname) => {
  const { address } = await dns.lookup(hostname, { family: 4 });
  return address;
};

/**
 * Checks that a name resolves to the address just written. Never throws:
 * a mismatch or a resolver failure is logged and reported as `false`.
 */
export class DnsVerifier {
  constructor(
    private readonly delayMs: number = 5000,
    private readonly resolve4: Resolve4 = systemResolve4,
  ) {}

  async verify(hostname: string, expectedIp: string): Promise<boolean> {
    // Allow some time for propagation
    await sleep(this.delayMs);

    let resolvedIp: string;
    try {
      resolvedIp = await this.resolve4(hostname);
    } catch (error) {
      logger.error(`DNS resolution failed for ${hostname}`, error);
      return false;
    }

    if (resolvedIp === expectedIp) {
      logger.info(`DNS verification successful: ${hostname} resolves to ${resolvedIp}`);
      return true;
    }

    logger.warn(`DNS verification failed: ${hostname} resolves to ${resolvedIp}, expected ${expectedIp}`);
    return false;
  }
}
