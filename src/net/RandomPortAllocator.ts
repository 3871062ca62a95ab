import type dgram from 'dgram';
import { MAXIMUM_RANDOM_PORT_BIND_ATTEMPTS, UDP_PORT_END, UDP_PORT_START } from '../constants';
import { InvalidAllocationRequestError, RangeExhaustedError } from '../errors';
import { Logger } from '../logging/Logger';
import { PortRange } from './PortRange';
import { RandomSource, secureRandom } from './SecureRandom';
import { SocketBinder } from './SocketBinder';
import { UdpEndpoint } from './UdpEndpoint';

export type ExclusionSet = ReadonlySet<number> | readonly number[];

export interface RandomListener {
  socket: dgram.Socket;
  localEndpoint: UdpEndpoint;
  /** Bind attempts made, excluded draws not counted. */
  attempts: number;
}

export interface RandomPortAllocatorOptions {
  maxAttempts?: number;
  defaultStart?: number;
  defaultEnd?: number;
  random?: RandomSource;
}

export class RandomPortAllocator {
  private readonly maxAttempts: number;
  private readonly defaultStart: number;
  private readonly defaultEnd: number;
  private readonly random: RandomSource;

  constructor(
    private readonly binder: SocketBinder,
    private readonly logger: Logger,
    options: RandomPortAllocatorOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? MAXIMUM_RANDOM_PORT_BIND_ATTEMPTS;
    this.defaultStart = options.defaultStart ?? UDP_PORT_START;
    this.defaultEnd = options.defaultEnd ?? UDP_PORT_END;
    this.random = options.random ?? secureRandom;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError('Random port bind attempts must be a positive integer');
    }
  }

  /**
   * Binds a UDP listener on a random port drawn from `[start, end)`.
   *
   * Draws that land on an excluded port are skipped without using up one of
   * the bind attempts. Bind conflicts are expected here and only logged at
   * debug level.
   */
  public async allocateRandomListener(
    localAddress: string,
    start: number = this.defaultStart,
    end: number = this.defaultEnd,
    excludedPorts?: ExclusionSet
  ): Promise<RandomListener> {
    UdpEndpoint.familyOf(localAddress);
    const range = new PortRange(start, end);
    if (range.size === 0) {
      throw new InvalidAllocationRequestError(`Port range ${range} has no ports to draw from`);
    }

    const excluded: ReadonlySet<number> = new Set(excludedPorts);
    if (this.excludesWholeRange(range, excluded)) {
      throw new RangeExhaustedError(localAddress, start, end, 0);
    }

    let attempts = 0;
    while (attempts < this.maxAttempts) {
      const port = this.random.randomInt(range.start, range.end);
      if (excluded.has(port)) {
        continue;
      }

      attempts++;
      const result = await this.binder.bind({ address: localAddress, port });
      if (result.kind === 'bound') {
        this.logger.debug(`Bound random UDP listener ${result.endpoint} after ${attempts} attempt(s)`);
        return { socket: result.socket, localEndpoint: result.endpoint, attempts };
      }

      this.logger.debug(`Random UDP port ${localAddress}:${port} unavailable (${result.code})`);
    }

    throw new RangeExhaustedError(localAddress, start, end, attempts);
  }

  private excludesWholeRange(range: PortRange, excluded: ReadonlySet<number>): boolean {
    if (excluded.size < range.size) {
      return false;
    }
    for (let port = range.start; port < range.end; port++) {
      if (!excluded.has(port)) {
        return false;
      }
    }
    return true;
  }
}
