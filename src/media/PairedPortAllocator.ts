import type dgram from 'dgram';
import { MAX_PORT, MAXIMUM_RTP_PORT_BIND_RETRIES, RTP_SOCKET_BUFFER_SIZE } from '../constants';
import { InvalidAllocationRequestError, RangeExhaustedError } from '../errors';
import { Logger } from '../logging/Logger';
import { AllocationLock, BindAttemptResult, PortRange, SocketBinder, UdpEndpoint } from '../net';

export interface PairedAllocation {
  mediaSocket: dgram.Socket;
  mediaEndpoint: UdpEndpoint;
  controlSocket?: dgram.Socket;
  controlEndpoint?: UdpEndpoint;
  attempts: number;
}

export interface PairedPortAllocatorOptions {
  /** Re-attempts after the first bind. */
  maxRetries?: number;
  socketBufferSize?: number;
  /** Stop retrying once the ports would pass `endPort`. */
  capAtEndPort?: boolean;
}

type PairAttempt =
  | ({ kind: 'bound' } & Omit<PairedAllocation, 'attempts'>)
  | { kind: 'conflict'; code: string; port: number };

/**
 * Binds the media (RTP) socket on an even port and, when asked for, the
 * control (RTCP) socket on the odd port right above it.
 *
 * Each allocation holds the shared lock from port selection until the last
 * bind settles, so two callers never pick the same pair.
 */
export class PairedPortAllocator {
  private readonly maxRetries: number;
  private readonly socketBufferSize: number;
  private readonly capAtEndPort: boolean;

  constructor(
    private readonly binder: SocketBinder,
    private readonly lock: AllocationLock,
    private readonly logger: Logger,
    options: PairedPortAllocatorOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? MAXIMUM_RTP_PORT_BIND_RETRIES;
    this.socketBufferSize = options.socketBufferSize ?? RTP_SOCKET_BUFFER_SIZE;
    this.capAtEndPort = options.capAtEndPort ?? false;

    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new RangeError('RTP bind retries must be a non-negative integer');
    }
  }

  public allocatePorts(
    localAddress: string,
    startPort: number,
    endPort: number,
    needsControlSocket: boolean
  ): Promise<PairedAllocation> {
    return this.lock.runExclusive(() => this.allocateExclusive(localAddress, startPort, endPort, needsControlSocket));
  }

  private async allocateExclusive(
    localAddress: string,
    startPort: number,
    endPort: number,
    needsControlSocket: boolean
  ): Promise<PairedAllocation> {
    UdpEndpoint.familyOf(localAddress);

    // Media goes on an even port, its control socket on the next odd one.
    const firstPort = startPort % 2 !== 0 ? startPort + 1 : startPort;
    const firstHighestPort = needsControlSocket ? firstPort + 1 : firstPort;
    if (!PortRange.isValidPort(firstPort) || !PortRange.isValidPort(firstHighestPort)) {
      throw new InvalidAllocationRequestError(
        `No RTP port could be allocated on address ${localAddress} within the range ${startPort} to ${endPort}`
      );
    }

    let mediaPort = firstPort;
    let attempts = 0;

    for (let retry = 0; retry <= this.maxRetries; retry++) {
      const highestPort = needsControlSocket ? mediaPort + 1 : mediaPort;
      if (highestPort > MAX_PORT || (this.capAtEndPort && highestPort > endPort)) {
        break;
      }

      attempts++;
      const result = await this.bindPair(localAddress, mediaPort, needsControlSocket);
      if (result.kind === 'bound') {
        const { kind: _kind, ...allocation } = result;
        return { ...allocation, attempts };
      }

      this.logger.warn(
        needsControlSocket
          ? `Socket error ${result.code} binding to address ${localAddress} and RTP port ${mediaPort} and/or control port ${mediaPort + 1}, attempt ${retry}`
          : `Socket error ${result.code} binding to address ${localAddress} and RTP port ${mediaPort}, attempt ${retry}`
      );

      // The OS may still be holding a port it has just released; step past it.
      mediaPort += 2;
    }

    throw new RangeExhaustedError(localAddress, firstPort, endPort, attempts);
  }

  private async bindPair(address: string, mediaPort: number, needsControlSocket: boolean): Promise<PairAttempt> {
    const media = await this.binder.bind({ address, port: mediaPort, bufferSize: this.socketBufferSize });
    if (media.kind === 'conflict') {
      return media;
    }

    if (!needsControlSocket) {
      this.logger.debug(`Successfully bound RTP socket ${media.endpoint}`);
      return { kind: 'bound', mediaSocket: media.socket, mediaEndpoint: media.endpoint };
    }

    let control: BindAttemptResult;
    try {
      control = await this.binder.bind({ address, port: mediaPort + 1, bufferSize: this.socketBufferSize });
    } catch (err) {
      media.socket.close();
      throw err;
    }

    if (control.kind === 'conflict') {
      media.socket.close();
      return control;
    }

    this.logger.debug(`Successfully bound RTP socket ${media.endpoint} and control socket ${control.endpoint}`);
    return {
      kind: 'bound',
      mediaSocket: media.socket,
      mediaEndpoint: media.endpoint,
      controlSocket: control.socket,
      controlEndpoint: control.endpoint,
    };
  }
}
