import dgram from 'dgram';
import { ROUTE_PROBE_PORT, SocketTypeByFamily } from '../constants';
import { RouteResolutionError } from '../errors';
import { Logger } from '../logging/Logger';
import { SocketFactory } from './SocketBinder';
import { UdpEndpoint } from './UdpEndpoint';

/**
 * Uses the OS routing table to pick the local address for talking to a
 * destination, e.g. a private interface for a LAN peer versus the public one
 * for an Internet host.
 *
 * A connected UDP socket has its local address chosen by the kernel without a
 * single packet being sent. Node will not connect to port 0, so a fixed probe
 * port stands in for it.
 */
export class LocalRouteResolver {
  constructor(
    private readonly logger: Logger,
    private readonly probePort: number = ROUTE_PROBE_PORT,
    private readonly createSocket: SocketFactory = (options) => dgram.createSocket(options)
  ) {}

  public async resolveLocalAddress(destination: string): Promise<string> {
    const family = UdpEndpoint.familyOf(destination);
    const socket = this.createSocket({ type: SocketTypeByFamily[family] });

    try {
      await new Promise<void>((resolve, reject) => {
        socket.once('error', reject);
        socket.connect(this.probePort, destination, (err?: Error) => (err ? reject(err) : resolve()));
      });
      const { address } = socket.address();
      this.logger.debug(`Local address for ${destination} is ${address}`);
      return address;
    } catch (err) {
      throw new RouteResolutionError(destination, err);
    } finally {
      socket.close();
    }
  }
}
