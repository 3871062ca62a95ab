import dgram from 'dgram';
import { SocketTypeByFamily } from '../constants';
import { Logger } from '../logging/Logger';
import { UdpEndpoint } from './UdpEndpoint';

export interface BindRequest {
  address: string;
  port: number;
  /** Applied to both the send and receive buffers once the socket is bound. */
  bufferSize?: number;
}

export type BindAttemptResult =
  | { kind: 'bound'; socket: dgram.Socket; endpoint: UdpEndpoint }
  | { kind: 'conflict'; code: string; port: number };

/**
 * Creates and binds a single UDP socket. A port that cannot be taken is
 * reported as a `conflict` result; any other failure rejects.
 */
export interface SocketBinder {
  bind(request: BindRequest): Promise<BindAttemptResult>;
}

export type SocketFactory = (options: dgram.SocketOptions) => dgram.Socket;

const CONFLICT_CODES: ReadonlySet<string> = new Set(['EADDRINUSE', 'EACCES']);

export const errorCode = (err: unknown): string | undefined =>
  err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;

export class DgramSocketBinder implements SocketBinder {
  constructor(
    private readonly logger: Logger,
    private readonly createSocket: SocketFactory = (options) => dgram.createSocket(options)
  ) {}

  public async bind(request: BindRequest): Promise<BindAttemptResult> {
    const family = UdpEndpoint.familyOf(request.address);
    const socket = this.createSocket({ type: SocketTypeByFamily[family] });

    return new Promise<BindAttemptResult>((resolve, reject) => {
      const onError = (err: Error) => {
        socket.off('listening', onListening);
        socket.close();
        const code = errorCode(err);
        if (code !== undefined && CONFLICT_CODES.has(code)) {
          resolve({ kind: 'conflict', code, port: request.port });
        } else {
          reject(err);
        }
      };

      const onListening = () => {
        socket.off('error', onError);
        if (request.bufferSize) {
          this.applyBufferSize(socket, request.bufferSize);
        }
        const bound = socket.address();
        resolve({ kind: 'bound', socket, endpoint: new UdpEndpoint(bound.address, bound.port, family) });
      };

      socket.once('error', onError);
      socket.once('listening', onListening);
      socket.bind({ address: request.address, port: request.port, exclusive: true });
    });
  }

  private applyBufferSize(socket: dgram.Socket, size: number): void {
    try {
      socket.setRecvBufferSize(size);
      socket.setSendBufferSize(size);
    } catch (err) {
      this.logger.warn(`Could not set UDP buffer size of ${size} bytes`, err);
    }
  }
}
