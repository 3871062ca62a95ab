import { EventEmitter } from 'events';
import type dgram from 'dgram';
import { vi } from 'vitest';
import { Config } from '../src/configurations';
import { Logger } from '../src/logging/Logger';
import { BindAttemptResult, BindRequest, SocketBinder, UdpEndpoint } from '../src/net';

export const createTestConfig = (overrides: Partial<Config> = {}): Config =>
  ({
    HTTP_PORT: 18080,
    HTTP_CORS_ORIGINS: [],
    BIND_ADDRESS: '127.0.0.1',
    RTP_PORT_RANGE_START: 10000,
    RTP_PORT_RANGE_END: 20000,
    RTP_SOCKET_BUFFER_SIZE: 100_000_000,
    RTP_BIND_RETRIES: 5,
    RTP_CAP_AT_END_PORT: false,
    UDP_PORT_START: 1025,
    UDP_PORT_END: 65535,
    RANDOM_PORT_ATTEMPTS: 50,
    ROUTE_PROBE_PORT: 9,
    LOG_LEVEL: 'info',
    ...overrides,
  } as Config);

export const createTestLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

/**
 * Stand-in for dgram.Socket. `bind` and `connect` settle on the next tick,
 * either with the scripted error or successfully.
 */
export class FakeUdpSocket extends EventEmitter {
  public bindError?: Error;
  public connectError?: Error;
  public localAddress = '0.0.0.0';
  public localPort = 0;

  public bind = vi.fn((options: dgram.BindOptions) => {
    setImmediate(() => {
      if (this.bindError) {
        this.emit('error', this.bindError);
        return;
      }
      this.localAddress = options.address ?? this.localAddress;
      this.localPort = options.port ?? this.localPort;
      this.emit('listening');
    });
  });

  public connect = vi.fn((_port: number, _address: string, callback: (err?: Error) => void) => {
    setImmediate(() => callback(this.connectError));
  });

  public address = vi.fn(() => ({ address: this.localAddress, port: this.localPort, family: 'IPv4' }));
  public close = vi.fn();
  public setRecvBufferSize = vi.fn();
  public setSendBufferSize = vi.fn();
}

export const asDgramSocket = (socket: FakeUdpSocket): dgram.Socket => socket as unknown as dgram.Socket;

export const socketError = (code: string): Error => Object.assign(new Error(`bind ${code}`), { code });

/**
 * In-memory bind backend. A port is taken until the socket bound to it is
 * closed. The free check happens before the simulated bind delay and the claim
 * after it, the same window in which two real callers could collide.
 */
export class FakeSocketBinder implements SocketBinder {
  public readonly requests: BindRequest[] = [];
  public readonly claimed = new Set<number>();
  public readonly busy = new Set<number>();
  public readonly doubleClaims: number[] = [];
  public failWith?: (request: BindRequest) => Error | undefined;
  public rejectAll = false;
  public inFlight = 0;
  public maxInFlight = 0;

  public async bind(request: BindRequest): Promise<BindAttemptResult> {
    this.requests.push(request);
    const wasFree = !this.busy.has(request.port) && !this.claimed.has(request.port) && !this.rejectAll;

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setImmediate(resolve));
    this.inFlight--;

    const failure = this.failWith?.(request);
    if (failure) {
      throw failure;
    }
    if (!wasFree) {
      return { kind: 'conflict', code: 'EADDRINUSE', port: request.port };
    }
    if (this.claimed.has(request.port)) {
      this.doubleClaims.push(request.port);
    }

    this.claimed.add(request.port);
    const socket = new FakeUdpSocket();
    socket.close.mockImplementation(() => {
      this.claimed.delete(request.port);
    });
    return {
      kind: 'bound',
      socket: asDgramSocket(socket),
      endpoint: new UdpEndpoint(request.address, request.port),
    };
  }

  public get requestedPorts(): number[] {
    return this.requests.map((request) => request.port);
  }
}

/** Random source that replays a fixed list of draws, cycling when it runs out. */
export const scriptedRandom = (draws: number[]) => {
  let index = 0;
  return {
    randomInt: vi.fn((_low: number, _high: number) => draws[index++ % draws.length]),
  };
};
