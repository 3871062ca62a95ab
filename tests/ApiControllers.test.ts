import type { Request, Response } from 'express';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AllocatorController, HealthController, RouteController } from '../src/http/controllers';
import { Logger } from '../src/logging/Logger';
import { AllocationLock, LocalRouteResolver } from '../src/net';
import { asDgramSocket, createTestConfig, createTestLogger, FakeUdpSocket, socketError } from './utils';

const createResponse = () => {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
};

const asResponse = (res: ReturnType<typeof createResponse>): Response => res as unknown as Response;

const createRequest = (query: Record<string, string>): Request => ({ query }) as unknown as Request;

describe('HealthController', () => {
  it('reports the service as healthy', () => {
    const res = createResponse();

    HealthController.healthCheck(createRequest({}), asResponse(res));

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ status: 'ok', message: 'Port allocator is healthy' });
  });
});

describe('AllocatorController', () => {
  it('describes the effective allocator settings', async () => {
    const lock = new AllocationLock();
    const controller = new AllocatorController(
      createTestConfig({ RTP_PORT_RANGE_START: 16384, RTP_PORT_RANGE_END: 32767, RTP_CAP_AT_END_PORT: true }),
      lock
    );
    const res = createResponse();

    let release: () => void = () => undefined;
    const held = lock.runExclusive(() => new Promise<void>((resolve) => (release = resolve)));
    await new Promise((resolve) => setImmediate(resolve));
    controller.settings(createRequest({}), asResponse(res));
    release();
    await held;

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({
      bindAddress: '127.0.0.1',
      paired: {
        rangeStart: 16384,
        rangeEnd: 32767,
        maxRetries: 5,
        socketBufferSize: 100_000_000,
        capAtEndPort: true,
        allocationInProgress: true,
      },
      random: {
        rangeStart: 1025,
        rangeEnd: 65535,
        maxAttempts: 50,
      },
    });
  });
});

describe('RouteController', () => {
  let socket: FakeUdpSocket;
  let logger: Logger;
  let controller: RouteController;

  beforeEach(() => {
    socket = new FakeUdpSocket();
    socket.localAddress = '10.0.0.7';
    logger = createTestLogger();
    const resolver = new LocalRouteResolver(logger, 9, () => asDgramSocket(socket));
    controller = new RouteController(resolver, logger);
  });

  it('returns the resolved local address', async () => {
    const res = createResponse();

    await controller.resolve(createRequest({ destination: '198.51.100.4' }), asResponse(res));

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ destination: '198.51.100.4', localAddress: '10.0.0.7' });
  });

  it('requires a destination', async () => {
    const res = createResponse();

    await controller.resolve(createRequest({}), asResponse(res));

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: 'Query parameter "destination" is required' });
  });

  it('rejects a destination that is not an IP address', async () => {
    const res = createResponse();

    await controller.resolve(createRequest({ destination: 'pbx.local' }), asResponse(res));

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: 'pbx.local is not an IPv4 or IPv6 address' });
  });

  it('maps routing failures to a bad gateway', async () => {
    socket.connectError = socketError('ENETUNREACH');
    const res = createResponse();

    await controller.resolve(createRequest({ destination: '203.0.113.50' }), asResponse(res));

    expect(res.status).toHaveBeenCalledWith(502);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Unable to determine the local address used to reach 203.0.113.50',
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Unable to determine the local address used to reach 203.0.113.50',
      socket.connectError
    );
  });
});
