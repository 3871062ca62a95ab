import { createContainer, asClass, asFunction, InjectionMode } from 'awilix';
import { Config } from './configurations';
import { ConsoleLogger } from './logging';
import { PairedPortAllocator } from './media';
import { AllocationLock, DgramSocketBinder, LocalRouteResolver, RandomPortAllocator } from './net';
import { ApiServer } from './http';

const container = createContainer({ injectionMode: InjectionMode.PROXY });

container.register({
  config: asClass(Config).singleton(),
  logger: asFunction(({ config }) => new ConsoleLogger(config)).singleton(),
  // One lock per process: every paired allocator must share it.
  allocationLock: asClass(AllocationLock).singleton(),
  socketBinder: asFunction(({ logger }) => new DgramSocketBinder(logger)).singleton(),
  pairedPortAllocator: asFunction(
    ({ socketBinder, allocationLock, logger, config }) =>
      new PairedPortAllocator(socketBinder, allocationLock, logger, {
        maxRetries: config.RTP_BIND_RETRIES,
        socketBufferSize: config.RTP_SOCKET_BUFFER_SIZE,
        capAtEndPort: config.RTP_CAP_AT_END_PORT,
      })
  ).singleton(),
  randomPortAllocator: asFunction(
    ({ socketBinder, logger, config }) =>
      new RandomPortAllocator(socketBinder, logger, {
        maxAttempts: config.RANDOM_PORT_ATTEMPTS,
        defaultStart: config.UDP_PORT_START,
        defaultEnd: config.UDP_PORT_END,
      })
  ).singleton(),
  localRouteResolver: asFunction(
    ({ logger, config }) => new LocalRouteResolver(logger, config.ROUTE_PROBE_PORT)
  ).singleton(),
  apiServer: asFunction(
    ({ config, logger, allocationLock, localRouteResolver }) =>
      new ApiServer(config, logger, allocationLock, localRouteResolver)
  ).singleton(),
});

export { container };
