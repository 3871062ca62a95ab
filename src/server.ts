import dotenv from 'dotenv';
import { Config } from './configurations';
import { Logger } from './logging/Logger';
import { ApiServer } from './http';
import { container } from './container';

// Config reads process.env when the container first builds it.
dotenv.config();

const logger = container.resolve<Logger>('logger');
const config = container.resolve<Config>('config');

logger.info(
  `RTP ports ${config.RTP_PORT_RANGE_START}-${config.RTP_PORT_RANGE_END} on ${config.BIND_ADDRESS}, ` +
    `random listeners ${config.UDP_PORT_START}-${config.UDP_PORT_END}`
);

const apiServer = container.resolve<ApiServer>('apiServer');
apiServer.start();

const shutdown = () => {
  logger.info('Shutting down port allocator...');
  apiServer.stop();
  process.exit(0);
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
