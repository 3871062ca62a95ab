import express from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { Logger } from '../logging/Logger';
import { AllocationLock, LocalRouteResolver } from '../net';
import { AllocatorController, RouteController } from './controllers';
import { createApiRoutes } from './routes';
import { Config } from '../configurations';

export class ApiServer {
  private app = express();
  private server?: Server;
  private config: Config;
  private logger: Logger;

  constructor(config: Config, logger: Logger, allocationLock: AllocationLock, routeResolver: LocalRouteResolver) {
    this.config = config;
    this.logger = logger;

    this.setupMiddleware();
    this.setupRoutes(
      new AllocatorController(config, allocationLock),
      new RouteController(routeResolver, logger)
    );
  }

  private setupMiddleware(): void {
    if (this.config.HTTP_CORS_ORIGINS.length > 0) {
      this.app.use(
        cors({
          origin: this.config.HTTP_CORS_ORIGINS,
        })
      );
    }
    this.app.use(express.json());
  }

  private setupRoutes(allocatorController: AllocatorController, routeController: RouteController): void {
    this.app.use('/api', createApiRoutes(allocatorController, routeController));
  }

  public start(): void {
    this.server = this.app.listen(this.config.HTTP_PORT, () => {
      this.logger.info(`API Server running on port ${this.config.HTTP_PORT}`);
    });
  }

  public stop(): void {
    this.server?.close();
    this.server = undefined;
  }
}
