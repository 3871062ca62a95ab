import express from 'express';
import { AllocatorController, HealthController, RouteController } from './controllers';

export const createApiRoutes = (
  allocatorController: AllocatorController,
  routeController: RouteController
): express.Router => {
  const router = express.Router();

  router.get('/health', HealthController.healthCheck);
  router.get('/allocator', allocatorController.settings.bind(allocatorController));
  router.get('/route', (req, res, next) => {
    routeController.resolve(req, res).catch(next);
  });

  return router;
};

export default createApiRoutes;
