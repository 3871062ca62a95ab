import { Request, Response } from 'express';
import { InvalidAllocationRequestError, RouteResolutionError } from '../../errors';
import { Logger } from '../../logging/Logger';
import { LocalRouteResolver } from '../../net';

export class RouteController {
  constructor(
    private readonly resolver: LocalRouteResolver,
    private readonly logger: Logger
  ) {}

  public async resolve(req: Request, res: Response): Promise<void> {
    const { destination } = req.query;
    if (typeof destination !== 'string' || destination.length === 0) {
      res.status(400).json({ error: 'Query parameter "destination" is required' });
      return;
    }

    try {
      const localAddress = await this.resolver.resolveLocalAddress(destination);
      res.status(200).json({ destination, localAddress });
    } catch (err) {
      if (err instanceof InvalidAllocationRequestError) {
        res.status(400).json({ error: err.message });
        return;
      }
      if (err instanceof RouteResolutionError) {
        this.logger.warn(err.message, err.cause);
        res.status(502).json({ error: err.message });
        return;
      }
      throw err;
    }
  }
}
