import { Request, Response } from 'express';
import { Config } from '../../configurations';
import { AllocationLock } from '../../net';

export class AllocatorController {
  constructor(
    private readonly config: Config,
    private readonly allocationLock: AllocationLock
  ) {}

  public settings(_req: Request, res: Response): void {
    res.status(200).json({
      bindAddress: this.config.BIND_ADDRESS,
      paired: {
        rangeStart: this.config.RTP_PORT_RANGE_START,
        rangeEnd: this.config.RTP_PORT_RANGE_END,
        maxRetries: this.config.RTP_BIND_RETRIES,
        socketBufferSize: this.config.RTP_SOCKET_BUFFER_SIZE,
        capAtEndPort: this.config.RTP_CAP_AT_END_PORT,
        allocationInProgress: this.allocationLock.isLocked,
      },
      random: {
        rangeStart: this.config.UDP_PORT_START,
        rangeEnd: this.config.UDP_PORT_END,
        maxAttempts: this.config.RANDOM_PORT_ATTEMPTS,
      },
    });
  }
}
