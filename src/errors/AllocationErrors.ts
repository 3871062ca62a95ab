export class PortAllocationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Every bind attempt hit a conflict. Terminal: the caller decides whether to
 * try again with another range.
 */
export class RangeExhaustedError extends PortAllocationError {
  constructor(
    public readonly address: string,
    public readonly start: number,
    public readonly end: number,
    public readonly attempts: number
  ) {
    super(
      `Failed to bind a UDP socket on address ${address} within the port range ${start} to ${end} after ${attempts} attempt(s)`
    );
  }
}

/** Rejected before any socket was created. */
export class InvalidAllocationRequestError extends PortAllocationError {}

export class RouteResolutionError extends PortAllocationError {
  constructor(public readonly destination: string, cause: unknown) {
    super(`Unable to determine the local address used to reach ${destination}`, { cause });
  }
}
