import { MAX_PORT, MIN_PORT } from '../constants';
import { InvalidAllocationRequestError } from '../errors';

export class PortRange {
  public readonly start: number;
  public readonly end: number;

  constructor(start: number, end: number) {
    if (!PortRange.isValidPort(start) || !PortRange.isValidPort(end)) {
      throw new InvalidAllocationRequestError(`Port range ${start} to ${end} must lie within ${MIN_PORT} to ${MAX_PORT}`);
    }
    if (start > end) {
      throw new InvalidAllocationRequestError('Port range start must not be greater than its end');
    }
    this.start = start;
    this.end = end;
  }

  /** Number of ports in the half-open draw range `[start, end)`. */
  public get size(): number {
    return this.end - this.start;
  }

  public toString(): string {
    return `${this.start}-${this.end}`;
  }

  public static isValidPort(port: number): boolean {
    return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
  }
}
