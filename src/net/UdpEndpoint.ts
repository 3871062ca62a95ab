import net from 'net';
import { AddressFamily, AddressFamilyType } from '../constants';
import { InvalidAllocationRequestError } from '../errors';

export class UdpEndpoint {
  constructor(
    public readonly address: string,
    public readonly port: number,
    public readonly family: AddressFamilyType = UdpEndpoint.familyOf(address)
  ) {}

  toString(): string {
    return this.family === AddressFamily.IPv6 ? `[${this.address}]:${this.port}` : `${this.address}:${this.port}`;
  }

  static familyOf(address: string): AddressFamilyType {
    switch (net.isIP(address)) {
      case 4:
        return AddressFamily.IPv4;
      case 6:
        return AddressFamily.IPv6;
      default:
        throw new InvalidAllocationRequestError(`${address} is not an IPv4 or IPv6 address`);
    }
  }
}
