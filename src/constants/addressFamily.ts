export const AddressFamily = {
  IPv4: 'IPv4',
  IPv6: 'IPv6',
} as const;

export type AddressFamilyType = (typeof AddressFamily)[keyof typeof AddressFamily];

export const SocketTypeByFamily = {
  IPv4: 'udp4',
  IPv6: 'udp6',
} as const satisfies Record<AddressFamilyType, 'udp4' | 'udp6'>;
