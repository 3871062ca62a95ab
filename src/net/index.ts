export * from './AllocationLock';
export * from './LocalRouteResolver';
export * from './PortRange';
export * from './RandomPortAllocator';
export * from './SecureRandom';
export * from './SocketBinder';
export * from './UdpEndpoint';
