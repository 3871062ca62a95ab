export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export const UDP_PORT_START = 1025;
export const UDP_PORT_END = 65535;

export const RTP_SOCKET_BUFFER_SIZE = 100_000_000;
// Re-attempts after the first bind, each one two ports higher.
export const MAXIMUM_RTP_PORT_BIND_RETRIES = 5;
export const MAXIMUM_RANDOM_PORT_BIND_ATTEMPTS = 50;

// Discard service; connecting a datagram socket sends nothing.
export const ROUTE_PROBE_PORT = 9;
