export const DEFAULT_BUFFER_SIZE = 2_097_152;

export const DEFAULT_MULTICAST_GROUP = {
  host: '239.0.0.1',
  port: 6766,
} as const;

export const DEFAULT_MULTICAST_BIND_ADDRESS = '0.0.0.0';

export const DEFAULT_MULTICAST_TTL = 0;

/** Host the controller listens on for the peer's command connection */
export const DEFAULT_COMMAND_HOST = '127.0.0.1';

export const DEFAULT_TIMEOUTS = {
  /** Overall budget for one ping/pong round */
  discoveryMs: 500,
  /** Wait for the peer to connect back after open_connection */
  acceptMs: 2000,
  /** Wait for one command result */
  commandMs: 5000,
} as const;
