import {
  MAXIMUM_RANDOM_PORT_BIND_ATTEMPTS,
  MAXIMUM_RTP_PORT_BIND_RETRIES,
  ROUTE_PROBE_PORT,
  RTP_SOCKET_BUFFER_SIZE,
  UDP_PORT_END,
  UDP_PORT_START,
} from '../constants';
import { LogLevel } from '../logging/Logger';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const parseList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const parseFlag = (value: string | undefined): boolean => {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
};

const parseCount = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
};

const parsePositiveCount = (value: string | undefined, fallback: number): number => {
  const parsed = parseCount(value, fallback);
  return parsed >= 1 ? parsed : fallback;
};

const parseLogLevel = (value: string | undefined): LogLevel =>
  LOG_LEVELS.find((level) => level === value?.trim().toLowerCase()) ?? 'info';

export class Config {
  public readonly HTTP_PORT: number = Number(process.env.HTTP_PORT) || 8080;
  public readonly HTTP_CORS_ORIGINS: string[] = parseList(process.env.HTTP_CORS_ORIGINS);

  public readonly BIND_ADDRESS: string = process.env.BIND_ADDRESS || '127.0.0.1';

  // Paired media/control allocation
  public readonly RTP_PORT_RANGE_START: number = Number(process.env.RTP_PORT_RANGE_START) || 10000;
  public readonly RTP_PORT_RANGE_END: number = Number(process.env.RTP_PORT_RANGE_END) || 20000;
  public readonly RTP_SOCKET_BUFFER_SIZE: number = Number(process.env.RTP_SOCKET_BUFFER_SIZE) || RTP_SOCKET_BUFFER_SIZE;
  public readonly RTP_BIND_RETRIES: number = parseCount(process.env.RTP_BIND_RETRIES, MAXIMUM_RTP_PORT_BIND_RETRIES);
  public readonly RTP_CAP_AT_END_PORT: boolean = parseFlag(process.env.RTP_CAP_AT_END_PORT);

  // Random single-listener allocation
  public readonly UDP_PORT_START: number = Number(process.env.UDP_PORT_START) || UDP_PORT_START;
  public readonly UDP_PORT_END: number = Number(process.env.UDP_PORT_END) || UDP_PORT_END;
  public readonly RANDOM_PORT_ATTEMPTS: number = parsePositiveCount(process.env.RANDOM_PORT_ATTEMPTS, MAXIMUM_RANDOM_PORT_BIND_ATTEMPTS);

  public readonly ROUTE_PROBE_PORT: number = Number(process.env.ROUTE_PROBE_PORT) || ROUTE_PROBE_PORT;

  public readonly LOG_LEVEL: LogLevel = parseLogLevel(process.env.LOG_LEVEL);
}
