import { Config } from '../configurations';
import { Logger, LogLevel } from './Logger';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(config?: Pick<Config, 'LOG_LEVEL'>) {
    this.threshold = LEVEL_ORDER[config?.LOG_LEVEL ?? 'info'];
  }

  public debug(message: string, meta?: unknown): void {
    if (this.enabled('debug')) console.debug(`[DEBUG] ${message}`, meta ?? '');
  }

  public info(message: string, meta?: unknown): void {
    if (this.enabled('info')) console.log(`[INFO] ${message}`, meta ?? '');
  }

  public warn(message: string, meta?: unknown): void {
    if (this.enabled('warn')) console.warn(`[WARN] ${message}`, meta ?? '');
  }

  public error(message: string, meta?: unknown): void {
    if (this.enabled('error')) console.error(`[ERROR] ${message}`, meta ?? '');
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}
