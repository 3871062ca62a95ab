export * from './Logger';
export * from './ConsoleLogger';
