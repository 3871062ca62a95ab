export * from './ApiServer';
export * from './routes';
