export * from './configurations';
export * from './constants';
export * from './errors';
export * from './logging';
export * from './media';
export * from './net';
export { ApiServer } from './http';
