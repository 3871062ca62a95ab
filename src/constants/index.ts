export * from './addressFamily';
export * from './ports';
