export * from './AllocatorController';
export * from './HealthController';
export * from './RouteController';
