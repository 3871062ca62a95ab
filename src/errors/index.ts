export * from './AllocationErrors';
