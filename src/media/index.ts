export * from './PairedPortAllocator';
