export * from './storage-unavailable.error';
