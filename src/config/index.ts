export * from './schema';
export * from './config-store';
