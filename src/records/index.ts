export * from './backend';
export * from './body';
export * from './elabftw-backend';
export * from './memory-backend';
export * from './record-client';
